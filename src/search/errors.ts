/**
 * Search Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown when a query is embedded with a different model (or into a
 * different number of dimensions) than the stored passages.
 *
 * Exit code 6: Search validation error
 *
 * @example
 * ```typescript
 * if (info.embeddingModel !== provider.model) {
 *   throw new EmbeddingMismatchError(info.embeddingModel, provider.model);
 * }
 * ```
 */
export class EmbeddingMismatchError extends CLIError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, actual: string) {
    super(
      `Knowledge base embeddings do not match the query embeddings`,
      `Expected: ${expected}\n` +
        `Received: ${actual}\n\n` +
        `Suggestion: Re-index with: medqa index <dir> --rebuild`,
      6
    );
    this.name = 'EmbeddingMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}
