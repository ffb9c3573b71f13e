/**
 * Knowledge Retriever
 *
 * The boundary around a SimilarityIndex. Callers get passages or an empty
 * list, never an exception; the failure reason goes to the logger and to
 * `searchDetailed().error`.
 */

import { consoleLogger, type Logger } from '../utils/logger.js';
import type {
  Passage,
  RetrieverOptions,
  SearchOutcome,
  SimilarityIndex,
  SimilaritySearchOptions,
} from './types.js';

export const UNKNOWN_SOURCE = 'Unknown';

/**
 * @example
 * ```typescript
 * const retriever = new KnowledgeRetriever(new SqliteVectorIndex(db, provider));
 * const passages = await retriever.search('高血压诊断标准', 3);
 * for (const p of passages) {
 *   console.log(`${p.source} ${p.score.toFixed(3)}`);
 * }
 * ```
 */
export class KnowledgeRetriever {
  private readonly minScore?: number;

  constructor(
    private readonly index: SimilarityIndex,
    options: RetrieverOptions = {},
    private readonly logger: Logger = consoleLogger
  ) {
    this.minScore = options.minScore;
  }

  /**
   * Up to `k` passages, best first. Empty on failure.
   */
  async search(query: string, k: number, options: SimilaritySearchOptions = {}): Promise<Passage[]> {
    const outcome = await this.searchDetailed(query, k, options);
    return outcome.passages;
  }

  async searchDetailed(query: string, k: number, options: SimilaritySearchOptions = {}): Promise<SearchOutcome> {
    if (!Number.isInteger(k) || k < 1) {
      const error = `k must be a positive integer, got ${k}`;
      this.logger.warn(`Knowledge search skipped: ${error}`);
      return { passages: [], error };
    }

    let raw: Passage[];
    try {
      raw = await this.index.similaritySearch(query, k, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Knowledge search failed: ${message}`);
      return { passages: [], error: message };
    }

    const minScore = this.minScore;
    const passages = raw
      .filter((passage) => minScore === undefined || passage.score >= minScore)
      .slice(0, k)
      .map((passage) =>
        Object.freeze({
          content: passage.content,
          source: passage.source.trim() === '' ? UNKNOWN_SOURCE : passage.source,
          score: passage.score,
        })
      );

    this.logger.debug?.(`Knowledge search returned ${passages.length} passage(s)`);
    return { passages };
  }
}
