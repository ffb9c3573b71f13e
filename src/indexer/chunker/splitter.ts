/**
 * Recursive character splitter.
 *
 * Splits on the coarsest separator present, recurses into pieces that are
 * still too long with the next separator, then greedily merges adjacent
 * pieces back up to `chunkSize`, keeping up to `chunkOverlap` characters
 * of context between consecutive chunks. Separators stay attached to the
 * end of the piece they terminate, so Chinese sentence punctuation is
 * not lost.
 */

import type { ChunkerConfig } from './types.js';

export const DEFAULT_SEPARATORS = ['\n\n', '\n', '。', '；', '!', '?', '，', '、', ' ', ''] as const;

export const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: 500,
  chunkOverlap: 50,
  separators: DEFAULT_SEPARATORS,
};

export class RecursiveTextSplitter {
  private readonly config: ChunkerConfig;

  constructor(config: Partial<ChunkerConfig> = {}) {
    this.config = { ...DEFAULT_CHUNKER_CONFIG, ...config };

    if (this.config.chunkSize < 1) {
      throw new RangeError(`chunkSize must be positive, got ${this.config.chunkSize}`);
    }
    if (this.config.chunkOverlap < 0 || this.config.chunkOverlap >= this.config.chunkSize) {
      throw new RangeError(
        `chunkOverlap must be in [0, chunkSize), got ${this.config.chunkOverlap} with chunkSize ${this.config.chunkSize}`
      );
    }
  }

  split(text: string): string[] {
    return this.splitWith(text, this.config.separators);
  }

  private splitWith(text: string, separators: readonly string[]): string[] {
    const index = separators.findIndex((s) => s === '' || text.includes(s));
    // No separator applies and no '' fallback was configured
    if (index === -1) {
      return this.merge([text]);
    }

    const separator = separators[index] ?? '';
    const remaining = separators.slice(index + 1);
    const pieces = separator === '' ? Array.from(text) : splitKeepingSeparator(text, separator);

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of pieces) {
      if (piece.length <= this.config.chunkSize) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending));
        pending = [];
      }
      if (remaining.length === 0) {
        chunks.push(piece.trim());
      } else {
        chunks.push(...this.splitWith(piece, remaining));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending));
    }

    return chunks.filter((chunk) => chunk !== '');
  }

  private merge(pieces: string[]): string[] {
    const { chunkSize, chunkOverlap } = this.config;
    const docs: string[] = [];
    const current: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > chunkSize && current.length > 0) {
        const doc = current.join('').trim();
        if (doc !== '') docs.push(doc);

        // Drop from the front until what is left fits as overlap
        while (total > chunkOverlap || (total + piece.length > chunkSize && total > 0)) {
          const dropped = current.shift();
          total -= dropped === undefined ? total : dropped.length;
        }
      }
      current.push(piece);
      total += piece.length;
    }

    const doc = current.join('').trim();
    if (doc !== '') docs.push(doc);

    return docs;
  }
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  const parts = text.split(separator);
  return parts
    .map((part, i) => (i < parts.length - 1 ? part + separator : part))
    .filter((part) => part !== '');
}
