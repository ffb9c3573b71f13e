/**
 * SQLite-backed Similarity Index
 *
 * Loads every stored vector from the passages table on first search and
 * ranks by exact cosine similarity. Knowledge bases here are a few
 * thousand passages, so a linear scan is fast enough.
 */

import type { DatabaseOperations } from '../database/index.js';
import { embedQuery, DEFAULT_EMBED_TIMEOUT_MS, type EmbeddingProvider } from '../indexer/embedder/index.js';
import { EmbeddingMismatchError } from './errors.js';
import type { Passage, SimilarityIndex, SimilaritySearchOptions, VectorIndexOptions } from './types.js';

interface IndexEntry {
  content: string;
  source: string;
  vector: Float32Array;
  norm: number;
}

function norm(vector: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    const value = vector[i] ?? 0;
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity; 0 when either vector has zero length.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array, normA = norm(a), normB = norm(b)): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector lengths differ: ${a.length} vs ${b.length}`);
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return dot / (normA * normB);
}

export class SqliteVectorIndex implements SimilarityIndex {
  private entries: IndexEntry[] | null = null;
  private readonly timeoutMs: number;

  constructor(
    private readonly database: DatabaseOperations,
    private readonly embeddingProvider: EmbeddingProvider,
    options: VectorIndexOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
  }

  /** Number of loaded passages (0 before the first search) */
  get size(): number {
    return this.entries?.length ?? 0;
  }

  /**
   * Drop the cached vectors; the next search reloads them.
   * Call after re-indexing.
   */
  invalidate(): void {
    this.entries = null;
  }

  /**
   * @throws EmbeddingMismatchError when the store was built with another model
   * @throws Error when the query cannot be embedded
   */
  async similaritySearch(query: string, k: number, options: SimilaritySearchOptions = {}): Promise<Passage[]> {
    if (k < 1) {
      return [];
    }

    const entries = this.ensureLoaded();
    if (entries.length === 0) {
      return [];
    }

    const info = this.database.getInfo();
    if (info.embeddingModel !== null && info.embeddingModel !== this.embeddingProvider.model) {
      throw new EmbeddingMismatchError(info.embeddingModel, this.embeddingProvider.model);
    }

    const queryVector = await embedQuery(this.embeddingProvider, query, {
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    const expectedDims = entries[0]?.vector.length ?? 0;
    if (queryVector.length !== expectedDims) {
      throw new EmbeddingMismatchError(
        `${expectedDims} dimensions`,
        `${queryVector.length} dimensions`
      );
    }

    const queryNorm = norm(queryVector);
    const scored = entries.map((entry, position) => ({
      entry,
      position,
      score: cosineSimilarity(queryVector, entry.vector, queryNorm, entry.norm),
    }));

    // Array.prototype.sort is stable; position keeps insertion order on ties
    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, k).map(({ entry, score }) => ({
      content: entry.content,
      source: entry.source,
      score,
    }));
  }

  private ensureLoaded(): IndexEntry[] {
    if (!this.entries) {
      this.entries = this.database.loadPassages().map((record) => ({
        content: record.content,
        source: record.source,
        vector: record.embedding,
        norm: norm(record.embedding),
      }));
    }
    return this.entries;
  }
}
