/**
 * Embedder Types
 */

import type { ChunkResult } from '../chunker/types.js';

/**
 * Anything that turns texts into vectors. The same provider (and model)
 * must be used for indexing and for queries.
 */
export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per input, in input order */
  embed(texts: string[], options?: { signal?: AbortSignal }): Promise<number[][]>;
}

/**
 * A chunk with its embedding. Float32Array because that is what the
 * passages table stores as a BLOB.
 */
export interface EmbeddedChunk extends ChunkResult {
  embedding: Float32Array;
}

export interface EmbedderOptions {
  /**
   * Texts per request.
   * @default 16
   */
  batchSize?: number;

  /**
   * Deadline per request in milliseconds. Non-positive disables it.
   * @default 30000
   */
  timeoutMs?: number;

  /** Stops before the next batch; chunks embedded so far are returned */
  signal?: AbortSignal;

  onProgress?: (processed: number, total: number) => void;

  /** Non-fatal: the chunk is skipped and processing continues */
  onError?: (error: Error, chunkId: string) => void;
}
