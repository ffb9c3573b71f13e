/**
 * Embedder Orchestration
 *
 * Turns ChunkResult[] into EmbeddedChunk[]: batches requests, bounds each
 * with a timeout, and falls back to one request per chunk when a batch
 * fails so a single bad input only costs itself.
 */

import { withTimeout } from '../../utils/timeout.js';
import type { ChunkResult } from '../chunker/types.js';
import type { EmbeddedChunk, EmbedderOptions, EmbeddingProvider } from './types.js';

export const DEFAULT_EMBED_BATCH_SIZE = 16;
export const DEFAULT_EMBED_TIMEOUT_MS = 30000;

async function embedBatch(
  provider: EmbeddingProvider,
  texts: string[],
  timeoutMs: number,
  parent?: AbortSignal
): Promise<Float32Array[]> {
  const vectors = await withTimeout((signal) => provider.embed(texts, { signal }), timeoutMs, {
    parent,
    label: 'Embedding request',
  });
  return vectors.map((vector) => new Float32Array(vector));
}

/**
 * Embed a single query string.
 *
 * @throws Error if the provider fails, returns nothing, or times out
 */
export async function embedQuery(
  provider: EmbeddingProvider,
  text: string,
  options: { timeoutMs?: number; signal?: AbortSignal } = {}
): Promise<Float32Array> {
  const [vector] = await embedBatch(provider, [text], options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS, options.signal);
  if (!vector || vector.length === 0) {
    throw new Error('Empty embedding returned for query');
  }
  return vector;
}

/**
 * Compute embeddings for chunks.
 *
 * @example
 * ```typescript
 * const embedded = await embedChunks(chunks, provider, {
 *   batchSize: 10,
 *   onProgress: (done, total) => console.log(`${done}/${total} chunks embedded`),
 * });
 * ```
 */
export async function embedChunks(
  chunks: ChunkResult[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbeddedChunk[]> {
  const {
    batchSize = DEFAULT_EMBED_BATCH_SIZE,
    timeoutMs = DEFAULT_EMBED_TIMEOUT_MS,
    signal,
    onProgress,
    onError,
  } = options;

  const embedded: EmbeddedChunk[] = [];
  let processed = 0;

  const accept = (chunk: ChunkResult, embedding: Float32Array | undefined): void => {
    if (!embedding || embedding.length === 0) {
      onError?.(new Error('Empty embedding returned for chunk'), chunk.id);
      return;
    }
    embedded.push({ ...chunk, embedding });
  };

  for (let i = 0; i < chunks.length; i += batchSize) {
    if (signal?.aborted) {
      break;
    }

    const batch = chunks.slice(i, i + batchSize);

    try {
      const embeddings = await embedBatch(
        provider,
        batch.map((chunk) => chunk.content),
        timeoutMs,
        signal
      );
      batch.forEach((chunk, j) => accept(chunk, embeddings[j]));
      processed += batch.length;
      onProgress?.(processed, chunks.length);
    } catch {
      // Isolate the failing input(s) by retrying one at a time
      for (const chunk of batch) {
        if (signal?.aborted) {
          break;
        }

        try {
          const [embedding] = await embedBatch(provider, [chunk.content], timeoutMs, signal);
          accept(chunk, embedding);
        } catch (chunkError) {
          onError?.(chunkError instanceof Error ? chunkError : new Error(String(chunkError)), chunk.id);
        }

        processed++;
        onProgress?.(processed, chunks.length);
      }
    }
  }

  return embedded;
}
