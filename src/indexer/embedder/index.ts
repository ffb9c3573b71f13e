/**
 * Embedder Module
 *
 * ```typescript
 * const provider = createEmbeddingProvider(config.embedding);
 * const embedded = await embedChunks(chunks, provider, { batchSize: config.embedding.batch_size });
 * ```
 */

export { embedChunks, embedQuery, DEFAULT_EMBED_BATCH_SIZE, DEFAULT_EMBED_TIMEOUT_MS } from './embedder.js';
export {
  createEmbeddingProvider,
  OpenAIEmbeddingProvider,
  CachedEmbeddingProvider,
  type OpenAIEmbeddingClient,
  type EmbeddingClientFactory,
  type EmbeddingProviderOptions,
} from './provider.js';
export type { EmbeddingProvider, EmbeddedChunk, EmbedderOptions } from './types.js';
