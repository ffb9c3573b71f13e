/**
 * Search Module
 *
 * Similarity search over the knowledge base.
 */

export type {
  Passage,
  SimilarityIndex,
  SimilaritySearchOptions,
  SearchOutcome,
  RetrieverOptions,
  VectorIndexOptions,
} from './types.js';

export { SqliteVectorIndex, cosineSimilarity } from './vector-index.js';
export { KnowledgeRetriever, UNKNOWN_SOURCE } from './retriever.js';
export { EmbeddingMismatchError } from './errors.js';
