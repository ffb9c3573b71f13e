/**
 * Search Module Types
 *
 * Scores are cosine similarities: higher is closer, range [-1, 1]. Every
 * index in this package ranks by that convention, and `minScore` is a
 * lower bound on it.
 */

/**
 * One retrieved piece of reference text.
 */
export interface Passage {
  readonly content: string;
  /** Originating document; "Unknown" when the index has none */
  readonly source: string;
  readonly score: number;
}

export interface SimilaritySearchOptions {
  signal?: AbortSignal;
}

/**
 * Opaque nearest-neighbour service.
 *
 * Returns at most `k` passages, best first. Ties keep the index's native
 * order. Implementations may reject; KnowledgeRetriever is the boundary
 * that turns failures into empty results.
 */
export interface SimilarityIndex {
  similaritySearch(query: string, k: number, options?: SimilaritySearchOptions): Promise<Passage[]>;
}

/**
 * Result of a search with its diagnostics side channel.
 * `error` is set only when the index failed; "no results" has no error.
 */
export interface SearchOutcome {
  passages: Passage[];
  error?: string;
}

export interface RetrieverOptions {
  /** Drop passages scoring below this similarity */
  minScore?: number;
}

export interface VectorIndexOptions {
  /**
   * Deadline for the query embedding request.
   * @default 30000
   */
  timeoutMs?: number;
}
