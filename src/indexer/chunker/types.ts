/**
 * Chunker Types
 */

/**
 * Recursive splitter settings. Separators are tried in order; the empty
 * string splits into single characters and must come last.
 */
export interface ChunkerConfig {
  /** Maximum characters per chunk */
  chunkSize: number;

  /** Characters carried over from the end of one chunk into the next */
  chunkOverlap: number;

  separators: readonly string[];
}

/**
 * A chunk ready for embedding. Becomes one passage in the knowledge base.
 */
export interface ChunkResult {
  /** UUID, used to report per-chunk embedding failures */
  id: string;

  content: string;

  /** Relative path of the originating document */
  source: string;

  metadata: {
    /** Position of this chunk within the file (0-indexed) */
    chunkIndex: number;
    totalChunks: number;
    /** Original file size in bytes */
    originalSize: number;
  };
}

export type SkipReason = 'too_large' | 'read_error' | 'empty';

export interface FileChunkResult {
  filePath: string;
  /** False only when the file could not be chunked at all */
  success: boolean;
  chunks: ChunkResult[];
  skipReason?: SkipReason;
  error?: string;
}

export interface BatchChunkResult {
  files: FileChunkResult[];
  successCount: number;
  failureCount: number;
  /** "<path>: <message>" lines */
  errors: string[];
}

export interface ChunkOptions {
  onChunk?: (chunk: ChunkResult) => void;
}
