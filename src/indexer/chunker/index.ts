/**
 * Chunker Module
 *
 * Splits reference documents into passages for embedding.
 */

export { chunkFileWithResult, chunkFilesWithResult, MAX_FILE_SIZE } from './chunker.js';
export { RecursiveTextSplitter, DEFAULT_CHUNKER_CONFIG, DEFAULT_SEPARATORS } from './splitter.js';
export type {
  ChunkerConfig,
  ChunkResult,
  ChunkOptions,
  FileChunkResult,
  BatchChunkResult,
  SkipReason,
} from './types.js';
