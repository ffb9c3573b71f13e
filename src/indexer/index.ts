/**
 * Indexer Module
 *
 * Offline ingestion of reference documents into the knowledge base.
 *
 * @example
 * ```ts
 * import { runIndexPipeline, createEmbeddingProvider } from './indexer/index.js';
 *
 * await runIndexPipeline({
 *   rootPath: './knowledge',
 *   embeddingProvider: createEmbeddingProvider(config.embedding),
 *   database: getDatabase(),
 * });
 * ```
 */

export type {
  FileInfo,
  ScanOptions,
  ScanResult,
  ScanStats,
  IndexingStage,
  StageStats,
  IndexPipelineResult,
} from './types.js';
export { DEFAULT_SUPPORTED_EXTENSIONS, DEFAULT_IGNORE_PATTERNS } from './types.js';

export { scanDirectory } from './scanner.js';
export { createIgnoreFilter, loadIgnoreFile, parseIgnoreContent, MEDQA_IGNORE_FILE, type IgnoreFilter } from './ignore.js';

export * from './chunker/index.js';
export * from './embedder/index.js';

export { runIndexPipeline, IndexingCancelledError, type IndexPipelineOptions } from './pipeline.js';
