/**
 * Index Pipeline
 *
 * Scan → Chunk → Embed → Store.
 *
 * The pipeline knows nothing about display; it fires callbacks and the
 * CLI's ProgressReporter renders them. Non-fatal problems are collected
 * in the result, not thrown.
 */

import { ConfigError } from '../errors/index.js';
import type { DatabaseOperations } from '../database/index.js';
import { scanDirectory } from './scanner.js';
import { chunkFilesWithResult, type ChunkerConfig } from './chunker/index.js';
import { embedChunks, type EmbeddingProvider } from './embedder/index.js';
import type { FileInfo, IndexingStage, IndexPipelineResult, StageStats } from './types.js';

export interface IndexPipelineOptions {
  /** Directory holding the reference documents */
  rootPath: string;

  embeddingProvider: EmbeddingProvider;

  /** Target store; usually getDatabase() */
  database: DatabaseOperations;

  chunkerConfig?: Partial<ChunkerConfig>;

  embeddingBatchSize?: number;
  embeddingTimeoutMs?: number;

  /**
   * Drop the whole knowledge base before storing. Required when the
   * embedding model changes, since old and new vectors are not comparable.
   */
  rebuild?: boolean;

  additionalIgnorePatterns?: string[];

  /** Checked between stages and between embedding batches */
  signal?: AbortSignal;

  onStageStart?: (stage: IndexingStage, total: number) => void;
  onProgress?: (stage: IndexingStage, processed: number, total: number, currentFile?: string) => void;
  onStageComplete?: (stage: IndexingStage, stats: StageStats) => void;
  onWarning?: (message: string, context?: string) => void;
  onError?: (error: Error, context?: string) => void;
}

export class IndexingCancelledError extends Error {
  constructor() {
    super('Indexing cancelled');
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'IndexingCancelledError';
  }
}

function checkCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new IndexingCancelledError();
  }
}

/**
 * Run the complete indexing pipeline.
 *
 * Each file's passages replace whatever the store held for that source,
 * so re-running over the same directory is safe.
 *
 * @throws ConfigError when the store was built with a different embedding model
 * @throws IndexingCancelledError when `signal` aborts
 *
 * @example
 * ```typescript
 * const result = await runIndexPipeline({
 *   rootPath: './knowledge',
 *   embeddingProvider: createEmbeddingProvider(config.embedding),
 *   database: getDatabase(),
 * });
 * console.log(`${result.chunksStored} passages stored`);
 * ```
 */
export async function runIndexPipeline(options: IndexPipelineOptions): Promise<IndexPipelineResult> {
  const {
    rootPath,
    embeddingProvider,
    database,
    signal,
    onStageStart,
    onProgress,
    onStageComplete,
    onWarning,
    onError,
  } = options;

  const startTime = performance.now();
  const warnings: string[] = [];
  const errors: string[] = [];
  const stageDurations: Partial<Record<IndexingStage, number>> = {};

  const existing = database.getInfo();
  if (
    !options.rebuild &&
    existing.passageCount > 0 &&
    existing.embeddingModel !== null &&
    existing.embeddingModel !== embeddingProvider.model
  ) {
    throw new ConfigError(
      `Knowledge base was built with embedding model '${existing.embeddingModel}', ` +
        `but '${embeddingProvider.model}' is configured`,
      'Re-run with --rebuild to re-embed every document with the configured model'
    );
  }

  // =========================================================================
  // STAGE 1: SCANNING
  // =========================================================================
  checkCancelled(signal);
  let stageStart = performance.now();
  onStageStart?.('scanning', 0);

  let filesScanned = 0;
  const scanResult = await scanDirectory(rootPath, {
    additionalIgnorePatterns: options.additionalIgnorePatterns,
    onFile: (file: FileInfo) => {
      filesScanned++;
      onProgress?.('scanning', filesScanned, 0, file.relativePath);
    },
    onError: (path: string, error: Error) => {
      const message = `Failed to read file info: ${error.message}`;
      warnings.push(`${path}: ${message}`);
      onWarning?.(message, path);
    },
  });

  stageDurations.scanning = Math.round(performance.now() - stageStart);
  onStageComplete?.('scanning', {
    stage: 'scanning',
    processed: scanResult.files.length,
    total: scanResult.files.length,
    durationMs: stageDurations.scanning,
    details: { totalSize: scanResult.stats.totalSize, byExtension: scanResult.stats.byExtension },
  });

  // =========================================================================
  // STAGE 2: CHUNKING
  // =========================================================================
  checkCancelled(signal);
  stageStart = performance.now();
  onStageStart?.('chunking', scanResult.files.length);

  let filesChunked = 0;
  let lastChunkedFile = '';
  const chunkResult = await chunkFilesWithResult(scanResult.files, options.chunkerConfig, {
    onChunk: (chunk) => {
      if (chunk.source !== lastChunkedFile) {
        filesChunked++;
        lastChunkedFile = chunk.source;
        onProgress?.('chunking', filesChunked, scanResult.files.length, chunk.source);
      }
    },
  });

  for (const file of chunkResult.files) {
    if (!file.success) {
      const message = file.error ?? 'could not be chunked';
      warnings.push(`${file.filePath}: ${message}`);
      onWarning?.(message, file.filePath);
    }
  }

  const chunks = chunkResult.files.flatMap((file) => file.chunks);
  stageDurations.chunking = Math.round(performance.now() - stageStart);
  onStageComplete?.('chunking', {
    stage: 'chunking',
    processed: chunks.length,
    total: chunks.length,
    durationMs: stageDurations.chunking,
    details: { filesProcessed: chunkResult.successCount, filesFailed: chunkResult.failureCount },
  });

  // =========================================================================
  // STAGE 3: EMBEDDING
  // =========================================================================
  checkCancelled(signal);
  stageStart = performance.now();
  onStageStart?.('embedding', chunks.length);

  const embedded = await embedChunks(chunks, embeddingProvider, {
    batchSize: options.embeddingBatchSize,
    timeoutMs: options.embeddingTimeoutMs,
    signal,
    onProgress: (processed, total) => onProgress?.('embedding', processed, total),
    onError: (error, chunkId) => {
      errors.push(`Chunk ${chunkId}: ${error.message}`);
      onError?.(error, chunkId);
    },
  });

  // embedChunks stops early on abort; storing a partial run would silently drop files
  checkCancelled(signal);

  stageDurations.embedding = Math.round(performance.now() - stageStart);
  onStageComplete?.('embedding', {
    stage: 'embedding',
    processed: embedded.length,
    total: chunks.length,
    durationMs: stageDurations.embedding,
  });

  // =========================================================================
  // STAGE 4: STORING
  // =========================================================================
  stageStart = performance.now();
  onStageStart?.('storing', embedded.length);

  const dimensions = embedded[0]?.embedding.length ?? 0;
  const mismatched = embedded.find((chunk) => chunk.embedding.length !== dimensions);
  if (mismatched) {
    throw new Error(
      `Embedding dimensions differ within one run (${dimensions} vs ${mismatched.embedding.length})`
    );
  }

  if (options.rebuild) {
    database.clear();
  }

  const stored = database.replaceSources(
    embedded.map((chunk) => ({
      content: chunk.content,
      source: chunk.source,
      embedding: chunk.embedding,
      metadata: { ...chunk.metadata },
    }))
  );

  if (dimensions > 0) {
    database.setEmbeddingInfo(embeddingProvider.model, dimensions);
  }

  onProgress?.('storing', stored.length, embedded.length);
  stageDurations.storing = Math.round(performance.now() - stageStart);
  onStageComplete?.('storing', {
    stage: 'storing',
    processed: stored.length,
    total: embedded.length,
    durationMs: stageDurations.storing,
  });

  return {
    rootPath: scanResult.rootPath,
    filesIndexed: chunkResult.successCount,
    chunksCreated: chunks.length,
    chunksStored: stored.length,
    embeddingModel: embeddingProvider.model,
    embeddingDimensions: dimensions,
    totalDurationMs: Math.round(performance.now() - startTime),
    stageDurations,
    warnings,
    errors,
  };
}
