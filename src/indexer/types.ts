/**
 * Ingestion Types
 *
 * Contracts for discovering reference documents and reporting on an
 * indexing run.
 */

/**
 * Metadata about a discovered document.
 */
export interface FileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root; stored as the passage source */
  relativePath: string;

  /** Lower-case extension without the dot (e.g., 'md') */
  extension: string;

  /** File size in bytes */
  size: number;

  /** Last modified timestamp (ISO 8601) */
  modifiedAt: string;
}

export interface ScanOptions {
  /**
   * Maximum directory depth to traverse.
   * - 0: Only scan files in the root directory
   * - Infinity (default): No limit
   */
  maxDepth?: number;

  /**
   * Only include files with these extensions (without dot).
   * @default DEFAULT_SUPPORTED_EXTENSIONS
   */
  extensions?: string[];

  /**
   * Extra gitignore-style patterns, applied after .gitignore and .medqaignore.
   * @example ['drafts/', '*.bak.md']
   */
  additionalIgnorePatterns?: string[];

  /** @default false */
  followSymlinks?: boolean;

  onFile?: (file: FileInfo) => void;

  /** Called when a file is skipped because it could not be inspected */
  onError?: (path: string, error: Error) => void;
}

export interface ScanStats {
  totalFiles: number;
  totalSize: number;
  byExtension: Record<string, number>;
  errorsEncountered: number;
  scanDurationMs: number;
}

export interface ScanResult {
  /** Absolute path of the scanned root */
  rootPath: string;
  files: FileInfo[];
  stats: ScanStats;
}

/** Markdown and plain text are the only formats the knowledge base ingests */
export const DEFAULT_SUPPORTED_EXTENSIONS = ['md', 'txt'];

export const DEFAULT_IGNORE_PATTERNS = [
  'node_modules/',
  '.git/',
  '.venv/',
  'venv/',
  '__pycache__/',
  'dist/',
  'build/',
];

// ============================================================================
// Pipeline reporting
// ============================================================================

export type IndexingStage = 'scanning' | 'chunking' | 'embedding' | 'storing';

export interface StageStats {
  stage: IndexingStage;
  processed: number;
  total: number;
  durationMs: number;
  details?: Record<string, unknown>;
}

export interface IndexPipelineResult {
  /** Absolute path that was indexed */
  rootPath: string;

  filesIndexed: number;
  chunksCreated: number;
  /** Passages written; lower than chunksCreated when some embeddings failed */
  chunksStored: number;

  embeddingModel: string;
  /** 0 when nothing was embedded */
  embeddingDimensions: number;

  totalDurationMs: number;
  stageDurations: Partial<Record<IndexingStage, number>>;

  warnings: string[];
  errors: string[];
}
