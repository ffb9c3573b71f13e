/**
 * Chunker
 *
 * Reads discovered documents and splits them into passages with
 * RecursiveTextSplitter. Per-file problems are reported in the result
 * rather than thrown, so one unreadable file does not stop a run.
 */

import { readFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';

import type { FileInfo } from '../types.js';
import { RecursiveTextSplitter } from './splitter.js';
import type { BatchChunkResult, ChunkerConfig, ChunkOptions, ChunkResult, FileChunkResult } from './types.js';

/** Files above this size are skipped (reference documents, not dumps) */
export const MAX_FILE_SIZE = 5 * 1024 * 1024;

/**
 * Chunk a single file.
 */
export async function chunkFileWithResult(
  fileInfo: FileInfo,
  config: Partial<ChunkerConfig> = {},
  options: ChunkOptions = {}
): Promise<FileChunkResult> {
  if (fileInfo.size > MAX_FILE_SIZE) {
    return {
      filePath: fileInfo.relativePath,
      success: false,
      chunks: [],
      skipReason: 'too_large',
      error: `File too large (${formatSize(fileInfo.size)} > ${formatSize(MAX_FILE_SIZE)})`,
    };
  }

  let content: string;
  try {
    content = await readFile(fileInfo.path, 'utf-8');
  } catch (error) {
    return {
      filePath: fileInfo.relativePath,
      success: false,
      chunks: [],
      skipReason: 'read_error',
      error: error instanceof Error ? error.message : String(error),
    };
  }

  // Empty files are a success with nothing to index
  if (!content.trim()) {
    return { filePath: fileInfo.relativePath, success: true, chunks: [], skipReason: 'empty' };
  }

  const pieces = new RecursiveTextSplitter(config).split(content.replace(/\r\n/g, '\n'));
  const chunks: ChunkResult[] = pieces.map((piece, chunkIndex) => ({
    id: randomUUID(),
    content: piece,
    source: fileInfo.relativePath,
    metadata: {
      chunkIndex,
      totalChunks: pieces.length,
      originalSize: fileInfo.size,
    },
  }));

  for (const chunk of chunks) {
    options.onChunk?.(chunk);
  }

  return { filePath: fileInfo.relativePath, success: true, chunks };
}

/**
 * Chunk many files, in order.
 *
 * @example
 * ```ts
 * const result = await chunkFilesWithResult(scan.files, { chunkSize: 500, chunkOverlap: 50 });
 * const chunks = result.files.flatMap((f) => f.chunks);
 * ```
 */
export async function chunkFilesWithResult(
  files: FileInfo[],
  config: Partial<ChunkerConfig> = {},
  options: ChunkOptions = {}
): Promise<BatchChunkResult> {
  const results: FileChunkResult[] = [];
  const errors: string[] = [];
  let successCount = 0;
  let failureCount = 0;

  for (const file of files) {
    const result = await chunkFileWithResult(file, config, options);
    results.push(result);

    if (result.success) {
      successCount++;
    } else {
      failureCount++;
      errors.push(`${result.filePath}: ${result.error ?? 'unknown error'}`);
    }
  }

  return { files: results, successCount, failureCount, errors };
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
