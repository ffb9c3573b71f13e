/**
 * Index Command
 *
 * Builds the knowledge base from a directory of reference documents.
 *
 * Usage:
 *   medqa index ./knowledge              Index a directory
 *   medqa index ./knowledge --rebuild    Drop the knowledge base first
 *   medqa index ./knowledge --json       Output progress as NDJSON
 *   medqa index ./knowledge --verbose    List warnings as they happen
 *
 * The indexing pipeline:
 * 1. Scanning - Discover .md and .txt documents
 * 2. Chunking - Split documents into passages
 * 3. Embedding - Compute a vector for each passage
 * 4. Storing - Save passages to SQLite for retrieval
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { runIndexPipeline, IndexingCancelledError } from '../../indexer/index.js';
import type { IndexPipelineResult } from '../../indexer/types.js';
import { createEmbeddingProvider } from '../../indexer/embedder/index.js';
import { loadConfig } from '../../config/index.js';
import { getDatabase } from '../../database/index.js';
import { CLIError, ConfigError } from '../../errors/index.js';

interface IndexCommandOptions {
  rebuild?: boolean;
  ignore?: string;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('<path>', 'Directory holding the reference documents')
    .description('Index reference documents into the knowledge base')
    .option('--rebuild', 'Drop the knowledge base before indexing', false)
    .option('-i, --ignore <patterns>', 'Comma-separated extra ignore patterns')
    .action(async (path: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      const rootPath = resolve(path);

      if (!existsSync(rootPath)) {
        throw new CLIError(`Path does not exist: ${rootPath}`, 'Check the path and try again');
      }

      if (!statSync(rootPath).isDirectory()) {
        throw new CLIError(
          `Path is not a directory: ${rootPath}`,
          'medqa index requires a directory path, not a file'
        );
      }

      const additionalIgnorePatterns = cmdOptions.ignore
        ? cmdOptions.ignore.split(',').map((p) => p.trim()).filter(Boolean)
        : undefined;

      const config = loadConfig();
      ctx.debug(`Indexing path: ${rootPath}`);
      ctx.debug(`Embedding: ${config.embedding.provider}/${config.embedding.model}`);

      const reporter = createProgressReporter(ctx);

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      let result: IndexPipelineResult;
      try {
        result = await runIndexPipeline({
          rootPath,
          embeddingProvider: createEmbeddingProvider(config.embedding),
          database: getDatabase(),
          embeddingBatchSize: config.embedding.batch_size,
          embeddingTimeoutMs: config.embedding.timeout_ms,
          rebuild: cmdOptions.rebuild,
          additionalIgnorePatterns,
          signal: controller.signal,

          onStageStart: (stage, total) => {
            reporter.startStage(stage, total);
          },
          onProgress: (_stage, processed, _total, currentFile) => {
            reporter.updateProgress(processed, currentFile);
          },
          onStageComplete: (_stage, stats) => {
            reporter.completeStage(stats);
          },
          onWarning: (message, context) => {
            reporter.warn(message, context);
          },
          onError: (error, context) => {
            reporter.error(error.message, context);
          },
        });
      } catch (error) {
        if (error instanceof IndexingCancelledError) {
          throw new CLIError('Indexing cancelled', 'Passages stored before the cancel were kept', 130);
        }
        if (error instanceof CLIError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(
          `Indexing failed: ${message}`,
          'Check the embedding settings with: medqa config list'
        );
      } finally {
        process.removeListener('SIGINT', onSigint);
      }

      reporter.showSummary(result);
    });
}
