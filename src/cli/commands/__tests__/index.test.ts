/**
 * Tests for index command
 *
 * Tests cover:
 * - Command structure and options
 * - Path validation (exists, is directory)
 * - Pipeline options (rebuild, ignore patterns, embedding settings)
 * - Progress callbacks reaching the reporter
 * - Error mapping
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';
import { Command } from 'commander';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createIndexCommand } from '../index.js';
import type { CommandContext } from '../../types.js';
import * as indexer from '../../../indexer/index.js';
import * as embedder from '../../../indexer/embedder/index.js';
import * as config from '../../../config/index.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import type { IndexPipelineResult } from '../../../indexer/types.js';
import { CLIError, ConfigError } from '../../../errors/index.js';

const mocks = vi.hoisted(() => ({
  reporter: {
    startStage: vi.fn(),
    updateProgress: vi.fn(),
    completeStage: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    showSummary: vi.fn(),
  },
  database: { getInfo: vi.fn() },
  provider: { model: 'text-embedding-v3', embed: vi.fn() },
}));

vi.mock('../../utils/progress.js', () => ({
  createProgressReporter: vi.fn(() => mocks.reporter),
}));

vi.mock('../../../database/index.js', () => ({
  getDatabase: vi.fn(() => mocks.database),
}));

vi.mock('../../../indexer/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../indexer/index.js')>()),
  runIndexPipeline: vi.fn(),
}));

vi.mock('../../../indexer/embedder/index.js', () => ({
  createEmbeddingProvider: vi.fn(() => mocks.provider),
}));

vi.mock('../../../config/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../config/index.js')>()),
  loadConfig: vi.fn(),
}));

const RESULT: IndexPipelineResult = {
  rootPath: '/kb',
  filesIndexed: 2,
  chunksCreated: 5,
  chunksStored: 5,
  embeddingModel: 'text-embedding-v3',
  embeddingDimensions: 1024,
  totalDurationMs: 120,
  stageDurations: { scanning: 10, chunking: 10, embedding: 90, storing: 10 },
  warnings: [],
  errors: [],
};

describe('createIndexCommand', () => {
  let tempDir: string;
  let filePath: string;
  let mockContext: CommandContext;

  beforeAll(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'medqa-index-'));
    filePath = join(tempDir, 'note.md');
    writeFileSync(filePath, '# 高血压\n');
  });

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.clearAllMocks();
    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    vi.mocked(config.loadConfig).mockReturnValue(DEFAULT_CONFIG);
    vi.mocked(indexer.runIndexPipeline).mockResolvedValue(RESULT);
  });

  async function runCommand(args: string[]) {
    const program = new Command();
    program.addCommand(createIndexCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'index', ...args]);
  }

  describe('command structure', () => {
    it('creates a command named "index" with a path argument', () => {
      const command = createIndexCommand(() => mockContext);
      expect(command.name()).toBe('index');
      expect(command.registeredArguments[0]?.name()).toBe('path');
      expect(command.options.map((o) => o.long)).toEqual(['--rebuild', '--ignore']);
    });
  });

  describe('path validation', () => {
    it('rejects a missing path', async () => {
      const missing = join(tempDir, 'missing');
      await expect(runCommand([missing])).rejects.toThrow(`Path does not exist: ${missing}`);
      expect(indexer.runIndexPipeline).not.toHaveBeenCalled();
    });

    it('rejects a file', async () => {
      await expect(runCommand([filePath])).rejects.toThrow(`Path is not a directory: ${filePath}`);
    });
  });

  describe('pipeline', () => {
    it('indexes the directory with the configured embedding settings', async () => {
      await runCommand([tempDir]);

      expect(embedder.createEmbeddingProvider).toHaveBeenCalledWith(DEFAULT_CONFIG.embedding);
      expect(indexer.runIndexPipeline).toHaveBeenCalledWith(
        expect.objectContaining({
          rootPath: tempDir,
          embeddingProvider: mocks.provider,
          database: mocks.database,
          embeddingBatchSize: 10,
          embeddingTimeoutMs: 30000,
          rebuild: false,
          additionalIgnorePatterns: undefined,
        })
      );
      expect(mocks.reporter.showSummary).toHaveBeenCalledWith(RESULT);
    });

    it('passes --rebuild and --ignore patterns', async () => {
      await runCommand([tempDir, '--rebuild', '--ignore', 'drafts/**, *.bak,']);

      expect(indexer.runIndexPipeline).toHaveBeenCalledWith(
        expect.objectContaining({ rebuild: true, additionalIgnorePatterns: ['drafts/**', '*.bak'] })
      );
    });

    it('forwards progress to the reporter', async () => {
      vi.mocked(indexer.runIndexPipeline).mockImplementation(async (options) => {
        options.onStageStart?.('scanning', 0);
        options.onProgress?.('scanning', 1, 0, 'note.md');
        options.onStageComplete?.('scanning', { stage: 'scanning', processed: 1, total: 1, durationMs: 5 });
        options.onWarning?.('empty file', 'blank.md');
        options.onError?.(new Error('embedding failed'), 'batch 1');
        return RESULT;
      });

      await runCommand([tempDir]);

      expect(mocks.reporter.startStage).toHaveBeenCalledWith('scanning', 0);
      expect(mocks.reporter.updateProgress).toHaveBeenCalledWith(1, 'note.md');
      expect(mocks.reporter.completeStage).toHaveBeenCalledWith({
        stage: 'scanning',
        processed: 1,
        total: 1,
        durationMs: 5,
      });
      expect(mocks.reporter.warn).toHaveBeenCalledWith('empty file', 'blank.md');
      expect(mocks.reporter.error).toHaveBeenCalledWith('embedding failed', 'batch 1');
    });
  });

  describe('errors', () => {
    it('reports a cancelled run with exit code 130', async () => {
      vi.mocked(indexer.runIndexPipeline).mockRejectedValue(new indexer.IndexingCancelledError());

      const error = await runCommand([tempDir]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CLIError);
      expect(error).toMatchObject({ message: 'Indexing cancelled', code: 130 });
      expect(mocks.reporter.showSummary).not.toHaveBeenCalled();
    });

    it('passes CLI errors through unchanged', async () => {
      const mismatch = new ConfigError('Knowledge base was built with embedding model', 'Re-run with --rebuild');
      vi.mocked(indexer.runIndexPipeline).mockRejectedValue(mismatch);

      await expect(runCommand([tempDir])).rejects.toBe(mismatch);
    });

    it('wraps other failures', async () => {
      vi.mocked(indexer.runIndexPipeline).mockRejectedValue(new Error('disk full'));

      await expect(runCommand([tempDir])).rejects.toThrow('Indexing failed: disk full');
    });
  });
});
