/**
 * Indexing progress tests
 *
 * Covers the three outputs of createProgressReporter:
 * - NDJSON events under --json
 * - Plain lines through the command context
 * - ora spinners on a TTY
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import ora from 'ora';
import {
  createProgressReporter,
  formatDuration,
  formatStage,
  formatSummary,
  type ProgressEvent,
} from '../progress.js';
import type { CommandContext } from '../../types.js';
import type { IndexPipelineResult } from '../../../indexer/types.js';

const spinner = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
  succeed: vi.fn(),
  text: '',
}));

vi.mock('ora', () => ({
  default: vi.fn(() => {
    spinner.start.mockReturnValue(spinner);
    return spinner;
  }),
}));

function createMockCtx(options: Partial<CommandContext['options']> = {}): CommandContext {
  return {
    options: { verbose: false, json: false, ...options },
    log: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const RESULT: IndexPipelineResult = {
  rootPath: '/data/knowledge',
  filesIndexed: 3,
  chunksCreated: 12,
  chunksStored: 11,
  embeddingModel: 'text-embedding-v3',
  embeddingDimensions: 1024,
  totalDurationMs: 1500,
  stageDurations: { scanning: 20, chunking: 30, embedding: 1400, storing: 50 },
  warnings: ['Skipped empty document: blank.md'],
  errors: ['Passage 7: timeout'],
};

describe('formatDuration', () => {
  it('picks a unit by size', () => {
    expect(formatDuration(450)).toBe('450ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});

describe('formatStage', () => {
  it('names the stage, count and duration', () => {
    expect(formatStage({ stage: 'embedding', processed: 12, total: 12, durationMs: 2300 })).toBe(
      'Embedding: 12 passages embedded in 2.3s'
    );
  });
});

describe('formatSummary', () => {
  const expectedHead = [
    '',
    chalk.green.bold('Knowledge base updated'),
    `  ${chalk.dim('Documents:'.padEnd(12))}3`,
    `  ${chalk.dim('Passages:'.padEnd(12))}11 of 12 stored`,
    `  ${chalk.dim('Embedding:'.padEnd(12))}text-embedding-v3 (1024 dims)`,
    `  ${chalk.dim('Elapsed:'.padEnd(12))}1.5s`,
    chalk.red('  1 passage(s) could not be embedded'),
    chalk.yellow('  1 warning(s)'),
  ];

  it('counts warnings without listing them', () => {
    expect(formatSummary(RESULT, false)).toEqual(expectedHead);
  });

  it('lists warnings when verbose', () => {
    expect(formatSummary(RESULT, true)).toEqual([
      ...expectedHead,
      chalk.dim('    - Skipped empty document: blank.md'),
    ]);
  });

  it('leaves out the problem lines on a clean run', () => {
    expect(formatSummary({ ...RESULT, warnings: [], errors: [] }, true)).toHaveLength(6);
  });
});

describe('createProgressReporter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    spinner.text = '';
  });

  describe('--json', () => {
    let consoleLogSpy: MockInstance<typeof console.log>;

    beforeEach(() => {
      consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      consoleLogSpy.mockRestore();
    });

    it('writes one event per callback', () => {
      const reporter = createProgressReporter(createMockCtx({ json: true }), true);

      reporter.startStage('chunking', 4);
      reporter.updateProgress(2, 'cardiology/hypertension.md');
      reporter.completeStage({ stage: 'chunking', processed: 4, total: 4, durationMs: 30 });
      reporter.warn('Skipped empty document', 'blank.md');
      reporter.error('Embedding failed');
      reporter.showSummary(RESULT);

      const events: ProgressEvent[] = consoleLogSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
      expect(events).toEqual([
        { type: 'stage_start', stage: 'chunking', total: 4 },
        { type: 'stage_progress', stage: 'chunking', processed: 2, total: 4, file: 'cardiology/hypertension.md' },
        { type: 'stage_complete', stage: 'chunking', processed: 4, durationMs: 30 },
        { type: 'warning', message: 'Skipped empty document', context: 'blank.md' },
        { type: 'error', message: 'Embedding failed' },
        { type: 'complete', result: RESULT },
      ]);
      expect(ora).not.toHaveBeenCalled();
    });
  });

  describe('plain output', () => {
    it('logs one line per finished stage', () => {
      const ctx = createMockCtx();
      const reporter = createProgressReporter(ctx, false);

      reporter.startStage('scanning', 0);
      reporter.updateProgress(3, 'notes.md');
      reporter.completeStage({ stage: 'scanning', processed: 3, total: 3, durationMs: 20 });

      expect(ctx.log).toHaveBeenCalledTimes(1);
      expect(ctx.log).toHaveBeenCalledWith('Scanning: 3 documents found in 20ms');
      expect(ora).not.toHaveBeenCalled();
    });

    it('keeps warnings at debug level and always reports errors', () => {
      const ctx = createMockCtx();
      const reporter = createProgressReporter(ctx, false);

      reporter.warn('Skipped empty document', 'blank.md');
      reporter.error('Embedding failed', 'batch 2');

      expect(ctx.debug).toHaveBeenCalledWith('Skipped empty document (blank.md)');
      expect(ctx.error).toHaveBeenCalledWith('Embedding failed (batch 2)');
    });

    it('prints the summary', () => {
      const ctx = createMockCtx();

      createProgressReporter(ctx, false).showSummary(RESULT);

      expect(vi.mocked(ctx.log).mock.calls.map((call) => call[0])).toEqual(formatSummary(RESULT, false));
    });
  });

  describe('TTY', () => {
    it('runs a spinner per stage', () => {
      const ctx = createMockCtx();
      const reporter = createProgressReporter(ctx, true);

      reporter.startStage('embedding', 12);
      reporter.updateProgress(5);

      expect(ora).toHaveBeenCalledWith('Embedding...');
      expect(spinner.text).toBe('Embedding 5/12');

      reporter.completeStage({ stage: 'embedding', processed: 12, total: 12, durationMs: 2300 });

      expect(spinner.succeed).toHaveBeenCalledWith('Embedding: 12 passages embedded in 2.3s');
      expect(ctx.log).not.toHaveBeenCalled();
    });
  });
});
