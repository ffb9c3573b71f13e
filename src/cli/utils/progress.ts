/**
 * Indexing progress for `medqa index`.
 *
 * Under --json every pipeline callback becomes one NDJSON line on stdout.
 * Otherwise a TTY gets an ora spinner per stage and anything else gets
 * one line per finished stage.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import type { IndexingStage, IndexPipelineResult, StageStats } from '../../indexer/types.js';

const STAGE_UNITS: Record<IndexingStage, string> = {
  scanning: 'documents found',
  chunking: 'passages split',
  embedding: 'passages embedded',
  storing: 'passages stored',
};

export type ProgressEvent =
  | { type: 'stage_start'; stage: IndexingStage; total: number }
  | { type: 'stage_progress'; stage: IndexingStage; processed: number; total: number; file?: string }
  | { type: 'stage_complete'; stage: IndexingStage; processed: number; durationMs: number }
  | { type: 'warning' | 'error'; message: string; context?: string }
  | { type: 'complete'; result: IndexPipelineResult };

/**
 * The pipeline callbacks the index command forwards.
 */
export interface ProgressReporter {
  startStage(stage: IndexingStage, total: number): void;
  updateProgress(processed: number, file?: string): void;
  completeStage(stats: StageStats): void;
  warn(message: string, context?: string): void;
  error(message: string, context?: string): void;
  showSummary(result: IndexPipelineResult): void;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}

function capitalize(stage: IndexingStage): string {
  return stage.charAt(0).toUpperCase() + stage.slice(1);
}

function withContext(message: string, context?: string): string {
  return context ? `${message} (${context})` : message;
}

export function formatStage(stats: StageStats): string {
  return `${capitalize(stats.stage)}: ${stats.processed} ${STAGE_UNITS[stats.stage]} in ${formatDuration(stats.durationMs)}`;
}

/**
 * Summary block printed after a run. Warnings are listed only when verbose.
 */
export function formatSummary(result: IndexPipelineResult, verbose: boolean): string[] {
  const row = (label: string, value: string): string => `  ${chalk.dim(label.padEnd(12))}${value}`;
  const lines = [
    '',
    chalk.green.bold('Knowledge base updated'),
    row('Documents:', String(result.filesIndexed)),
    row('Passages:', `${result.chunksStored} of ${result.chunksCreated} stored`),
    row('Embedding:', `${result.embeddingModel} (${result.embeddingDimensions} dims)`),
    row('Elapsed:', formatDuration(result.totalDurationMs)),
  ];

  if (result.errors.length > 0) {
    lines.push(chalk.red(`  ${result.errors.length} passage(s) could not be embedded`));
  }
  if (result.warnings.length > 0) {
    lines.push(chalk.yellow(`  ${result.warnings.length} warning(s)`));
    if (verbose) {
      lines.push(...result.warnings.map((warning) => chalk.dim(`    - ${warning}`)));
    }
  }
  return lines;
}

class NdjsonProgress implements ProgressReporter {
  private stage: IndexingStage = 'scanning';
  private total = 0;

  constructor(private readonly write: (line: string) => void) {}

  private emit(event: ProgressEvent): void {
    this.write(JSON.stringify(event));
  }

  startStage(stage: IndexingStage, total: number): void {
    this.stage = stage;
    this.total = total;
    this.emit({ type: 'stage_start', stage, total });
  }

  updateProgress(processed: number, file?: string): void {
    this.emit({ type: 'stage_progress', stage: this.stage, processed, total: this.total, file });
  }

  completeStage(stats: StageStats): void {
    this.emit({ type: 'stage_complete', stage: stats.stage, processed: stats.processed, durationMs: stats.durationMs });
  }

  warn(message: string, context?: string): void {
    this.emit({ type: 'warning', message, context });
  }

  error(message: string, context?: string): void {
    this.emit({ type: 'error', message, context });
  }

  showSummary(result: IndexPipelineResult): void {
    this.emit({ type: 'complete', result });
  }
}

class TextProgress implements ProgressReporter {
  private spinner: Ora | null = null;
  private stage: IndexingStage = 'scanning';
  private total = 0;

  constructor(
    private readonly ctx: CommandContext,
    private readonly interactive: boolean
  ) {}

  startStage(stage: IndexingStage, total: number): void {
    this.stage = stage;
    this.total = total;
    if (this.interactive) {
      this.spinner?.stop();
      this.spinner = ora(`${capitalize(stage)}...`).start();
    }
  }

  updateProgress(processed: number, file?: string): void {
    if (!this.spinner) return;
    const count = this.total > 0 ? `${processed}/${this.total}` : String(processed);
    this.spinner.text = `${capitalize(this.stage)} ${count}${file ? ` ${chalk.dim(file)}` : ''}`;
  }

  completeStage(stats: StageStats): void {
    if (this.spinner) {
      this.spinner.succeed(formatStage(stats));
      this.spinner = null;
    } else {
      this.ctx.log(formatStage(stats));
    }
  }

  warn(message: string, context?: string): void {
    // Only in verbose; the summary counts them either way
    this.ctx.debug(withContext(message, context));
  }

  error(message: string, context?: string): void {
    this.spinner?.stop();
    this.spinner = null;
    this.ctx.error(withContext(message, context));
  }

  showSummary(result: IndexPipelineResult): void {
    for (const line of formatSummary(result, this.ctx.options.verbose)) {
      this.ctx.log(line);
    }
  }
}

/**
 * @param interactive - Spinners; defaults to whether stdout is a TTY
 */
export function createProgressReporter(
  ctx: CommandContext,
  interactive: boolean = process.stdout.isTTY ?? false
): ProgressReporter {
  if (ctx.options.json) {
    return new NdjsonProgress((line) => console.log(line));
  }
  return new TextProgress(ctx, interactive);
}
