/**
 * Agent Event Renderers
 *
 * Terminal output for the answering pipeline:
 *
 * ```
 * ReasoningLoop (onEvent)
 *     │
 *     └── createReasoningRenderer()  → progress lines while the agent works
 *
 * AnswerEnvelope
 *     │
 *     ├── renderEnvelope()           → answer, sources, tool trace
 *     └── renderQualityReport()      → evaluator metrics (--evaluate)
 * ```
 *
 * Everything goes through ctx.log, so --json runs print nothing here.
 */

import chalk from 'chalk';
import { sourceName } from '../../agent/context-assembler.js';
import type { AnswerEnvelope, ReasoningEvent } from '../../agent/types.js';
import type { QualityReport } from '../../eval/quality.js';
import type { CommandContext } from '../types.js';

const PREVIEW_LENGTH = 60;

function preview(text: string): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > PREVIEW_LENGTH ? `${oneLine.slice(0, PREVIEW_LENGTH)}...` : oneLine;
}

// ============================================================================
// Reasoning progress
// ============================================================================

/**
 * onEvent handler printing one dimmed line per reasoning step.
 *
 * @example
 * ```typescript
 * const session = await openQASession(ctx, { onEvent: createReasoningRenderer(ctx) });
 * ```
 */
export function createReasoningRenderer(ctx: CommandContext): (event: ReasoningEvent) => void {
  return (event) => {
    switch (event.type) {
      case 'iteration_start':
        ctx.debug(`Reasoning step ${event.iteration}`);
        break;

      case 'tool_start':
        ctx.log(chalk.cyan(`→ ${event.invocation.name} ${chalk.dim(JSON.stringify(event.invocation.arguments))}`));
        break;

      case 'tool_result': {
        const { execution, durationMs } = event.record;
        const marker = execution.success ? chalk.green('✓') : chalk.red('✗');
        ctx.log(chalk.dim(`  ${marker} ${preview(execution.observation)} (${durationMs}ms)`));
        break;
      }

      case 'retry':
        ctx.warn(`Step ${event.iteration} failed (${event.error}); retrying in ${event.delayMs}ms`);
        break;

      case 'finished':
        ctx.debug(`Reasoning ${event.status} after ${event.iterations} step(s)`);
        break;
    }
  };
}

// ============================================================================
// Envelope
// ============================================================================

export interface RenderEnvelopeOptions {
  /** Print the assembled context before the answer */
  showContext?: boolean;
}

/**
 * Print an answer with its sources (rag/llm) or its tool trace (agent).
 */
export function renderEnvelope(envelope: AnswerEnvelope, ctx: CommandContext, options: RenderEnvelopeOptions = {}): void {
  if (options.showContext && envelope.context !== undefined) {
    ctx.log(chalk.bold('Context:'));
    ctx.log(chalk.dim(envelope.context));
    ctx.log('');
  }

  ctx.log(envelope.answer);

  if (envelope.passagesUsed.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    envelope.passagesUsed.forEach((passage, i) => {
      ctx.log(`  [${i + 1}] ${sourceName(passage.source)} ${chalk.dim(`(${passage.score.toFixed(3)})`)}`);
    });
  }

  if (envelope.toolCalls && envelope.toolCalls.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim(`Tools used: ${envelope.toolCalls.map((record) => record.invocation.name).join(', ')}`));
  }

  if (envelope.agentStatus !== undefined && envelope.agentStatus !== 'done') {
    ctx.warn(`Agent stopped: ${envelope.agentStatus}`);
  }
  if (envelope.error !== undefined) {
    ctx.debug(`Errors: ${envelope.error}`);
  }

  ctx.log('');
  ctx.log(chalk.dim(envelope.modeLabel));
}

/**
 * Print evaluator metrics as an aligned block.
 */
export function renderQualityReport(report: QualityReport, ctx: CommandContext): void {
  const rows: Array<[string, string]> = [
    ['Retrieved', report.hasResults ? `yes (${report.numSources})` : 'no'],
    ['Avg score', report.avgScore.toFixed(3)],
    ['Coverage', report.coverageScore.toFixed(2)],
    ['Answer length', String(report.answerLength)],
    ['Disclaimer', report.hasSafetyDisclaimer ? 'yes' : 'no'],
  ];

  ctx.log('');
  ctx.log(chalk.bold('Quality:'));
  for (const [label, value] of rows) {
    ctx.log(`  ${chalk.dim(`${label}:`.padEnd(15))}${value}`);
  }
}
