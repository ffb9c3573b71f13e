/**
 * Ask Command
 *
 * Answers one medical question and exits.
 *
 * Usage:
 *   medqa ask "高血压的诊断标准是什么？"
 *   medqa ask "头痛发热怎么办？" --mode agent
 *   medqa ask "什么是痛风？" --no-rag
 *   medqa ask "糖尿病饮食" -k 5 --show-context --evaluate
 *   medqa ask "..." --json
 *
 * Flow:
 * 1. Open a QA session (config, chat backend, knowledge base)
 * 2. Answer in the configured or requested mode
 * 3. Print the answer with sources or the tool trace
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

import type { CommandContext } from '../types.js';
import { openQASession } from '../utils/session.js';
import { createReasoningRenderer, renderEnvelope, renderQualityReport } from '../utils/agent-event-renderer.js';
import { CLIError } from '../../errors/index.js';
import type { AnswerEnvelope, ReasoningEvent } from '../../agent/types.js';
import type { QualityReport } from '../../eval/quality.js';

/** Upper bound on --top-k */
export const MAX_TOP_K = 20;

interface AskCommandOptions {
  mode?: string;
  /** false when --no-rag was given */
  rag: boolean;
  topK?: string;
  showContext?: boolean;
  evaluate?: boolean;
}

/**
 * JSON output of `medqa ask --json`.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  mode: string;
  modeLabel: string;
  ragEnabled: boolean;
  sources: Array<{ source: string; score: number }>;
  context?: string;
  agent?: {
    status: string;
    iterations: number;
    tools: string[];
  };
  quality?: QualityReport;
  error?: string;
}

/**
 * @throws CLIError unless the value is an integer from 1 to MAX_TOP_K
 */
export function parseTopK(value: string): number {
  const topK = Number(value);
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new CLIError(`Invalid --top-k value: ${value}`, `Use a whole number between 1 and ${MAX_TOP_K}`);
  }
  return topK;
}

export function formatAskJSON(envelope: AnswerEnvelope, quality?: QualityReport): AskOutputJSON {
  const output: AskOutputJSON = {
    question: envelope.question,
    answer: envelope.answer,
    mode: envelope.mode,
    modeLabel: envelope.modeLabel,
    ragEnabled: envelope.ragEnabled,
    sources: envelope.passagesUsed.map((passage) => ({ source: passage.source, score: passage.score })),
  };
  if (envelope.context !== undefined) output.context = envelope.context;
  if (envelope.agentStatus !== undefined) {
    output.agent = {
      status: envelope.agentStatus,
      iterations: envelope.iterations ?? 0,
      tools: (envelope.toolCalls ?? []).map((record) => record.invocation.name),
    };
  }
  if (quality) output.quality = quality;
  if (envelope.error !== undefined) output.error = envelope.error;
  return output;
}

/**
 * Create the ask command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .description('Ask a medical question')
    .argument('<question>', 'The question to answer')
    .option('-m, --mode <mode>', 'Answering mode: llm, rag or agent (default: qa.mode)')
    .option('--no-rag', 'Answer without the knowledge base')
    .option('-k, --top-k <number>', 'Number of passages to retrieve (default: search.top_k)')
    .option('--show-context', 'Print the retrieved context before the answer')
    .option('--evaluate', 'Print answer quality metrics')
    .action(async (rawQuestion: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const question = rawQuestion.trim();
      if (!question) {
        throw new CLIError('Question cannot be empty', 'Usage: medqa ask "你的问题"');
      }
      const k = cmdOptions.topK !== undefined ? parseTopK(cmdOptions.topK) : undefined;

      const renderStep = createReasoningRenderer(ctx);
      let spinner: Ora | null = null;
      const onEvent = (event: ReasoningEvent): void => {
        // Tool lines would be overwritten by a running spinner
        if (event.type === 'tool_start') spinner?.stop();
        renderStep(event);
      };

      const session = await openQASession(ctx, {
        mode: cmdOptions.mode,
        enableRag: cmdOptions.rag ? undefined : false,
        onEvent,
      });
      const { service } = session;
      ctx.debug(`Mode: ${service.getCurrentMode()}`);

      if (!ctx.options.json && process.stdout.isTTY) {
        spinner = ora({ text: 'Thinking...', prefixText: chalk.dim(service.getCurrentMode()) }).start();
      }

      let envelope: AnswerEnvelope;
      try {
        envelope = await service.answer(question, { k, showContext: cmdOptions.showContext });
      } finally {
        spinner?.stop();
      }

      const quality = cmdOptions.evaluate ? service.evaluate(envelope) : undefined;

      if (ctx.options.json) {
        console.log(JSON.stringify(formatAskJSON(envelope, quality), null, 2));
        return;
      }

      renderEnvelope(envelope, ctx, { showContext: cmdOptions.showContext });
      if (quality) {
        renderQualityReport(quality, ctx);
      }
    });
}
