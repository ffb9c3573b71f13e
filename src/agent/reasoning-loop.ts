/**
 * Reasoning Loop
 *
 * ReAct controller for agent mode. Each iteration sends the whole
 * conversation plus the tool schema to the backend:
 *
 *   THINKING ──(no tool calls)──────────► DONE
 *   THINKING ──(tool calls)──► ACTING ──► THINKING
 *   THINKING ──(budget used up)─────────► BUDGET_EXCEEDED
 *
 * Every requested tool call gets exactly one tool message before the next
 * model call. The loop keeps no state between runs; callers continue a
 * conversation by passing the previous `conversation` back as `history`.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { callChat } from '../providers/call.js';
import { BackendError } from '../providers/errors.js';
import type { BackendReply, ChatBackend, ChatMessage, ToolInvocation } from '../providers/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import {
  AGENT_CANCELLED_MESSAGE,
  AGENT_SYSTEM_PROMPT,
  BUDGET_EXCEEDED_MESSAGE,
  agentErrorMessage,
} from './prompts.js';
import type { ToolRegistry } from './tools/registry.js';
import type { AgentRunResult, AgentStatus, ReasoningEvent, ToolCallRecord } from './types.js';

export interface ReasoningLoopOptions {
  /** @default AGENT_SYSTEM_PROMPT */
  systemPrompt?: string;
  /** @default 5 */
  maxIterations?: number;
  /** @default 0.1 */
  temperature?: number;
  /** @default 1500 */
  maxTokens?: number;
  /** Deadline per backend call. @default 60000 */
  requestTimeoutMs?: number;
  /** Backend failures in a row before the episode is abandoned. @default 3 */
  maxConsecutiveFailures?: number;
  /** First retry delay; doubles with each consecutive failure. @default 500 */
  retryBackoffMs?: number;
  /** Run the tool calls of one step concurrently. @default false */
  parallelToolCalls?: boolean;
  logger?: Logger;
  onEvent?: (event: ReasoningEvent) => void;
}

export interface RunOptions {
  /** Earlier conversation; its system messages are replaced by this loop's */
  history?: readonly ChatMessage[];
  /** Checked before each iteration and passed to backend and tool calls */
  signal?: AbortSignal;
}

export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_AGENT_TEMPERATURE = 0.1;
export const DEFAULT_AGENT_MAX_TOKENS = 1500;
export const DEFAULT_AGENT_TIMEOUT_MS = 60000;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 500;

/**
 * Gives every invocation an id not already in `taken`, suffixing repeats
 * (`x`, `x_2`, `x_3`), and records the ids it hands out.
 */
export function withUniqueCallIds(invocations: readonly ToolInvocation[], taken: Set<string>): ToolInvocation[] {
  return invocations.map((invocation) => {
    let id = invocation.id;
    for (let n = 2; taken.has(id); n++) {
      id = `${invocation.id}_${n}`;
    }
    taken.add(id);
    return id === invocation.id ? invocation : { ...invocation, id };
  });
}

export class ReasoningLoop {
  private readonly systemPrompt: string;
  private readonly maxIterations: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly requestTimeoutMs: number;
  private readonly maxConsecutiveFailures: number;
  private readonly retryBackoffMs: number;
  private readonly parallelToolCalls: boolean;
  private readonly logger: Logger;
  private readonly onEvent?: (event: ReasoningEvent) => void;

  constructor(
    private readonly backend: ChatBackend,
    private readonly registry: ToolRegistry,
    options: ReasoningLoopOptions = {}
  ) {
    this.systemPrompt = options.systemPrompt ?? AGENT_SYSTEM_PROMPT;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.temperature = options.temperature ?? DEFAULT_AGENT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_AGENT_MAX_TOKENS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.maxConsecutiveFailures = options.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.parallelToolCalls = options.parallelToolCalls ?? false;
    this.logger = options.logger ?? consoleLogger;
    this.onEvent = options.onEvent;

    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  toolNames(): string[] {
    return this.registry.names();
  }

  async run(question: string, options: RunOptions = {}): Promise<AgentRunResult> {
    const { signal } = options;
    const conversation: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...(options.history ?? []).filter((message) => message.role !== 'system'),
      { role: 'user', content: question },
    ];
    const toolCalls: ToolCallRecord[] = [];
    const callIds = new Set<string>();
    for (const message of conversation) {
      if (message.role === 'assistant') {
        message.toolCalls?.forEach((call) => callIds.add(call.id));
      }
    }
    const tools = this.registry.schema();
    let iterations = 0;
    let consecutiveFailures = 0;

    const finish = (status: AgentStatus, answer: string, error?: string): AgentRunResult => {
      this.logger.debug?.(`Reasoning finished: ${status} after ${iterations} iteration(s)`);
      this.onEvent?.({ type: 'finished', status, iterations });
      const result: AgentRunResult = { status, answer, iterations, toolCalls, conversation };
      if (error !== undefined) result.error = error;
      return result;
    };

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      if (signal?.aborted) {
        return finish('cancelled', AGENT_CANCELLED_MESSAGE);
      }

      iterations = iteration;
      this.logger.debug?.(`Reasoning iteration ${iteration}/${this.maxIterations}`);
      this.onEvent?.({ type: 'iteration_start', iteration });

      let reply: BackendReply;
      try {
        reply = await callChat(
          this.backend,
          {
            messages: conversation,
            temperature: this.temperature,
            maxTokens: this.maxTokens,
            tools,
            toolChoice: tools.length > 0 ? 'auto' : undefined,
          },
          { timeoutMs: this.requestTimeoutMs, signal }
        );
        if (reply.toolCalls.length === 0 && (reply.content ?? '').trim() === '') {
          throw BackendError.invalidResponse('reply has neither content nor tool calls');
        }
      } catch (error) {
        const failure = BackendError.from(error);

        if (signal?.aborted) {
          return finish('cancelled', AGENT_CANCELLED_MESSAGE);
        }

        consecutiveFailures++;
        this.logger.warn(`Reasoning iteration ${iteration} failed: ${failure.message}`);

        const isLast = iteration === this.maxIterations;
        if (isLast || !failure.retryable || consecutiveFailures >= this.maxConsecutiveFailures) {
          return finish('failed', agentErrorMessage(failure.message), failure.message);
        }

        const delayMs = this.retryBackoffMs * 2 ** (consecutiveFailures - 1);
        this.onEvent?.({ type: 'retry', iteration, error: failure.message, delayMs });
        if (!(await this.wait(delayMs, signal))) {
          return finish('cancelled', AGENT_CANCELLED_MESSAGE);
        }
        continue;
      }

      consecutiveFailures = 0;

      if (reply.toolCalls.length === 0) {
        const answer = reply.content ?? '';
        conversation.push({ role: 'assistant', content: answer });
        return finish('done', answer);
      }

      const invocations = withUniqueCallIds(reply.toolCalls, callIds);
      conversation.push({ role: 'assistant', content: reply.content, toolCalls: invocations });

      const records = await this.executeToolCalls(invocations, iteration, signal);
      for (const record of records) {
        conversation.push({ role: 'tool', toolCallId: record.invocation.id, content: record.execution.observation });
      }
      toolCalls.push(...records);
    }

    return finish('budget_exceeded', BUDGET_EXCEEDED_MESSAGE);
  }

  /**
   * Results come back in request order whether or not they ran concurrently.
   */
  private async executeToolCalls(
    invocations: ToolInvocation[],
    iteration: number,
    signal?: AbortSignal
  ): Promise<ToolCallRecord[]> {
    const executeOne = async (invocation: ToolInvocation): Promise<ToolCallRecord> => {
      this.onEvent?.({ type: 'tool_start', invocation, iteration });
      const started = performance.now();
      const execution = await this.registry.executeInvocation(invocation, { signal });
      const record: ToolCallRecord = {
        invocation,
        execution,
        iteration,
        durationMs: Math.round(performance.now() - started),
      };
      this.logger.debug?.(
        `Tool ${invocation.name} ${execution.success ? 'succeeded' : 'failed'} in ${record.durationMs}ms`
      );
      this.onEvent?.({ type: 'tool_result', record });
      return record;
    };

    if (this.parallelToolCalls) {
      return Promise.all(invocations.map(executeOne));
    }

    const records: ToolCallRecord[] = [];
    for (const invocation of invocations) {
      records.push(await executeOne(invocation));
    }
    return records;
  }

  /**
   * Resolves false when the signal aborts during the wait.
   */
  private async wait(delayMs: number, signal?: AbortSignal): Promise<boolean> {
    if (delayMs <= 0) {
      return !signal?.aborted;
    }
    try {
      await sleep(delayMs, undefined, { signal });
      return true;
    } catch (error) {
      if (signal?.aborted) {
        return false;
      }
      throw error;
    }
  }
}
