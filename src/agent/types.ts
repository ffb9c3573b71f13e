/**
 * Answering Pipeline Types
 *
 * The entities that flow between the retriever, the context assembler,
 * the answer generator, the reasoning loop and the mode controller.
 */

import type { QAMode } from '../config/schema.js';
import type { ChatMessage, ToolInvocation } from '../providers/types.js';
import type { Passage } from '../search/types.js';

// ============================================================================
// LOOKUPS
// ============================================================================

/**
 * Result of looking something up in a static table or registry.
 * "Not found" is a value, not an exception.
 */
export type Lookup<T> =
  | { kind: 'found'; value: T }
  | { kind: 'not_found' }
  | { kind: 'error'; reason: string };

export function found<T>(value: T): Lookup<T> {
  return { kind: 'found', value };
}

export function notFound<T>(): Lookup<T> {
  return { kind: 'not_found' };
}

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * Retrieved evidence rendered into one bounded prompt fragment.
 */
export interface AssembledContext {
  /** Never longer than the max context length it was built with */
  text: string;
  /** The passages actually rendered, in rank order */
  passages: Passage[];
  /** Number of rendered passage segments */
  segments: number;
  /** False when nothing was retrieved and `text` is the sentinel */
  found: boolean;
}

// ============================================================================
// TOOLS
// ============================================================================

/**
 * Outcome of one tool execution. `observation` is what the model sees.
 */
export interface ToolExecution {
  toolName: string;
  observation: string;
  success: boolean;
}

/**
 * A requested tool call paired with its result.
 */
export interface ToolCallRecord {
  invocation: ToolInvocation;
  execution: ToolExecution;
  /** 1-based iteration in which the model requested the call */
  iteration: number;
  durationMs: number;
}

// ============================================================================
// REASONING LOOP
// ============================================================================

/**
 * Terminal states of one reasoning episode.
 *
 * - done: the model produced a reply without tool calls
 * - budget_exceeded: the iteration budget ran out
 * - failed: the backend failed in a way that is not worth retrying
 * - cancelled: the caller aborted between iterations
 */
export type AgentStatus = 'done' | 'budget_exceeded' | 'failed' | 'cancelled';

export interface AgentRunResult {
  status: AgentStatus;
  /** Always a user-facing text, also for non-`done` states */
  answer: string;
  /** Model calls made, including failed ones */
  iterations: number;
  toolCalls: ToolCallRecord[];
  /**
   * The full conversation, system message first. Pass it back as
   * `history` to continue in the next turn.
   */
  conversation: ChatMessage[];
  error?: string;
}

/**
 * Progress notifications from the reasoning loop.
 */
export type ReasoningEvent =
  | { type: 'iteration_start'; iteration: number }
  | { type: 'tool_start'; invocation: ToolInvocation; iteration: number }
  | { type: 'tool_result'; record: ToolCallRecord }
  | { type: 'retry'; iteration: number; error: string; delayMs: number }
  | { type: 'finished'; status: AgentStatus; iterations: number };

// ============================================================================
// ANSWER ENVELOPE
// ============================================================================

/**
 * The one thing every caller gets back. Frozen after construction.
 */
export interface AnswerEnvelope {
  readonly question: string;
  readonly answer: string;
  readonly passagesUsed: readonly Passage[];
  /** Source of each passage used, in rank order */
  readonly sources: readonly string[];
  readonly mode: QAMode;
  /** Display label such as "RAG模式" */
  readonly modeLabel: string;
  readonly ragEnabled: boolean;
  /** Rendered context, only when the caller asked to see it */
  readonly context?: string;
  readonly toolCalls?: readonly ToolCallRecord[];
  readonly iterations?: number;
  readonly agentStatus?: AgentStatus;
  /** Agent mode: the conversation to pass back for the next turn */
  readonly conversation?: readonly ChatMessage[];
  readonly error?: string;
}
