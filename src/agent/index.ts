/**
 * Agent Module
 *
 * The answering pipeline: context assembly, single-shot generation, the
 * reasoning loop with its tools, and the mode controller on top.
 *
 * @example
 * ```typescript
 * import { MedicalQAService } from './agent/index.js';
 *
 * const service = MedicalQAService.fromConfig(config, { backend, retriever });
 * const envelope = await service.answer('阿司匹林的用法用量是多少？');
 * console.log(envelope.answer);
 * console.log(service.evaluate(envelope));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Mode controller
// ============================================================================

export {
  MedicalQAService,
  parseMode,
  qaServiceOptionsFromConfig,
  DEFAULT_TOP_K,
  DEFAULT_MAX_CONTEXT_LENGTH,
  type QAServiceDependencies,
  type QAServiceOptions,
  type AnswerOptions,
  type Capabilities,
} from './qa-service.js';

// ============================================================================
// Pipeline stages
// ============================================================================

export {
  assembleContext,
  sourceName,
  NO_KNOWLEDGE_FOUND,
  TRUNCATION_MARKER,
  CONTEXT_BANNER,
  SEGMENT_SEPARATOR,
} from './context-assembler.js';

export {
  AnswerGenerator,
  DEFAULT_GENERATION_TEMPERATURE,
  DEFAULT_GENERATION_MAX_TOKENS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type AnswerGeneratorOptions,
  type GenerateOptions,
  type GeneratedAnswer,
} from './answer-generator.js';

export {
  ReasoningLoop,
  DEFAULT_MAX_ITERATIONS,
  type ReasoningLoopOptions,
  type RunOptions,
} from './reasoning-loop.js';

export * from './prompts.js';
export * from './tools/index.js';

// ============================================================================
// Types
// ============================================================================

export { found, notFound } from './types.js';
export type {
  Lookup,
  AssembledContext,
  ToolExecution,
  ToolCallRecord,
  AgentStatus,
  AgentRunResult,
  ReasoningEvent,
  AnswerEnvelope,
} from './types.js';
