/**
 * Medical QA Service
 *
 * Mode controller. Picks the single-shot path (rag / llm) or the reasoning
 * loop (agent) and always hands back a frozen AnswerEnvelope.
 *
 * @example
 * ```typescript
 * const service = MedicalQAService.fromConfig(config, { backend, retriever });
 * const envelope = await service.answer('高血压的诊断标准是什么？');
 * console.log(envelope.answer, envelope.sources);
 *
 * service.switchMode('agent');
 * const turn1 = await service.answer('我最近总是头痛');
 * const turn2 = await service.answer('需要去医院吗？', { history: turn1.conversation });
 * ```
 */

import type { Config, QAMode } from '../config/schema.js';
import { QA_MODES, QAModeSchema } from '../config/schema.js';
import { ConfigError, InvalidModeError } from '../errors/index.js';
import { evaluateAnswer, type QualityReport } from '../eval/quality.js';
import type { ChatBackend, ChatMessage } from '../providers/types.js';
import type { KnowledgeRetriever } from '../search/retriever.js';
import type { Passage } from '../search/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { AnswerGenerator, type AnswerGeneratorOptions } from './answer-generator.js';
import { assembleContext } from './context-assembler.js';
import { buildSystemPrompt } from './prompts.js';
import { ReasoningLoop, type ReasoningLoopOptions } from './reasoning-loop.js';
import { createMedicalToolRegistry } from './tools/index.js';
import type { AnswerEnvelope } from './types.js';

export interface QAServiceDependencies {
  backend: ChatBackend;
  /** Omit when there is no knowledge base; RAG then stays off */
  retriever?: Pick<KnowledgeRetriever, 'searchDetailed'> | null;
}

export interface QAServiceOptions {
  /** Validated; unknown names throw InvalidModeError. @default 'rag' */
  mode?: string;
  /** Only takes effect in rag and agent modes. @default true */
  enableRag?: boolean;
  /** @default 3 */
  topK?: number;
  /** @default 4000 */
  maxContextLength?: number;
  generation?: Omit<AnswerGeneratorOptions, 'logger'>;
  agent?: Omit<ReasoningLoopOptions, 'systemPrompt' | 'logger'>;
  logger?: Logger;
}

export interface AnswerOptions {
  /** Passages to retrieve; defaults to the service's topK */
  k?: number;
  /** Include the rendered context in the envelope */
  showContext?: boolean;
  /** Agent mode: the previous envelope's `conversation` */
  history?: readonly ChatMessage[];
  signal?: AbortSignal;
}

export interface Capabilities {
  mode: string;
  capabilities: string[];
  limitations: string[];
  /** Agent mode only */
  tools?: string[];
}

export const DEFAULT_TOP_K = 3;
export const DEFAULT_MAX_CONTEXT_LENGTH = 4000;

const LIMITATIONS = ['不提供具体医疗诊断', '不能替代专业医疗咨询', '建议结果仅供参考'];

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

function requirePositiveInteger(name: string, value: number): number {
  if (!isPositiveInteger(value)) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * @throws InvalidModeError for anything but llm, rag or agent (case-insensitive)
 */
export function parseMode(mode: string): QAMode {
  const parsed = QAModeSchema.safeParse(mode.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidModeError(mode, QA_MODES);
  }
  return parsed.data;
}

/**
 * Map the loaded config onto service options.
 */
export function qaServiceOptionsFromConfig(config: Config, logger?: Logger): QAServiceOptions {
  return {
    mode: config.qa.mode,
    enableRag: config.qa.enable_rag,
    topK: config.search.top_k,
    maxContextLength: config.rag.max_context_length,
    generation: {
      temperature: config.generation.temperature,
      maxTokens: config.generation.max_tokens,
      requestTimeoutMs: config.generation.request_timeout_ms,
    },
    agent: {
      maxIterations: config.agent.max_iterations,
      temperature: config.agent.temperature,
      maxTokens: config.agent.max_tokens,
      requestTimeoutMs: config.agent.request_timeout_ms,
      maxConsecutiveFailures: config.agent.max_consecutive_failures,
      retryBackoffMs: config.agent.retry_backoff_ms,
      parallelToolCalls: config.agent.parallel_tool_calls,
    },
    logger,
  };
}

type EnvelopeFields = { -readonly [K in keyof AnswerEnvelope]: AnswerEnvelope[K] };

function freezeEnvelope(fields: EnvelopeFields): AnswerEnvelope {
  const envelope: EnvelopeFields = { ...fields };
  for (const key of Object.keys(envelope)) {
    if (Reflect.get(envelope, key) === undefined) {
      Reflect.deleteProperty(envelope, key);
    }
  }
  Object.freeze(envelope.passagesUsed);
  Object.freeze(envelope.sources);
  return Object.freeze(envelope);
}

export class MedicalQAService {
  private readonly backend: ChatBackend;
  private readonly retriever: Pick<KnowledgeRetriever, 'searchDetailed'> | null;
  private readonly generator: AnswerGenerator;
  private readonly topK: number;
  private readonly maxContextLength: number;
  private readonly agentOptions: Omit<ReasoningLoopOptions, 'systemPrompt' | 'logger'>;
  private readonly logger: Logger;

  private mode: QAMode = 'rag';
  private ragEnabled = false;
  private currentSystemPrompt = '';
  private agentLoop: ReasoningLoop | null = null;

  /**
   * @throws InvalidModeError for an unknown mode
   * @throws ConfigError when `topK` or `maxContextLength` is not a positive integer
   */
  constructor(dependencies: QAServiceDependencies, options: QAServiceOptions = {}) {
    this.backend = dependencies.backend;
    this.retriever = dependencies.retriever ?? null;
    this.logger = options.logger ?? consoleLogger;
    this.topK = requirePositiveInteger('topK', options.topK ?? DEFAULT_TOP_K);
    this.maxContextLength = requirePositiveInteger(
      'maxContextLength',
      options.maxContextLength ?? DEFAULT_MAX_CONTEXT_LENGTH
    );
    this.agentOptions = options.agent ?? {};
    this.generator = new AnswerGenerator(this.backend, { ...options.generation, logger: this.logger });

    this.configure(parseMode(options.mode ?? 'rag'), options.enableRag ?? true);
  }

  static fromConfig(config: Config, dependencies: QAServiceDependencies, logger?: Logger): MedicalQAService {
    return new MedicalQAService(dependencies, qaServiceOptionsFromConfig(config, logger));
  }

  get currentMode(): QAMode {
    return this.mode;
  }

  get isRagEnabled(): boolean {
    return this.ragEnabled;
  }

  get systemPrompt(): string {
    return this.currentSystemPrompt;
  }

  /**
   * Switching always discards the current reasoning loop; agent mode gets
   * a fresh one.
   *
   * @throws InvalidModeError
   */
  switchMode(mode: string, enableRag = true): void {
    const previous = this.getCurrentMode();
    this.configure(parseMode(mode), enableRag);
    this.logger.debug?.(`Switched from ${previous} to ${this.getCurrentMode()}`);
  }

  /**
   * Flip RAG, or set it when `enable` is given. Returns the new state,
   * which stays false in llm mode or without a knowledge base.
   */
  toggleRag(enable?: boolean): boolean {
    this.configure(this.mode, enable ?? !this.ragEnabled);
    return this.ragEnabled;
  }

  /** e.g. "RAG模式(RAG增强)", "LLM模式" */
  getCurrentMode(): string {
    return `${this.mode.toUpperCase()}模式${this.ragEnabled ? '(RAG增强)' : ''}`;
  }

  getCapabilities(): Capabilities {
    if (this.mode === 'agent') {
      return {
        mode: this.getCurrentMode(),
        capabilities: ['医疗问答', '多步推理', '工具调用', this.ragEnabled ? '知识检索' : '知识问答'],
        limitations: [...LIMITATIONS],
        tools: this.agentLoop?.toolNames() ?? [],
      };
    }
    return {
      mode: this.getCurrentMode(),
      capabilities: ['医疗问答', this.ragEnabled ? '文档检索' : '知识问答', '批量处理', '质量评估'],
      limitations: [...LIMITATIONS],
    };
  }

  /**
   * Never rejects: backend and retrieval failures, and a `k` that is not a
   * positive integer, come back as degraded answers with `error` set.
   */
  async answer(question: string, options: AnswerOptions = {}): Promise<AnswerEnvelope> {
    if (options.k !== undefined && !isPositiveInteger(options.k)) {
      return this.rejectedEnvelope(question, `k must be a positive integer, got ${options.k}`);
    }
    if (this.mode === 'agent' && this.agentLoop) {
      return this.answerWithAgent(this.agentLoop, question, options);
    }
    return this.answerWithGenerator(question, options);
  }

  /**
   * Sequential; one question at a time.
   */
  async batchAnswer(questions: readonly string[], k?: number): Promise<AnswerEnvelope[]> {
    const envelopes: AnswerEnvelope[] = [];
    for (const question of questions) {
      envelopes.push(await this.answer(question, { k }));
    }
    return envelopes;
  }

  evaluate(envelope: AnswerEnvelope): QualityReport {
    return evaluateAnswer(envelope.question, envelope.answer, envelope.passagesUsed);
  }

  private configure(mode: QAMode, enableRag: boolean): void {
    let ragEnabled = enableRag && (mode === 'rag' || mode === 'agent');
    if (ragEnabled && !this.retriever) {
      this.logger.warn('Knowledge base unavailable; answering without retrieval');
      ragEnabled = false;
    }

    this.mode = mode;
    this.ragEnabled = ragEnabled;
    this.currentSystemPrompt = buildSystemPrompt(mode, ragEnabled);
    this.agentLoop =
      mode === 'agent'
        ? new ReasoningLoop(
            this.backend,
            createMedicalToolRegistry({ retriever: ragEnabled && this.retriever ? this.retriever : undefined }),
            { ...this.agentOptions, systemPrompt: this.currentSystemPrompt, logger: this.logger }
          )
        : null;
  }

  private async answerWithGenerator(question: string, options: AnswerOptions): Promise<AnswerEnvelope> {
    const k = options.k ?? this.topK;
    const errors: string[] = [];
    let passages: Passage[] = [];
    let context = '';

    if (this.ragEnabled && this.retriever) {
      const outcome = await this.retriever.searchDetailed(question, k, { signal: options.signal });
      if (outcome.error !== undefined) {
        errors.push(`retrieval: ${outcome.error}`);
      }
      const assembled = assembleContext(outcome.passages, k, this.maxContextLength);
      passages = assembled.passages;
      context = assembled.text;
    }

    const generated = await this.generator.generate(question, context, {
      systemPrompt: this.currentSystemPrompt,
      ragEnabled: this.ragEnabled,
      signal: options.signal,
    });
    if (generated.error !== undefined) {
      errors.push(`generation: ${generated.error}`);
    }

    return freezeEnvelope({
      question,
      answer: generated.answer,
      passagesUsed: passages,
      sources: passages.map((passage) => passage.source),
      mode: this.mode,
      modeLabel: this.modeLabel(),
      ragEnabled: this.ragEnabled,
      context: options.showContext ? context : undefined,
      error: errors.length > 0 ? errors.join('; ') : undefined,
    });
  }

  private rejectedEnvelope(question: string, error: string): AnswerEnvelope {
    this.logger.warn(`Question not answered: ${error}`);
    return freezeEnvelope({
      question,
      answer: `无法处理该问题: ${error}`,
      passagesUsed: [],
      sources: [],
      mode: this.mode,
      modeLabel: this.modeLabel(),
      ragEnabled: this.ragEnabled,
      agentStatus: this.mode === 'agent' ? 'failed' : undefined,
      error,
    });
  }

  private modeLabel(): string {
    if (this.mode === 'agent') {
      return `Agent模式${this.ragEnabled ? '(RAG增强)' : ''}`;
    }
    return this.ragEnabled ? 'RAG模式' : 'LLM模式';
  }

  private async answerWithAgent(
    loop: ReasoningLoop,
    question: string,
    options: AnswerOptions
  ): Promise<AnswerEnvelope> {
    const modeLabel = this.modeLabel();
    try {
      const result = await loop.run(question, { history: options.history, signal: options.signal });
      return freezeEnvelope({
        question,
        answer: result.answer,
        passagesUsed: [],
        sources: [],
        mode: 'agent',
        modeLabel,
        ragEnabled: this.ragEnabled,
        toolCalls: result.toolCalls,
        iterations: result.iterations,
        agentStatus: result.status,
        conversation: result.conversation,
        error: result.error,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Agent failed: ${message}`);
      return freezeEnvelope({
        question,
        answer: `智能体处理过程中出现错误: ${message}`,
        passagesUsed: [],
        sources: [],
        mode: 'agent',
        modeLabel,
        ragEnabled: this.ragEnabled,
        agentStatus: 'failed',
        error: message,
      });
    }
  }
}
