/**
 * Answer Generator
 *
 * Single-shot generation for rag and llm modes: one system message, one
 * user message, one backend call. A failed call degrades to an apology
 * plus the retrieved context instead of throwing.
 */

import { callChat } from '../providers/call.js';
import { BackendError } from '../providers/errors.js';
import type { ChatBackend, ChatRequest } from '../providers/types.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { degradedAnswer, llmUserMessage, ragUserMessage } from './prompts.js';

export interface AnswerGeneratorOptions {
  /** @default 0.1 */
  temperature?: number;
  /** @default 1500 */
  maxTokens?: number;
  /** @default 60000 */
  requestTimeoutMs?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  systemPrompt: string;
  /** Embed the context in the user message (when it is non-empty) */
  ragEnabled: boolean;
  signal?: AbortSignal;
}

export interface GeneratedAnswer {
  answer: string;
  /** True when the backend failed and `answer` is the fallback text */
  degraded: boolean;
  error?: string;
}

export const DEFAULT_GENERATION_TEMPERATURE = 0.1;
export const DEFAULT_GENERATION_MAX_TOKENS = 1500;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

export class AnswerGenerator {
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly backend: ChatBackend,
    options: AnswerGeneratorOptions = {}
  ) {
    this.temperature = options.temperature ?? DEFAULT_GENERATION_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_GENERATION_MAX_TOKENS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * The exact request `generate` sends.
   */
  buildRequest(question: string, context: string, options: Pick<GenerateOptions, 'systemPrompt' | 'ragEnabled'>): ChatRequest {
    const userMessage =
      options.ragEnabled && context !== '' ? ragUserMessage(question, context) : llmUserMessage(question);

    return {
      messages: [
        { role: 'system', content: options.systemPrompt },
        { role: 'user', content: userMessage },
      ],
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    };
  }

  async generate(question: string, context: string, options: GenerateOptions): Promise<GeneratedAnswer> {
    const request = this.buildRequest(question, context, options);

    try {
      const reply = await callChat(this.backend, request, {
        timeoutMs: this.requestTimeoutMs,
        signal: options.signal,
      });

      if (reply.content === null || reply.content.trim() === '') {
        throw BackendError.invalidResponse('empty answer');
      }
      return { answer: reply.content, degraded: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Answer generation failed: ${message}`);
      return { answer: degradedAnswer(context), degraded: true, error: message };
    }
  }
}
