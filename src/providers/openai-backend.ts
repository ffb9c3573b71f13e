/**
 * OpenAI chat-completions adapter
 *
 * DashScope, OpenAI, Ollama and other OpenAI-compatible endpoints all speak
 * the same wire format, so one adapter serves every provider. It maps our
 * ChatMessage / ToolSchema types to the SDK's request shape, bounds each
 * call with a timeout, and normalizes every failure to BackendError.
 */

import type OpenAI from 'openai';
import { safeJsonParse, isJsonObject } from '../utils/json.js';
import { withTimeout } from '../utils/timeout.js';
import { BackendError } from './errors.js';
import type {
  BackendReply,
  ChatBackend,
  ChatCallOptions,
  ChatMessage,
  ChatRequest,
  FinishReason,
  ProviderType,
  ToolInvocation,
  ToolSchema,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

type CompletionParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;
type Completion = OpenAI.Chat.ChatCompletion;
type MessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ToolParam = OpenAI.Chat.ChatCompletionTool;

/**
 * The slice of the OpenAI client this adapter uses. A real `OpenAI`
 * instance satisfies it; tests pass a hand-written fake.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(body: CompletionParams, options?: { signal?: AbortSignal }): PromiseLike<Completion>;
    };
  };
  models: {
    list(): PromiseLike<unknown>;
  };
}

export interface OpenAIChatBackendOptions {
  client: OpenAIChatClient;
  name: ProviderType;
  model: string;
  /**
   * Deadline for one chat call. Non-positive disables it.
   * @default 60000
   */
  timeoutMs?: number;
}

export const DEFAULT_CHAT_TIMEOUT_MS = 60000;

// ============================================================================
// MAPPING
// ============================================================================

function toMessageParam(message: ChatMessage): MessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: 'assistant', content: message.content ?? '' };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

function toToolParam(tool: ToolSchema): ToolParam {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
    case 'length':
    case 'tool_calls':
    case 'content_filter':
      return reason;
    default:
      return 'other';
  }
}

// ============================================================================
// BACKEND
// ============================================================================

export class OpenAIChatBackend implements ChatBackend {
  readonly name: ProviderType;
  readonly model: string;
  private readonly client: OpenAIChatClient;
  private readonly timeoutMs: number;
  private generatedIds = 0;

  constructor(options: OpenAIChatBackendOptions) {
    this.client = options.client;
    this.name = options.name;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS;
  }

  async chat(request: ChatRequest, options: ChatCallOptions = {}): Promise<BackendReply> {
    const params = this.buildParams(request);

    let completion: Completion;
    try {
      completion = await withTimeout(
        (signal) => Promise.resolve(this.client.chat.completions.create(params, { signal })),
        this.timeoutMs,
        { parent: options.signal, label: `${this.name} chat request` }
      );
    } catch (error) {
      throw BackendError.from(error);
    }

    return this.parseCompletion(completion);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await withTimeout(() => Promise.resolve(this.client.models.list()), this.timeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Tools are only attached when there are some; an empty `tools` array
   * is rejected by several OpenAI-compatible servers.
   */
  buildParams(request: ChatRequest): CompletionParams {
    const params: CompletionParams = {
      model: this.model,
      messages: request.messages.map(toMessageParam),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };

    if (request.tools && request.tools.length > 0) {
      params.tools = request.tools.map(toToolParam);
      params.tool_choice = request.toolChoice ?? 'auto';
    }

    return params;
  }

  private parseCompletion(completion: Completion): BackendReply {
    const choice = completion.choices[0];
    if (!choice) {
      throw BackendError.invalidResponse('completion has no choices');
    }

    const toolCalls: ToolInvocation[] = (choice.message.tool_calls ?? []).map((call, index) =>
      this.parseToolCall(call.id, call.function.name, call.function.arguments, index)
    );

    const reply: BackendReply = {
      content: choice.message.content ?? null,
      toolCalls,
      finishReason: toFinishReason(choice.finish_reason),
    };

    if (completion.usage) {
      reply.usage = {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
        totalTokens: completion.usage.total_tokens,
      };
    }

    return reply;
  }

  private parseToolCall(id: string, name: string, rawArguments: string, index: number): ToolInvocation {
    // Some compatible servers omit ids; the tool result still needs one to pair with
    const callId = id ? id : `call_${++this.generatedIds}_${index}`;

    if (rawArguments.trim() === '') {
      return { id: callId, name, arguments: {} };
    }

    let argumentError: string | undefined;
    const args = safeJsonParse(rawArguments, isJsonObject, {}, (error) => {
      argumentError = error.message;
    });

    const invocation: ToolInvocation = { id: callId, name, arguments: args };
    if (argumentError !== undefined) {
      invocation.argumentError = argumentError;
    }
    return invocation;
  }
}
