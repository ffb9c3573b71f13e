/**
 * Language-model backend contract.
 *
 * The reasoning loop and the answer generator only ever see ChatBackend.
 * Every concrete provider (DashScope, OpenAI, Ollama, any OpenAI-compatible
 * endpoint) is adapted to it in openai-backend.ts.
 */

import type { LLMProviderType } from '../config/schema.js';

/** Supported chat providers */
export type ProviderType = LLMProviderType;

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * A tool call requested by the model.
 *
 * `argumentError` is set when the model's argument payload was not a JSON
 * object. The call is still answered (with a failure observation) so every
 * id gets exactly one result.
 */
export interface ToolInvocation {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  argumentError?: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolInvocation[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  content: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolResultMessage;

// ============================================================================
// TOOL SCHEMA
// ============================================================================

/**
 * JSON-schema subset used to describe tool parameters to the model.
 */
export type ParameterProperty = {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  enum?: readonly string[];
  items?: ParameterProperty;
  properties?: Record<string, ParameterProperty>;
  default?: string | number | boolean;
};

/** A type alias (not an interface) so it stays assignable to the SDK's open record type */
export type ParameterSpec = {
  type: 'object';
  properties: Record<string, ParameterProperty>;
  required?: readonly string[];
};

/**
 * What the model sees of a tool.
 */
export interface ToolSchema {
  name: string;
  description: string;
  parameters: ParameterSpec;
}

export type ToolChoice = 'auto' | 'none' | 'required';

// ============================================================================
// REQUEST / REPLY
// ============================================================================

export interface ChatRequest {
  messages: readonly ChatMessage[];
  temperature: number;
  maxTokens: number;
  /** Omitted or empty means the call is made without tool calling */
  tools?: readonly ToolSchema[];
  toolChoice?: ToolChoice;
}

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'content_filter' | 'other';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface BackendReply {
  content: string | null;
  toolCalls: ToolInvocation[];
  finishReason: FinishReason;
  usage?: TokenUsage;
}

export interface ChatCallOptions {
  signal?: AbortSignal;
}

/**
 * Opaque chat-completion service with optional tool calling.
 *
 * Implementations reject with BackendError on failure.
 */
export interface ChatBackend {
  readonly name: ProviderType;
  readonly model: string;
  chat(request: ChatRequest, options?: ChatCallOptions): Promise<BackendReply>;
  isAvailable?(): Promise<boolean>;
}
