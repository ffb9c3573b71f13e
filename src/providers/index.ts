/**
 * Providers Module
 *
 * Chat backends for every OpenAI-wire-compatible provider, their
 * credential checks and the failure taxonomy the answering pipeline
 * recovers from.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createChatBackend } from './providers/index.js';
 * const { backend, name, model } = await createChatBackend(config);
 * ```
 */

export {
  validateProviderKey,
  getProviderKey,
  OpenAIKeySchema,
  DashScopeKeySchema,
  BaseUrlSchema,
  type ValidationResult,
} from './validation.js';

export { BackendError, BackendErrorCodes, type BackendErrorCode } from './errors.js';
export { callChat, type BoundedCallOptions } from './call.js';

export {
  OpenAIChatBackend,
  DEFAULT_CHAT_TIMEOUT_MS,
  type OpenAIChatClient,
  type OpenAIChatBackendOptions,
} from './openai-backend.js';

export {
  createOpenAIBackend,
  resolveClientSettings,
  resolveModel,
  defaultClientFactory,
  DASHSCOPE_BASE_URL,
  DEFAULT_MODELS,
  type ClientSettings,
  type ClientFactory,
  type OpenAIBackendOptions,
} from './openai.js';

export {
  createChatBackend,
  AllProvidersFailedError,
  type ChatBackendResult,
  type ChatBackendResultWithFallback,
  type ChatBackendOptions,
  type FallbackOptions,
  type ProviderAttempt,
} from './llm.js';

export type {
  ProviderType,
  ChatMessage,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolResultMessage,
  ToolInvocation,
  ToolSchema,
  ToolChoice,
  ParameterSpec,
  ParameterProperty,
  ChatRequest,
  ChatCallOptions,
  BackendReply,
  FinishReason,
  TokenUsage,
  ChatBackend,
} from './types.js';
