/**
 * Chat Backend Factory
 *
 * Central entry point for creating the chat backend from configuration,
 * with an ordered fallback chain when the primary provider cannot be
 * created (missing key, unreachable endpoint).
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { backend, name, model, usedFallback } = await createChatBackend(config);
 * ```
 */

import type { Config } from '../config/schema.js';
import { hasApiKey } from '../config/env.js';
import { createOpenAIBackend, resolveModel, type ClientFactory } from './openai.js';
import type { ChatBackend, ProviderType } from './types.js';
import { AllProvidersFailedError, type ProviderAttempt } from './errors.js';

export { AllProvidersFailedError, type ProviderAttempt };

// ============================================================================
// TYPES
// ============================================================================

export interface ChatBackendResult {
  backend: ChatBackend;
  name: ProviderType;
  model: string;
}

export interface ChatBackendResultWithFallback extends ChatBackendResult {
  /** True if a fallback provider was used instead of the primary */
  usedFallback: boolean;
  /** The provider that was originally requested (from config) */
  requestedProvider: ProviderType;
  /** All failed attempts before success (empty if primary succeeded) */
  failedAttempts: ProviderAttempt[];
}

export interface FallbackOptions {
  onFallback?: (from: ProviderType, to: ProviderType, reason: string) => void;
  onProviderFailed?: (provider: ProviderType, error: Error) => void;
  /** Fail immediately without trying fallback providers */
  disableFallback?: boolean;
}

export interface ChatBackendOptions {
  /** Overrides config.default_model for the primary provider */
  model?: string;
  /** @default false */
  skipAvailabilityCheck?: boolean;
  /** Per-call deadline; defaults to config.agent.request_timeout_ms */
  timeoutMs?: number;
  fallback?: FallbackOptions;
  clientFactory?: ClientFactory;
}

// ============================================================================
// FALLBACK CHAIN
// ============================================================================

const DEFAULT_FALLBACK_CHAINS: Record<ProviderType, ProviderType[]> = {
  dashscope: ['openai-compatible', 'openai', 'ollama'],
  openai: ['dashscope', 'openai-compatible', 'ollama'],
  ollama: ['dashscope', 'openai-compatible', 'openai'],
  'openai-compatible': ['dashscope', 'openai', 'ollama'],
};

/**
 * Uses config.llm.fallback_providers when set. Otherwise the default chain,
 * minus remote providers that have no credentials configured.
 */
function getFallbackChain(config: Config, primary: ProviderType): ProviderType[] {
  if (config.llm?.fallback_providers) {
    return config.llm.fallback_providers.filter((p) => p !== primary);
  }
  return DEFAULT_FALLBACK_CHAINS[primary].filter((p) => hasApiKey(p));
}

function getFallbackModel(config: Config, provider: ProviderType): string {
  return config.llm?.fallback_models?.[provider] ?? resolveModel(provider);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the chat backend named by config.default_provider, falling back
 * along the chain until one can be created.
 *
 * @throws AllProvidersFailedError if all providers fail
 */
export async function createChatBackend(
  config: Config,
  options: ChatBackendOptions = {}
): Promise<ChatBackendResultWithFallback> {
  const primary = config.default_provider;
  const failedAttempts: ProviderAttempt[] = [];
  const timeoutMs = options.timeoutMs ?? config.agent.request_timeout_ms;

  const attempt = async (provider: ProviderType, model: string): Promise<ChatBackend> =>
    createOpenAIBackend({
      provider,
      model,
      timeoutMs,
      skipAvailabilityCheck: options.skipAvailabilityCheck,
      clientFactory: options.clientFactory,
    });

  const recordFailure = (provider: ProviderType, error: unknown): void => {
    const err = toError(error);
    failedAttempts.push({ provider, error: err, timestamp: new Date() });
    options.fallback?.onProviderFailed?.(provider, err);
  };

  try {
    const backend = await attempt(primary, options.model ?? config.default_model);
    return {
      backend,
      name: primary,
      model: backend.model,
      usedFallback: false,
      requestedProvider: primary,
      failedAttempts: [],
    };
  } catch (error) {
    recordFailure(primary, error);
  }

  if (options.fallback?.disableFallback) {
    throw new AllProvidersFailedError(failedAttempts);
  }

  for (const fallbackProvider of getFallbackChain(config, primary)) {
    const lastError = failedAttempts[failedAttempts.length - 1]?.error;
    options.fallback?.onFallback?.(primary, fallbackProvider, lastError?.message ?? 'Unknown error');

    try {
      const backend = await attempt(fallbackProvider, getFallbackModel(config, fallbackProvider));
      return {
        backend,
        name: fallbackProvider,
        model: backend.model,
        usedFallback: true,
        requestedProvider: primary,
        failedAttempts,
      };
    } catch (error) {
      recordFailure(fallbackProvider, error);
    }
  }

  throw new AllProvidersFailedError(failedAttempts);
}
