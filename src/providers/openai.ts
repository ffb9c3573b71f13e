/**
 * Client construction for OpenAI-wire-compatible providers.
 *
 * Resolves base URL and key per provider, creates the SDK client and wraps
 * it in an OpenAIChatBackend. Keys are fetched only after validation.
 */

import OpenAI from 'openai';
import { getEnv, getOllamaHost } from '../config/env.js';
import { getProviderKey } from './validation.js';
import { OpenAIChatBackend, type OpenAIChatClient } from './openai-backend.js';
import type { ProviderType } from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';

/** Model used for a provider when nothing more specific is configured */
export const DEFAULT_MODELS: Record<ProviderType, string> = {
  dashscope: 'qwen-plus',
  openai: 'gpt-4o-mini',
  ollama: 'qwen2.5:7b',
  'openai-compatible': 'qwen-plus',
};

// ============================================================================
// TYPES
// ============================================================================

export interface ClientSettings {
  apiKey: string;
  /** Undefined means the SDK default (api.openai.com) */
  baseURL?: string;
}

/**
 * Anything that can stand in for `new OpenAI(...)`. Tests inject fakes.
 */
export type ClientFactory = (settings: ClientSettings) => OpenAIChatClient;

export interface OpenAIBackendOptions {
  provider: ProviderType;
  /** @default DEFAULT_MODELS[provider], or OPENAI_COMPATIBLE_MODEL for that provider */
  model?: string;
  timeoutMs?: number;
  /** @default false */
  skipAvailabilityCheck?: boolean;
  clientFactory?: ClientFactory;
}

// ============================================================================
// FUNCTIONS
// ============================================================================

/**
 * Key and base URL for a provider.
 *
 * @throws Error with setup instructions when the provider is not configured
 */
export function resolveClientSettings(provider: ProviderType): ClientSettings {
  const apiKey = getProviderKey(provider);

  switch (provider) {
    case 'dashscope':
      return { apiKey, baseURL: DASHSCOPE_BASE_URL };
    case 'openai':
      return { apiKey };
    case 'ollama':
      return { apiKey, baseURL: `${getOllamaHost().replace(/\/+$/, '')}/v1` };
    case 'openai-compatible':
      return { apiKey, baseURL: getEnv('OPENAI_COMPATIBLE_BASE_URL') };
  }
}

/**
 * Retries are owned by the reasoning loop, so the SDK's own are disabled.
 */
export const defaultClientFactory: ClientFactory = (settings) =>
  new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL, maxRetries: 0 });

export function resolveModel(provider: ProviderType, model?: string): string {
  if (model) return model;
  if (provider === 'openai-compatible') {
    return getEnv('OPENAI_COMPATIBLE_MODEL') ?? DEFAULT_MODELS[provider];
  }
  return DEFAULT_MODELS[provider];
}

/**
 * Create a chat backend for one provider.
 *
 * @throws Error if the provider is not configured or fails its availability check
 *
 * @example
 * ```typescript
 * const backend = await createOpenAIBackend({ provider: 'dashscope', model: 'qwen-plus' });
 * const reply = await backend.chat({ messages, temperature: 0.1, maxTokens: 1500 });
 * ```
 */
export async function createOpenAIBackend(options: OpenAIBackendOptions): Promise<OpenAIChatBackend> {
  const settings = resolveClientSettings(options.provider);
  const client = (options.clientFactory ?? defaultClientFactory)(settings);

  const backend = new OpenAIChatBackend({
    client,
    name: options.provider,
    model: resolveModel(options.provider, options.model),
    timeoutMs: options.timeoutMs,
  });

  if (!options.skipAvailabilityCheck) {
    const available = await backend.isAvailable();
    if (!available) {
      throw new Error(
        `${options.provider} is not reachable. Check your API key, base URL and network connection.`
      );
    }
  }

  return backend;
}
