/**
 * API Key Validators
 *
 * Validates provider credentials without exposing key values.
 * These functions never log or return the actual key, except
 * getProviderKey, which exists only to hand the key to a client.
 */

import { z } from 'zod';
import { loadEnv, hasApiKey, SETUP_INSTRUCTIONS } from '../config/env.js';
import type { ProviderType } from './types.js';

// ============================================================================
// VALIDATION RESULT TYPE
// ============================================================================

/**
 * When valid: { valid: true }
 * When invalid: { valid: false, error: string, setupInstructions: string }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * OpenAI keys come in several flavours (sk-, sk-proj-, sk-svcacct-);
 * all share the "sk-" prefix.
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-'), 'Invalid OpenAI API key format (should start with "sk-")');

/** DashScope keys have no stable public format beyond being non-empty */
export const DashScopeKeySchema = z.string().trim().min(1, 'API key cannot be empty');

export const BaseUrlSchema = z
  .string()
  .url('Invalid base URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Base URL must be an HTTP(S) URL'
  );

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

function invalid(provider: ProviderType, error: string): ValidationResult {
  return { valid: false, error, setupInstructions: SETUP_INSTRUCTIONS[provider] };
}

function checkFormat(provider: ProviderType, schema: z.ZodType<string>, value: string): ValidationResult {
  const result = schema.safeParse(value);
  if (!result.success) {
    return invalid(provider, result.error.issues[0]?.message ?? 'Invalid value');
  }
  return { valid: true };
}

/**
 * Validate the credentials a provider needs before building a client.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.default_provider);
 * if (!result.valid) {
 *   logger.warn(result.error);
 *   logger.warn(result.setupInstructions);
 *   return;
 * }
 * ```
 */
export function validateProviderKey(provider: ProviderType): ValidationResult {
  const env = loadEnv();

  switch (provider) {
    case 'dashscope':
      if (!hasApiKey('dashscope')) {
        return invalid(provider, 'DASHSCOPE_API_KEY environment variable is not set');
      }
      return checkFormat(provider, DashScopeKeySchema, env.DASHSCOPE_API_KEY ?? '');

    case 'openai':
      if (!hasApiKey('openai')) {
        return invalid(provider, 'OPENAI_API_KEY environment variable is not set');
      }
      return checkFormat(provider, OpenAIKeySchema, env.OPENAI_API_KEY ?? '');

    case 'ollama':
      return checkFormat(provider, BaseUrlSchema, env.OLLAMA_HOST);

    case 'openai-compatible':
      if (!hasApiKey('openai-compatible')) {
        return invalid(
          provider,
          'OPENAI_COMPATIBLE_API_KEY and OPENAI_COMPATIBLE_BASE_URL must both be set'
        );
      }
      return checkFormat(provider, BaseUrlSchema, env.OPENAI_COMPATIBLE_BASE_URL ?? '');

    default: {
      const _exhaustiveCheck: never = provider;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Validate, then return the key for a provider. Ollama ignores the key
 * but the OpenAI client refuses an empty one, so it gets a placeholder.
 *
 * @throws Error with setup instructions if the provider is not configured
 */
export function getProviderKey(provider: ProviderType): string {
  const validation = validateProviderKey(provider);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  const env = loadEnv();
  const keys: Record<ProviderType, string | undefined> = {
    dashscope: env.DASHSCOPE_API_KEY,
    openai: env.OPENAI_API_KEY,
    ollama: 'ollama',
    'openai-compatible': env.OPENAI_COMPATIBLE_API_KEY,
  };
  const key = keys[provider]?.trim();
  if (!key) {
    throw new Error(`${provider} API key is not configured`);
  }
  return key;
}
