/**
 * Environment Variable Handler
 *
 * Loads and provides access to provider API keys.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { LLMProviderType } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Keys are optional at load time; only the provider actually used has to
 * be configured.
 */
export const EnvSchema = z.object({
  DASHSCOPE_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  OPENAI_COMPATIBLE_API_KEY: z.string().optional(),
  OPENAI_COMPATIBLE_BASE_URL: z.string().optional(),
  OPENAI_COMPATIBLE_MODEL: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    DASHSCOPE_API_KEY: process.env.DASHSCOPE_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    OPENAI_COMPATIBLE_API_KEY: process.env.OPENAI_COMPATIBLE_API_KEY,
    OPENAI_COMPATIBLE_BASE_URL: process.env.OPENAI_COMPATIBLE_BASE_URL,
    OPENAI_COMPATIBLE_MODEL: process.env.OPENAI_COMPATIBLE_MODEL,
  });
  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether a provider has what it needs to be constructed. Ollama needs no
 * key; openai-compatible also needs a base URL.
 */
export function hasApiKey(provider: LLMProviderType): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'dashscope':
      return Boolean(env.DASHSCOPE_API_KEY?.trim());
    case 'openai':
      return Boolean(env.OPENAI_API_KEY?.trim());
    case 'ollama':
      return true;
    case 'openai-compatible':
      return Boolean(env.OPENAI_COMPATIBLE_API_KEY?.trim() && env.OPENAI_COMPATIBLE_BASE_URL?.trim());
  }
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required API key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<LLMProviderType, string> = {
  dashscope: `
To use Qwen models through DashScope:

1. Create an API key in the Alibaba Cloud Model Studio console
2. Set the environment variable (or add it to .env):

   export DASHSCOPE_API_KEY="your-key"
`.trim(),

  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="your-key"
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/
2. Start the server and pull a model:

   ollama serve
   ollama pull qwen2.5:7b

3. (Optional) Set a custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  'openai-compatible': `
To use another OpenAI-compatible endpoint, set:

   OPENAI_COMPATIBLE_API_KEY="your-key"
   OPENAI_COMPATIBLE_BASE_URL="https://api.example.com/v1"
   OPENAI_COMPATIBLE_MODEL="model-name"
`.trim(),
};
