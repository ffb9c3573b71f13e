/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `medqa config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  SearchConfigSchema,
  AgentConfigSchema,
  QAModeSchema,
  LLMProviderTypeSchema,
  QA_MODES,
} from './schema.js';
export type { Config, PartialConfig, QAMode, LLMProviderType } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, getConfigValue, setConfigValue, listConfig, parseValue } from './loader.js';

export { getMedqaDir, getDbPath, getConfigPath } from './paths.js';

export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
