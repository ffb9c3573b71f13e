/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.medqa)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';
import { isJsonObject } from '../utils/json.js';

function isTomlTable(value: unknown): value is TOML.JsonMap {
  return isJsonObject(value) && !(value instanceof Date);
}

/**
 * Deep merge two plain objects, with source values overriding target.
 * Arrays and primitives are replaced, nested tables are merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isJsonObject(sourceValue) && isJsonObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readToml(configPath: string): TOML.JsonMap {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides).
 *
 * @param createIfMissing - Write CONFIG_TEMPLATE on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = readToml(configPath);

  // Sparse files are fine; only the fields present are checked here
  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('agent.max_iterations') => 5
 */
export function getConfigValue(key: string, config: Config = loadConfig()): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path and write it back.
 * The merged result is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath = getConfigPath()): void {
  const parts = key.split('.').filter((part) => part.length > 0);
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  if (!isKnownKey(key)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  let current = config;
  for (const part of parts) {
    const child = current[part];
    if (isTomlTable(child)) {
      current = child;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[leaf] = parseValue(value);

  const validation = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validation.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validation.error.issues)}`,
      'Run: medqa config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/** Keys that have no default value but may still be set */
const OPTIONAL_KEYS = ['search.min_score', 'llm.fallback_providers'];

function isKnownKey(key: string): boolean {
  if (OPTIONAL_KEYS.includes(key) || key.startsWith('llm.fallback_models.')) {
    return true;
  }
  return listConfig(DEFAULT_CONFIG).some(([known]) => known === key);
}

/**
 * Parse a CLI string into a boolean, number or string
 */
export function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values as flat dot-path entries,
 * e.g. ['agent.max_iterations', 5]
 */
export function listConfig(config: Config = loadConfig()): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isJsonObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
