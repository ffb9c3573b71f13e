/**
 * Config Module Tests
 *
 * Loading, validation, merging and dot-path access, against a temp
 * config file so the real ~/.medqa is never touched.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import { loadConfig, getConfigValue, setConfigValue, listConfig, parseValue } from '../loader.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown provider', () => {
    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, default_provider: 'anthropic' });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown mode', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      qa: { ...DEFAULT_CONFIG.qa, mode: 'expert' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects min_score outside the cosine range', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      search: { top_k: 3, min_score: 1.5 },
    });
    expect(result.success).toBe(false);
  });

  it('allows deeply partial config', () => {
    expect(PartialConfigSchema.safeParse({ agent: { max_iterations: 8 } }).success).toBe(true);
  });
});

describe('Config Loader', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'medqa-config-'));
    configPath = path.join(dir, 'config.toml');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the template and returns defaults on first run', () => {
    const config = loadConfig(true, configPath);

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('parses its own template back to the defaults', () => {
    fs.writeFileSync(configPath, CONFIG_TEMPLATE);

    expect(loadConfig(false, configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('does not create a file when createIfMissing is false', () => {
    loadConfig(false, configPath);

    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('merges sparse user values over defaults', () => {
    fs.writeFileSync(configPath, '[agent]\nmax_iterations = 8\n\n[qa]\nmode = "agent"\n');

    const config = loadConfig(false, configPath);

    expect(config.agent.max_iterations).toBe(8);
    expect(config.agent.temperature).toBe(0.1);
    expect(config.qa).toEqual({ mode: 'agent', enable_rag: true });
    expect(config.default_model).toBe('qwen-plus');
  });

  it('throws ConfigError for invalid TOML', () => {
    fs.writeFileSync(configPath, '[agent\nmax_iterations = 8');

    expect(() => loadConfig(false, configPath)).toThrow(ConfigError);
  });

  it('throws ConfigError for values that fail validation', () => {
    fs.writeFileSync(configPath, '[search]\ntop_k = 0\n');

    expect(() => loadConfig(false, configPath)).toThrow(/search\.top_k/);
  });

  it('reads values by dot path', () => {
    expect(getConfigValue('agent.max_iterations', DEFAULT_CONFIG)).toBe(5);
    expect(getConfigValue('rag.max_context_length', DEFAULT_CONFIG)).toBe(4000);
    expect(getConfigValue('agent.nope', DEFAULT_CONFIG)).toBeUndefined();
    expect(getConfigValue('default_model.length.x', DEFAULT_CONFIG)).toBeUndefined();
  });

  it('sets a value and writes it back', () => {
    setConfigValue('search.top_k', '5', configPath);

    expect(loadConfig(false, configPath).search.top_k).toBe(5);
  });

  it('refuses an invalid value without writing', () => {
    expect(() => setConfigValue('agent.temperature', 'hot', configPath)).toThrow(ConfigError);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('refuses an unknown key', () => {
    expect(() => setConfigValue('agent.turbo', 'true', configPath)).toThrow('Unknown config key: agent.turbo');
  });

  it('accepts optional keys without defaults', () => {
    setConfigValue('search.min_score', '0.25', configPath);

    expect(loadConfig(false, configPath).search.min_score).toBe(0.25);
  });

  it('lists flat dot-path entries', () => {
    const entries = listConfig(DEFAULT_CONFIG);

    expect(entries).toContainEqual(['default_provider', 'dashscope']);
    expect(entries).toContainEqual(['agent.parallel_tool_calls', false]);
    expect(entries).toContainEqual(['qa.mode', 'rag']);
  });
});

describe('parseValue', () => {
  it('converts booleans, numbers and strings', () => {
    expect(parseValue('TRUE')).toBe(true);
    expect(parseValue('false')).toBe(false);
    expect(parseValue('0.25')).toBe(0.25);
    expect(parseValue('qwen-max')).toBe('qwen-max');
    expect(parseValue(' ')).toBe(' ');
  });
});
