/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, hasApiKey, getOllamaHost, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('loads DASHSCOPE_API_KEY when set', () => {
      vi.stubEnv('DASHSCOPE_API_KEY', 'test-secret');

      expect(loadEnv().DASHSCOPE_API_KEY).toBe('test-secret');
    });

    it('provides default OLLAMA_HOST when unset or empty', () => {
      vi.stubEnv('OLLAMA_HOST', '');

      expect(loadEnv().OLLAMA_HOST).toBe('http://localhost:11434');
    });

    it('caches environment variables after first load', () => {
      vi.stubEnv('OPENAI_API_KEY', 'first-key');
      loadEnv();

      vi.stubEnv('OPENAI_API_KEY', 'second-key');

      expect(loadEnv().OPENAI_API_KEY).toBe('first-key');
    });

    it('returns fresh values after cache is cleared', () => {
      vi.stubEnv('OPENAI_API_KEY', 'first-key');
      loadEnv();

      vi.stubEnv('OPENAI_API_KEY', 'second-key');
      _clearEnvCache();

      expect(getEnv('OPENAI_API_KEY')).toBe('second-key');
    });
  });

  describe('hasApiKey()', () => {
    it('returns true when the dashscope key exists', () => {
      vi.stubEnv('DASHSCOPE_API_KEY', 'test-secret');

      expect(hasApiKey('dashscope')).toBe(true);
    });

    it('returns false when the key is only whitespace', () => {
      vi.stubEnv('OPENAI_API_KEY', '   ');

      expect(hasApiKey('openai')).toBe(false);
    });

    it('never needs a key for ollama', () => {
      expect(hasApiKey('ollama')).toBe(true);
    });

    it('requires both key and base URL for openai-compatible', () => {
      vi.stubEnv('OPENAI_COMPATIBLE_API_KEY', 'test-secret');
      vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', '');
      expect(hasApiKey('openai-compatible')).toBe(false);

      _clearEnvCache();
      vi.stubEnv('OPENAI_COMPATIBLE_BASE_URL', 'http://localhost:8000/v1');
      expect(hasApiKey('openai-compatible')).toBe(true);
    });
  });

  describe('getOllamaHost()', () => {
    it('returns custom host when configured', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://gpu-box:11434');

      expect(getOllamaHost()).toBe('http://gpu-box:11434');
    });
  });
});
