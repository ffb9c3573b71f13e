import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  InvalidModeError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  DuplicateToolError,
  formatError,
  getExitCode,
  toErrorReport,
} from '../index.js';
import { AllProvidersFailedError, BackendError } from '../../providers/errors.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('FileNotFoundError', () => {
    it('creates error with path', () => {
      const error = new FileNotFoundError('/docs/missing');

      expect(error.message).toBe('Path does not exist: /docs/missing');
      expect(error.code).toBe(3);
    });
  });

  describe('ConfigError', () => {
    it('falls back to the config list hint', () => {
      const error = new ConfigError('Invalid TOML');

      expect(error.hint).toBe('Run: medqa config list  to see valid options');
      expect(error.code).toBe(2);
    });
  });

  describe('InvalidModeError', () => {
    it('names the rejected mode and the supported ones', () => {
      const error = new InvalidModeError('expert', ['llm', 'rag', 'agent']);

      expect(error.message).toBe('Unsupported mode: expert');
      expect(error.hint).toBe('Supported modes: llm, rag, agent');
      expect(error.mode).toBe('expert');
      expect(error.code).toBe(2);
      expect(error).toBeInstanceOf(ConfigError);
      expect(error.name).toBe('InvalidModeError');
    });
  });

  describe('APIKeyError', () => {
    it('derives the env var from the provider name', () => {
      const error = new APIKeyError('dashscope');

      expect(error.message).toBe('dashscope API key not configured');
      expect(error.hint).toContain('DASHSCOPE_API_KEY');
      expect(error.code).toBe(4);
    });

    it('uses an explicit env var when given', () => {
      const error = new APIKeyError('openai-compatible', 'OPENAI_COMPATIBLE_API_KEY');

      expect(error.hint).toContain('OPENAI_COMPATIBLE_API_KEY');
    });
  });

  describe('DatabaseError', () => {
    it('keeps the underlying cause', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new DatabaseError('Database is locked', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid arguments', ['top_k: Expected number']);

      expect(error.hint).toBe('Issues:\n  top_k: Expected number');
      expect(error.issues).toEqual(['top_k: Expected number']);
    });
  });

  describe('DuplicateToolError', () => {
    it('reports the clashing tool name', () => {
      const error = new DuplicateToolError('drug_information');

      expect(error.message).toBe("Tool 'drug_information' is already registered");
      expect(error.toolName).toBe('drug_information');
      expect(error).toBeInstanceOf(CLIError);
    });
  });
});

describe('formatError', () => {
  it('formats CLIError with hint', () => {
    const output = formatError(new CLIError('Failed', 'Try again'));

    expect(output).toContain('Failed');
    expect(output).toContain('Hint:');
    expect(output).toContain('Try again');
  });

  it('suggests --verbose for plain errors', () => {
    const output = formatError(new Error('Something broke'));

    expect(output).toContain('Something broke');
    expect(output).toContain('--verbose');
  });

  it('formats CLIError as JSON', () => {
    const output = formatError(new ConfigError('Bad config', 'Fix it'), { json: true });
    const parsed: unknown = JSON.parse(output);

    expect(parsed).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
  });

  it('formats unknown values as JSON', () => {
    expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
  });
});

describe('toErrorReport', () => {
  it('lists every failed provider', () => {
    const error = new AllProvidersFailedError([
      { provider: 'dashscope', error: new Error('DASHSCOPE_API_KEY is not set'), timestamp: new Date(0) },
      { provider: 'openai', error: new Error('401 Unauthorized'), timestamp: new Date(0) },
    ]);

    expect(toErrorReport(error)).toEqual({
      error: 'All chat providers failed. Tried: dashscope -> openai',
      code: 4,
      hint:
        'dashscope: DASHSCOPE_API_KEY is not set\n' +
        'openai: 401 Unauthorized\n' +
        'Set the provider API key in .env, or pick another with: medqa config set default_provider <name>',
    });
  });

  it('hints at a retry only for retryable backend failures', () => {
    expect(toErrorReport(BackendError.requestFailed('503 Service Unavailable', 503)).hint).toBe(
      'The model service may be busy; try again shortly'
    );
    expect(toErrorReport(BackendError.requestFailed('400 Bad Request', 400))).toEqual({
      error: '400 Bad Request',
      code: 1,
      hint: 'Check the model settings with: medqa config list',
    });
  });

  it('adds the stack only when verbose', () => {
    const error = new ConfigError('Bad config', 'Fix it');

    expect(toErrorReport(error).stack).toBeUndefined();
    expect(toErrorReport(error, true).stack).toBe(error.stack);
  });

  it('drops the --verbose hint once verbose is on', () => {
    expect(toErrorReport(new Error('boom'), true).hint).toBeUndefined();
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError', () => {
    expect(getExitCode(new InvalidModeError('x', ['rag']))).toBe(2);
    expect(getExitCode(new APIKeyError('openai'))).toBe(4);
    expect(getExitCode(new DatabaseError('locked'))).toBe(5);
  });

  it('returns 4 when no chat provider could be used', () => {
    expect(getExitCode(new AllProvidersFailedError([]))).toBe(4);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});
