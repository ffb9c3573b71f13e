/**
 * Error classes and CLI error handling.
 *
 * @example
 * ```typescript
 * import { ConfigError, handleError } from './errors/index.js';
 *
 * throw new ConfigError('Invalid option', 'Try: medqa config list');
 * ```
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  InvalidModeError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  DuplicateToolError,
} from './types.js';

export {
  toErrorReport,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorReport,
} from './handler.js';
