/**
 * Error classes for the medqa CLI and library.
 *
 * Every error the user can see carries a recovery hint and a process exit
 * code. Runtime language-model faults live in providers/errors.ts instead,
 * because those are recovered inside the pipeline and never reach the user
 * as an exception.
 */

/**
 * Base class for all user-facing errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration problems: bad TOML, unknown keys, values that
 * fail schema validation.
 *
 * Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: medqa config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a QA service is built or switched with a mode name it does
 * not support. This is a caller error and surfaces immediately.
 */
export class InvalidModeError extends ConfigError {
  public readonly mode: string;

  constructor(mode: string, supported: readonly string[]) {
    super(
      `Unsupported mode: ${mode}`,
      `Supported modes: ${supported.join(', ')}`
    );
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

/**
 * Thrown when an API key is missing.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to a .env file)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures from the knowledge store.
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try re-running: medqa index <dir>  to rebuild the knowledge base', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails. Carries one line per zod issue.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown by ToolRegistry.register when a name is already taken and the
 * caller did not ask to replace it.
 */
export class DuplicateToolError extends CLIError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(
      `Tool '${toolName}' is already registered`,
      'Pass { replace: true } to overwrite an existing tool on purpose',
      1
    );
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}
