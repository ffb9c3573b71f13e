/**
 * Last stop for errors that reach the CLI.
 *
 * Everything thrown is first mapped to an ErrorReport (message, recovery
 * hint, exit code), which is then printed as coloured text or as JSON.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';
import { AllProvidersFailedError, BackendError } from '../providers/errors.js';

export interface ErrorHandlerOptions {
  /** Include the stack trace */
  verbose?: boolean;
  /** Print the report as JSON */
  json?: boolean;
}

export interface ErrorReport {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

/** Exit code for a chat provider that cannot be reached or used */
const PROVIDER_EXIT_CODE = 4;

function report(error: Error, code: number, hint: string | undefined, verbose: boolean): ErrorReport {
  const result: ErrorReport = { error: error.message, code };
  if (hint !== undefined) result.hint = hint;
  if (verbose && error.stack) result.stack = error.stack;
  return result;
}

export function toErrorReport(error: unknown, verbose = false): ErrorReport {
  if (error instanceof CLIError) {
    return report(error, error.code, error.hint, verbose);
  }

  if (error instanceof AllProvidersFailedError) {
    const tried = error.attempts.map((attempt) => `${attempt.provider}: ${attempt.error.message}`);
    return report(
      error,
      PROVIDER_EXIT_CODE,
      [...tried, 'Set the provider API key in .env, or pick another with: medqa config set default_provider <name>'].join('\n'),
      verbose
    );
  }

  if (error instanceof BackendError) {
    const hint = error.retryable
      ? 'The model service may be busy; try again shortly'
      : 'Check the model settings with: medqa config list';
    return report(error, 1, hint, verbose);
  }

  if (error instanceof Error) {
    return report(error, 1, verbose ? undefined : 'Run with --verbose for more details', verbose);
  }

  return { error: String(error), code: 1 };
}

export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const result = toErrorReport(error, options.verbose ?? false);

  if (options.json) {
    return JSON.stringify(result, null, 2);
  }

  const lines = [chalk.red('Error: ') + result.error];
  if (result.hint) {
    lines.push(chalk.dim('Hint: ') + result.hint);
  }
  if (result.stack) {
    lines.push('', chalk.dim(result.stack));
  }
  return lines.join('\n');
}

export function getExitCode(error: unknown): number {
  return toErrorReport(error).code;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * For `uncaughtException` and `unhandledRejection`.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
