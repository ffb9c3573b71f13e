/**
 * Backend failure taxonomy.
 *
 * BackendErrors never reach the user as exceptions: the answer generator
 * and the reasoning loop turn them into degraded answers. `retryable` tells
 * the reasoning loop whether to retry the same step or abandon the episode.
 *
 * AllProvidersFailedError is raised while a session is being opened, before
 * any question is asked, and does reach the CLI.
 */

import { TimeoutError } from '../utils/timeout.js';
import type { ProviderType } from './types.js';

export const BackendErrorCodes = {
  /** The call exceeded its deadline */
  TIMEOUT: 'TIMEOUT',
  /** The caller cancelled the call */
  ABORTED: 'ABORTED',
  /** Network failure or an error status from the service */
  REQUEST_FAILED: 'REQUEST_FAILED',
  /** The service answered with something we cannot use */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

export type BackendErrorCode = (typeof BackendErrorCodes)[keyof typeof BackendErrorCodes];

export class BackendError extends Error {
  public readonly code: BackendErrorCode;
  public readonly retryable: boolean;
  /** HTTP status, when the service sent one */
  public readonly status?: number;
  public readonly cause?: Error;

  constructor(
    code: BackendErrorCode,
    message: string,
    options: { retryable: boolean; status?: number; cause?: Error }
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'BackendError';
    this.code = code;
    this.retryable = options.retryable;
    this.status = options.status;
    this.cause = options.cause;
  }

  static timeout(timeoutMs: number, cause?: Error): BackendError {
    return new BackendError(
      BackendErrorCodes.TIMEOUT,
      `Backend call timed out after ${timeoutMs}ms`,
      { retryable: true, cause }
    );
  }

  static aborted(cause?: Error): BackendError {
    return new BackendError(BackendErrorCodes.ABORTED, 'Backend call was cancelled', {
      retryable: false,
      cause,
    });
  }

  /**
   * Network errors (no status), 408, 409, 429 and 5xx are worth retrying.
   */
  static requestFailed(message: string, status?: number, cause?: Error): BackendError {
    const retryable =
      status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
    return new BackendError(BackendErrorCodes.REQUEST_FAILED, message, { retryable, status, cause });
  }

  static invalidResponse(reason: string): BackendError {
    return new BackendError(
      BackendErrorCodes.INVALID_RESPONSE,
      `Invalid backend response: ${reason}`,
      { retryable: true }
    );
  }

  /**
   * Normalize anything thrown by a backend call.
   */
  static from(error: unknown): BackendError {
    if (error instanceof BackendError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return BackendError.timeout(error.timeoutMs, error);
    }
    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'APIUserAbortError') {
        return BackendError.aborted(error);
      }
      return BackendError.requestFailed(error.message, readStatus(error), error);
    }
    return BackendError.requestFailed(String(error));
  }
}

function readStatus(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Record of a failed creation attempt, kept for diagnostics.
 */
export interface ProviderAttempt {
  provider: ProviderType;
  error: Error;
  timestamp: Date;
}

/**
 * Thrown when every provider in the chain failed.
 */
export class AllProvidersFailedError extends Error {
  public readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[], message?: string) {
    const providers = attempts.map((a) => a.provider).join(' -> ');
    super(message ?? `All chat providers failed. Tried: ${providers}`);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'AllProvidersFailedError';
    this.attempts = attempts;
  }

  /** The most recent failure */
  get lastError(): Error | undefined {
    return this.attempts[this.attempts.length - 1]?.error;
  }
}
