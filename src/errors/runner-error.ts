/**
 * Runner Error - Base error class for oprun
 *
 * Every error raised by an operation run extends this class, so callers can
 * treat any RunnerError as "run did not complete" and inspect `code`.
 */

import { ErrorCode, ErrorCategory, getErrorCategory, getErrorMessage } from './error-codes';

export class RunnerError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message?: string, details?: Record<string, unknown>) {
    const baseMessage = message || getErrorMessage(code);
    super(`[${code}] ${baseMessage}`);
    this.name = 'RunnerError';
    this.code = code;
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }
}
