/**
 * Session Error - base error class for the CV session bridge
 */

import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';

export class SessionError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly context?: string;

  constructor(code: ErrorCode, context?: string) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'SessionError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, SessionError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SessionError);
    }
  }
}

/**
 * Human-readable cause of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
