/**
 * Result kinds at operation boundaries.
 *
 * Best-effort operations return a Degradable: the value is always usable and
 * an optional issue records why it fell back. Caller-visible contracts return
 * a Fallible: either a value or a fatal SessionError, never both.
 */

import { ErrorCode, getErrorMessage } from './error-codes';
import { SessionError } from './session-error';

export interface RecoverableIssue {
  code: ErrorCode;
  message: string;
}

export interface Degradable<T> {
  value: T;
  issue?: RecoverableIssue;
}

export type Fallible<T> =
  | { success: true; value: T }
  | { success: false; error: SessionError };

export function available<T>(value: T): Degradable<T> {
  return { value };
}

export function degraded<T>(value: T, code: ErrorCode, detail?: string): Degradable<T> {
  const base = getErrorMessage(code);
  return {
    value,
    issue: {
      code,
      message: detail ? `${base}: ${detail}` : base,
    },
  };
}

export function succeed<T>(value: T): Fallible<T> {
  return { success: true, value };
}

export function fail<T>(code: ErrorCode, context?: string): Fallible<T> {
  return { success: false, error: new SessionError(code, context) };
}
