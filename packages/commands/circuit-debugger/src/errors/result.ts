import type { DebuggerFailure } from './debugger-error.js';
import { DebuggerError } from './debugger-error.js';

/**
 * Outcome of a session operation. Failures are values, never thrown.
 */
export type DebugResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DebuggerFailure };

export function success<T>(value: T): DebugResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: DebuggerError): DebugResult<T> {
  return { ok: false, error: error.toFailure() };
}

/**
 * Runs `operation`, turning a thrown {@link DebuggerError} into a failure.
 * Any other exception propagates.
 */
export function capture<T>(operation: () => T): DebugResult<T> {
  try {
    return success(operation());
  } catch (error) {
    if (error instanceof DebuggerError) {
      return failure(error);
    }
    throw error;
  }
}
