import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a call is cancelled through its AbortSignal, mid-request or mid-backoff.
 * The signal's abort reason is kept as `cause`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
