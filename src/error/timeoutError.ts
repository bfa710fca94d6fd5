import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a single attempt exceeds the configured timeout.
 * Surfaces as the `cause` of a {@link NetworkError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  override name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
