import { ApiResponseError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';

/**
 * Error representing a `429 Too Many Requests` response.
 */
export class RateLimitedError extends ApiResponseError {
  /** RateLimitedError error-name */
  override name = 'RateLimitedError';
  readonly kind = ErrorKind.RateLimited;
}

/**
 * Type guard for {@link RateLimitedError}.
 */
export function isRateLimitedError(error: unknown): error is RateLimitedError {
  return isErrorType(RateLimitedError, error);
}
