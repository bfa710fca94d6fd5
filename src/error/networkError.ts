import { ChainQueryError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request that never produced a response: DNS, TLS, connect, reset or timeout.
 * The underlying failure is kept as `cause`.
 */
export class NetworkError extends ChainQueryError {
  /** NetworkError error-name */
  override name = 'NetworkError';
  readonly kind = ErrorKind.NetworkFailure;
}

/**
 * Type guard for {@link NetworkError}.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return isErrorType(NetworkError, error);
}

/**
 * Extract a {@link NetworkError} from an unknown error value, following nested causes.
 */
export function getNetworkError(error: unknown): NetworkError | null {
  return unwrapErrorType(NetworkError, error);
}
