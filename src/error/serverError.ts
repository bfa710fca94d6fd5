import { ApiResponseError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';

/**
 * Error representing a 5xx response.
 */
export class ServerError extends ApiResponseError {
  /** ServerError error-name */
  override name = 'ServerError';
  readonly kind = ErrorKind.ServerFailure;
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}
