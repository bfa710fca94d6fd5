import { ApiResponseError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a well-formed 2xx envelope whose `error` field is populated.
 */
export class ApiDomainError extends ApiResponseError {
  /** ApiDomainError error-name */
  override name = 'ApiDomainError';
  readonly kind = ErrorKind.ApiDomainError;
}

/**
 * Type guard for {@link ApiDomainError}.
 */
export function isApiDomainError(error: unknown): error is ApiDomainError {
  return isErrorType(ApiDomainError, error);
}

/**
 * Extract an {@link ApiDomainError} from an unknown error value, following nested causes.
 */
export function getApiDomainError(error: unknown): ApiDomainError | null {
  return unwrapErrorType(ApiDomainError, error);
}
