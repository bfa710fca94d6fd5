import { ApiResponseError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a rejected request: any 4xx other than 429, or a non-2xx status the client cannot act on.
 */
export class ClientRequestError extends ApiResponseError {
  /** ClientRequestError error-name */
  override name = 'ClientRequestError';
  readonly kind = ErrorKind.ClientRequestError;
}

/**
 * Type guard for {@link ClientRequestError}.
 */
export function isClientRequestError(error: unknown): error is ClientRequestError {
  return isErrorType(ClientRequestError, error);
}

/**
 * Extract a {@link ClientRequestError} from an unknown error value, following nested causes.
 */
export function getClientRequestError(error: unknown): ClientRequestError | null {
  return unwrapErrorType(ClientRequestError, error);
}
