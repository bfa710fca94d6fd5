import { ChainQueryError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';

/**
 * Error raised before any I/O when the API key is empty or blank.
 */
export class MissingCredentialError extends ChainQueryError {
  /** MissingCredentialError error-name */
  override name = 'MissingCredentialError';
  readonly kind = ErrorKind.MissingCredential;

  constructor(message = 'error missing api key', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link MissingCredentialError}.
 */
export function isMissingCredentialError(error: unknown): error is MissingCredentialError {
  return isErrorType(MissingCredentialError, error);
}
