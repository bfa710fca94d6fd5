import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a path template that could not be turned into a request.
 */
export class RequestSpecError extends Error {
  /** RequestSpecError error-name */
  override name = 'RequestSpecError';
  /** Internal path as it looked when building failed */
  #path: string;

  /** Creates a new instance of a RequestSpecError with the offending path */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path as it looked when building failed */
  get path(): string {
    return this.#path;
  }
}

/**
 * Extract a {@link RequestSpecError} from an unknown error value, following nested causes.
 */
export function getRequestSpecError(error: unknown): RequestSpecError | null {
  return unwrapErrorType(RequestSpecError, error);
}

/**
 * Type guard for {@link RequestSpecError}.
 */
export function isRequestSpecError(error: unknown): error is RequestSpecError {
  return isErrorType(RequestSpecError, error);
}
