import { ChainQueryError } from './chainQueryError.js';
import { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a 2xx response whose body is not JSON or does not match the expected shape.
 * The parse or {@link ValidationError} failure is kept as `cause`.
 */
export class SerializationError extends ChainQueryError {
  /** SerializationError error-name */
  override name = 'SerializationError';
  readonly kind = ErrorKind.SerializationFailure;
  /** Internal status of the response that failed to parse */
  #status: number;

  constructor(message: string, status: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
  }

  /** HTTP status of the response that failed to parse */
  get status(): number {
    return this.#status;
  }
}

/**
 * Type guard for {@link SerializationError}.
 */
export function isSerializationError(error: unknown): error is SerializationError {
  return isErrorType(SerializationError, error);
}

/**
 * Extract a {@link SerializationError} from an unknown error value, following nested causes.
 */
export function getSerializationError(error: unknown): SerializationError | null {
  return unwrapErrorType(SerializationError, error);
}
