import type { ApiErrorBody } from '../types/envelope.js';
import type { ErrorKind } from './errorKind.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Base of every classified failure, tagged with its {@link ErrorKind}.
 */
export abstract class ChainQueryError extends Error {
  /** Taxonomy kind of this failure */
  abstract readonly kind: ErrorKind;
}

/**
 * Base of the failures that came back as an HTTP response, exposing what the API said about it.
 */
export abstract class ApiResponseError extends ChainQueryError {
  /** Error details parsed from the response */
  #body: ApiErrorBody;

  constructor(message: string, body: ApiErrorBody, opts?: ErrorOptions) {
    super(message, opts);
    this.#body = body;
  }

  /** HTTP status of the response */
  get status(): number {
    return this.#body.status;
  }

  /** Business-level code from the error body, when present */
  get code(): number | undefined {
    return this.#body.code;
  }

  /** Error details as sent by the API */
  get body(): ApiErrorBody {
    return { ...this.#body };
  }
}

/**
 * Type guard for any {@link ChainQueryError}, following nested causes.
 */
export function isChainQueryError(error: unknown): error is ChainQueryError {
  return isErrorType(ChainQueryError, error);
}

/**
 * Extract the innermost-wrapping {@link ChainQueryError} from an unknown error value.
 */
export function getChainQueryError(error: unknown): ChainQueryError | null {
  return unwrapErrorType(ChainQueryError, error);
}
