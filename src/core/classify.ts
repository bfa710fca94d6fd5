import { parseErrorBody } from '../envelope/parse.js';
import { ApiDomainError } from '../error/apiDomainError.js';
import type { ChainQueryError } from '../error/chainQueryError.js';
import { ClientRequestError } from '../error/clientRequestError.js';
import { ErrorKind } from '../error/errorKind.js';
import { NetworkError } from '../error/networkError.js';
import { RateLimitedError } from '../error/rateLimitedError.js';
import { SerializationError } from '../error/serializationError.js';
import { ServerError } from '../error/serverError.js';
import type { ApiErrorBody } from '../types/envelope.js';

/** Everything an attempt can fail with before it is classified. */
export type Failure =
  /** No response was obtained. */
  | { type: 'transport'; error: Error }
  /** A non-2xx response with its raw body. */
  | { type: 'status'; status: number; body: string }
  /** A 2xx response whose body did not parse into the expected shape. */
  | { type: 'serialization'; error: SerializationError }
  /** A 2xx envelope with a populated `error`. */
  | { type: 'domain'; error: ApiErrorBody };

/** Typed error for a failure and whether sending again may change the outcome. */
export interface Classification {
  kind: ErrorKind;
  retryable: boolean;
  error: ChainQueryError;
}

function describe(status: number, body: ApiErrorBody): string {
  return body.message ? `error ${status} response: ${body.message}` : `error ${status} response`;
}

/**
 * Maps a failure to its {@link ErrorKind}, typed error and retry eligibility.
 *
 * Transport failures, 429 and 5xx are retryable; other 4xx, unparseable 2xx bodies and
 * envelope-level errors are not. Statuses outside 2xx/4xx/5xx count as client request errors.
 * Pure: the same failure always yields an equal classification.
 */
export function classify(failure: Failure): Classification {
  switch (failure.type) {
    case 'transport': {
      const error =
        failure.error instanceof NetworkError
          ? failure.error
          : new NetworkError('error sending request', { cause: failure.error });
      return { kind: ErrorKind.NetworkFailure, retryable: true, error };
    }
    case 'serialization':
      return { kind: ErrorKind.SerializationFailure, retryable: false, error: failure.error };
    case 'domain': {
      const message = failure.error.message ?? 'no message';
      const code = failure.error.code === undefined ? '' : ` (code ${failure.error.code})`;
      return {
        kind: ErrorKind.ApiDomainError,
        retryable: false,
        error: new ApiDomainError(`error api rejected request${code}: ${message}`, failure.error),
      };
    }
    case 'status': {
      const { status } = failure;
      const body = parseErrorBody(status, failure.body);
      if (status === 429) {
        return { kind: ErrorKind.RateLimited, retryable: true, error: new RateLimitedError(describe(status, body), body) };
      }

      if (status >= 500 && status <= 599) {
        return { kind: ErrorKind.ServerFailure, retryable: true, error: new ServerError(describe(status, body), body) };
      }

      return {
        kind: ErrorKind.ClientRequestError,
        retryable: false,
        error: new ClientRequestError(describe(status, body), body),
      };
    }
  }
}
