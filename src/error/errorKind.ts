/**
 * Taxonomy of failures a call can end in.
 *
 * `NetworkFailure`, `RateLimited` and `ServerFailure` are transient and retried by the dispatcher,
 * every other kind is surfaced on first occurrence.
 */
export const ErrorKind = {
  MissingCredential: 'MissingCredential',
  NetworkFailure: 'NetworkFailure',
  RateLimited: 'RateLimited',
  ClientRequestError: 'ClientRequestError',
  ServerFailure: 'ServerFailure',
  SerializationFailure: 'SerializationFailure',
  ApiDomainError: 'ApiDomainError',
} as const;

/** One of the {@link ErrorKind} values. */
export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];
