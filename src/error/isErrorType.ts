import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Type guard to check if an unknown error is, or wraps, an instance of the given class.
 * Pass `shallow` to skip the `cause` chain.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): err is T {
  if (shallow) {
    return err instanceof errorClass;
  }

  return unwrapErrorType(errorClass, err) !== null;
}
