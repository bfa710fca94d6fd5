/** Any error class, abstract ones included. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following the `cause` chain.
 * Returns the first match from the outside in, or `null`.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
