/**
 * Error-first tuple returned by every fallible operation in chainquery, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Promise of a {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and captures a rejection (or a synchronous throw) as the error slot.
 * @example
 * const [err, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Synchronous counterpart of {@link safeWrapAsync}.
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
