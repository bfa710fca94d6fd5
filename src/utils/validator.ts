import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an unknown value against any Standard Schema (zod, valibot, arktype, ...).
 *
 * - The schema may validate synchronously or asynchronously.
 * - A throwing validator, or one resolving to a malformed result, yields a {@link ValidationError}
 *   carrying the thrown value as `cause`.
 * - Reported issues yield a {@link ValidationError} carrying those issues.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<Error, ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error starting validation', [], { cause: err }), null];
  }

  let result: unknown = pending;
  if (pending instanceof Promise) {
    const [errAsync, resolved] = await safeWrapAsync<Error, ValidationResult>(() => pending);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resolved;
  }

  if (!isResult<StandardSchemaV1.InferOutput<T>>(result)) {
    return [new ValidationError('error validation returned a malformed result', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}

function isResult<Output>(value: unknown): value is StandardSchemaV1.Result<Output> {
  return typeof value === 'object' && value !== null && ('value' in value || 'issues' in value);
}
