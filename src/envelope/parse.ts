import type { StandardSchemaV1 } from '@standard-schema/spec';
import { SerializationError } from '../error/serializationError.js';
import type { ApiErrorBody, PageInfo, ResponseEnvelope } from '../types/envelope.js';
import { tryParse } from '../utils/tryParse.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import {
  type ApiErrorWire,
  envelopeWireSchema,
  errorEnvelopeWireSchema,
  type PageInfoWire,
} from './schema.js';

/** Maps a wire error object to an {@link ApiErrorBody}, dropping nulls. */
export function toApiErrorBody(status: number, wire: ApiErrorWire): ApiErrorBody {
  return {
    status,
    ...(wire.code != null && { code: wire.code }),
    ...(wire.message != null && { message: wire.message }),
  };
}

/** Maps wire pagination to {@link PageInfo}, dropping nulls. */
export function toPageInfo(wire: PageInfoWire): PageInfo {
  return {
    ...(wire.has_more != null && { hasMore: wire.has_more }),
    ...(wire.page_number != null && { pageNumber: wire.page_number }),
    ...(wire.page_size != null && { pageSize: wire.page_size }),
    ...(wire.total_count != null && { totalCount: wire.total_count }),
  };
}

/**
 * Parses a 2xx body into a {@link ResponseEnvelope}, validating `data` against the endpoint's schema.
 *
 * - Body that is not JSON, or JSON that is not an envelope, fails with {@link SerializationError}.
 * - `data` that the schema rejects fails with {@link SerializationError} caused by a `ValidationError`.
 * - When `error` is populated the envelope is a failure, so `data` is not validated and left out.
 */
export async function parseEnvelope<Schema extends StandardSchemaV1>(
  status: number,
  body: string,
  schema: Schema,
): SafeWrapAsync<SerializationError, ResponseEnvelope<StandardSchemaV1.InferOutput<Schema>>> {
  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(body));
  if (errJson) {
    return [new SerializationError('error parsing response body as json', status, { cause: errJson }), null];
  }

  const [errEnvelope, envelope] = await validator(json, envelopeWireSchema);
  if (errEnvelope) {
    return [new SerializationError('error response body is not an envelope', status, { cause: errEnvelope }), null];
  }

  const pagination = envelope.pagination ? toPageInfo(envelope.pagination) : undefined;
  if (envelope.error) {
    return [null, { error: toApiErrorBody(status, envelope.error), ...(pagination && { pagination }) }];
  }

  if (envelope.data === null || envelope.data === undefined) {
    return [null, { ...(pagination && { pagination }) }];
  }

  const [errData, data] = await validator(envelope.data, schema);
  if (errData) {
    return [new SerializationError('error validating response data', status, { cause: errData }), null];
  }

  return [null, { data, ...(pagination && { pagination }) }];
}

/**
 * Reads error details out of a non-2xx body.
 *
 * An error envelope supplies `code` and `message`; any other non-empty body becomes the message as-is.
 */
export function parseErrorBody(status: number, body: string): ApiErrorBody {
  const parsed = errorEnvelopeWireSchema.safeParse(tryParse(body));
  if (parsed.success && parsed.data.error) {
    const details = toApiErrorBody(status, parsed.data.error);
    return details.message === undefined && body ? { ...details, message: body } : details;
  }

  return { status, ...(body ? { message: body } : {}) };
}
