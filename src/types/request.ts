import type { StandardSchemaV1 } from '@standard-schema/spec';

/** Header options accepted by the transport; a `null` value removes a default header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null>;

/** HTTP methods the API exposes. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Ordered query pairs; a key may appear more than once. */
export type QueryPairs = ReadonlyArray<readonly [key: string, value: string]>;

/** Scalar query values; `undefined` and `null` are skipped, arrays repeat the key. */
export type QueryValue = string | number | boolean | bigint;

/** Query input accepted when building a {@link RequestSpec}. */
export type QueryInput = QueryPairs | Record<string, QueryValue | readonly QueryValue[] | null | undefined>;

/**
 * Immutable description of a single API call.
 *
 * Built once per call by `buildRequestSpec` and frozen, so every retry attempt sends the same request.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  /** Path relative to the base URL, with every `{placeholder}` already substituted. */
  readonly path: string;
  readonly query: QueryPairs;
  /** Whether the bearer credential is attached. */
  readonly requiresAuth: boolean;
}

/** Per-call options shared by the dispatching operations. */
export interface CallOptions {
  /** External deadline or cancellation; aborts an in-flight request or a backoff wait. */
  signal?: AbortSignal;
  /** Overrides the configured per-attempt timeout in milliseconds, `false` disables it. */
  timeout?: number | false;
}

/** Infers the parsed `data` type of an envelope from its target schema. */
export type DataOf<Schema extends StandardSchemaV1> = StandardSchemaV1.InferOutput<Schema>;
