import { RequestSpecError } from '../error/requestSpecError.js';
import type { HttpMethod, QueryInput, QueryPairs, QueryValue, RequestSpec } from '../types/request.js';
import type { SafeWrap } from './wrap.js';

/** Input for {@link buildRequestSpec}. */
export interface RequestSpecInput {
  /** @default 'GET' */
  method?: HttpMethod;
  /** Path template relative to the base URL, e.g. `/v1/{chainName}/address/{address}/balances_v2/`. */
  path: string;
  /** Values substituted for `{name}` placeholders, URI-encoded. */
  params?: Record<string, string | number | bigint>;
  query?: QueryInput;
  /** @default true */
  requiresAuth?: boolean;
}

/**
 * Flattens query input into ordered pairs.
 *
 * Pairs pass through untouched; for records `null`/`undefined` values are skipped and arrays repeat their key.
 */
export function normalizeQuery(query?: QueryInput): QueryPairs {
  if (!query) {
    return [];
  }

  if (isQueryPairs(query)) {
    return query.map(([key, value]) => [key, value] as const);
  }

  const pairs: Array<readonly [string, string]> = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }

    const values = isQueryList(value) ? value : [value];
    for (const item of values) {
      pairs.push([key, String(item)]);
    }
  }

  return pairs;
}

/**
 * Builds the immutable {@link RequestSpec} for one call.
 *
 * - Substitutes every `{name}` placeholder in the path with its URI-encoded param.
 * - Fails with {@link RequestSpecError} if a placeholder is left over.
 * - Freezes the spec and its query so retries resend exactly the same request.
 */
export function buildRequestSpec({
  method = 'GET',
  path,
  params = {},
  query,
  requiresAuth = true,
}: RequestSpecInput): SafeWrap<RequestSpecError, RequestSpec> {
  let result = path;
  for (const [key, value] of Object.entries(params)) {
    result = result.split(`{${key}}`).join(encodeURIComponent(String(value)));
  }

  if (result.includes('{') || result.includes('}')) {
    return [new RequestSpecError(`error building request, path has unreplaced placeholders ${result}`, result), null];
  }

  const pairs = Object.freeze(normalizeQuery(query).map((pair) => Object.freeze(pair)));
  return [null, Object.freeze({ method, path: result, query: pairs, requiresAuth })];
}

function isQueryPairs(query: QueryInput): query is QueryPairs {
  return Array.isArray(query);
}

function isQueryList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
  return Array.isArray(value);
}
