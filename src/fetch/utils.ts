import type { HeaderOptions, QueryPairs } from '../types/request.js';

/**
 * Drops values that cannot be a header and stringifies the rest.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merges header sets left to right into one `Headers`; a `null` value removes the header.
 */
export function mergeHeaderOptions(...sets: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const set of sets) {
    for (const [key, value] of toEntries(set)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}

/**
 * Joins base URL, path and query pairs into an absolute URL, keeping pair order and repeated keys.
 */
export function constructUrl(baseUrl: string, path: string, query: QueryPairs): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  if (query.length === 0) {
    return url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of query) {
    search.append(key, value);
  }

  return `${url}?${search.toString()}`;
}
