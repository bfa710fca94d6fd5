import { NetworkError } from '../error/networkError.js';
import type { HeaderOptions, RequestSpec } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type { SendOptions, Transport, TransportOptions, TransportResponse } from './types.js';
import { constructUrl, mergeHeaderOptions } from './utils.js';

/**
 * {@link Transport} over the runtime's `fetch`, which pools and reuses connections on its own.
 *
 * - Prefixes every path with the configured base URL and appends the query pairs in order.
 * - Attaches `Accept: application/json`, the default headers and, when the request needs it,
 *   `Authorization: Bearer <apiKey>`.
 * - Applies the per-attempt timeout; hitting it surfaces as a {@link NetworkError} caused by a `TimeoutError`.
 * - Returns every response, whatever its status, with the body read as text.
 */
export class FetchClient implements Transport {
  /** Base URL prepended to all request paths. */
  #baseUrl: string;
  /** Bearer credential. */
  #apiKey: string;
  /** Default headers for every request. */
  #headers: HeaderOptions;
  /** Default per-attempt timeout. */
  #timeout: number | false;

  /** Creates a new instance of the fetch-client, with a base-url, credential and defaults */
  constructor({ baseUrl, apiKey, headers, timeout = false }: TransportOptions) {
    this.#baseUrl = baseUrl;
    this.#apiKey = apiKey;
    this.#headers = mergeHeaderOptions({ Accept: 'application/json' }, headers);
    this.#timeout = timeout;
  }

  /**
   * Sends one request described by `spec`.
   *
   * @returns `[null, response]` for any HTTP response, `[NetworkError, null]` when none was obtained.
   */
  public async send(spec: RequestSpec, opts: SendOptions = {}): SafeWrapAsync<NetworkError, TransportResponse> {
    const timeout = createTimeoutSignal(opts.timeout ?? this.#timeout);
    const merged = mergeSignals([opts.signal, timeout?.signal]);

    try {
      const headers = mergeHeaderOptions(
        this.#headers,
        spec.requiresAuth ? { Authorization: `Bearer ${this.#apiKey}` } : undefined,
      );

      const [errFetch, res] = await safeWrapAsync(() =>
        fetch(constructUrl(this.#baseUrl, spec.path, spec.query), {
          method: spec.method,
          headers,
          ...(merged && { signal: merged.signal }),
        }),
      );
      if (errFetch) {
        const cause = timeout?.signal.aborted ? timeout.signal.reason : errFetch;
        return [new NetworkError(`error sending ${spec.method} ${spec.path} in fetchClient`, { cause }), null];
      }

      const [errBody, body] = await safeWrapAsync(() => res.text());
      if (errBody) {
        const cause = timeout?.signal.aborted ? timeout.signal.reason : errBody;
        return [new NetworkError(`error reading ${spec.method} ${spec.path} response in fetchClient`, { cause }), null];
      }

      return [null, { status: res.status, body, headers: res.headers }];
    } finally {
      timeout?.dispose();
      merged?.dispose();
    }
  }
}
