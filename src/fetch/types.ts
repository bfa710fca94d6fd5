import type { HeaderOptions, RequestSpec } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Raw outcome of one exchange: any status, body unread into any shape yet. */
export interface TransportResponse {
  status: number;
  /** Response body as text; empty string when there was none. */
  body: string;
  headers: Headers;
}

/** Per-send options. */
export interface SendOptions {
  /** Caller cancellation, merged with the per-attempt timeout. */
  signal?: AbortSignal;
  /** Per-attempt timeout in milliseconds; `false` disables it. Falls back to the transport default. */
  timeout?: number | false;
}

/** Options a transport is constructed with. */
export interface TransportOptions {
  baseUrl: string;
  /** Credential sent as a bearer token on requests that require auth. */
  apiKey: string;
  /** Default headers merged under every request. */
  headers?: HeaderOptions;
  /** Default per-attempt timeout in milliseconds. */
  timeout?: number | false;
}

/**
 * Executes exactly one request. Must not retry, parse or classify, and must be safe to call concurrently.
 * Any failure to obtain a response comes back in the error slot.
 */
export interface Transport {
  send(spec: RequestSpec, opts?: SendOptions): SafeWrapAsync<Error, TransportResponse>;
  /** Releases resources held by the transport. */
  dispose?(): void;
}

/** Constructor of a {@link Transport}, used to plug in alternatives to {@link FetchClient}. */
export type TransportProvider = new (opts: TransportOptions) => Transport;
