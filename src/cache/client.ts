import type { RequestSpec } from '../types/request.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** Options for cache-client */
export interface CacheClientOptions {
  /**
   * Cache time to live in milliseconds.
   * @default 500
   */
  ttl?: number;
  /**
   * Cache cleanup interval in milliseconds.
   * @default 30_000
   */
  cleanupInterval?: number;
}

interface CacheItem<T = unknown> {
  data: T;
  expires: number;
}

/**
 * In-memory TTL cache for successful GET envelopes.
 *
 * Concurrent lookups of the same key share one pending request, and failures are never stored.
 * Every caller gets its own copy of the value, so mutating a result never leaks into another.
 */
export class CacheClient {
  #ttl: number;
  #cleanupInterval: number;
  #intervalId?: ReturnType<typeof setInterval>;
  #cache: Map<string, CacheItem> = new Map();
  #pending: Map<string, SafeWrapAsync<Error, unknown>> = new Map();

  /**
   * Creates a cache client and starts its cleanup timer.
   * The timer is unref'd, so an idle cache never keeps the process alive.
   */
  constructor(opts?: CacheClientOptions) {
    this.#ttl = opts?.ttl ?? 500;
    this.#cleanupInterval = opts?.cleanupInterval ?? 30_000;

    this.#startCleanup();
  }

  /**
   * Stops the cleanup timer and drops every entry.
   */
  public dispose() {
    clearInterval(this.#intervalId);
    this.#intervalId = undefined;
    this.#cache = new Map();
    this.#pending = new Map();
  }

  /**
   * Returns the cached value for `key`, joins a pending request for it, or starts `request`.
   */
  public get<T>(key: string, request: () => SafeWrapAsync<Error, T>, ttl = this.#ttl): SafeWrapAsync<Error, T> {
    const cached = this.#getItem(key);
    if (cached) {
      return Promise.resolve(copy([null, cached.data as T]));
    }

    const pending = this.#pending.get(key);
    if (pending !== undefined) {
      return (pending as SafeWrapAsync<Error, T>).then(copy);
    }

    const started = this.#track(key, request, ttl);
    this.#pending.set(key, started);
    return started;
  }

  /**
   * Deterministic key for a request: method, path, query pairs in their sent order, and whether it is authenticated.
   */
  public key(spec: RequestSpec): string {
    return JSON.stringify([spec.method, spec.path, spec.query, spec.requiresAuth]);
  }

  /** Number of live entries. */
  public get size(): number {
    return this.#cache.size;
  }

  #getItem(key: string): CacheItem | null {
    const item = this.#cache.get(key);
    if (!item) {
      return null;
    }

    if (item.expires > Date.now()) {
      return item;
    }

    this.#cache.delete(key);
    return null;
  }

  async #track<T>(key: string, request: () => SafeWrapAsync<Error, T>, ttl: number): SafeWrapAsync<Error, T> {
    const [errWrapped, wrapped] = await safeWrapAsync(() => request());
    this.#pending.delete(key);
    if (errWrapped) {
      return [new Error('error thrown on cache wrapping request', { cause: errWrapped }), null];
    }

    const [errData, data] = wrapped;
    if (errData) {
      return [errData, null];
    }

    const [errCopy, stored] = copy<T>([null, data]);
    if (!errCopy) {
      this.#cache.set(key, { data: stored, expires: Date.now() + ttl });
    }

    return [null, data];
  }

  /**
   * Housekeeping that evicts expired entries every `cleanupInterval` ms.
   */
  #startCleanup() {
    clearInterval(this.#intervalId);

    this.#intervalId = setInterval(() => {
      for (const key of [...this.#cache.keys()]) {
        this.#getItem(key);
      }
    }, this.#cleanupInterval);
    this.#intervalId.unref?.();
  }
}

/** Deep-copies the data slot of a successful result. */
function copy<T>(result: SafeWrap<Error, T>): SafeWrap<Error, T> {
  const [err, data] = result;
  if (err) {
    return [err, null];
  }

  const [errClone, cloned] = safeWrap<Error, T>(() => structuredClone(data));
  if (errClone) {
    return [new Error('error copying cached value', { cause: errClone }), null];
  }

  return [null, cloned];
}
