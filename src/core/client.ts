import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'pino';
import { CacheClient } from '../cache/client.js';
import { type ChainQueryClientProps, type ClientConfig, resolveConfig } from '../config/config.js';
import { FetchClient } from '../fetch/client.js';
import type { Transport } from '../fetch/types.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { PageIterator, type PageQuery } from '../pagination/iterator.js';
import type { ResponseEnvelope } from '../types/envelope.js';
import type { CallOptions, DataOf, QueryInput, RequestSpec } from '../types/request.js';
import { buildRequestSpec, normalizeQuery, type RequestSpecInput } from '../utils/buildRequestSpec.js';
import { createLogger } from '../utils/logger.js';
import { abortedBy, mergeSignals, raceAbort } from '../utils/signals.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import { RetryDispatcher } from './dispatcher.js';

/** Options for {@link ChainQueryClient.request}. */
export interface RequestOptions extends CallOptions {
  /** Serve GET calls from the response cache when the client has one. */
  cache?: boolean;
}

/** Options for {@link ChainQueryClient.get}. */
export interface GetOptions<Schema extends StandardSchemaV1> extends RequestOptions, Omit<RequestSpecInput, 'path' | 'method'> {
  /** Target shape of the envelope's `data`. */
  schema: Schema;
}

/** Options for {@link ChainQueryClient.paginate}. */
export interface PaginateOptions<Schema extends StandardSchemaV1, Item>
  extends CallOptions,
    Omit<RequestSpecInput, 'path' | 'method'> {
  schema: Schema;
  /** Picks the batch of items out of a page's data. */
  selectItems: (data: DataOf<Schema>) => readonly Item[] | null | undefined;
  /** Page to start from. */
  pageNumber?: number;
  pageSize?: number;
  /** @default 'page-number' */
  pageNumberParam?: string;
  /** @default 'page-size' */
  pageSizeParam?: string;
}

type ClientState =
  | { ready: true; config: ClientConfig; transport: Transport; dispatcher: RetryDispatcher; cache: CacheClient | null }
  | { ready: false; error: Error };

/**
 * Client for the blockchain-data API that:
 * - builds immutable request specs from path templates,
 * - sends them through a pluggable transport with bearer authentication,
 * - retries transient failures with exponential backoff,
 * - parses the response envelope against a Standard Schema of the endpoint's data,
 * - walks paged endpoints lazily,
 * - optionally caches GET responses.
 *
 * Every method returns an error-first tuple and never throws.
 *
 * @example
 * const [err, client] = ChainQueryClient.create({ apiKey: process.env.API_KEY ?? '' });
 */
export class ChainQueryClient {
  #state: ClientState;
  #logger: Logger;
  /** Aborts in-flight calls on dispose */
  #abortController = new AbortController();

  /**
   * Validates props and builds a client, failing before any I/O on a blank key or bad settings.
   */
  static create(props: ChainQueryClientProps): SafeWrap<Error, ChainQueryClient> {
    const client = new ChainQueryClient(props);
    const error = client.error;
    if (error) {
      return [error, null];
    }

    return [null, client];
  }

  /**
   * Never throws; a client built from invalid props answers every call with the construction error
   * without sending anything. Use {@link ChainQueryClient.create} to fail at construction instead.
   */
  constructor(props: ChainQueryClientProps) {
    this.#logger = createLogger({ component: 'client' }, props.logger);

    const [err, config] = resolveConfig(props);
    if (err) {
      this.#logger.warn({ err }, 'invalid client configuration');
      this.#state = { ready: false, error: err };
      return;
    }

    const Provider = props.transport ?? FetchClient;
    const transport = new Provider({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      timeout: config.timeout,
      headers: mergeHeaderOptions({ 'User-Agent': config.userAgent }, config.headers),
    });

    this.#state = {
      ready: true,
      config,
      transport,
      cache: props.cache ? new CacheClient(props.cache) : null,
      dispatcher: new RetryDispatcher({
        transport,
        logger: createLogger({ component: 'dispatcher' }, props.logger),
        timeout: config.timeout,
        maxRetries: config.maxRetries,
        baseDelay: config.baseDelay,
        maxDelay: config.maxDelay,
      }),
    };
  }

  /** Construction error, or `null` for a usable client. */
  get error(): Error | null {
    return this.#state.ready ? null : this.#state.error;
  }

  /** Resolved configuration, or `null` for a client that failed construction. */
  get config(): ClientConfig | null {
    return this.#state.ready ? this.#state.config : null;
  }

  /**
   * Stops the cache timer, releases the transport and aborts in-flight calls.
   */
  dispose() {
    this.#abortController.abort('client was disposed');
    if (this.#state.ready) {
      this.#state.cache?.dispose();
      this.#state.transport.dispose?.();
    }
  }

  /**
   * Dispatches a prebuilt request spec and parses the envelope's `data` with `schema`.
   *
   * A cached GET joins any identical call already in flight. That shared dispatch only stops on
   * {@link ChainQueryClient.dispose}; each caller's own `signal` ends just that caller's wait.
   */
  async request<Schema extends StandardSchemaV1>(
    spec: RequestSpec,
    schema: Schema,
    opts: RequestOptions = {},
  ): SafeWrapAsync<Error, ResponseEnvelope<DataOf<Schema>>> {
    if (!this.#state.ready) {
      return [this.#state.error, null];
    }

    const { cache: useCache, signal, ...callOpts } = opts;
    const { dispatcher, cache } = this.#state;
    if (signal?.aborted) {
      return [abortedBy(signal), null];
    }

    if (useCache && cache && spec.method === 'GET') {
      const shared = cache.get(cache.key(spec), () =>
        dispatcher.dispatch(spec, schema, { ...callOpts, signal: this.#abortController.signal }),
      );
      return raceAbort(shared, signal);
    }

    const merged = mergeSignals([signal, this.#abortController.signal]);
    try {
      return await dispatcher.dispatch(spec, schema, { ...callOpts, ...(merged && { signal: merged.signal }) });
    } finally {
      merged?.dispose();
    }
  }

  /**
   * Performs a GET against a path template, e.g. `/v1/{chainName}/address/{address}/balances_v2/`.
   */
  async get<Schema extends StandardSchemaV1>(
    path: string,
    opts: GetOptions<Schema>,
  ): SafeWrapAsync<Error, ResponseEnvelope<DataOf<Schema>>> {
    const { schema, params, query, requiresAuth, ...requestOpts } = opts;
    const [errSpec, spec] = buildRequestSpec({ method: 'GET', path, params, query, requiresAuth });
    if (errSpec) {
      return [errSpec, null];
    }

    return this.request(spec, schema, requestOpts);
  }

  /**
   * Creates a {@link PageIterator} over a paged GET endpoint.
   *
   * Page position goes out as `page-number` / `page-size` query params (renamable), replacing any
   * same-named keys in `query`.
   */
  paginate<Schema extends StandardSchemaV1, Item>(
    path: string,
    opts: PaginateOptions<Schema, Item>,
  ): PageIterator<DataOf<Schema>, Item> {
    const {
      selectItems,
      pageNumber,
      pageSize,
      pageNumberParam = 'page-number',
      pageSizeParam = 'page-size',
      query,
      ...getOpts
    } = opts;
    const base = normalizeQuery(query).filter(([key]) => key !== pageNumberParam && key !== pageSizeParam);

    const fetchPage = (page: PageQuery) => {
      const pageQuery: QueryInput = [
        ...base,
        ...(page.pageSize !== undefined ? [[pageSizeParam, String(page.pageSize)] as const] : []),
        ...(page.pageNumber !== undefined ? [[pageNumberParam, String(page.pageNumber)] as const] : []),
      ];

      return this.get(path, { ...getOpts, query: pageQuery });
    };

    return new PageIterator({ fetchPage, selectItems, pageNumber, pageSize });
  }
}
