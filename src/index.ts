/**
 * Root entrypoint for chainquery: re-exports the client, transport, pagination, types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export { CacheClient, type CacheClientOptions } from './cache/client.js';
export {
  type ChainQueryClientProps,
  type ClientConfig,
  type ClientSettings,
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
  resolveConfig,
} from './config/config.js';
export * from './core/index.js';
export * from './endpoints/index.js';
export { parseEnvelope, parseErrorBody } from './envelope/parse.js';
export * from './error/index.js';
export { FetchClient } from './fetch/client.js';
export type { SendOptions, Transport, TransportOptions, TransportProvider, TransportResponse } from './fetch/types.js';
export { PageIterator, type PageIteratorOptions, type PageQuery } from './pagination/iterator.js';
export type { ApiErrorBody, PageInfo, ResponseEnvelope } from './types/envelope.js';
export type {
  CallOptions,
  DataOf,
  HeaderOptions,
  HttpMethod,
  QueryInput,
  QueryPairs,
  QueryValue,
  RequestSpec,
} from './types/request.js';
export { buildRequestSpec, normalizeQuery, type RequestSpecInput } from './utils/buildRequestSpec.js';
export { createLogger, logger } from './utils/logger.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
export { VERSION } from './version.js';
