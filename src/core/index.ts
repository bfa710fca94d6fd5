/**
 * Core entrypoint: the client, the retry dispatcher and the pagination iterator, without error helpers.
 * @module
 */

export { type Classification, classify, type Failure } from './classify.js';
export { ChainQueryClient, type GetOptions, type PaginateOptions, type RequestOptions } from './client.js';
export {
  type AttemptOutcome,
  backoffDelay,
  type DispatchState,
  RetryDispatcher,
  type RetryDispatcherOptions,
  type RetryPolicy,
  transition,
} from './dispatcher.js';
