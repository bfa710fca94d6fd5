import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Logger } from 'pino';
import { parseEnvelope } from '../envelope/parse.js';
import type { ChainQueryError } from '../error/chainQueryError.js';
import type { Transport } from '../fetch/types.js';
import type { ResponseEnvelope } from '../types/envelope.js';
import type { CallOptions, RequestSpec } from '../types/request.js';
import { abortedBy } from '../utils/signals.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { type Classification, classify } from './classify.js';

/** Retry limits for one dispatch. */
export interface RetryPolicy {
  /** Retries after the first send; total sends never exceed `maxRetries + 1`. */
  maxRetries: number;
  /** Delay before the first retry, doubled for each one after. */
  baseDelay: number;
  /** Upper bound for a single delay. */
  maxDelay?: number;
}

/** Result of one send. */
export type AttemptOutcome<T> = { ok: true; envelope: ResponseEnvelope<T> } | { ok: false; failure: Classification };

/**
 * States of the attempt loop. `attempt` counts retries performed so far (0 on the first send).
 */
export type DispatchState<T> =
  | { state: 'attempting'; attempt: number }
  | { state: 'retrying'; attempt: number; delay: number; error: ChainQueryError }
  | { state: 'succeeded'; attempt: number; envelope: ResponseEnvelope<T> }
  | { state: 'failed'; attempt: number; error: Error };

/**
 * Delay before retry number `attempt` (1-based): `baseDelay * 2^(attempt - 1)`, capped at `maxDelay`. No jitter.
 */
export function backoffDelay(attempt: number, { baseDelay, maxDelay = Number.POSITIVE_INFINITY }: RetryPolicy): number {
  return Math.min(baseDelay * 2 ** (attempt - 1), maxDelay);
}

/**
 * Decides the state that follows an attempt. Kept free of I/O so the retry boundary can be tested on its own.
 */
export function transition<T>(attempt: number, outcome: AttemptOutcome<T>, policy: RetryPolicy): DispatchState<T> {
  if (outcome.ok) {
    return { state: 'succeeded', attempt, envelope: outcome.envelope };
  }

  const { retryable, error } = outcome.failure;
  if (!retryable || attempt >= policy.maxRetries) {
    return { state: 'failed', attempt, error };
  }

  const next = attempt + 1;
  return { state: 'retrying', attempt: next, delay: backoffDelay(next, policy), error };
}

/** Options for constructing a {@link RetryDispatcher}. */
export interface RetryDispatcherOptions extends RetryPolicy {
  transport: Transport;
  logger: Logger;
  /** Default per-attempt timeout handed to the transport. */
  timeout?: number | false;
  /** Wait used between attempts; swapped out in tests. */
  sleep?: (ms: number, signal?: AbortSignal | null) => Promise<void>;
}

/**
 * Drives a request to a terminal result: sends it, classifies failures, and backs off exponentially
 * between retries of transient ones (network failures, 429, 5xx).
 *
 * Holds no per-call state, so one instance serves any number of concurrent dispatches.
 */
export class RetryDispatcher {
  #transport: Transport;
  #logger: Logger;
  #policy: RetryPolicy;
  #timeout?: number | false;
  #sleep: (ms: number, signal?: AbortSignal | null) => Promise<void>;

  constructor({ transport, logger, timeout, sleep = defaultSleep, ...policy }: RetryDispatcherOptions) {
    this.#transport = transport;
    this.#logger = logger;
    this.#timeout = timeout;
    this.#sleep = sleep;
    this.#policy = policy;
  }

  /**
   * Sends `spec` until it succeeds, fails terminally, or runs out of retries.
   *
   * @returns `[null, envelope]` for a clean envelope, otherwise the classified error
   *          (or an {@link AbortError} once `opts.signal` aborts).
   */
  async dispatch<Schema extends StandardSchemaV1>(
    spec: RequestSpec,
    schema: Schema,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, ResponseEnvelope<StandardSchemaV1.InferOutput<Schema>>> {
    const { signal } = opts;
    const log = this.#logger.child({ method: spec.method, path: spec.path });
    let state: DispatchState<StandardSchemaV1.InferOutput<Schema>> = { state: 'attempting', attempt: 0 };

    while (true) {
      switch (state.state) {
        case 'attempting': {
          if (signal?.aborted) {
            state = { state: 'failed', attempt: state.attempt, error: abortedBy(signal) };
            break;
          }

          const outcome = await this.#attempt(spec, schema, opts);
          state = signal?.aborted
            ? { state: 'failed', attempt: state.attempt, error: abortedBy(signal) }
            : transition(state.attempt, outcome, this.#policy);
          break;
        }
        case 'retrying': {
          log.warn(
            { attempt: state.attempt, delay: state.delay, kind: state.error.kind, err: state.error },
            'retrying request after transient failure',
          );
          await this.#sleep(state.delay, signal);
          state = signal?.aborted
            ? { state: 'failed', attempt: state.attempt, error: abortedBy(signal) }
            : { state: 'attempting', attempt: state.attempt };
          break;
        }
        case 'succeeded':
          log.debug({ attempts: state.attempt + 1 }, 'request succeeded');
          return [null, state.envelope];
        case 'failed':
          log.debug({ attempts: state.attempt + 1, err: state.error }, 'request failed');
          return [state.error, null];
      }
    }
  }

  /** One send plus parsing; never retries. A transport that throws counts as a transport failure. */
  async #attempt<Schema extends StandardSchemaV1>(
    spec: RequestSpec,
    schema: Schema,
    { signal, timeout = this.#timeout }: CallOptions,
  ): Promise<AttemptOutcome<StandardSchemaV1.InferOutput<Schema>>> {
    const [errThrown, sent] = await safeWrapAsync(() => this.#transport.send(spec, { signal, timeout }));
    if (errThrown) {
      return { ok: false, failure: classify({ type: 'transport', error: errThrown }) };
    }

    const [errSend, response] = sent;
    if (errSend) {
      return { ok: false, failure: classify({ type: 'transport', error: errSend }) };
    }

    const { status, body } = response;
    if (status < 200 || status > 299) {
      return { ok: false, failure: classify({ type: 'status', status, body }) };
    }

    const [errParse, envelope] = await parseEnvelope(status, body, schema);
    if (errParse) {
      return { ok: false, failure: classify({ type: 'serialization', error: errParse }) };
    }

    if (envelope.error) {
      return { ok: false, failure: classify({ type: 'domain', error: envelope.error }) };
    }

    return { ok: true, envelope };
  }
}
