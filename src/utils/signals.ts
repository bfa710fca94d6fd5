import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { SafeWrap, SafeWrapAsync } from './wrap.js';

/** A derived signal plus the teardown for whatever keeps it alive (timers, listeners). */
export interface SignalHandle {
  signal: AbortSignal;
  /** Releases timers and listeners; the signal is left as it is. */
  dispose: () => void;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false`, `0` or omitted, no signal is created. Call `dispose` once the guarded
 * work settles so the timer does not hold the process open.
 */
export function createTimeoutSignal(timeoutMs?: number | false): SignalHandle | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer),
  };
}

/**
 * Merges multiple {@link AbortSignal} instances into one that aborts when any source does.
 *
 * - No signals: `null`.
 * - One signal: returned as-is with a no-op `dispose`.
 * - Several: a new signal carrying the first source's `reason`, or an {@link AbortError} when it has none.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): SignalHandle | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], dispose: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const dispose = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    dispose();
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose };
}

/** The error a call ends with once `signal` aborts, carrying the abort reason as `cause`. */
export function abortedBy(signal: AbortSignal): AbortError {
  return new AbortError('error request aborted', { cause: signal.reason });
}

/**
 * Settles with `pending`, or with an {@link AbortError} as soon as `signal` aborts.
 *
 * Lets one caller stop waiting on work shared with others without cancelling that work.
 */
export async function raceAbort<T>(pending: SafeWrapAsync<Error, T>, signal?: AbortSignal | null): SafeWrapAsync<Error, T> {
  if (!signal) {
    return pending;
  }

  if (signal.aborted) {
    return [abortedBy(signal), null];
  }

  let onAbort = () => {};
  const aborted = new Promise<SafeWrap<Error, T>>((resolve) => {
    onAbort = () => resolve([abortedBy(signal), null]);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([pending, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}
