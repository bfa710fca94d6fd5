import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';
import { isChainQueryError } from './chainQueryError.js';
import { isErrorType } from './isErrorType.js';
import { isNetworkError, NetworkError } from './networkError.js';
import { isRateLimitedError, RateLimitedError } from './rateLimitedError.js';
import { isTimeoutError, TimeoutError } from './timeoutError.js';

describe('isErrorType', () => {
  it('returns false for non-errors', () => {
    expect(isErrorType(NetworkError, { name: 'NetworkError' })).toBe(false);
    expect(isErrorType(NetworkError, 'NetworkError')).toBe(false);
    expect(isErrorType(NetworkError, null)).toBe(false);
  });

  it('matches the error itself', () => {
    expect(isErrorType(NetworkError, new NetworkError('error sending request'))).toBe(true);
  });

  it('follows the cause chain', () => {
    const timeout = new TimeoutError('error request timed out after 50ms');
    const network = new NetworkError('error sending GET /v1/chains/ in fetchClient', { cause: timeout });
    const outer = new Error('outer', { cause: network });

    expect(isErrorType(TimeoutError, outer)).toBe(true);
    expect(isTimeoutError(network)).toBe(true);
    expect(isNetworkError(outer)).toBe(true);
  });

  it('skips the cause chain when shallow', () => {
    const wrapped = new Error('outer', { cause: new AbortError('error request aborted') });

    expect(isErrorType(AbortError, wrapped, true)).toBe(false);
    expect(isAbortError(wrapped)).toBe(true);
  });

  it('does not match by name', () => {
    const lookalike = new Error('error request aborted');
    lookalike.name = 'AbortError';

    expect(isAbortError(lookalike)).toBe(false);
  });

  it('matches subclasses through the abstract base', () => {
    const err = new RateLimitedError('error 429 response', { status: 429 });

    expect(isChainQueryError(err)).toBe(true);
    expect(isRateLimitedError(err)).toBe(true);
    expect(isNetworkError(err)).toBe(false);
  });

  it('stops on cyclic causes', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(isErrorType(NetworkError, first)).toBe(false);
  });
});
