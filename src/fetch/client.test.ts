import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { NetworkError } from '../error/networkError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { RequestSpec } from '../types/request.js';
import { buildRequestSpec } from '../utils/buildRequestSpec.js';
import { FetchClient } from './client.js';

const BASE_URL = 'https://api.example.test';

function specFor(input: Parameters<typeof buildRequestSpec>[0]): RequestSpec {
  const [err, spec] = buildRequestSpec(input);
  if (err) {
    throw err;
  }

  return spec;
}

function lastInit(fetchMock: Mock<typeof fetch>): RequestInit {
  const init = fetchMock.mock.lastCall?.[1];
  if (!init) {
    throw new Error('expected fetch to be called with init');
  }

  return init;
}

describe('FetchClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    fetchMock.mockReset();
  });

  it('sends the request with url, method and headers', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"data":[]}', { status: 200 }));
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret', headers: { 'User-Agent': 'chainquery/0.1.0' } });

    const [err, res] = await client.send(specFor({ path: '/v1/chains/', query: [['page-size', '2']] }));

    expect(err).toBeNull();
    expect(res?.status).toBe(200);
    expect(res?.body).toBe('{"data":[]}');
    expect(fetchMock.mock.lastCall?.[0]).toBe('https://api.example.test/v1/chains/?page-size=2');

    const init = lastInit(fetchMock);
    const headers = new Headers(init.headers);
    expect(init.method).toBe('GET');
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(headers.get('accept')).toBe('application/json');
    expect(headers.get('user-agent')).toBe('chainquery/0.1.0');
    expect(init.signal).toBeUndefined();
  });

  it('leaves out the credential when the request does not require it', async () => {
    fetchMock.mockResolvedValueOnce(new Response('', { status: 204 }));
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret' });

    const [, res] = await client.send(specFor({ path: '/v1/chains/', requiresAuth: false }));

    expect(res?.body).toBe('');
    expect(new Headers(lastInit(fetchMock).headers).has('authorization')).toBe(false);
  });

  it('returns non-2xx responses as responses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('Too Many Requests', { status: 429 }));
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret' });

    const [err, res] = await client.send(specFor({ path: '/v1/chains/' }));

    expect(err).toBeNull();
    expect(res?.status).toBe(429);
    expect(res?.body).toBe('Too Many Requests');
  });

  it('wraps a fetch rejection in a NetworkError', async () => {
    const cause = new TypeError('fetch failed');
    fetchMock.mockRejectedValueOnce(cause);
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret' });

    const [err, res] = await client.send(specFor({ path: '/v1/chains/' }));

    expect(res).toBeNull();
    expect(err).toBeInstanceOf(NetworkError);
    expect(err?.message).toBe('error sending GET /v1/chains/ in fetchClient');
    expect(err?.cause).toBe(cause);
  });

  it('surfaces a timeout as a NetworkError caused by a TimeoutError', async () => {
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
        }),
    );
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret', timeout: 10 });

    const [err] = await client.send(specFor({ path: '/v1/chains/' }));

    expect(err).toBeInstanceOf(NetworkError);
    expect(err?.cause).toBeInstanceOf(TimeoutError);
    expect(err?.cause).toEqual(new TimeoutError('error request timed out after 10ms'));
  });

  it('lets a per-send timeout override the default', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret', timeout: 10 });

    await client.send(specFor({ path: '/v1/chains/' }), { timeout: false });

    expect(lastInit(fetchMock).signal).toBeUndefined();
  });

  it('forwards the caller signal', async () => {
    const controller = new AbortController();
    const reason = new Error('caller cancelled');
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
        }),
    );
    const client = new FetchClient({ baseUrl: BASE_URL, apiKey: 'test-secret' });

    const pending = client.send(specFor({ path: '/v1/chains/' }), { signal: controller.signal });
    controller.abort(reason);
    const [err] = await pending;

    expect(lastInit(fetchMock).signal).toBe(controller.signal);
    expect(err?.cause).toBe(reason);
  });
});
