import { describe, expect, it } from 'vitest';
import { ApiDomainError, getApiDomainError } from './apiDomainError.js';
import { getChainQueryError } from './chainQueryError.js';
import { ClientRequestError } from './clientRequestError.js';
import { ErrorKind } from './errorKind.js';
import { MissingCredentialError } from './missingCredentialError.js';
import { NetworkError } from './networkError.js';
import { RateLimitedError } from './rateLimitedError.js';
import { SerializationError } from './serializationError.js';
import { ServerError } from './serverError.js';

describe('ChainQueryError', () => {
  it('tags every taxonomy class with its kind', () => {
    const body = { status: 400 };

    expect(new MissingCredentialError().kind).toBe(ErrorKind.MissingCredential);
    expect(new NetworkError('n').kind).toBe(ErrorKind.NetworkFailure);
    expect(new RateLimitedError('r', { status: 429 }).kind).toBe(ErrorKind.RateLimited);
    expect(new ClientRequestError('c', body).kind).toBe(ErrorKind.ClientRequestError);
    expect(new ServerError('s', { status: 502 }).kind).toBe(ErrorKind.ServerFailure);
    expect(new SerializationError('p', 200).kind).toBe(ErrorKind.SerializationFailure);
    expect(new ApiDomainError('d', { status: 200, code: 7 }).kind).toBe(ErrorKind.ApiDomainError);
  });

  it('uses a default message for a missing credential', () => {
    const err = new MissingCredentialError();

    expect(err.message).toBe('error missing api key');
    expect(err.name).toBe('MissingCredentialError');
  });

  it('exposes the api error body of response errors', () => {
    const err = new ClientRequestError('error 404 response: not found', {
      status: 404,
      code: 404,
      message: 'not found',
    });

    expect(err.status).toBe(404);
    expect(err.code).toBe(404);
    expect(err.body).toEqual({ status: 404, code: 404, message: 'not found' });
  });

  it('hands out a copy of the body', () => {
    const err = new ApiDomainError('error api rejected request', { status: 200, message: 'bad address' });
    const body = err.body;
    body.message = 'changed';

    expect(err.body.message).toBe('bad address');
  });

  it('unwraps the taxonomy error from a wrapper', () => {
    const domain = new ApiDomainError('error api rejected request', { status: 200 });
    const wrapped = new Error('outer', { cause: domain });

    expect(getChainQueryError(wrapped)).toBe(domain);
    expect(getApiDomainError(wrapped)).toBe(domain);
    expect(getChainQueryError(new Error('plain'))).toBeNull();
  });
});
