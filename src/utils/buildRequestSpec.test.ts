import { describe, expect, it } from 'vitest';
import { RequestSpecError } from '../error/requestSpecError.js';
import { buildRequestSpec, normalizeQuery } from './buildRequestSpec.js';

describe('normalizeQuery', () => {
  it('returns no pairs for missing input', () => {
    expect(normalizeQuery()).toEqual([]);
  });

  it('keeps pairs as given, repeated keys included', () => {
    expect(
      normalizeQuery([
        ['b', '2'],
        ['a', '1'],
        ['b', '3'],
      ]),
    ).toEqual([
      ['b', '2'],
      ['a', '1'],
      ['b', '3'],
    ]);
  });

  it('flattens records, skipping nullish values and repeating array keys', () => {
    expect(
      normalizeQuery({
        'quote-currency': 'USD',
        'page-size': 100,
        nft: false,
        'block-height': 10n,
        'no-spam': undefined,
        'page-number': null,
        contract: ['0xa', '0xb'],
      }),
    ).toEqual([
      ['quote-currency', 'USD'],
      ['page-size', '100'],
      ['nft', 'false'],
      ['block-height', '10'],
      ['contract', '0xa'],
      ['contract', '0xb'],
    ]);
  });
});

describe('buildRequestSpec', () => {
  it('substitutes placeholders and applies defaults', () => {
    const [err, spec] = buildRequestSpec({
      path: '/v1/{chainName}/address/{address}/balances_v2/',
      params: { chainName: 'eth-mainnet', address: 'demo.eth' },
      query: { 'quote-currency': 'USD' },
    });

    expect(err).toBeNull();
    expect(spec).toEqual({
      method: 'GET',
      path: '/v1/eth-mainnet/address/demo.eth/balances_v2/',
      query: [['quote-currency', 'USD']],
      requiresAuth: true,
    });
  });

  it('uri-encodes substituted values and replaces repeated placeholders', () => {
    const [, spec] = buildRequestSpec({
      method: 'POST',
      path: '/v1/{name}/{name}/',
      params: { name: 'a b/c' },
      requiresAuth: false,
    });

    expect(spec?.path).toBe('/v1/a%20b%2Fc/a%20b%2Fc/');
    expect(spec?.method).toBe('POST');
    expect(spec?.requiresAuth).toBe(false);
  });

  it('fails on placeholders left unreplaced', () => {
    const [err, spec] = buildRequestSpec({
      path: '/v1/{chainName}/address/{address}/',
      params: { chainName: 'eth-mainnet' },
    });

    expect(spec).toBeNull();
    expect(err).toBeInstanceOf(RequestSpecError);
    expect(err?.path).toBe('/v1/eth-mainnet/address/{address}/');
    expect(err?.message).toBe(
      'error building request, path has unreplaced placeholders /v1/eth-mainnet/address/{address}/',
    );
  });

  it('freezes the spec and its query', () => {
    const [, spec] = buildRequestSpec({ path: '/v1/chains/', query: [['page-size', '10']] });

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec?.query)).toBe(true);
    expect(Object.isFrozen(spec?.query[0])).toBe(true);
  });
});
