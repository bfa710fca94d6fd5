import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { SerializationError } from '../error/serializationError.js';
import { ValidationError } from '../error/validationError.js';
import { parseEnvelope, parseErrorBody } from './parse.js';

const itemsSchema = z.object({ items: z.array(z.object({ symbol: z.string() })) });

describe('parseEnvelope', () => {
  it('parses data and camel-cases pagination, dropping nulls', async () => {
    const body = JSON.stringify({
      data: { items: [{ symbol: 'ETH' }] },
      error: null,
      pagination: { has_more: true, page_number: 0, page_size: 1, total_count: null },
    });

    const [err, envelope] = await parseEnvelope(200, body, itemsSchema);

    expect(err).toBeNull();
    expect(envelope).toEqual({
      data: { items: [{ symbol: 'ETH' }] },
      pagination: { hasMore: true, pageNumber: 0, pageSize: 1 },
    });
  });

  it('reads total_count as a JS number, rounding past 2^53', async () => {
    const body = '{"data":null,"pagination":{"has_more":false,"total_count":9007199254740993}}';

    const [err, envelope] = await parseEnvelope(200, body, itemsSchema);

    expect(err).toBeNull();
    expect(envelope?.pagination).toEqual({ hasMore: false, totalCount: 9007199254740992 });
  });

  it('treats null and missing data as absent', async () => {
    expect(await parseEnvelope(200, '{"data":null,"error":null,"pagination":null}', itemsSchema)).toEqual([null, {}]);
    expect(await parseEnvelope(200, '{}', itemsSchema)).toEqual([null, {}]);
  });

  it('returns the error and skips data validation when error is populated', async () => {
    const body = JSON.stringify({ data: { unexpected: true }, error: { code: 400, message: 'bad address' } });

    const [err, envelope] = await parseEnvelope(200, body, itemsSchema);

    expect(err).toBeNull();
    expect(envelope).toEqual({ error: { status: 200, code: 400, message: 'bad address' } });
  });

  it('fails on a body that is not json', async () => {
    const [err, envelope] = await parseEnvelope(200, '<html>ok</html>', itemsSchema);

    expect(envelope).toBeNull();
    expect(err).toBeInstanceOf(SerializationError);
    expect(err?.message).toBe('error parsing response body as json');
    expect(err?.status).toBe(200);
  });

  it('fails on json that is not an envelope', async () => {
    const [err] = await parseEnvelope(200, '[1,2,3]', itemsSchema);

    expect(err?.message).toBe('error response body is not an envelope');
    expect(err?.cause).toBeInstanceOf(ValidationError);
  });

  it('fails when the pagination block has the wrong shape', async () => {
    const [err] = await parseEnvelope(200, '{"data":null,"pagination":{"has_more":"yes"}}', itemsSchema);

    expect(err?.message).toBe('error response body is not an envelope');
  });

  it('fails when data does not match the schema', async () => {
    const [err, envelope] = await parseEnvelope(200, '{"data":{"items":[{"symbol":1}]}}', itemsSchema);

    expect(envelope).toBeNull();
    expect(err?.message).toBe('error validating response data');
    expect(err?.cause).toBeInstanceOf(ValidationError);
  });
});

describe('parseErrorBody', () => {
  it('reads code and message from an error envelope', () => {
    expect(parseErrorBody(500, '{"error":{"code":500,"message":"internal"}}')).toEqual({
      status: 500,
      code: 500,
      message: 'internal',
    });
  });

  it('falls back to the raw body when the envelope has no message', () => {
    expect(parseErrorBody(429, '{"error":{"code":429}}')).toEqual({
      status: 429,
      code: 429,
      message: '{"error":{"code":429}}',
    });
  });

  it('uses a plain-text body as the message', () => {
    expect(parseErrorBody(502, 'Bad Gateway')).toEqual({ status: 502, message: 'Bad Gateway' });
  });

  it('leaves out the message for an empty body', () => {
    expect(parseErrorBody(503, '')).toEqual({ status: 503 });
  });
});
