import { describe, expect, it } from 'vitest';
import { tryParse } from './tryParse.js';

describe('tryParse', () => {
  it('parses an envelope body', () => {
    expect(tryParse('{"data":{"items":[]},"error":null}')).toEqual({ data: { items: [] }, error: null });
  });

  it('parses JSON primitives', () => {
    expect(tryParse('"rate limited"')).toBe('rate limited');
    expect(tryParse('429')).toBe(429);
    expect(tryParse('null')).toBeNull();
  });

  it('returns the raw text when the body is not JSON', () => {
    expect(tryParse('<html>Bad Gateway</html>')).toBe('<html>Bad Gateway</html>');
    expect(tryParse('{"truncated":')).toBe('{"truncated":');
    expect(tryParse('   ')).toBe('   ');
  });

  it('returns null for an empty body', () => {
    expect(tryParse('')).toBeNull();
  });
});
