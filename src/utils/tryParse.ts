import { safeWrap } from './wrap.js';

/**
 * Parses a response body as JSON, falling back to the raw text when it is not JSON.
 * Never throws; an empty body yields `null`.
 */
export function tryParse(input: string): unknown {
  if (!input) {
    return null;
  }

  const [errParsed, parsed] = safeWrap<Error, unknown>(() => JSON.parse(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}
