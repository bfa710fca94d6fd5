import type { ChainQueryClient } from '../core/client.js';
import type { CallOptions } from '../types/request.js';
import { chainsDataSchema } from './schemas.js';

/** Path of the supported-chains endpoint. */
export const ALL_CHAINS_PATH = '/v1/chains/';

/**
 * Every chain the API supports. Served from the response cache when the client has one.
 */
export function getAllChains(client: ChainQueryClient, opts: CallOptions = {}) {
  return client.get(ALL_CHAINS_PATH, { ...opts, schema: chainsDataSchema, cache: true });
}
