import type { ChainQueryClient } from '../core/client.js';
import type { CallOptions } from '../types/request.js';
import { balancesDataSchema } from './schemas.js';

/** Path template of the token balances endpoint. */
export const TOKEN_BALANCES_PATH = '/v1/{chainName}/address/{address}/balances_v2/';

/** Query options of {@link getTokenBalances}. */
export interface BalancesOptions extends CallOptions {
  /** e.g. `USD`, `EUR`, `ETH` */
  quoteCurrency?: string;
  /** Include NFT balances. */
  nft?: boolean;
  /** Exclude tokens flagged as spam. */
  noSpam?: boolean;
  /** 0-indexed. */
  pageNumber?: number;
  pageSize?: number;
}

/**
 * Token balances held by `address` on `chainName` (e.g. `eth-mainnet`).
 */
export function getTokenBalances(
  client: ChainQueryClient,
  chainName: string,
  address: string,
  { quoteCurrency, nft, noSpam, pageNumber, pageSize, ...callOpts }: BalancesOptions = {},
) {
  return client.get(TOKEN_BALANCES_PATH, {
    ...callOpts,
    schema: balancesDataSchema,
    params: { chainName, address },
    query: {
      'quote-currency': quoteCurrency,
      nft,
      'no-spam': noSpam,
      'page-number': pageNumber,
      'page-size': pageSize,
    },
  });
}
