import type { ChainQueryClient } from '../core/client.js';
import type { CallOptions } from '../types/request.js';
import { transactionsDataSchema } from './schemas.js';

/** Path template of the transactions endpoint. */
export const TRANSACTIONS_PATH = '/v1/{chainName}/address/{address}/transactions_v2/';

/** Query options of {@link getTransactions} and {@link iterateTransactions}. */
export interface TransactionsOptions extends CallOptions {
  quoteCurrency?: string;
  /** Oldest first. */
  blockSignedAtAsc?: boolean;
  /** Omit decoded log events. */
  noLogs?: boolean;
  pageNumber?: number;
  pageSize?: number;
}

function toQuery({ quoteCurrency, blockSignedAtAsc, noLogs }: TransactionsOptions) {
  return {
    'quote-currency': quoteCurrency,
    'block-signed-at-asc': blockSignedAtAsc,
    'no-logs': noLogs,
  };
}

/**
 * One page of transactions for `address` on `chainName`.
 */
export function getTransactions(
  client: ChainQueryClient,
  chainName: string,
  address: string,
  opts: TransactionsOptions = {},
) {
  const { signal, timeout, pageNumber, pageSize } = opts;
  return client.get(TRANSACTIONS_PATH, {
    schema: transactionsDataSchema,
    params: { chainName, address },
    query: { ...toQuery(opts), 'page-number': pageNumber, 'page-size': pageSize },
    signal,
    timeout,
  });
}

/**
 * Walks every transaction page for `address` on `chainName`, starting at `opts.pageNumber` when given.
 */
export function iterateTransactions(
  client: ChainQueryClient,
  chainName: string,
  address: string,
  opts: TransactionsOptions = {},
) {
  const { signal, timeout, pageNumber, pageSize } = opts;
  return client.paginate(TRANSACTIONS_PATH, {
    schema: transactionsDataSchema,
    params: { chainName, address },
    query: toQuery(opts),
    selectItems: (data) => data.items,
    pageNumber,
    pageSize,
    signal,
    timeout,
  });
}
