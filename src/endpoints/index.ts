/**
 * Endpoint entrypoint: ready-made calls for common endpoints and their response schemas.
 * @module
 */

export { type BalancesOptions, getTokenBalances, TOKEN_BALANCES_PATH } from './balances.js';
export { ALL_CHAINS_PATH, getAllChains } from './chains.js';
export * from './schemas.js';
export { getTransactions, iterateTransactions, TRANSACTIONS_PATH, type TransactionsOptions } from './transactions.js';
