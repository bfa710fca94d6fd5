import { z } from 'zod';

/**
 * Response shapes of the bundled endpoints. Only the commonly used fields are typed;
 * everything else the API sends is kept through `passthrough`.
 */

export const balanceItemSchema = z
  .object({
    contract_name: z.string().nullish(),
    contract_ticker_symbol: z.string().nullish(),
    contract_address: z.string().nullish(),
    contract_decimals: z.number().int().nullish(),
    type: z.string().nullish(),
    balance: z.string().nullish(),
    quote: z.number().nullish(),
    quote_rate: z.number().nullish(),
  })
  .passthrough();

export const balancesDataSchema = z
  .object({
    address: z.string().nullish(),
    chain_id: z.number().int().nullish(),
    chain_name: z.string().nullish(),
    quote_currency: z.string().nullish(),
    updated_at: z.string().nullish(),
    items: z.array(balanceItemSchema).nullish(),
  })
  .passthrough();

export const transactionItemSchema = z
  .object({
    block_signed_at: z.string().nullish(),
    block_height: z.number().int().nullish(),
    tx_hash: z.string().nullish(),
    successful: z.boolean().nullish(),
    from_address: z.string().nullish(),
    to_address: z.string().nullish(),
    value: z.string().nullish(),
    fees_paid: z.string().nullish(),
  })
  .passthrough();

export const transactionsDataSchema = z
  .object({
    address: z.string().nullish(),
    chain_id: z.number().int().nullish(),
    chain_name: z.string().nullish(),
    updated_at: z.string().nullish(),
    items: z.array(transactionItemSchema).nullish(),
  })
  .passthrough();

export const chainItemSchema = z
  .object({
    name: z.string().nullish(),
    chain_id: z.string().nullish(),
    is_testnet: z.boolean().nullish(),
    label: z.string().nullish(),
    logo_url: z.string().nullish(),
  })
  .passthrough();

export const chainsDataSchema = z
  .object({
    updated_at: z.string().nullish(),
    items: z.array(chainItemSchema).nullish(),
  })
  .passthrough();

export type BalanceItem = z.infer<typeof balanceItemSchema>;
export type BalancesData = z.infer<typeof balancesDataSchema>;
export type TransactionItem = z.infer<typeof transactionItemSchema>;
export type TransactionsData = z.infer<typeof transactionsDataSchema>;
export type ChainItem = z.infer<typeof chainItemSchema>;
export type ChainsData = z.infer<typeof chainsDataSchema>;
