import { pgTable, bigserial, bigint, text, integer, numeric, smallint, timestamp, index, unique } from 'drizzle-orm/pg-core';

export const transfers = pgTable(
  'transfers',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    blockNumber: bigint('block_number', { mode: 'number' }).notNull(),
    blockHash: text('block_hash').notNull(),
    txHash: text('tx_hash').notNull(),
    logIndex: integer('log_index').notNull(),
    tokenAddress: text('token_address').notNull(),
    fromAddress: text('from_address').notNull(),
    toAddress: text('to_address').notNull(),
    amount: numeric('amount', { precision: 78, scale: 0 }).notNull(), // raw token units
    tokenSymbol: text('token_symbol').notNull(),
    tokenDecimals: smallint('token_decimals').notNull(),
    blockTimestamp: timestamp('block_timestamp', { withTimezone: true }).notNull(),
  },
  (table) => [
    // Idempotency key for at-least-once delivery
    unique('transfers_chain_tx_log_uniq').on(table.chainId, table.txHash, table.logIndex),
    index('transfers_chain_block_idx').on(table.chainId, table.blockNumber),
    index('transfers_from_idx').on(table.fromAddress),
    index('transfers_to_idx').on(table.toAddress),
    index('transfers_token_idx').on(table.tokenAddress),
    index('transfers_timestamp_idx').on(table.blockTimestamp),
    index('transfers_tx_hash_idx').on(table.txHash),
    // Pair lookups for edge re-derivation after rollback
    index('transfers_chain_pair_idx').on(table.chainId, table.fromAddress, table.toAddress),
  ],
);
