import { pgTable, bigint, text, timestamp, primaryKey, index } from 'drizzle-orm/pg-core';

/** Resumable cursor, one row per chain. Written only by that chain's ingestion task. */
export const chainCheckpoints = pgTable('chain_checkpoints', {
  chainId: bigint('chain_id', { mode: 'number' }).primaryKey(),
  lastIndexedBlock: bigint('last_indexed_block', { mode: 'number' }).notNull(),
  lastBlockHash: text('last_block_hash'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

/** Ledger of accepted block hashes, used only for reorg comparison */
export const blockHashes = pgTable(
  'block_hashes',
  {
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    blockNumber: bigint('block_number', { mode: 'number' }).notNull(),
    blockHash: text('block_hash').notNull(),
    parentHash: text('parent_hash').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.chainId, table.blockNumber] }),
    index('block_hashes_hash_idx').on(table.blockHash),
  ],
);
