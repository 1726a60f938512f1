import { pgTable, bigint, text, numeric, timestamp, primaryKey, index } from 'drizzle-orm/pg-core';

/** First sighting of an address on a chain. First write wins. */
export const walletFirstSeen = pgTable(
  'wallet_first_seen',
  {
    address: text('address').notNull(),
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).notNull(),
    firstBlock: bigint('first_block', { mode: 'number' }).notNull(),
    firstTxHash: text('first_tx_hash'),
    firstDirection: text('first_direction', { enum: ['in', 'out'] }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.address, table.chainId] }),
    index('wallet_first_seen_time_idx').on(table.firstSeenAt),
    index('wallet_first_seen_chain_idx').on(table.chainId, table.firstSeenAt),
  ],
);

/** Aggregated transfers from one address to another on one chain */
export const walletGraphEdges = pgTable(
  'wallet_graph_edges',
  {
    sourceAddress: text('source_address').notNull(),
    destAddress: text('dest_address').notNull(),
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    transferCount: bigint('transfer_count', { mode: 'number' }).notNull().default(1),
    totalAmount: numeric('total_amount', { precision: 78, scale: 0 }).notNull().default('0'),
    firstSeen: timestamp('first_seen', { withTimezone: true }).notNull(),
    lastSeen: timestamp('last_seen', { withTimezone: true }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.sourceAddress, table.destAddress, table.chainId] }),
    index('wallet_graph_edges_source_idx').on(table.sourceAddress),
    index('wallet_graph_edges_dest_idx').on(table.destAddress),
    index('wallet_graph_edges_last_seen_idx').on(table.lastSeen),
  ],
);
