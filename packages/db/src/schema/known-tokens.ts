import { pgTable, bigint, text, smallint, primaryKey } from 'drizzle-orm/pg-core';

/** Watched stablecoin contracts per chain (seeded from the chain config file) */
export const knownTokens = pgTable(
  'known_tokens',
  {
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    tokenAddress: text('token_address').notNull(),
    symbol: text('symbol').notNull(),
    decimals: smallint('decimals').notNull(),
  },
  (table) => [primaryKey({ columns: [table.chainId, table.tokenAddress] })],
);
