import { pgTable, serial, bigint, integer, text, boolean, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { transfers } from './transfers.js';

/** Exchanges and fiat on-ramp services */
export const onrampProviders = pgTable('onramp_providers', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
  providerType: text('provider_type').notNull(), // 'exchange' | 'onramp' | 'p2p'
  website: text('website'),
  kycRequired: boolean('kyc_required').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

/** Known hot/deposit wallets of a provider */
export const providerWallets = pgTable(
  'provider_wallets',
  {
    id: serial('id').primaryKey(),
    providerId: integer('provider_id')
      .notNull()
      .references(() => onrampProviders.id),
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    address: text('address').notNull(),
    label: text('label'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('provider_wallets_chain_address_uniq').on(table.chainId, table.address),
    index('provider_wallets_address_idx').on(table.address),
  ],
);

/** One row per transfer attributed to a provider */
export const onrampTransfers = pgTable(
  'onramp_transfers',
  {
    transferId: bigint('transfer_id', { mode: 'number' })
      .primaryKey()
      .references(() => transfers.id),
    providerId: integer('provider_id')
      .notNull()
      .references(() => onrampProviders.id),
    direction: text('direction', { enum: ['deposit', 'withdrawal'] }).notNull(), // deposit: user -> provider
  },
  (table) => [index('onramp_transfers_provider_idx').on(table.providerId)],
);
