import { pgTable, serial, bigserial, bigint, integer, text, real, jsonb, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { transfers } from './transfers.js';

/** Reusable identities attached to addresses. chain_id NULL = every chain. */
export const entityLabels = pgTable(
  'entity_labels',
  {
    id: serial('id').primaryKey(),
    address: text('address').notNull(),
    chainId: bigint('chain_id', { mode: 'number' }),
    entityName: text('entity_name').notNull(),
    entityType: text('entity_type').notNull(), // exchange, company, individual, contract, mixer, sanctioned, unknown
    labelSource: text('label_source').notNull(), // ofac_sdn, config, heuristic, custom_watchlist
    confidence: real('confidence').notNull().default(1),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('entity_labels_identity_uniq').on(table.address, table.chainId, table.labelSource, table.entityName),
    index('entity_labels_address_idx').on(table.address),
    index('entity_labels_type_idx').on(table.entityType),
    index('entity_labels_source_idx').on(table.labelSource),
  ],
);

/** Sanctions / custom watchlist entries */
export const watchlistEntries = pgTable(
  'watchlist_entries',
  {
    id: serial('id').primaryKey(),
    listName: text('list_name').notNull(),
    address: text('address').notNull(),
    entityName: text('entity_name'),
    sdnId: text('sdn_id'),
    program: text('program'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    addedAt: timestamp('added_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('watchlist_entries_list_address_uniq').on(table.listName, table.address),
    index('watchlist_entries_address_idx').on(table.address),
  ],
);

export const transferEntityFlags = pgTable(
  'transfer_entity_flags',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    transferId: bigint('transfer_id', { mode: 'number' })
      .notNull()
      .references(() => transfers.id),
    entityLabelId: integer('entity_label_id')
      .notNull()
      .references(() => entityLabels.id),
    side: text('side', { enum: ['from', 'to'] }).notNull(),
  },
  (table) => [
    unique('transfer_entity_flags_uniq').on(table.transferId, table.entityLabelId, table.side),
    index('transfer_entity_flags_transfer_idx').on(table.transferId),
    index('transfer_entity_flags_entity_idx').on(table.entityLabelId),
  ],
);
