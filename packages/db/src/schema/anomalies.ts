import { pgTable, bigserial, bigint, text, real, jsonb, boolean, timestamp, index, unique } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { transfers } from './transfers.js';

export const anomalies = pgTable(
  'anomalies',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    transferId: bigint('transfer_id', { mode: 'number' })
      .notNull()
      .references(() => transfers.id),
    chainId: bigint('chain_id', { mode: 'number' }).notNull(),
    anomalyType: text('anomaly_type').notNull(),
    riskScore: real('risk_score').notNull(), // 0..1
    flags: text('flags').array().notNull().default(sql`'{}'::text[]`),
    details: jsonb('details').$type<Record<string, unknown>>(),
    address: text('address'),
    detectedAt: timestamp('detected_at', { withTimezone: true }).notNull().defaultNow(),
    // Analyst workflow only; the scorer never writes it
    resolved: boolean('resolved').notNull().default(false),
  },
  (table) => [
    unique('anomalies_transfer_type_uniq').on(table.transferId, table.anomalyType),
    index('anomalies_type_idx').on(table.anomalyType),
    index('anomalies_risk_idx').on(table.riskScore),
    index('anomalies_chain_idx').on(table.chainId, table.detectedAt),
    index('anomalies_address_idx').on(table.address),
  ],
);
