import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export interface CreateDbOptions {
  maxConnections?: number;
  applicationName?: string;
}

export function createDb(connectionString: string, options: CreateDbOptions = {}) {
  const isNeon = connectionString.includes('.neon.tech');

  const client = postgres(connectionString, {
    max: options.maxConnections ?? (isNeon ? 10 : 20),
    idle_timeout: 20,
    connect_timeout: 10,
    max_lifetime: isNeon ? 60 * 5 : 60 * 30,
    ssl: isNeon ? 'require' : undefined,
    connection: { application_name: options.applicationName ?? 'tidemark-indexer' },
  });
  return drizzle(client, { schema });
}

export type Database = ReturnType<typeof createDb>;

/** Either the root database or an open transaction on it */
export type DbExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export * from './schema/index.js';
