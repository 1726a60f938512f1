/**
 * Load on-ramp providers, entity labels and watchlists from a JSON file.
 *
 * Usage: npm run registry:load -w @tidemark/indexer -- config/registry.json
 */
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { RegistryFileSchema } from '@tidemark/shared/schemas';
import { env } from '../config/env.js';
import { getDb } from '../lib/db.js';
import { logger } from '../lib/logger.js';
import { PgIndexerStore } from '../repositories/pg-store.js';
import { loadRegistry } from '../services/registry-loader.js';

async function main(): Promise<void> {
  const path = resolve(process.cwd(), process.argv[2] ?? 'config/registry.json');
  const registry = RegistryFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));

  const db = getDb();
  try {
    const summary = await loadRegistry(new PgIndexerStore(db), registry);
    logger.info({ path, database: new URL(env.DATABASE_URL).host, ...summary }, 'Registry loaded');
  } finally {
    await db.$client.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Registry load failed');
  process.exitCode = 1;
});
