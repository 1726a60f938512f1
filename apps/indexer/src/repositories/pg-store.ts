import { sql } from 'drizzle-orm';
import type { DbExecutor } from '@tidemark/db';
import { PgCheckpointRepository } from './checkpoint.repository.js';
import { PgTransferRepository } from './transfer.repository.js';
import { PgGraphRepository } from './graph.repository.js';
import { PgAnomalyRepository } from './anomaly.repository.js';
import { PgAttributionRepository } from './attribution.repository.js';
import { PgRegistryRepository } from './registry.repository.js';
import type { IndexerStore } from './types.js';

/** Drizzle-backed store. Constructed over the root db or over an open transaction. */
export class PgIndexerStore implements IndexerStore {
  readonly checkpoints: PgCheckpointRepository;
  readonly transfers: PgTransferRepository;
  readonly graph: PgGraphRepository;
  readonly anomalies: PgAnomalyRepository;
  readonly attribution: PgAttributionRepository;
  readonly registry: PgRegistryRepository;

  constructor(private readonly db: DbExecutor) {
    this.checkpoints = new PgCheckpointRepository(db);
    this.transfers = new PgTransferRepository(db);
    this.graph = new PgGraphRepository(db);
    this.anomalies = new PgAnomalyRepository(db);
    this.attribution = new PgAttributionRepository(db);
    this.registry = new PgRegistryRepository(db);
  }

  transaction<T>(fn: (tx: IndexerStore) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new PgIndexerStore(tx)));
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}
