import type { IndexerStore } from './repositories/types.js';
import type { ChainHealthRegistry } from './services/chain-health.js';

/** What the HTTP surface reads; supplied by the entry point */
export interface AppDeps {
  store: Pick<IndexerStore, 'ping'>;
  health: ChainHealthRegistry;
}
