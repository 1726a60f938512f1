/**
 * Indexer Service.
 *
 * Owns one ChainWatcher per configured chain. Chains run independently:
 * a halted or degraded chain never blocks the others.
 */

import type { ChainConfig } from '@tidemark/shared';
import type { AnomalyConfig } from '../config/anomaly.js';
import { ChainLock } from '../lib/chain-lock.js';
import { withStoreRetry, type RetryOptions } from '../lib/retry.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { IndexerStore } from '../repositories/types.js';
import { AnomalyScorer } from './anomaly-scorer.service.js';
import { BlockIngestor } from './block-ingestor.js';
import type { BlockSource } from './block-source.js';
import { ChainHealthRegistry } from './chain-health.js';
import { ChainWatcher } from './chain-watcher.js';
import { EntityAttributor } from './entity-attributor.service.js';

export interface IndexerServiceOptions {
  chains: ChainConfig[];
  store: IndexerStore;
  createSource: (chain: ChainConfig, logger: Logger) => BlockSource;
  anomaly: AnomalyConfig;
  retry: Omit<RetryOptions, 'logger'>;
  health?: ChainHealthRegistry;
  logger?: Logger;
}

export class IndexerService {
  readonly health: ChainHealthRegistry;
  private readonly lock = new ChainLock();
  private readonly watchers: ChainWatcher[] = [];
  private readonly log: Logger;
  private isRunning = false;

  constructor(private readonly options: IndexerServiceOptions) {
    this.health = options.health ?? new ChainHealthRegistry();
    this.log = options.logger ?? rootLogger;
  }

  /** Seed watched tokens and build the per-chain watchers */
  async init(): Promise<void> {
    const { chains, store, anomaly, retry } = this.options;

    await withStoreRetry(
      () =>
        store.transaction(async (tx) => {
          for (const chain of chains) {
            for (const token of chain.tokens) {
              await tx.registry.upsertKnownToken({
                chainId: chain.chainId,
                tokenAddress: token.address,
                symbol: token.symbol,
                decimals: token.decimals,
              });
            }
          }
        }),
      { ...retry, logger: this.log },
    );

    const scorer = new AnomalyScorer(anomaly);
    for (const chain of chains) {
      const log = this.log.child({ chain: chain.name, chainId: chain.chainId });
      const source = this.options.createSource(chain, log);
      const ingestor = new BlockIngestor({
        chain,
        store,
        source,
        scorer,
        attributor: new EntityAttributor(log),
        retry,
        logger: log,
      });
      this.watchers.push(
        new ChainWatcher({ chain, store, source, ingestor, lock: this.lock, health: this.health, retry, logger: log }),
      );
      this.health.register(chain.chainId, chain.name);
    }

    this.log.info(
      { chains: chains.map((c) => c.chainId), anomalyDetection: anomaly.enabled },
      'Indexer initialized',
    );
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    for (const watcher of this.watchers) watcher.start();
    this.log.info({ watchers: this.watchers.length }, 'Indexer started');
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    for (const watcher of this.watchers) watcher.stop();
    this.log.info('Indexer stopped');
  }

  getWatcher(chainId: number): ChainWatcher | undefined {
    return this.watchers.find((w) => w.chainId === chainId);
  }
}
