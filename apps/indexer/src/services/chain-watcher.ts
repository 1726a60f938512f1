import type { ChainConfig } from '@tidemark/shared';
import { ChainBusyError, IndexerError } from '../lib/errors.js';
import type { ChainLock } from '../lib/chain-lock.js';
import { withStoreRetry, type RetryOptions } from '../lib/retry.js';
import type { Logger } from '../lib/logger.js';
import type { IndexerStore } from '../repositories/types.js';
import type { BlockIngestor } from './block-ingestor.js';
import type { BlockSource } from './block-source.js';
import type { ChainHealthRegistry } from './chain-health.js';

export interface ChainWatcherOptions {
  chain: ChainConfig;
  store: IndexerStore;
  source: BlockSource;
  ingestor: BlockIngestor;
  lock: ChainLock;
  health: ChainHealthRegistry;
  retry: Omit<RetryOptions, 'logger'>;
  logger: Logger;
}

export type TickResult =
  | { kind: 'skipped'; reason: 'busy' | 'halted' | 'stopped' }
  | { kind: 'polled'; processed: number; height: number | null }
  | { kind: 'failed'; halted: boolean; error: unknown };

type PollResult = Extract<TickResult, { kind: 'polled' }>;

/**
 * Polls one chain on its interval. Ticks never overlap: a tick that finds the
 * previous one still running is skipped. Halting errors stop the watcher;
 * anything else marks the chain degraded and the next tick resumes from the
 * durable checkpoint.
 */
export class ChainWatcher {
  private interval: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private halted = false;
  private readonly retry: RetryOptions;

  constructor(private readonly options: ChainWatcherOptions) {
    this.retry = { ...options.retry, logger: options.logger };
  }

  get chainId(): number {
    return this.options.chain.chainId;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  start(): void {
    if (this.interval) return;
    const { chain, health, logger } = this.options;
    health.register(chain.chainId, chain.name);
    logger.info({ pollIntervalMs: chain.pollIntervalMs, startBlock: chain.startBlock }, 'Chain watcher started');

    // tick() reports its own failures
    this.interval = setInterval(() => void this.tick(), chain.pollIntervalMs);
    void this.tick();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.options.logger.info('Chain watcher stopped');
    }
  }

  async tick(): Promise<TickResult> {
    if (this.halted) return { kind: 'skipped', reason: 'halted' };
    if (this.polling) return { kind: 'skipped', reason: 'busy' };

    const { chain, lock, health, logger } = this.options;
    this.polling = true;
    try {
      const result = await lock.runExclusive(chain.chainId, () => this.poll());
      health.markHealthy(chain.chainId, result.height);
      return result;
    } catch (err) {
      if (err instanceof ChainBusyError) {
        logger.debug('Chain owned by another task, skipping tick');
        return { kind: 'skipped', reason: 'busy' };
      }
      if (err instanceof IndexerError && err.halts) {
        this.halted = true;
        this.stop();
        health.markHalted(chain.chainId, err);
        logger.error({ err, code: err.code, details: err.details }, 'Chain halted, manual intervention required');
        return { kind: 'failed', halted: true, error: err };
      }
      health.markDegraded(chain.chainId, err);
      logger.error({ err }, 'Chain tick failed, will retry from checkpoint');
      return { kind: 'failed', halted: false, error: err };
    } finally {
      this.polling = false;
    }
  }

  private async poll(): Promise<PollResult> {
    const { chain, store, source, ingestor, logger } = this.options;

    const head = await source.getLatestHeight();
    const checkpoint = await withStoreRetry(() => store.checkpoints.get(chain.chainId), this.retry);

    let height = checkpoint?.lastIndexedBlock ?? null;
    let next = checkpoint ? checkpoint.lastIndexedBlock + 1 : chain.startBlock ?? head;
    let processed = 0;

    while (processed < chain.maxBlocksPerPoll && next <= head) {
      const block = await source.getBlock(next);
      if (!block) break;

      const outcome = await ingestor.advance(block);
      processed++;

      switch (outcome.kind) {
        case 'extended':
          height = outcome.height;
          next = outcome.height + 1;
          break;
        case 'duplicate':
          next = block.number + 1;
          break;
        case 'rolled_back':
          height = outcome.ancestor;
          next = outcome.ancestor + 1;
          break;
      }
    }

    if (processed > 0) {
      logger.debug({ processed, height, head }, 'Poll complete');
    }
    return { kind: 'polled', processed, height };
  }
}
