import type { ChainConfig, FetchedBlock } from '@tidemark/shared';
import { withStoreRetry, type RetryOptions } from '../lib/retry.js';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { IndexerStore } from '../repositories/types.js';
import type { AnomalyScorer } from './anomaly-scorer.service.js';
import type { BlockSource } from './block-source.js';
import { EntityAttributor } from './entity-attributor.service.js';
import { graphAggregator, type GraphAggregator } from './graph-aggregator.service.js';
import { classifyBlock, findCommonAncestor } from './reorg-detector.js';
import { RollbackService, type RollbackResult } from './rollback.service.js';
import { transferRecorder, type TransferRecorder, toNewTransfer } from './transfer-recorder.service.js';

export type AdvanceOutcome =
  | { kind: 'extended'; height: number; transfers: number; inserted: number; anomalies: number }
  | { kind: 'duplicate'; height: number }
  /** The caller resumes at `ancestor + 1`; the offered block was not applied */
  | { kind: 'rolled_back'; ancestor: number; rollback: RollbackResult };

export interface BlockIngestorOptions {
  chain: ChainConfig;
  store: IndexerStore;
  source: BlockSource;
  scorer: AnomalyScorer;
  retry: Omit<RetryOptions, 'logger'>;
  attributor?: EntityAttributor;
  recorder?: TransferRecorder;
  graph?: GraphAggregator;
  logger?: Logger;
}

/**
 * Per-chain `advance`: checkpoint comparison, reorg handling and the
 * per-block unit of work (record, fan out, hash ledger, checkpoint).
 */
export class BlockIngestor {
  private readonly chain: ChainConfig;
  private readonly store: IndexerStore;
  private readonly source: BlockSource;
  private readonly scorer: AnomalyScorer;
  private readonly attributor: EntityAttributor;
  private readonly recorder: TransferRecorder;
  private readonly graph: GraphAggregator;
  private readonly rollbacks: RollbackService;
  private readonly retry: RetryOptions;
  private readonly log: Logger;

  constructor(options: BlockIngestorOptions) {
    this.chain = options.chain;
    this.store = options.store;
    this.source = options.source;
    this.scorer = options.scorer;
    this.log = options.logger ?? rootLogger;
    this.attributor = options.attributor ?? new EntityAttributor(this.log);
    this.recorder = options.recorder ?? transferRecorder;
    this.graph = options.graph ?? graphAggregator;
    this.rollbacks = new RollbackService(this.graph);
    this.retry = { ...options.retry, logger: this.log };
  }

  advance(block: FetchedBlock): Promise<AdvanceOutcome> {
    return withStoreRetry(() => this.step(block), this.retry);
  }

  private async step(block: FetchedBlock): Promise<AdvanceOutcome> {
    const { chainId } = this.chain;
    const checkpoint = await this.store.checkpoints.get(chainId);
    const classification = await classifyBlock(this.store, this.chain, checkpoint, block);

    switch (classification.kind) {
      case 'duplicate':
        this.log.debug({ height: block.number, hash: block.hash }, 'Duplicate block ignored');
        return { kind: 'duplicate', height: block.number };

      case 'extend':
        return this.store.transaction((tx) => this.apply(tx, block));

      case 'reorg': {
        const ancestor = await findCommonAncestor(this.store, this.source, this.chain, classification.checkpoint, block);
        const rollback = await this.store.transaction((tx) => this.rollbacks.rollback(tx, chainId, ancestor));
        this.log.warn(
          {
            from: classification.checkpoint.lastIndexedBlock,
            ancestor: ancestor.height,
            offered: block.number,
            transfersRemoved: rollback.transfersRemoved,
            blocksRemoved: rollback.blocksRemoved,
          },
          'Reorg rolled back',
        );
        return { kind: 'rolled_back', ancestor: ancestor.height, rollback };
      }
    }
  }

  private async apply(tx: IndexerStore, block: FetchedBlock): Promise<AdvanceOutcome> {
    const { chainId } = this.chain;
    const ordered = [...block.transfers].sort((a, b) => a.logIndex - b.logIndex);

    let inserted = 0;
    let anomalies = 0;
    for (const fetched of ordered) {
      const recorded = await this.recorder.record(tx, toNewTransfer(chainId, block, fetched));
      if (recorded.inserted) {
        inserted++;
        await this.graph.absorb(tx, recorded.transfer);
      }
      const [findings] = await Promise.all([
        this.scorer.score(tx, recorded.transfer),
        this.attributor.attribute(tx, recorded.transfer),
      ]);
      anomalies += findings.length;
    }

    await tx.checkpoints.putBlockHash({
      chainId,
      blockNumber: block.number,
      blockHash: block.hash,
      parentHash: block.parentHash,
    });
    await tx.checkpoints.save(chainId, block.number, block.hash);

    if (ordered.length > 0) {
      this.log.debug({ height: block.number, transfers: ordered.length, inserted, anomalies }, 'Block indexed');
    }
    return { kind: 'extended', height: block.number, transfers: ordered.length, inserted, anomalies };
  }
}
