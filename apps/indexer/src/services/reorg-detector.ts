import type { ChainConfig, FetchedBlock } from '@tidemark/shared';
import { DeepReorgError, GapError, ReorgLinkageError } from '../lib/errors.js';
import type { ChainCheckpoint, IndexerStore } from '../repositories/types.js';
import type { BlockSource } from './block-source.js';

export type BlockClassification =
  | { kind: 'extend' }
  | { kind: 'duplicate' }
  | { kind: 'reorg'; checkpoint: ChainCheckpoint };

export interface CommonAncestor {
  height: number;
  /** Stored hash at `height`; null when the height is below the hash ledger */
  hash: string | null;
}

type ChainRef = Pick<ChainConfig, 'chainId' | 'startBlock' | 'maxReorgDepth'>;

/**
 * Decide what an offered block means relative to the checkpoint.
 * Throws GapError when heights are missing in between.
 */
export async function classifyBlock(
  store: IndexerStore,
  chain: ChainRef,
  checkpoint: ChainCheckpoint | null,
  block: FetchedBlock,
): Promise<BlockClassification> {
  if (!checkpoint) {
    if (chain.startBlock === undefined || block.number === chain.startBlock) return { kind: 'extend' };
    if (block.number < chain.startBlock) return { kind: 'duplicate' };
    throw new GapError(chain.chainId, chain.startBlock, block.number);
  }

  const last = checkpoint.lastIndexedBlock;

  if (block.number === last + 1) {
    if (checkpoint.lastBlockHash === null || block.parentHash === checkpoint.lastBlockHash) {
      return { kind: 'extend' };
    }
    return { kind: 'reorg', checkpoint };
  }

  if (block.number <= last) {
    const stored = await store.checkpoints.getBlockHash(chain.chainId, block.number);
    if (stored && stored.blockHash !== block.hash) return { kind: 'reorg', checkpoint };
    return { kind: 'duplicate' };
  }

  throw new GapError(chain.chainId, last + 1, block.number);
}

/**
 * Walk down from the offered block's parent until the stored hash agrees with
 * the canonical chain. Canonical headers below the offered block are fetched
 * from upstream and must link by parent hash.
 */
export async function findCommonAncestor(
  store: IndexerStore,
  source: BlockSource,
  chain: ChainRef,
  checkpoint: ChainCheckpoint,
  block: FetchedBlock,
): Promise<CommonAncestor> {
  const last = checkpoint.lastIndexedBlock;
  let height = Math.min(block.number - 1, last);
  let canonical = block.parentHash;

  for (;;) {
    if (height < 0 || last - height > chain.maxReorgDepth) {
      throw new DeepReorgError(chain.chainId, last, chain.maxReorgDepth);
    }

    const stored = await store.checkpoints.getBlockHash(chain.chainId, height);
    if (!stored) return { height, hash: null };
    if (stored.blockHash === canonical) return { height, hash: stored.blockHash };

    const header = await source.getBlock(height);
    if (!header || header.hash !== canonical) {
      throw new ReorgLinkageError(chain.chainId, height, canonical, header?.hash ?? null);
    }
    canonical = header.parentHash;
    height--;
  }
}
