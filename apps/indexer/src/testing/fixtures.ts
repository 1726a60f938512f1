import { createHash } from 'node:crypto';
import pino from 'pino';
import type { ChainConfig, FetchedBlock, FetchedTransfer } from '@tidemark/shared';
import type { AnomalyConfig } from '../config/anomaly.js';
import type { BlockSource } from '../services/block-source.js';

export const silentLogger = pino({ level: 'silent' });

/** Deterministic 32-byte hex from a short tag, e.g. hash('a1') */
export function hash(tag: string): string {
  return `0x${createHash('sha256').update(tag).digest('hex')}`;
}

/** Deterministic 20-byte hex address from a short tag */
export function address(tag: string): string {
  return `0x${createHash('sha256').update(`addr:${tag}`).digest('hex').slice(0, 40)}`;
}

export const USDC = address('usdc');

export function makeChain(overrides: Partial<ChainConfig> = {}): ChainConfig {
  return {
    name: 'testnet',
    chainId: 1,
    pollIntervalMs: 1000,
    maxBlocksPerPoll: 100,
    maxReorgDepth: 64,
    tokens: [{ symbol: 'USDC', address: USDC, decimals: 6 }],
    ...overrides,
  };
}

export function makeAnomalyConfig(overrides: Partial<AnomalyConfig> = {}): AnomalyConfig {
  return {
    enabled: true,
    largeTransferThresholds: new Map(),
    defaultLargeTransferThreshold: 100_000,
    velocityWindowSecs: 3600,
    velocityMaxTransfers: 20,
    roundNumberTolerance: 0.001,
    newWalletThreshold: 10_000,
    crossChainWindowSecs: 3600,
    roundTripWindowSecs: 86_400,
    ...overrides,
  };
}

/** USDC amount in raw units (6 decimals) */
export function usdc(human: number): string {
  return (BigInt(Math.round(human * 100)) * 10_000n).toString();
}

export function makeTransfer(overrides: Partial<FetchedTransfer> & Pick<FetchedTransfer, 'from' | 'to'>): FetchedTransfer {
  return {
    txHash: hash(`tx-${overrides.from}-${overrides.to}-${overrides.logIndex ?? 0}`),
    logIndex: 0,
    tokenAddress: USDC,
    amount: usdc(1),
    symbol: 'USDC',
    decimals: 6,
    ...overrides,
  };
}

/**
 * Block on branch `branch` at `number`, whose parent is `parentBranch`'s block
 * at `number - 1`. Timestamps advance 12s per height from a fixed epoch.
 */
export function makeBlock(
  number: number,
  options: { branch?: string; parentBranch?: string; transfers?: FetchedTransfer[]; timestamp?: number } = {},
): FetchedBlock {
  const branch = options.branch ?? 'a';
  const parentBranch = options.parentBranch ?? branch;
  return {
    number,
    hash: hash(`${branch}${number}`),
    parentHash: hash(`${parentBranch}${number - 1}`),
    timestamp: options.timestamp ?? 1_700_000_000 + number * 12,
    transfers: options.transfers ?? [],
  };
}

/** In-memory upstream: a map of canonical blocks plus a head height */
export class FakeBlockSource implements BlockSource {
  readonly blocks = new Map<number, FetchedBlock>();
  head = 0;
  fetches = 0;

  constructor(blocks: FetchedBlock[] = []) {
    for (const block of blocks) this.put(block);
  }

  put(block: FetchedBlock): void {
    this.blocks.set(block.number, block);
    this.head = Math.max(this.head, block.number);
  }

  async getLatestHeight(): Promise<number> {
    return this.head;
  }

  async getBlock(height: number): Promise<FetchedBlock | null> {
    this.fetches++;
    return this.blocks.get(height) ?? null;
  }
}
