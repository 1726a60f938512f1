import { describe, it, expect, vi } from 'vitest';
import type { ChainConfig } from '@tidemark/shared';
import { DeepReorgError, GapError, ReorgLinkageError } from '../lib/errors.js';
import { MemoryIndexerStore } from '../testing/memory-store.js';
import {
  FakeBlockSource,
  address,
  hash,
  makeAnomalyConfig,
  makeBlock,
  makeChain,
  makeTransfer,
  silentLogger,
  usdc,
} from '../testing/fixtures.js';
import { AnomalyScorer } from './anomaly-scorer.service.js';
import { BlockIngestor } from './block-ingestor.js';

const A = address('alice');
const B = address('bob');
const C = address('carol');
const D = address('dave');

function setup(overrides: Partial<ChainConfig> = {}) {
  const store = new MemoryIndexerStore();
  const source = new FakeBlockSource();
  const chain = makeChain(overrides);
  const ingestor = new BlockIngestor({
    chain,
    store,
    source,
    scorer: new AnomalyScorer(makeAnomalyConfig()),
    retry: { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    logger: silentLogger,
  });
  return { store, source, chain, ingestor };
}

const at = (height: number) => new Date((1_700_000_000 + height * 12) * 1000);

/** Every stored edge equals the aggregate over the transfers that remain */
async function expectEdgesConsistent(store: MemoryIndexerStore) {
  for (const edge of store.state.edges.values()) {
    const aggregate = await store.transfers.aggregatePair(edge.chainId, edge.sourceAddress, edge.destAddress);
    expect(aggregate).toEqual({
      transferCount: edge.transferCount,
      totalAmount: edge.totalAmount,
      firstSeen: edge.firstSeen,
      lastSeen: edge.lastSeen,
    });
  }
}

describe('BlockIngestor.advance: linear extension', () => {
  it('records transfers, writes the hash ledger and moves the checkpoint', async () => {
    const { store, ingestor } = setup();
    const b10 = makeBlock(10, { transfers: [makeTransfer({ from: A, to: B, amount: usdc(100), txHash: hash('t1') })] });
    const b11 = makeBlock(11, { transfers: [makeTransfer({ from: A, to: B, amount: usdc(50), txHash: hash('t2') })] });

    expect(await ingestor.advance(b10)).toEqual({ kind: 'extended', height: 10, transfers: 1, inserted: 1, anomalies: 0 });
    expect(await ingestor.advance(b11)).toEqual({ kind: 'extended', height: 11, transfers: 1, inserted: 1, anomalies: 0 });

    const checkpoint = await store.checkpoints.get(1);
    expect(checkpoint?.lastIndexedBlock).toBe(11);
    expect(checkpoint?.lastBlockHash).toBe(hash('a11'));
    expect(await store.checkpoints.getBlockHash(1, 10)).toEqual({
      chainId: 1,
      blockNumber: 10,
      blockHash: hash('a10'),
      parentHash: hash('a9'),
    });

    const edge = await store.graph.getEdge(A, B, 1);
    expect(edge).toEqual({
      sourceAddress: A,
      destAddress: B,
      chainId: 1,
      transferCount: 2,
      totalAmount: '150000000',
      firstSeen: at(10),
      lastSeen: at(11),
    });
    expect(store.transactionCount).toBe(2);
  });

  it('applies transfers in log-index order', async () => {
    const { store, ingestor } = setup();
    await ingestor.advance(
      makeBlock(10, {
        transfers: [
          makeTransfer({ from: B, to: A, logIndex: 2, txHash: hash('t1') }),
          makeTransfer({ from: A, to: B, logIndex: 0, txHash: hash('t1') }),
        ],
      }),
    );

    expect((await store.graph.getFirstSeen(A, 1))?.firstDirection).toBe('out');
    expect((await store.graph.getFirstSeen(B, 1))?.firstDirection).toBe('in');
    expect(store.state.transfers.map((t) => t.logIndex)).toEqual([0, 2]);
  });

  it('treats a replayed block as a no-op', async () => {
    const { store, ingestor } = setup();
    const b10 = makeBlock(10, { transfers: [makeTransfer({ from: A, to: B, amount: usdc(100), txHash: hash('t1') })] });
    await ingestor.advance(b10);
    const before = store.snapshot();

    expect(await ingestor.advance(b10)).toEqual({ kind: 'duplicate', height: 10 });
    expect(store.snapshot()).toEqual(before);
  });

  it('raises GapError when heights are skipped', async () => {
    const { store, ingestor } = setup();
    await ingestor.advance(makeBlock(10));

    const err = await ingestor.advance(makeBlock(12)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GapError);
    expect(err).toMatchObject({ chainId: 1, expected: 11, received: 12 });
    expect((await store.checkpoints.get(1))?.lastIndexedBlock).toBe(10);
  });

  it('honours the configured start block before any checkpoint exists', async () => {
    const { store, ingestor } = setup({ startBlock: 10 });

    expect(await ingestor.advance(makeBlock(9))).toEqual({ kind: 'duplicate', height: 9 });
    await expect(ingestor.advance(makeBlock(11))).rejects.toBeInstanceOf(GapError);
    expect(await store.checkpoints.get(1)).toBeNull();

    expect((await ingestor.advance(makeBlock(10))).kind).toBe('extended');
  });

  it('retries a transient store failure and commits the block once', async () => {
    const { store, ingestor } = setup();
    const insert = vi
      .spyOn(store.transfers, 'insert')
      .mockRejectedValueOnce(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));

    const outcome = await ingestor.advance(
      makeBlock(10, { transfers: [makeTransfer({ from: A, to: B, txHash: hash('t1') })] }),
    );

    expect(outcome.kind).toBe('extended');
    expect(insert).toHaveBeenCalledTimes(2);
    expect(store.state.transfers).toHaveLength(1);
    expect((await store.checkpoints.get(1))?.lastIndexedBlock).toBe(10);
  });
});

describe('BlockIngestor.advance: reorgs', () => {
  async function indexA10toA12() {
    const ctx = setup();
    const { store, ingestor } = ctx;

    const providerId = await store.registry.upsertProvider({
      name: 'Example Exchange',
      providerType: 'exchange',
      website: null,
      kycRequired: true,
    });
    await store.registry.upsertProviderWallet({ providerId, chainId: 1, address: C, label: null });
    await store.registry.upsertLabel({
      address: C,
      chainId: null,
      entityName: 'Example Exchange',
      entityType: 'exchange',
      labelSource: 'config',
      confidence: 1,
      metadata: null,
    });

    await ingestor.advance(makeBlock(10, { transfers: [makeTransfer({ from: A, to: B, amount: usdc(100), txHash: hash('t1') })] }));
    await ingestor.advance(makeBlock(11, { transfers: [makeTransfer({ from: A, to: B, amount: usdc(50), txHash: hash('t2') })] }));
    await ingestor.advance(makeBlock(12, { transfers: [makeTransfer({ from: B, to: C, amount: usdc(200_000), txHash: hash('t3') })] }));
    return ctx;
  }

  it('rolls back to the common ancestor and re-derives aggregates', async () => {
    const { store, ingestor } = await indexA10toA12();
    expect(store.state.anomalies.map((a) => a.anomalyType)).toEqual([
      'large_transfer',
      'round_number',
      'new_wallet_large_receive',
    ]);
    expect(store.state.flags).toHaveLength(1);
    // ids come from one sequence: provider 1, wallet 2, label 3, transfers 4..6
    expect(store.state.onramp).toEqual([{ transferId: 6, providerId: 1, direction: 'deposit' }]);

    const b12 = makeBlock(12, {
      branch: 'b',
      parentBranch: 'a',
      transfers: [makeTransfer({ from: B, to: D, amount: usdc(20), txHash: hash('t4') })],
    });

    const outcome = await ingestor.advance(b12);
    expect(outcome).toMatchObject({ kind: 'rolled_back', ancestor: 11 });
    expect(outcome.kind === 'rolled_back' && outcome.rollback).toMatchObject({
      transfersRemoved: 1,
      blocksRemoved: 1,
      anomaliesRemoved: 3,
      edgesRebuilt: 1,
      addressesRebuilt: 2,
    });

    const checkpoint = await store.checkpoints.get(1);
    expect(checkpoint?.lastIndexedBlock).toBe(11);
    expect(checkpoint?.lastBlockHash).toBe(hash('a11'));
    expect(store.state.anomalies).toEqual([]);
    expect(store.state.flags).toEqual([]);
    expect(store.state.onramp).toEqual([]);
    expect(await store.graph.getEdge(B, C, 1)).toBeNull();
    expect(await store.graph.getFirstSeen(C, 1)).toBeNull();
    expect((await store.graph.getFirstSeen(B, 1))?.firstBlock).toBe(10);

    // the caller re-offers the canonical block
    expect((await ingestor.advance(b12)).kind).toBe('extended');

    expect((await store.checkpoints.get(1))?.lastBlockHash).toBe(hash('b12'));
    expect((await store.checkpoints.getBlockHash(1, 12))?.blockHash).toBe(hash('b12'));
    expect(store.state.transfers.map((t) => [t.blockNumber, t.fromAddress, t.toAddress])).toEqual([
      [10, A, B],
      [11, A, B],
      [12, B, D],
    ]);
    expect((await store.graph.getEdge(A, B, 1))?.transferCount).toBe(2);
    expect((await store.graph.getEdge(A, B, 1))?.totalAmount).toBe('150000000');
    expect((await store.graph.getEdge(B, D, 1))?.transferCount).toBe(1);
    expect((await store.graph.getFirstSeen(D, 1))?.firstBlock).toBe(12);
    await expectEdgesConsistent(store);
  });

  it('walks back through upstream headers when the fork is deeper than one block', async () => {
    const { store, source, ingestor } = await indexA10toA12();
    source.put(makeBlock(11, { branch: 'b', parentBranch: 'a' }));
    source.put(makeBlock(12, { branch: 'b' }));

    const outcome = await ingestor.advance(makeBlock(13, { branch: 'b' }));

    expect(outcome).toMatchObject({ kind: 'rolled_back', ancestor: 10 });
    expect((await store.checkpoints.get(1))?.lastBlockHash).toBe(hash('a10'));
    expect(store.state.transfers.map((t) => t.blockNumber)).toEqual([10]);
    expect(await store.graph.getEdge(A, B, 1)).toMatchObject({ transferCount: 1, totalAmount: '100000000', lastSeen: at(10) });
    await expectEdgesConsistent(store);
  });

  it('detects a reorg from a mismatching hash at an already indexed height', async () => {
    const { store, ingestor } = await indexA10toA12();

    const outcome = await ingestor.advance(makeBlock(11, { branch: 'b', parentBranch: 'a' }));

    expect(outcome).toMatchObject({ kind: 'rolled_back', ancestor: 10 });
    expect((await store.checkpoints.get(1))?.lastIndexedBlock).toBe(10);
  });

  it('refuses a reorg deeper than the configured depth and writes nothing', async () => {
    const ctx = setup({ maxReorgDepth: 2 });
    for (let n = 10; n <= 14; n++) await ctx.ingestor.advance(makeBlock(n));
    for (let n = 11; n <= 14; n++) ctx.source.put(makeBlock(n, { branch: 'b' }));
    const before = ctx.store.snapshot();

    const err = await ctx.ingestor.advance(makeBlock(15, { branch: 'b' })).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DeepReorgError);
    expect(err).toMatchObject({ chainId: 1, checkpointHeight: 14, maxDepth: 2 });
    expect(ctx.store.snapshot()).toEqual(before);
  });

  it('rejects upstream headers that do not link by parent hash', async () => {
    const ctx = setup();
    for (let n = 10; n <= 12; n++) await ctx.ingestor.advance(makeBlock(n));
    // upstream answers height 12 with a header from yet another fork
    ctx.source.put(makeBlock(12, { branch: 'c' }));
    const before = ctx.store.snapshot();

    await expect(ctx.ingestor.advance(makeBlock(13, { branch: 'b' }))).rejects.toBeInstanceOf(ReorgLinkageError);
    expect(ctx.store.snapshot()).toEqual(before);
  });

  it('takes a height below the hash ledger as the ancestor', async () => {
    const ctx = setup({ startBlock: 10 });
    await ctx.ingestor.advance(makeBlock(10, { transfers: [makeTransfer({ from: A, to: B, txHash: hash('t1') })] }));
    await ctx.ingestor.advance(makeBlock(11));
    ctx.source.put(makeBlock(10, { branch: 'b' }));

    const outcome = await ctx.ingestor.advance(makeBlock(11, { branch: 'b' }));

    expect(outcome).toMatchObject({ kind: 'rolled_back', ancestor: 9 });
    expect(await ctx.store.checkpoints.get(1)).toMatchObject({ lastIndexedBlock: 9, lastBlockHash: null });
    expect(ctx.store.state.transfers).toEqual([]);
    expect(ctx.store.state.edges.size).toBe(0);
    expect(ctx.store.state.firstSeen.size).toBe(0);

    expect((await ctx.ingestor.advance(makeBlock(10, { branch: 'b' }))).kind).toBe('extended');
  });

  it('leaves state untouched when the rollback transaction fails', async () => {
    const { store, ingestor } = await indexA10toA12();
    const before = store.snapshot();
    vi.spyOn(store.graph, 'deleteEdge').mockRejectedValueOnce(new Error('constraint violation'));

    await expect(ingestor.advance(makeBlock(12, { branch: 'b', parentBranch: 'a' }))).rejects.toThrow('constraint violation');
    expect(store.snapshot()).toEqual(before);
  });
});
