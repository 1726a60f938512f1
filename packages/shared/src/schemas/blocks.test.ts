import { describe, it, expect } from 'vitest';
import { FetchedBlockSchema } from './blocks.js';
import { ChainsFileSchema } from './chains.js';

const HASH_A = `0x${'a'.repeat(64)}`;
const HASH_B = `0x${'b'.repeat(64)}`;
const TOKEN = `0x${'1'.repeat(40)}`;

describe('FetchedBlockSchema', () => {
  it('normalizes addresses and hashes to lowercase', () => {
    const block = FetchedBlockSchema.parse({
      number: 10,
      hash: HASH_A.toUpperCase().replace('0X', '0x'),
      parentHash: HASH_B,
      timestamp: 1_700_000_000,
      transfers: [
        {
          txHash: `0x${'C'.repeat(64)}`,
          logIndex: 0,
          tokenAddress: TOKEN,
          from: `0x${'D'.repeat(40)}`,
          to: `0x${'e'.repeat(40)}`,
          amount: '1000000',
          symbol: 'USDC',
          decimals: 6,
        },
      ],
    });

    expect(block.hash).toBe(HASH_A);
    expect(block.transfers[0]?.txHash).toBe(`0x${'c'.repeat(64)}`);
    expect(block.transfers[0]?.from).toBe(`0x${'d'.repeat(40)}`);
  });

  it('defaults transfers to an empty list', () => {
    const block = FetchedBlockSchema.parse({ number: 1, hash: HASH_A, parentHash: HASH_B, timestamp: 0 });
    expect(block.transfers).toEqual([]);
  });

  it('rejects non-integer amounts', () => {
    const result = FetchedBlockSchema.safeParse({
      number: 1,
      hash: HASH_A,
      parentHash: HASH_B,
      timestamp: 0,
      transfers: [
        {
          txHash: HASH_A,
          logIndex: 0,
          tokenAddress: TOKEN,
          from: TOKEN,
          to: TOKEN,
          amount: '1.5',
          symbol: 'USDC',
          decimals: 6,
        },
      ],
    });
    expect(result.success).toBe(false);
  });
});

describe('ChainsFileSchema', () => {
  const chain = {
    name: 'ethereum',
    chainId: 1,
    tokens: [{ symbol: 'USDC', address: TOKEN, decimals: 6 }],
  };

  it('applies defaults', () => {
    const file = ChainsFileSchema.parse({ chains: [chain] });
    expect(file.chains[0]?.maxReorgDepth).toBe(64);
    expect(file.chains[0]?.maxBlocksPerPoll).toBe(100);
    expect(file.chains[0]?.pollIntervalMs).toBe(2000);
  });

  it('requires at least one chain', () => {
    expect(ChainsFileSchema.safeParse({ chains: [] }).success).toBe(false);
  });

  it('rejects duplicate chain ids', () => {
    expect(ChainsFileSchema.safeParse({ chains: [chain, { ...chain, name: 'mainnet' }] }).success).toBe(false);
  });

  it('rejects a chain without tokens', () => {
    expect(ChainsFileSchema.safeParse({ chains: [{ ...chain, tokens: [] }] }).success).toBe(false);
  });

  it('rejects malformed token addresses', () => {
    const bad = { ...chain, tokens: [{ symbol: 'BAD', address: 'not-an-address', decimals: 6 }] };
    expect(ChainsFileSchema.safeParse({ chains: [bad] }).success).toBe(false);
  });
});
