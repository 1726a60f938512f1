import { describe, it, expect, vi } from 'vitest';
import { IndexerError } from '../lib/errors.js';
import { hash, silentLogger } from '../testing/fixtures.js';
import { HttpBlockSource, blockSourceUrls } from './block-source.js';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const block = {
  number: 12,
  hash: hash('a12'),
  parentHash: hash('a11'),
  timestamp: 1_700_000_144,
  transfers: [],
};

describe('blockSourceUrls', () => {
  it('puts the primary first and drops blanks and trailing slashes', () => {
    expect(blockSourceUrls('http://a.test/', ' http://b.test , ,http://c.test')).toEqual([
      'http://a.test',
      'http://b.test',
      'http://c.test',
    ]);
  });
});

describe('HttpBlockSource', () => {
  it('reads the head height', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json({ height: 42 }));
    const source = new HttpBlockSource({ chainId: 7, urls: ['http://a.test'], timeoutMs: 1000, fetchFn, logger: silentLogger });

    await expect(source.getLatestHeight()).resolves.toBe(42);
    expect(fetchFn.mock.calls[0]?.[0]).toBe('http://a.test/chains/7/head');
  });

  it('returns a validated block with lowercased hashes', async () => {
    const upper = { ...block, hash: block.hash.toUpperCase().replace('0X', '0x') };
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json(upper));
    const source = new HttpBlockSource({ chainId: 7, urls: ['http://a.test'], timeoutMs: 1000, fetchFn, logger: silentLogger });

    const result = await source.getBlock(12);
    expect(result?.hash).toBe(block.hash);
    expect(result?.transfers).toEqual([]);
  });

  it('returns null when the height is not available yet', async () => {
    const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(json({ error: 'not found' }, 404));
    const source = new HttpBlockSource({ chainId: 7, urls: ['http://a.test'], timeoutMs: 1000, fetchFn, logger: silentLogger });

    await expect(source.getBlock(99)).resolves.toBeNull();
  });

  it('fails over on 5xx and on network errors', async () => {
    const fetchFn = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(json({}, 503))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(json(block));
    const source = new HttpBlockSource({
      chainId: 7,
      urls: ['http://a.test', 'http://b.test', 'http://c.test'],
      timeoutMs: 1000,
      fetchFn,
      logger: silentLogger,
    });

    const result = await source.getBlock(12);
    expect(result?.number).toBe(12);
    expect(fetchFn.mock.calls.map((call) => call[0])).toEqual([
      'http://a.test/chains/7/blocks/12',
      'http://b.test/chains/7/blocks/12',
      'http://c.test/chains/7/blocks/12',
    ]);
  });

  it('rejects blocks that fail validation or answer a different height', async () => {
    const bad = vi.fn<typeof fetch>().mockResolvedValue(json({ ...block, hash: 'nope' }));
    const wrong = vi.fn<typeof fetch>().mockResolvedValue(json({ ...block, number: 13 }));

    await expect(
      new HttpBlockSource({ chainId: 7, urls: ['http://a.test'], timeoutMs: 1000, fetchFn: bad, logger: silentLogger }).getBlock(12),
    ).rejects.toMatchObject({ code: 'UPSTREAM_INVALID' });
    await expect(
      new HttpBlockSource({ chainId: 7, urls: ['http://a.test'], timeoutMs: 1000, fetchFn: wrong, logger: silentLogger }).getBlock(12),
    ).rejects.toBeInstanceOf(IndexerError);
  });
});
