import { describe, it, expect } from 'vitest';
import {
  IndexerError,
  GapError,
  DeepReorgError,
  TransientStoreError,
  ChainBusyError,
  classifyStoreError,
  errorKind,
} from './errors.js';

describe('IndexerError', () => {
  it('carries code, message and details', () => {
    const err = new IndexerError('TEST_CODE', 'test message', { foo: 'bar' });
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('TEST_CODE');
    expect(err.message).toBe('test message');
    expect(err.details).toEqual({ foo: 'bar' });
    expect(err.name).toBe('IndexerError');
    expect(err.halts).toBe(false);
  });
});

describe('halting errors', () => {
  it('GapError reports expected and received heights', () => {
    const err = new GapError(1, 11, 15);
    expect(err.code).toBe('GAP');
    expect(err.message).toBe('Chain 1: expected block 11, received 15');
    expect(err.details).toEqual({ chainId: 1, expected: 11, received: 15 });
    expect(err.halts).toBe(true);
    expect(err).toBeInstanceOf(IndexerError);
  });

  it('DeepReorgError halts the chain', () => {
    const err = new DeepReorgError(137, 500, 64);
    expect(err.code).toBe('DEEP_REORG');
    expect(err.message).toBe('Chain 137: no common ancestor within 64 blocks of 500');
    expect(err.halts).toBe(true);
  });

  it('ChainBusyError does not halt', () => {
    expect(new ChainBusyError(1).halts).toBe(false);
  });
});

describe('classifyStoreError', () => {
  it('wraps connection failures as transient', () => {
    const raw = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' });
    const classified = classifyStoreError(raw);
    expect(classified).toBeInstanceOf(TransientStoreError);
    expect(classified).toHaveProperty('cause', raw);
  });

  it('wraps serialization failures found on the cause', () => {
    const raw = new Error('transaction failed', { cause: { code: '40001' } });
    expect(classifyStoreError(raw)).toBeInstanceOf(TransientStoreError);
  });

  it('leaves constraint violations untouched', () => {
    const raw = Object.assign(new Error('duplicate key'), { code: '23505' });
    expect(classifyStoreError(raw)).toBe(raw);
  });

  it('leaves indexer errors untouched', () => {
    const gap = new GapError(1, 2, 3);
    expect(classifyStoreError(gap)).toBe(gap);
  });
});

describe('errorKind', () => {
  it('uses the error class name', () => {
    expect(errorKind(new DeepReorgError(1, 10, 2))).toBe('DeepReorgError');
    expect(errorKind(new TypeError('x'))).toBe('TypeError');
    expect(errorKind('boom')).toBe('UnknownError');
  });
});
