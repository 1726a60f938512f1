import { describe, it, expect } from 'vitest';
import { IndexerError } from '../lib/errors.js';
import { largeTransferThreshold, parseThresholds, type AnomalyConfig } from './anomaly.js';

describe('parseThresholds', () => {
  it('reads symbol pairs and the default', () => {
    const { thresholds, fallback } = parseThresholds('usdt:1000000, DAI:250000,default:50000');
    expect(thresholds.get('USDT')).toBe(1_000_000);
    expect(thresholds.get('DAI')).toBe(250_000);
    expect(fallback).toBe(50_000);
  });

  it('falls back to 100000 when no default is given', () => {
    expect(parseThresholds('USDC:5000').fallback).toBe(100_000);
    expect(parseThresholds('').thresholds.size).toBe(0);
  });

  it('rejects malformed pairs', () => {
    expect(() => parseThresholds('USDT')).toThrow(IndexerError);
    expect(() => parseThresholds('USDT:abc')).toThrow(IndexerError);
    expect(() => parseThresholds('USDT:-5')).toThrow(IndexerError);
    expect(() => parseThresholds(':100')).toThrow(IndexerError);
  });
});

describe('largeTransferThreshold', () => {
  it('matches symbols case-insensitively and falls back to the default', () => {
    const { thresholds, fallback } = parseThresholds('USDT:1000000,default:100000');
    const config: AnomalyConfig = {
      enabled: true,
      largeTransferThresholds: thresholds,
      defaultLargeTransferThreshold: fallback,
      velocityWindowSecs: 3600,
      velocityMaxTransfers: 20,
      roundNumberTolerance: 0.001,
      newWalletThreshold: 10_000,
      crossChainWindowSecs: 3600,
      roundTripWindowSecs: 86_400,
    };
    expect(largeTransferThreshold(config, 'usdt')).toBe(1_000_000);
    expect(largeTransferThreshold(config, 'DAI')).toBe(100_000);
  });
});
