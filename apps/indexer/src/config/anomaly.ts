import { IndexerError } from '../lib/errors.js';
import type { Env } from './env.js';

export interface AnomalyConfig {
  enabled: boolean;
  /** Upper-cased token symbol → threshold in human units */
  largeTransferThresholds: Map<string, number>;
  defaultLargeTransferThreshold: number;
  velocityWindowSecs: number;
  velocityMaxTransfers: number;
  roundNumberTolerance: number;
  newWalletThreshold: number;
  crossChainWindowSecs: number;
  roundTripWindowSecs: number;
}

const DEFAULT_LARGE_TRANSFER_THRESHOLD = 100_000;

/**
 * Parse `SYMBOL:amount` pairs, e.g. `USDT:1000000,DAI:250000,default:100000`.
 * Symbols are matched case-insensitively.
 */
export function parseThresholds(raw: string): { thresholds: Map<string, number>; fallback: number } {
  const thresholds = new Map<string, number>();
  let fallback = DEFAULT_LARGE_TRANSFER_THRESHOLD;

  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const sep = trimmed.lastIndexOf(':');
    const symbol = sep > 0 ? trimmed.slice(0, sep).trim() : '';
    const amount = Number(trimmed.slice(sep + 1));
    if (!symbol || !Number.isFinite(amount) || amount <= 0) {
      throw new IndexerError('CONFIG_INVALID', `Invalid large-transfer threshold "${trimmed}"`, { value: raw });
    }

    if (symbol.toLowerCase() === 'default') fallback = amount;
    else thresholds.set(symbol.toUpperCase(), amount);
  }

  return { thresholds, fallback };
}

export function anomalyConfigFromEnv(source: Env): AnomalyConfig {
  const { thresholds, fallback } = parseThresholds(source.LARGE_TRANSFER_THRESHOLDS);
  return {
    enabled: source.ANOMALY_DETECTION_ENABLED === 'true',
    largeTransferThresholds: thresholds,
    defaultLargeTransferThreshold: fallback,
    velocityWindowSecs: source.VELOCITY_WINDOW_SECS,
    velocityMaxTransfers: source.VELOCITY_MAX_TRANSFERS,
    roundNumberTolerance: source.ROUND_NUMBER_TOLERANCE,
    newWalletThreshold: source.NEW_WALLET_THRESHOLD,
    crossChainWindowSecs: source.CROSS_CHAIN_WINDOW_SECS,
    roundTripWindowSecs: source.ROUND_TRIP_WINDOW_SECS,
  };
}

export function largeTransferThreshold(config: AnomalyConfig, symbol: string): number {
  return config.largeTransferThresholds.get(symbol.toUpperCase()) ?? config.defaultLargeTransferThreshold;
}
