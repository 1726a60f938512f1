// ---- Anomaly detection ----

export const ANOMALY_TYPES = [
  'large_transfer',
  'velocity',
  'sanctioned_counterparty',
  'round_number',
  'new_wallet_large_receive',
  'cross_chain_activity',
  'round_trip',
] as const;

export type AnomalyType = (typeof ANOMALY_TYPES)[number];

/** Round amounts (human units) checked by the round-number rule, largest first */
export const ROUND_NUMBER_STEPS = [100_000, 50_000, 25_000, 10_000, 5_000, 1_000] as const;

/** Amounts below this (human units) are never flagged as round */
export const ROUND_NUMBER_MIN_AMOUNT = 1_000;

/** Distinct chains within the window before cross-chain activity is flagged */
export const CROSS_CHAIN_MIN_CHAINS = 3;

// ---- Wallet graph ----

/** Direction of the transfer that first revealed an address */
export const FIRST_SEEN_DIRECTIONS = ['in', 'out'] as const;
export type FirstSeenDirection = (typeof FIRST_SEEN_DIRECTIONS)[number];

// ---- Attribution ----

export const FLAG_SIDES = ['from', 'to'] as const;
export type FlagSide = (typeof FLAG_SIDES)[number];

export const ONRAMP_DIRECTIONS = ['deposit', 'withdrawal'] as const;
export type OnrampDirection = (typeof ONRAMP_DIRECTIONS)[number];

export const ENTITY_TYPES = ['exchange', 'company', 'individual', 'contract', 'mixer', 'sanctioned', 'unknown'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const PROVIDER_TYPES = ['exchange', 'onramp', 'p2p'] as const;
export type ProviderType = (typeof PROVIDER_TYPES)[number];

/** Label source written for watchlist entries loaded from the OFAC SDN list */
export const OFAC_LABEL_SOURCE = 'ofac_sdn';

// ---- Chain health ----

export const CHAIN_STATUSES = ['starting', 'healthy', 'degraded', 'halted'] as const;
export type ChainStatus = (typeof CHAIN_STATUSES)[number];

// ---- Amounts ----

/**
 * Convert a raw integer token amount to human units.
 * Precision is that of a double, which is enough for threshold checks.
 */
export function toHumanAmount(raw: string | bigint, decimals: number): number {
  const value = typeof raw === 'bigint' ? raw : BigInt(raw);
  const scale = 10n ** BigInt(decimals);
  const whole = value / scale;
  const fraction = value % scale;
  return Number(whole) + Number(fraction) / 10 ** decimals;
}

/** Sum raw integer amounts without losing precision */
export function addAmounts(a: string, b: string): string {
  return (BigInt(a) + BigInt(b)).toString();
}
