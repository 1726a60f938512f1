export * from './chain-checkpoints.js';
export * from './known-tokens.js';
export * from './transfers.js';
export * from './wallets.js';
export * from './anomalies.js';
export * from './entity-attribution.js';
export * from './onramp.js';
