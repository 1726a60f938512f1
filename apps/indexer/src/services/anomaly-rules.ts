import {
  CROSS_CHAIN_MIN_CHAINS,
  ROUND_NUMBER_MIN_AMOUNT,
  ROUND_NUMBER_STEPS,
  toHumanAmount,
  type AnomalyType,
} from '@tidemark/shared/constants';
import { largeTransferThreshold, type AnomalyConfig } from '../config/anomaly.js';
import type { GraphEdgeRecord, TransferRecord } from '../repositories/types.js';

/** State around a transfer that the rules read; built from the store after the transfer is absorbed */
export interface WalletContext {
  senderSanctioned: boolean;
  receiverSanctioned: boolean;
  /** This transfer created the receiver's first-seen row */
  receiverIsNew: boolean;
  /** Sender's transfers on this chain within the velocity window, this one included */
  senderRecentTransfers: number;
  /** Distinct chains the sender was active on within the cross-chain window */
  senderActiveChains: number;
  /** receiver → sender edge, if any */
  reverseEdge: GraphEdgeRecord | null;
}

export interface AnomalyFinding {
  type: AnomalyType;
  riskScore: number;
  flags: string[];
  details: Record<string, unknown>;
  address: string | null;
}

type Rule = (transfer: TransferRecord, amount: number, ctx: WalletContext, config: AnomalyConfig) => AnomalyFinding | null;

const largeTransfer: Rule = (transfer, amount, _ctx, config) => {
  const threshold = largeTransferThreshold(config, transfer.tokenSymbol);
  if (amount < threshold) return null;
  const ratio = amount / threshold;
  return {
    type: 'large_transfer',
    riskScore: ratio >= 10 ? 0.8 : ratio >= 5 ? 0.6 : 0.4,
    flags: ['large_transfer'],
    details: { amount, threshold, symbol: transfer.tokenSymbol },
    address: transfer.fromAddress,
  };
};

const velocity: Rule = (transfer, _amount, ctx, config) => {
  const max = config.velocityMaxTransfers;
  if (ctx.senderRecentTransfers <= max) return null;
  return {
    type: 'velocity',
    riskScore: ctx.senderRecentTransfers > max * 5 ? 0.7 : 0.5,
    flags: ['high_velocity'],
    details: { count: ctx.senderRecentTransfers, max, windowSecs: config.velocityWindowSecs },
    address: transfer.fromAddress,
  };
};

const sanctionedCounterparty: Rule = (transfer, _amount, ctx) => {
  if (!ctx.senderSanctioned && !ctx.receiverSanctioned) return null;
  const flags: string[] = [];
  if (ctx.senderSanctioned) flags.push('sanctioned_sender');
  if (ctx.receiverSanctioned) flags.push('sanctioned_receiver');
  return {
    type: 'sanctioned_counterparty',
    riskScore: 0.95,
    flags,
    details: { senderSanctioned: ctx.senderSanctioned, receiverSanctioned: ctx.receiverSanctioned },
    address: ctx.senderSanctioned ? transfer.fromAddress : transfer.toAddress,
  };
};

const roundNumber: Rule = (transfer, amount, _ctx, config) => {
  if (amount < ROUND_NUMBER_MIN_AMOUNT) return null;
  const tolerance = config.roundNumberTolerance;

  for (const step of ROUND_NUMBER_STEPS) {
    if (amount < step) continue;
    const fraction = (amount % step) / step;
    if (fraction < tolerance || fraction > 1 - tolerance) {
      return {
        type: 'round_number',
        riskScore: step === 100_000 ? 0.4 : step >= 10_000 ? 0.3 : 0.2,
        flags: ['round_amount'],
        details: { amount, step },
        address: transfer.fromAddress,
      };
    }
  }
  return null;
};

const newWalletLargeReceive: Rule = (transfer, amount, ctx, config) => {
  const threshold = config.newWalletThreshold;
  if (!ctx.receiverIsNew || amount < threshold) return null;
  return {
    type: 'new_wallet_large_receive',
    riskScore: amount >= threshold * 10 ? 0.8 : 0.6,
    flags: ['new_wallet'],
    details: { amount, threshold },
    address: transfer.toAddress,
  };
};

const crossChainActivity: Rule = (transfer, _amount, ctx, config) => {
  if (ctx.senderActiveChains < CROSS_CHAIN_MIN_CHAINS) return null;
  return {
    type: 'cross_chain_activity',
    riskScore: ctx.senderActiveChains >= 5 ? 0.5 : 0.3,
    flags: ['multi_chain'],
    details: { chains: ctx.senderActiveChains, windowSecs: config.crossChainWindowSecs },
    address: transfer.fromAddress,
  };
};

const roundTrip: Rule = (transfer, _amount, ctx, config) => {
  const edge = ctx.reverseEdge;
  // A self-transfer is its own reverse edge
  if (!edge || transfer.fromAddress === transfer.toAddress) return null;
  const gapSecs = Math.abs(transfer.blockTimestamp.getTime() - edge.lastSeen.getTime()) / 1000;
  if (gapSecs > config.roundTripWindowSecs) return null;
  return {
    type: 'round_trip',
    riskScore: 0.5,
    flags: ['round_trip'],
    details: { reverseCount: edge.transferCount, gapSecs },
    address: transfer.fromAddress,
  };
};

const RULES: readonly Rule[] = [
  largeTransfer,
  velocity,
  sanctionedCounterparty,
  roundNumber,
  newWalletLargeReceive,
  crossChainActivity,
  roundTrip,
];

/** Run every rule in order; each yields at most one finding */
export function evaluate(transfer: TransferRecord, ctx: WalletContext, config: AnomalyConfig): AnomalyFinding[] {
  if (!config.enabled) return [];
  const amount = toHumanAmount(transfer.amount, transfer.tokenDecimals);
  const findings: AnomalyFinding[] = [];
  for (const rule of RULES) {
    const finding = rule(transfer, amount, ctx, config);
    if (finding) findings.push(finding);
  }
  return findings;
}
