import { OFAC_LABEL_SOURCE } from '@tidemark/shared/constants';
import type { AnomalyConfig } from '../config/anomaly.js';
import type { IndexerStore, TransferRecord } from '../repositories/types.js';
import { evaluate, type AnomalyFinding, type WalletContext } from './anomaly-rules.js';
import { selectLabels } from './entity-attributor.service.js';

export class AnomalyScorer {
  constructor(private readonly config: AnomalyConfig) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  /** Evaluate the transfer against current state and upsert one row per finding */
  async score(store: IndexerStore, transfer: TransferRecord): Promise<AnomalyFinding[]> {
    if (!this.config.enabled) return [];

    const ctx = await this.buildContext(store, transfer);
    const findings = evaluate(transfer, ctx, this.config);

    for (const finding of findings) {
      await store.anomalies.upsert({
        transferId: transfer.id,
        chainId: transfer.chainId,
        anomalyType: finding.type,
        riskScore: finding.riskScore,
        flags: finding.flags,
        details: finding.details,
        address: finding.address,
      });
    }
    return findings;
  }

  async buildContext(store: IndexerStore, transfer: TransferRecord): Promise<WalletContext> {
    const at = transfer.blockTimestamp;
    const velocitySince = new Date(at.getTime() - this.config.velocityWindowSecs * 1000);
    const crossChainSince = new Date(at.getTime() - this.config.crossChainWindowSecs * 1000);

    const [senderSanctioned, receiverSanctioned, firstSeen, senderRecentTransfers, senderActiveChains, reverseEdge] =
      await Promise.all([
        this.isSanctioned(store, transfer.fromAddress, transfer.chainId),
        this.isSanctioned(store, transfer.toAddress, transfer.chainId),
        store.graph.getFirstSeen(transfer.toAddress, transfer.chainId),
        store.transfers.countSentBetween(transfer.chainId, transfer.fromAddress, velocitySince, at),
        store.transfers.countActiveChainsBetween(transfer.fromAddress, crossChainSince, at),
        store.graph.getEdge(transfer.toAddress, transfer.fromAddress, transfer.chainId),
      ]);

    const receiverIsNew =
      firstSeen !== null &&
      firstSeen.firstDirection === 'in' &&
      firstSeen.firstTxHash === transfer.txHash &&
      firstSeen.firstBlock === transfer.blockNumber;

    return { senderSanctioned, receiverSanctioned, receiverIsNew, senderRecentTransfers, senderActiveChains, reverseEdge };
  }

  /**
   * Labels follow the attributor's precedence (chain-scoped labels shadow
   * global ones); any watchlist entry sanctions the address on every chain.
   */
  private async isSanctioned(store: IndexerStore, address: string, chainId: number): Promise<boolean> {
    const labels = selectLabels(await store.attribution.labelsForAddress(address, chainId), chainId);
    if (labels.some((l) => l.entityType === 'sanctioned' || l.labelSource === OFAC_LABEL_SOURCE)) return true;
    const entries = await store.attribution.watchlistForAddress(address);
    return entries.length > 0;
  }
}
