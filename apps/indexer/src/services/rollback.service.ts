import type { IndexerStore } from '../repositories/types.js';
import { graphAggregator, type AddressPair, type GraphAggregator } from './graph-aggregator.service.js';
import type { CommonAncestor } from './reorg-detector.js';

export interface RollbackResult {
  ancestor: number;
  transfersRemoved: number;
  blocksRemoved: number;
  anomaliesRemoved: number;
  edgesRebuilt: number;
  addressesRebuilt: number;
}

/**
 * Unwind a chain to `ancestor`. Must run inside a store transaction: either
 * the whole rollback lands or nothing does.
 *
 * Order matters: derived rows that reference transfers go first, then the
 * transfers, then the hash ledger; aggregates are re-derived from what is
 * left and the checkpoint moves last.
 */
export class RollbackService {
  constructor(private readonly graph: GraphAggregator = graphAggregator) {}

  async rollback(tx: IndexerStore, chainId: number, ancestor: CommonAncestor): Promise<RollbackResult> {
    const doomed = await tx.transfers.listAbove(chainId, ancestor.height);
    const ids = doomed.map((t) => t.id);

    const pairs = new Map<string, AddressPair>();
    const addresses = new Set<string>();
    for (const t of doomed) {
      pairs.set(`${t.fromAddress}>${t.toAddress}`, { source: t.fromAddress, dest: t.toAddress });
      addresses.add(t.fromAddress);
      addresses.add(t.toAddress);
    }

    const anomaliesRemoved = await tx.anomalies.deleteForTransfers(ids);
    await tx.attribution.deleteFlagsForTransfers(ids);
    await tx.attribution.deleteOnrampForTransfers(ids);
    const transfersRemoved = await tx.transfers.deleteByIds(ids);
    const blocksRemoved = await tx.checkpoints.deleteBlockHashesAbove(chainId, ancestor.height);

    const edgesRebuilt = await this.graph.rebuildPairs(tx, chainId, pairs.values());
    const addressesRebuilt = await this.graph.rebuildAddresses(tx, chainId, addresses);

    await tx.checkpoints.save(chainId, ancestor.height, ancestor.hash);

    return { ancestor: ancestor.height, transfersRemoved, blocksRemoved, anomaliesRemoved, edgesRebuilt, addressesRebuilt };
  }
}
