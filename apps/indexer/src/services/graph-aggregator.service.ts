import type { IndexerStore, TransferRecord } from '../repositories/types.js';

export interface AddressPair {
  source: string;
  dest: string;
}

/**
 * Incremental wallet graph: first-seen rows and per-pair edges.
 *
 * `absorb` is the hot path and only ever widens aggregates. Rollback cannot
 * subtract safely (first/last seen are not invertible), so it re-derives the
 * touched rows from the transfers that remain.
 */
export class GraphAggregator {
  async absorb(store: IndexerStore, transfer: TransferRecord): Promise<void> {
    const { chainId, blockNumber, txHash, blockTimestamp } = transfer;

    await store.graph.insertFirstSeenIfAbsent({
      address: transfer.fromAddress,
      chainId,
      firstSeenAt: blockTimestamp,
      firstBlock: blockNumber,
      firstTxHash: txHash,
      firstDirection: 'out',
    });
    await store.graph.insertFirstSeenIfAbsent({
      address: transfer.toAddress,
      chainId,
      firstSeenAt: blockTimestamp,
      firstBlock: blockNumber,
      firstTxHash: txHash,
      firstDirection: 'in',
    });

    await store.graph.incrementEdge({
      sourceAddress: transfer.fromAddress,
      destAddress: transfer.toAddress,
      chainId,
      amount: transfer.amount,
      at: blockTimestamp,
    });
  }

  /** Recompute each pair's edge from current transfers; drop edges with none left */
  async rebuildPairs(store: IndexerStore, chainId: number, pairs: Iterable<AddressPair>): Promise<number> {
    let rebuilt = 0;
    for (const { source, dest } of pairs) {
      const aggregate = await store.transfers.aggregatePair(chainId, source, dest);
      if (aggregate) {
        await store.graph.putEdge({ sourceAddress: source, destAddress: dest, chainId, ...aggregate });
      } else {
        await store.graph.deleteEdge(source, dest, chainId);
      }
      rebuilt++;
    }
    return rebuilt;
  }

  /** Recompute first-seen rows from each address's earliest remaining transfer */
  async rebuildAddresses(store: IndexerStore, chainId: number, addresses: Iterable<string>): Promise<number> {
    let rebuilt = 0;
    for (const address of addresses) {
      const earliest = await store.transfers.earliestForAddress(chainId, address);
      if (earliest) {
        await store.graph.putFirstSeen({
          address,
          chainId,
          firstSeenAt: earliest.blockTimestamp,
          firstBlock: earliest.blockNumber,
          firstTxHash: earliest.txHash,
          // absorb writes the sender's row first, so a self-transfer reads as 'out'
          firstDirection: earliest.fromAddress === address ? 'out' : 'in',
        });
      } else {
        await store.graph.deleteFirstSeen(address, chainId);
      }
      rebuilt++;
    }
    return rebuilt;
  }
}

export const graphAggregator = new GraphAggregator();
