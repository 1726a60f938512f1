import type { FetchedBlock, FetchedTransfer } from '@tidemark/shared';
import type { IndexerStore, NewTransfer, TransferRecord } from '../repositories/types.js';

export interface RecordResult {
  transfer: TransferRecord;
  /** False when (chain, tx, log index) was already stored */
  inserted: boolean;
}

/** Flatten an upstream transfer into the row shape, stamped with its block */
export function toNewTransfer(chainId: number, block: FetchedBlock, transfer: FetchedTransfer): NewTransfer {
  return {
    chainId,
    blockNumber: block.number,
    blockHash: block.hash,
    txHash: transfer.txHash,
    logIndex: transfer.logIndex,
    tokenAddress: transfer.tokenAddress,
    fromAddress: transfer.from,
    toAddress: transfer.to,
    amount: transfer.amount,
    tokenSymbol: transfer.symbol,
    tokenDecimals: transfer.decimals,
    blockTimestamp: new Date(block.timestamp * 1000),
  };
}

export class TransferRecorder {
  async record(store: IndexerStore, transfer: NewTransfer): Promise<RecordResult> {
    const { id, inserted } = await store.transfers.insert(transfer);
    return { transfer: { ...transfer, id }, inserted };
  }
}

export const transferRecorder = new TransferRecorder();
