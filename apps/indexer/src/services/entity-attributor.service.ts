import type { FlagSide, OnrampDirection } from '@tidemark/shared/constants';
import { logger as rootLogger, type Logger } from '../lib/logger.js';
import type { EntityLabelRecord, IndexerStore, TransferRecord } from '../repositories/types.js';

export type OnrampOutcome =
  | { kind: 'none' }
  | { kind: 'attributed'; providerId: number; providerName: string; direction: OnrampDirection; inserted: boolean }
  /** Both sides are provider wallets; nothing is stored */
  | { kind: 'ambiguous'; fromProvider: string; toProvider: string };

export interface AttributionResult {
  flags: number;
  onramp: OnrampOutcome;
}

/** Chain-scoped labels shadow global ones for the same address */
export function selectLabels(labels: EntityLabelRecord[], chainId: number): EntityLabelRecord[] {
  const scoped = labels.filter((l) => l.chainId === chainId);
  return scoped.length > 0 ? scoped : labels.filter((l) => l.chainId === null);
}

export class EntityAttributor {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? rootLogger;
  }

  async attribute(store: IndexerStore, transfer: TransferRecord): Promise<AttributionResult> {
    const sides: Array<[FlagSide, string]> = [
      ['from', transfer.fromAddress],
      ['to', transfer.toAddress],
    ];

    let flags = 0;
    for (const [side, address] of sides) {
      const labels = selectLabels(await store.attribution.labelsForAddress(address, transfer.chainId), transfer.chainId);
      for (const label of labels) {
        await store.attribution.upsertFlag({ transferId: transfer.id, entityLabelId: label.id, side });
        flags++;
      }
    }

    return { flags, onramp: await this.attributeOnramp(store, transfer) };
  }

  private async attributeOnramp(store: IndexerStore, transfer: TransferRecord): Promise<OnrampOutcome> {
    const [fromWallet, toWallet] = await Promise.all([
      store.attribution.providerWallet(transfer.chainId, transfer.fromAddress),
      store.attribution.providerWallet(transfer.chainId, transfer.toAddress),
    ]);

    if (fromWallet && toWallet) {
      this.log.warn(
        {
          chainId: transfer.chainId,
          txHash: transfer.txHash,
          logIndex: transfer.logIndex,
          fromProvider: fromWallet.providerName,
          toProvider: toWallet.providerName,
        },
        'Ambiguous on-ramp match, skipping attribution',
      );
      return { kind: 'ambiguous', fromProvider: fromWallet.providerName, toProvider: toWallet.providerName };
    }

    const wallet = toWallet ?? fromWallet;
    if (!wallet) return { kind: 'none' };

    const direction: OnrampDirection = toWallet ? 'deposit' : 'withdrawal';
    const inserted = await store.attribution.insertOnramp({
      transferId: transfer.id,
      providerId: wallet.providerId,
      direction,
    });
    return { kind: 'attributed', providerId: wallet.providerId, providerName: wallet.providerName, direction, inserted };
  }
}
