import { and, asc, eq, inArray, isNull, or } from 'drizzle-orm';
import {
  entityLabels,
  watchlistEntries,
  transferEntityFlags,
  onrampProviders,
  providerWallets,
  onrampTransfers,
  type DbExecutor,
} from '@tidemark/db';
import type {
  AttributionRepository,
  EntityFlagWrite,
  EntityLabelRecord,
  OnrampWrite,
  ProviderWalletRecord,
  WatchlistEntryRecord,
} from './types.js';

export class PgAttributionRepository implements AttributionRepository {
  constructor(private readonly db: DbExecutor) {}

  async labelsForAddress(address: string, chainId: number): Promise<EntityLabelRecord[]> {
    return this.db
      .select({
        id: entityLabels.id,
        address: entityLabels.address,
        chainId: entityLabels.chainId,
        entityName: entityLabels.entityName,
        entityType: entityLabels.entityType,
        labelSource: entityLabels.labelSource,
        confidence: entityLabels.confidence,
      })
      .from(entityLabels)
      .where(
        and(
          eq(entityLabels.address, address),
          or(isNull(entityLabels.chainId), eq(entityLabels.chainId, chainId)),
        ),
      )
      .orderBy(asc(entityLabels.id));
  }

  async watchlistForAddress(address: string): Promise<WatchlistEntryRecord[]> {
    return this.db
      .select({
        id: watchlistEntries.id,
        listName: watchlistEntries.listName,
        address: watchlistEntries.address,
        entityName: watchlistEntries.entityName,
      })
      .from(watchlistEntries)
      .where(eq(watchlistEntries.address, address));
  }

  async providerWallet(chainId: number, address: string): Promise<ProviderWalletRecord | null> {
    const [row] = await this.db
      .select({
        id: providerWallets.id,
        providerId: providerWallets.providerId,
        providerName: onrampProviders.name,
        chainId: providerWallets.chainId,
        address: providerWallets.address,
      })
      .from(providerWallets)
      .innerJoin(onrampProviders, eq(providerWallets.providerId, onrampProviders.id))
      .where(and(eq(providerWallets.chainId, chainId), eq(providerWallets.address, address)))
      .limit(1);
    return row ?? null;
  }

  async upsertFlag(flag: EntityFlagWrite): Promise<void> {
    await this.db
      .insert(transferEntityFlags)
      .values(flag)
      .onConflictDoNothing({
        target: [transferEntityFlags.transferId, transferEntityFlags.entityLabelId, transferEntityFlags.side],
      });
  }

  async insertOnramp(onramp: OnrampWrite): Promise<boolean> {
    const created = await this.db
      .insert(onrampTransfers)
      .values(onramp)
      .onConflictDoNothing({ target: onrampTransfers.transferId })
      .returning({ transferId: onrampTransfers.transferId });
    return created.length > 0;
  }

  async deleteFlagsForTransfers(transferIds: number[]): Promise<number> {
    if (transferIds.length === 0) return 0;
    const deleted = await this.db
      .delete(transferEntityFlags)
      .where(inArray(transferEntityFlags.transferId, transferIds))
      .returning({ id: transferEntityFlags.id });
    return deleted.length;
  }

  async deleteOnrampForTransfers(transferIds: number[]): Promise<number> {
    if (transferIds.length === 0) return 0;
    const deleted = await this.db
      .delete(onrampTransfers)
      .where(inArray(onrampTransfers.transferId, transferIds))
      .returning({ transferId: onrampTransfers.transferId });
    return deleted.length;
  }
}
