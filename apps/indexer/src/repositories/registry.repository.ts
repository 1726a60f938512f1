import { and, eq, isNull } from 'drizzle-orm';
import {
  entityLabels,
  watchlistEntries,
  onrampProviders,
  providerWallets,
  knownTokens,
  type DbExecutor,
} from '@tidemark/db';
import type {
  EntityLabelWrite,
  KnownTokenWrite,
  ProviderWalletWrite,
  ProviderWrite,
  RegistryRepository,
  WatchlistEntryWrite,
} from './types.js';

export class PgRegistryRepository implements RegistryRepository {
  constructor(private readonly db: DbExecutor) {}

  async upsertProvider(provider: ProviderWrite): Promise<number> {
    const [row] = await this.db
      .insert(onrampProviders)
      .values(provider)
      .onConflictDoUpdate({
        target: onrampProviders.name,
        set: {
          providerType: provider.providerType,
          website: provider.website,
          kycRequired: provider.kycRequired,
        },
      })
      .returning({ id: onrampProviders.id });
    if (!row) throw new Error(`Provider upsert returned no row: ${provider.name}`);
    return row.id;
  }

  async upsertProviderWallet(wallet: ProviderWalletWrite): Promise<void> {
    await this.db
      .insert(providerWallets)
      .values(wallet)
      .onConflictDoUpdate({
        target: [providerWallets.chainId, providerWallets.address],
        set: { providerId: wallet.providerId, label: wallet.label },
      });
  }

  async upsertLabel(label: EntityLabelWrite): Promise<number> {
    // The unique constraint treats NULL chain ids as distinct, so global labels
    // cannot rely on ON CONFLICT.
    const [existing] = await this.db
      .select({ id: entityLabels.id })
      .from(entityLabels)
      .where(
        and(
          eq(entityLabels.address, label.address),
          label.chainId === null ? isNull(entityLabels.chainId) : eq(entityLabels.chainId, label.chainId),
          eq(entityLabels.labelSource, label.labelSource),
          eq(entityLabels.entityName, label.entityName),
        ),
      )
      .limit(1);

    if (existing) {
      await this.db
        .update(entityLabels)
        .set({
          entityType: label.entityType,
          confidence: label.confidence,
          metadata: label.metadata,
          updatedAt: new Date(),
        })
        .where(eq(entityLabels.id, existing.id));
      return existing.id;
    }

    const [created] = await this.db.insert(entityLabels).values(label).returning({ id: entityLabels.id });
    if (!created) throw new Error(`Label insert returned no row: ${label.address}`);
    return created.id;
  }

  async upsertWatchlistEntry(entry: WatchlistEntryWrite): Promise<void> {
    await this.db
      .insert(watchlistEntries)
      .values(entry)
      .onConflictDoUpdate({
        target: [watchlistEntries.listName, watchlistEntries.address],
        set: { entityName: entry.entityName, sdnId: entry.sdnId, program: entry.program },
      });
  }

  async upsertKnownToken(token: KnownTokenWrite): Promise<void> {
    await this.db
      .insert(knownTokens)
      .values(token)
      .onConflictDoUpdate({
        target: [knownTokens.chainId, knownTokens.tokenAddress],
        set: { symbol: token.symbol, decimals: token.decimals },
      });
  }
}
