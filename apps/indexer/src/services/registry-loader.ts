import { OFAC_LABEL_SOURCE } from '@tidemark/shared/constants';
import type { RegistryFile } from '@tidemark/shared';
import type { IndexerStore } from '../repositories/types.js';

export interface RegistryLoadSummary {
  providers: number;
  providerWallets: number;
  labels: number;
  watchlistEntries: number;
}

/** Label source written for entries of any list other than the SDN list */
export const CUSTOM_WATCHLIST_SOURCE = 'custom_watchlist';

/**
 * Upsert providers, provider wallets, labels and watchlists in one
 * transaction. Every watchlist entry also becomes a global `sanctioned`
 * label so the attributor flags transfers touching it.
 */
export async function loadRegistry(store: IndexerStore, registry: RegistryFile): Promise<RegistryLoadSummary> {
  return store.transaction(async (tx) => {
    const summary: RegistryLoadSummary = { providers: 0, providerWallets: 0, labels: 0, watchlistEntries: 0 };

    for (const provider of registry.providers) {
      const providerId = await tx.registry.upsertProvider({
        name: provider.name,
        providerType: provider.providerType,
        website: provider.website,
        kycRequired: provider.kycRequired,
      });
      summary.providers++;

      for (const wallet of provider.wallets) {
        await tx.registry.upsertProviderWallet({
          providerId,
          chainId: wallet.chainId,
          address: wallet.address,
          label: wallet.label,
        });
        summary.providerWallets++;
      }
    }

    for (const label of registry.labels) {
      await tx.registry.upsertLabel(label);
      summary.labels++;
    }

    for (const list of registry.watchlists) {
      const labelSource = list.listName === OFAC_LABEL_SOURCE ? OFAC_LABEL_SOURCE : CUSTOM_WATCHLIST_SOURCE;
      for (const entry of list.entries) {
        await tx.registry.upsertWatchlistEntry({ listName: list.listName, ...entry });
        await tx.registry.upsertLabel({
          address: entry.address,
          chainId: null,
          entityName: entry.entityName ?? list.listName,
          entityType: 'sanctioned',
          labelSource,
          confidence: 1,
          metadata: { listName: list.listName, sdnId: entry.sdnId, program: entry.program },
        });
        summary.watchlistEntries++;
        summary.labels++;
      }
    }

    return summary;
  });
}
