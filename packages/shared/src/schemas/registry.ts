import { z } from 'zod';
import { ENTITY_TYPES, PROVIDER_TYPES } from '../constants.js';
import { AddressSchema, ChainIdSchema } from './common.js';

export const ProviderWalletEntrySchema = z.object({
  chainId: ChainIdSchema,
  address: AddressSchema,
  label: z.string().nullable().default(null),
});

export const ProviderEntrySchema = z.object({
  name: z.string().min(1),
  providerType: z.enum(PROVIDER_TYPES),
  website: z.string().url().nullable().default(null),
  kycRequired: z.boolean().default(true),
  wallets: z.array(ProviderWalletEntrySchema).default([]),
});

export const LabelEntrySchema = z.object({
  address: AddressSchema,
  /** null = applies on every chain */
  chainId: ChainIdSchema.nullable().default(null),
  entityName: z.string().min(1),
  entityType: z.enum(ENTITY_TYPES),
  labelSource: z.string().min(1).default('config'),
  confidence: z.number().min(0).max(1).default(1),
  metadata: z.record(z.unknown()).nullable().default(null),
});

export const WatchlistSchema = z.object({
  listName: z.string().min(1),
  entries: z.array(
    z.object({
      address: AddressSchema,
      entityName: z.string().nullable().default(null),
      sdnId: z.string().nullable().default(null),
      program: z.string().nullable().default(null),
    }),
  ),
});

/** Registry file consumed by the registry loader script */
export const RegistryFileSchema = z.object({
  providers: z.array(ProviderEntrySchema).default([]),
  labels: z.array(LabelEntrySchema).default([]),
  watchlists: z.array(WatchlistSchema).default([]),
});
