export {
  AddressSchema,
  HashSchema,
  AmountSchema,
  ChainIdSchema,
  BlockNumberSchema,
  ErrorResponseSchema,
} from './common.js';

export { FetchedTransferSchema, FetchedBlockSchema, LatestHeightResponseSchema } from './blocks.js';

export { TokenConfigSchema, ChainConfigSchema, ChainsFileSchema } from './chains.js';

export { ChainHealthSchema, HealthResponseSchema } from './health.js';

export {
  ProviderWalletEntrySchema,
  ProviderEntrySchema,
  LabelEntrySchema,
  WatchlistSchema,
  RegistryFileSchema,
} from './registry.js';
