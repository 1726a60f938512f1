import type { z } from 'zod';
import type {
  FetchedTransferSchema,
  FetchedBlockSchema,
  TokenConfigSchema,
  ChainConfigSchema,
  ChainsFileSchema,
  ChainHealthSchema,
  HealthResponseSchema,
  ErrorResponseSchema,
  RegistryFileSchema,
} from '../schemas/index.js';

// ---- Upstream block contract ----
export type FetchedTransfer = z.infer<typeof FetchedTransferSchema>;
export type FetchedBlock = z.infer<typeof FetchedBlockSchema>;

// ---- Configuration ----
export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type ChainConfig = z.infer<typeof ChainConfigSchema>;
export type ChainsFile = z.infer<typeof ChainsFileSchema>;

// ---- Health ----
export type ChainHealth = z.infer<typeof ChainHealthSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// ---- Registry ----
/** Parsed registry file (defaults applied) */
export type RegistryFile = z.infer<typeof RegistryFileSchema>;
/** Registry file as written on disk */
export type RegistryFileInput = z.input<typeof RegistryFileSchema>;
