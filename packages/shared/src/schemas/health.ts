import { z } from 'zod';
import { CHAIN_STATUSES } from '../constants.js';

export const ChainHealthSchema = z.object({
  chainId: z.number().int(),
  name: z.string(),
  status: z.enum(CHAIN_STATUSES),
  lastHeight: z.number().int().nullable(),
  lastErrorKind: z.string().nullable(),
  lastErrorMessage: z.string().nullable(),
  updatedAt: z.string(),
});

export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  timestamp: z.string(),
  checks: z.record(z.enum(['ok', 'error'])),
  chains: z.array(ChainHealthSchema),
});
