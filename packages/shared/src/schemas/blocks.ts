import { z } from 'zod';
import { AddressSchema, AmountSchema, BlockNumberSchema, HashSchema } from './common.js';

/** A decoded ERC-20 Transfer log, as delivered by the upstream fetch/decode service */
export const FetchedTransferSchema = z.object({
  txHash: HashSchema,
  logIndex: z.number().int().nonnegative(),
  tokenAddress: AddressSchema,
  from: AddressSchema,
  to: AddressSchema,
  amount: AmountSchema,
  symbol: z.string().min(1).max(16),
  decimals: z.number().int().min(0).max(36),
});

export const FetchedBlockSchema = z.object({
  number: BlockNumberSchema,
  hash: HashSchema,
  parentHash: HashSchema,
  /** Unix seconds */
  timestamp: z.number().int().nonnegative(),
  transfers: z.array(FetchedTransferSchema).default([]),
});

export const LatestHeightResponseSchema = z.object({
  height: BlockNumberSchema,
});
