import { z } from 'zod';

// ---- Common field schemas ----

/** 20-byte EVM address, normalized to lowercase */
export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, 'Address must be 0x followed by 40 hex characters')
  .transform((val) => val.toLowerCase());

/** 32-byte block or transaction hash, normalized to lowercase */
export const HashSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/, 'Hash must be 0x followed by 64 hex characters')
  .transform((val) => val.toLowerCase());

/** Raw token amount (integer string, token base units) */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'Amount must be a non-negative integer string')
  .refine((val) => val.length <= 78, 'Amount exceeds uint256');

export const ChainIdSchema = z.coerce.number().int().positive();

export const BlockNumberSchema = z.coerce.number().int().nonnegative();

// ---- Error response ----
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});
