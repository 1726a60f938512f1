import { z } from 'zod';
import { ChainIdSchema, BlockNumberSchema } from './common.js';

export const TokenConfigSchema = z.object({
  symbol: z.string().min(1).max(16),
  address: z.string(),
  decimals: z.number().int().min(0).max(36),
});

export const ChainConfigSchema = z.object({
  name: z.string().min(1),
  chainId: ChainIdSchema,
  startBlock: BlockNumberSchema.optional(),
  pollIntervalMs: z.number().int().positive().default(2000),
  maxBlocksPerPoll: z.number().int().positive().default(100),
  maxReorgDepth: z.number().int().positive().default(64),
  tokens: z.array(TokenConfigSchema),
});

export const ChainsFileSchema = z
  .object({
    chains: z.array(ChainConfigSchema).min(1, 'At least one chain must be configured'),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<number>();
    file.chains.forEach((chain, i) => {
      if (seen.has(chain.chainId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['chains', i, 'chainId'],
          message: `Duplicate chainId ${chain.chainId}`,
        });
      }
      seen.add(chain.chainId);

      if (chain.tokens.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['chains', i, 'tokens'],
          message: `Chain '${chain.name}' must have at least one token configured`,
        });
      }
      chain.tokens.forEach((token, j) => {
        if (!/^0x[0-9a-fA-F]{40}$/.test(token.address)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['chains', i, 'tokens', j, 'address'],
            message: `Invalid token address '${token.address}' for ${token.symbol} on chain '${chain.name}'`,
          });
        }
      });
    });
  });
