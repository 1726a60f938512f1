import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ChainsFileSchema } from '@tidemark/shared/schemas';
import type { ChainConfig } from '@tidemark/shared';
import { IndexerError } from '../lib/errors.js';

/** Validate a parsed chains file; throws CONFIG_INVALID listing every issue */
export function parseChainsConfig(raw: unknown): ChainConfig[] {
  const parsed = ChainsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new IndexerError('CONFIG_INVALID', `Invalid chain configuration:\n  ${issues.join('\n  ')}`, { issues });
  }
  return parsed.data.chains.map((chain) => ({
    ...chain,
    tokens: chain.tokens.map((t) => ({ ...t, address: t.address.toLowerCase() })),
  }));
}

export function loadChainsConfig(path: string): ChainConfig[] {
  const fullPath = resolve(process.cwd(), path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (err) {
    throw new IndexerError('CONFIG_INVALID', `Cannot read chain configuration at ${fullPath}`, {
      path: fullPath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseChainsConfig(raw);
}
