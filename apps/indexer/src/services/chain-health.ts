import type { ChainStatus } from '@tidemark/shared/constants';
import type { ChainHealth } from '@tidemark/shared';
import { errorKind } from '../lib/errors.js';

/** Per-chain status as seen by the watchers; read by the health endpoints */
export class ChainHealthRegistry {
  private readonly chains = new Map<number, ChainHealth>();

  register(chainId: number, name: string): void {
    this.chains.set(chainId, {
      chainId,
      name,
      status: 'starting',
      lastHeight: null,
      lastErrorKind: null,
      lastErrorMessage: null,
      updatedAt: new Date().toISOString(),
    });
  }

  /** The last error stays visible after recovery; `status` shows the chain is back */
  markHealthy(chainId: number, lastHeight: number | null): void {
    this.update(chainId, 'healthy', { lastHeight });
  }

  markDegraded(chainId: number, err: unknown): void {
    this.update(chainId, 'degraded', describe(err));
  }

  markHalted(chainId: number, err: unknown): void {
    this.update(chainId, 'halted', describe(err));
  }

  get(chainId: number): ChainHealth | null {
    const entry = this.chains.get(chainId);
    return entry ? { ...entry } : null;
  }

  list(): ChainHealth[] {
    return [...this.chains.values()].sort((a, b) => a.chainId - b.chainId).map((h) => ({ ...h }));
  }

  /** True while every chain is starting or healthy */
  allHealthy(): boolean {
    return [...this.chains.values()].every((h) => h.status === 'starting' || h.status === 'healthy');
  }

  private update(chainId: number, status: ChainStatus, patch: Partial<ChainHealth>): void {
    const current = this.chains.get(chainId);
    if (!current) return;
    this.chains.set(chainId, { ...current, ...patch, status, updatedAt: new Date().toISOString() });
  }
}

function describe(err: unknown): Pick<ChainHealth, 'lastErrorKind' | 'lastErrorMessage'> {
  return {
    lastErrorKind: errorKind(err),
    lastErrorMessage: err instanceof Error ? err.message : String(err),
  };
}
