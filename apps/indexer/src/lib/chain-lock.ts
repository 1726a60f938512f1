/**
 * Per-chain ownership guard.
 * A chain's checkpoint is owned by exactly one task at a time; a second
 * acquirer is rejected rather than queued, so a slow tick is skipped instead
 * of piling up behind the one still running.
 */
import { ChainBusyError } from './errors.js';

export class ChainLock {
  private readonly held = new Map<number, number>();

  acquire(chainId: number): void {
    if (this.held.has(chainId)) {
      throw new ChainBusyError(chainId);
    }
    this.held.set(chainId, Date.now());
  }

  release(chainId: number): void {
    this.held.delete(chainId);
  }

  isHeld(chainId: number): boolean {
    return this.held.has(chainId);
  }

  /** Run `fn` while holding the chain, releasing it however `fn` ends */
  async runExclusive<T>(chainId: number, fn: () => Promise<T>): Promise<T> {
    this.acquire(chainId);
    try {
      return await fn();
    } finally {
      this.release(chainId);
    }
  }
}
