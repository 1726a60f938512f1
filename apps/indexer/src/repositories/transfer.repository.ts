import { and, asc, countDistinct, eq, gt, inArray, lte, or, sql } from 'drizzle-orm';
import { transfers, type DbExecutor } from '@tidemark/db';
import { IndexerError } from '../lib/errors.js';
import type { NewTransfer, PairAggregate, TransferRecord, TransferRepository } from './types.js';

export class PgTransferRepository implements TransferRepository {
  constructor(private readonly db: DbExecutor) {}

  async insert(transfer: NewTransfer): Promise<{ id: number; inserted: boolean }> {
    const [created] = await this.db
      .insert(transfers)
      .values(transfer)
      .onConflictDoNothing({ target: [transfers.chainId, transfers.txHash, transfers.logIndex] })
      .returning({ id: transfers.id });

    if (created) return { id: created.id, inserted: true };

    const [existing] = await this.db
      .select({ id: transfers.id })
      .from(transfers)
      .where(
        and(
          eq(transfers.chainId, transfer.chainId),
          eq(transfers.txHash, transfer.txHash),
          eq(transfers.logIndex, transfer.logIndex),
        ),
      )
      .limit(1);

    if (!existing) {
      throw new IndexerError('TRANSFER_LOOKUP_FAILED', 'Transfer conflicted on insert but could not be read back', {
        chainId: transfer.chainId,
        txHash: transfer.txHash,
        logIndex: transfer.logIndex,
      });
    }
    return { id: existing.id, inserted: false };
  }

  async listAbove(chainId: number, blockNumber: number): Promise<TransferRecord[]> {
    return this.db
      .select()
      .from(transfers)
      .where(and(eq(transfers.chainId, chainId), gt(transfers.blockNumber, blockNumber)))
      .orderBy(asc(transfers.blockNumber), asc(transfers.logIndex));
  }

  async deleteByIds(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const deleted = await this.db
      .delete(transfers)
      .where(inArray(transfers.id, ids))
      .returning({ id: transfers.id });
    return deleted.length;
  }

  async aggregatePair(chainId: number, source: string, dest: string): Promise<PairAggregate | null> {
    const [row] = await this.db
      .select({
        transferCount: sql<number>`count(*)`.mapWith(Number),
        totalAmount: sql<string>`coalesce(sum(${transfers.amount}), 0)::text`,
        firstSeen: sql`min(${transfers.blockTimestamp})`.mapWith(transfers.blockTimestamp),
        lastSeen: sql`max(${transfers.blockTimestamp})`.mapWith(transfers.blockTimestamp),
      })
      .from(transfers)
      .where(
        and(
          eq(transfers.chainId, chainId),
          eq(transfers.fromAddress, source),
          eq(transfers.toAddress, dest),
        ),
      );

    if (!row || row.transferCount === 0) return null;
    return row;
  }

  async earliestForAddress(chainId: number, address: string): Promise<TransferRecord | null> {
    const [row] = await this.db
      .select()
      .from(transfers)
      .where(
        and(
          eq(transfers.chainId, chainId),
          or(eq(transfers.fromAddress, address), eq(transfers.toAddress, address)),
        ),
      )
      .orderBy(asc(transfers.blockNumber), asc(transfers.logIndex))
      .limit(1);
    return row ?? null;
  }

  async countSentBetween(chainId: number, address: string, since: Date, until: Date): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)`.mapWith(Number) })
      .from(transfers)
      .where(
        and(
          eq(transfers.chainId, chainId),
          eq(transfers.fromAddress, address),
          gt(transfers.blockTimestamp, since),
          lte(transfers.blockTimestamp, until),
        ),
      );
    return row?.count ?? 0;
  }

  async countActiveChainsBetween(address: string, since: Date, until: Date): Promise<number> {
    const [row] = await this.db
      .select({ chains: countDistinct(transfers.chainId) })
      .from(transfers)
      .where(
        and(
          or(eq(transfers.fromAddress, address), eq(transfers.toAddress, address)),
          gt(transfers.blockTimestamp, since),
          lte(transfers.blockTimestamp, until),
        ),
      );
    return row?.chains ?? 0;
  }
}
