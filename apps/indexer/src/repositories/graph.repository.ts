import { and, eq, sql } from 'drizzle-orm';
import { walletFirstSeen, walletGraphEdges, type DbExecutor } from '@tidemark/db';
import type { EdgeIncrement, GraphEdgeRecord, GraphRepository, WalletFirstSeenRecord } from './types.js';

export class PgGraphRepository implements GraphRepository {
  constructor(private readonly db: DbExecutor) {}

  async insertFirstSeenIfAbsent(record: WalletFirstSeenRecord): Promise<boolean> {
    const created = await this.db
      .insert(walletFirstSeen)
      .values(record)
      .onConflictDoNothing({ target: [walletFirstSeen.address, walletFirstSeen.chainId] })
      .returning({ address: walletFirstSeen.address });
    return created.length > 0;
  }

  async getFirstSeen(address: string, chainId: number): Promise<WalletFirstSeenRecord | null> {
    const [row] = await this.db
      .select()
      .from(walletFirstSeen)
      .where(and(eq(walletFirstSeen.address, address), eq(walletFirstSeen.chainId, chainId)))
      .limit(1);
    return row ?? null;
  }

  async putFirstSeen(record: WalletFirstSeenRecord): Promise<void> {
    await this.db
      .insert(walletFirstSeen)
      .values(record)
      .onConflictDoUpdate({
        target: [walletFirstSeen.address, walletFirstSeen.chainId],
        set: {
          firstSeenAt: record.firstSeenAt,
          firstBlock: record.firstBlock,
          firstTxHash: record.firstTxHash,
          firstDirection: record.firstDirection,
        },
      });
  }

  async deleteFirstSeen(address: string, chainId: number): Promise<void> {
    await this.db
      .delete(walletFirstSeen)
      .where(and(eq(walletFirstSeen.address, address), eq(walletFirstSeen.chainId, chainId)));
  }

  async incrementEdge(increment: EdgeIncrement): Promise<void> {
    await this.db
      .insert(walletGraphEdges)
      .values({
        sourceAddress: increment.sourceAddress,
        destAddress: increment.destAddress,
        chainId: increment.chainId,
        transferCount: 1,
        totalAmount: increment.amount,
        firstSeen: increment.at,
        lastSeen: increment.at,
      })
      .onConflictDoUpdate({
        target: [walletGraphEdges.sourceAddress, walletGraphEdges.destAddress, walletGraphEdges.chainId],
        set: {
          transferCount: sql`${walletGraphEdges.transferCount} + 1`,
          totalAmount: sql`${walletGraphEdges.totalAmount} + excluded.total_amount`,
          firstSeen: sql`LEAST(${walletGraphEdges.firstSeen}, excluded.first_seen)`,
          lastSeen: sql`GREATEST(${walletGraphEdges.lastSeen}, excluded.last_seen)`,
        },
      });
  }

  async getEdge(sourceAddress: string, destAddress: string, chainId: number): Promise<GraphEdgeRecord | null> {
    const [row] = await this.db
      .select()
      .from(walletGraphEdges)
      .where(
        and(
          eq(walletGraphEdges.sourceAddress, sourceAddress),
          eq(walletGraphEdges.destAddress, destAddress),
          eq(walletGraphEdges.chainId, chainId),
        ),
      )
      .limit(1);
    return row ?? null;
  }

  async putEdge(edge: GraphEdgeRecord): Promise<void> {
    await this.db
      .insert(walletGraphEdges)
      .values(edge)
      .onConflictDoUpdate({
        target: [walletGraphEdges.sourceAddress, walletGraphEdges.destAddress, walletGraphEdges.chainId],
        set: {
          transferCount: edge.transferCount,
          totalAmount: edge.totalAmount,
          firstSeen: edge.firstSeen,
          lastSeen: edge.lastSeen,
        },
      });
  }

  async deleteEdge(sourceAddress: string, destAddress: string, chainId: number): Promise<void> {
    await this.db
      .delete(walletGraphEdges)
      .where(
        and(
          eq(walletGraphEdges.sourceAddress, sourceAddress),
          eq(walletGraphEdges.destAddress, destAddress),
          eq(walletGraphEdges.chainId, chainId),
        ),
      );
  }
}
