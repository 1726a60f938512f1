import { and, eq, gt } from 'drizzle-orm';
import { chainCheckpoints, blockHashes, type DbExecutor } from '@tidemark/db';
import type { BlockHashRecord, ChainCheckpoint, CheckpointRepository } from './types.js';

export class PgCheckpointRepository implements CheckpointRepository {
  constructor(private readonly db: DbExecutor) {}

  async get(chainId: number): Promise<ChainCheckpoint | null> {
    const [row] = await this.db
      .select()
      .from(chainCheckpoints)
      .where(eq(chainCheckpoints.chainId, chainId))
      .limit(1);
    return row ?? null;
  }

  async save(chainId: number, lastIndexedBlock: number, lastBlockHash: string | null): Promise<void> {
    const updatedAt = new Date();
    await this.db
      .insert(chainCheckpoints)
      .values({ chainId, lastIndexedBlock, lastBlockHash, updatedAt })
      .onConflictDoUpdate({
        target: chainCheckpoints.chainId,
        set: { lastIndexedBlock, lastBlockHash, updatedAt },
      });
  }

  async getBlockHash(chainId: number, blockNumber: number): Promise<BlockHashRecord | null> {
    const [row] = await this.db
      .select()
      .from(blockHashes)
      .where(and(eq(blockHashes.chainId, chainId), eq(blockHashes.blockNumber, blockNumber)))
      .limit(1);
    return row ?? null;
  }

  async putBlockHash(record: BlockHashRecord): Promise<void> {
    await this.db
      .insert(blockHashes)
      .values(record)
      .onConflictDoUpdate({
        target: [blockHashes.chainId, blockHashes.blockNumber],
        set: { blockHash: record.blockHash, parentHash: record.parentHash },
      });
  }

  async deleteBlockHashesAbove(chainId: number, blockNumber: number): Promise<number> {
    const deleted = await this.db
      .delete(blockHashes)
      .where(and(eq(blockHashes.chainId, chainId), gt(blockHashes.blockNumber, blockNumber)))
      .returning({ blockNumber: blockHashes.blockNumber });
    return deleted.length;
  }
}
