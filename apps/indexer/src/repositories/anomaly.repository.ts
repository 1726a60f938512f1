import { inArray } from 'drizzle-orm';
import { anomalies, type DbExecutor } from '@tidemark/db';
import type { AnomalyRepository, AnomalyWrite } from './types.js';

export class PgAnomalyRepository implements AnomalyRepository {
  constructor(private readonly db: DbExecutor) {}

  async upsert(anomaly: AnomalyWrite): Promise<void> {
    await this.db
      .insert(anomalies)
      .values(anomaly)
      .onConflictDoUpdate({
        target: [anomalies.transferId, anomalies.anomalyType],
        // `resolved` and `detectedAt` belong to the first detection / analyst workflow
        set: {
          chainId: anomaly.chainId,
          riskScore: anomaly.riskScore,
          flags: anomaly.flags,
          details: anomaly.details,
          address: anomaly.address,
        },
      });
  }

  async deleteForTransfers(transferIds: number[]): Promise<number> {
    if (transferIds.length === 0) return 0;
    const deleted = await this.db
      .delete(anomalies)
      .where(inArray(anomalies.transferId, transferIds))
      .returning({ id: anomalies.id });
    return deleted.length;
  }
}
