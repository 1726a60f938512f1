/**
 * Error taxonomy for the ingestion pipeline.
 *
 * Halting errors (gap, deep reorg) stop a chain's watcher until an operator
 * steps in. Transient store errors are retried with backoff and never move
 * the checkpoint. Duplicates and ambiguous on-ramp matches are outcomes,
 * not errors, and are reported through return values.
 */
export class IndexerError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'IndexerError';
  }

  /** Whether the chain must stop until manual resolution */
  get halts(): boolean {
    return false;
  }
}

/** Missing heights between the checkpoint and the offered block */
export class GapError extends IndexerError {
  constructor(
    public chainId: number,
    public expected: number,
    public received: number,
  ) {
    super('GAP', `Chain ${chainId}: expected block ${expected}, received ${received}`, { chainId, expected, received });
    this.name = 'GapError';
  }

  override get halts(): boolean {
    return true;
  }
}

/** No common ancestor within the configured reorg depth */
export class DeepReorgError extends IndexerError {
  constructor(
    public chainId: number,
    public checkpointHeight: number,
    public maxDepth: number,
  ) {
    super(
      'DEEP_REORG',
      `Chain ${chainId}: no common ancestor within ${maxDepth} blocks of ${checkpointHeight}`,
      { chainId, checkpointHeight, maxDepth },
    );
    this.name = 'DeepReorgError';
  }

  override get halts(): boolean {
    return true;
  }
}

/** Storage unavailable or a transaction lost a serialization race */
export class TransientStoreError extends IndexerError {
  constructor(message: string, cause?: unknown) {
    super('TRANSIENT_STORE', message);
    this.name = 'TransientStoreError';
    this.cause = cause;
  }
}

/** Another task already owns the chain */
export class ChainBusyError extends IndexerError {
  constructor(public chainId: number) {
    super('CHAIN_BUSY', `Chain ${chainId} is already being processed`, { chainId });
    this.name = 'ChainBusyError';
  }
}

/** Upstream headers do not link by parent hash while walking back for a reorg */
export class ReorgLinkageError extends IndexerError {
  constructor(chainId: number, height: number, expected: string, actual: string | null) {
    super(
      'REORG_LINKAGE',
      `Chain ${chainId}: canonical header at ${height} does not match its child's parent hash`,
      { chainId, height, expected, actual },
    );
    this.name = 'ReorgLinkageError';
  }
}

// Node socket errors and Postgres SQLSTATEs worth retrying
const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  '08000', // connection_exception
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08003', // connection_does_not_exist
  '08006', // connection_failure
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const { code } = err;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Map a raw storage failure to TransientStoreError when it is worth retrying.
 * Anything else is returned untouched.
 */
export function classifyStoreError(err: unknown): unknown {
  if (err instanceof IndexerError) return err;
  const code = errorCode(err) ?? errorCode(err instanceof Error ? err.cause : undefined);
  if (code && TRANSIENT_CODES.has(code)) {
    const message = err instanceof Error ? err.message : String(err);
    return new TransientStoreError(`Store unavailable (${code}): ${message}`, err);
  }
  return err;
}

/** Short machine-readable kind for health reporting */
export function errorKind(err: unknown): string {
  if (err instanceof IndexerError) return err.name;
  if (err instanceof Error) return err.name;
  return 'UnknownError';
}
