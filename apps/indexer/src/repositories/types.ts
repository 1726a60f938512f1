import type { AnomalyType, FirstSeenDirection, FlagSide, OnrampDirection } from '@tidemark/shared';

// ---- Records ----

export interface ChainCheckpoint {
  chainId: number;
  lastIndexedBlock: number;
  lastBlockHash: string | null;
  updatedAt: Date;
}

export interface BlockHashRecord {
  chainId: number;
  blockNumber: number;
  blockHash: string;
  parentHash: string;
}

export interface NewTransfer {
  chainId: number;
  blockNumber: number;
  blockHash: string;
  txHash: string;
  logIndex: number;
  tokenAddress: string;
  fromAddress: string;
  toAddress: string;
  /** Raw token units, integer string */
  amount: string;
  tokenSymbol: string;
  tokenDecimals: number;
  blockTimestamp: Date;
}

export interface TransferRecord extends NewTransfer {
  id: number;
}

export interface PairAggregate {
  transferCount: number;
  totalAmount: string;
  firstSeen: Date;
  lastSeen: Date;
}

export interface WalletFirstSeenRecord {
  address: string;
  chainId: number;
  firstSeenAt: Date;
  firstBlock: number;
  firstTxHash: string | null;
  firstDirection: FirstSeenDirection;
}

export interface GraphEdgeRecord extends PairAggregate {
  sourceAddress: string;
  destAddress: string;
  chainId: number;
}

export interface EdgeIncrement {
  sourceAddress: string;
  destAddress: string;
  chainId: number;
  amount: string;
  at: Date;
}

export interface AnomalyWrite {
  transferId: number;
  chainId: number;
  anomalyType: AnomalyType;
  riskScore: number;
  flags: string[];
  details: Record<string, unknown>;
  address: string | null;
}

export interface EntityLabelRecord {
  id: number;
  address: string;
  chainId: number | null;
  entityName: string;
  entityType: string;
  labelSource: string;
  confidence: number;
}

export interface WatchlistEntryRecord {
  id: number;
  listName: string;
  address: string;
  entityName: string | null;
}

export interface ProviderWalletRecord {
  id: number;
  providerId: number;
  providerName: string;
  chainId: number;
  address: string;
}

export interface EntityFlagWrite {
  transferId: number;
  entityLabelId: number;
  side: FlagSide;
}

export interface OnrampWrite {
  transferId: number;
  providerId: number;
  direction: OnrampDirection;
}

// ---- Registry writes (watchlist loader, token seeding) ----

export interface ProviderWrite {
  name: string;
  providerType: string;
  website: string | null;
  kycRequired: boolean;
}

export interface ProviderWalletWrite {
  providerId: number;
  chainId: number;
  address: string;
  label: string | null;
}

export interface EntityLabelWrite {
  address: string;
  chainId: number | null;
  entityName: string;
  entityType: string;
  labelSource: string;
  confidence: number;
  metadata: Record<string, unknown> | null;
}

export interface WatchlistEntryWrite {
  listName: string;
  address: string;
  entityName: string | null;
  sdnId: string | null;
  program: string | null;
}

export interface KnownTokenWrite {
  chainId: number;
  tokenAddress: string;
  symbol: string;
  decimals: number;
}

// ---- Repositories ----

export interface CheckpointRepository {
  get(chainId: number): Promise<ChainCheckpoint | null>;
  save(chainId: number, lastIndexedBlock: number, lastBlockHash: string | null): Promise<void>;
  getBlockHash(chainId: number, blockNumber: number): Promise<BlockHashRecord | null>;
  /** Insert or overwrite the ledger entry for a height */
  putBlockHash(record: BlockHashRecord): Promise<void>;
  deleteBlockHashesAbove(chainId: number, blockNumber: number): Promise<number>;
}

export interface TransferRepository {
  /** Insert unless (chain, tx, log) exists; always returns the durable id */
  insert(transfer: NewTransfer): Promise<{ id: number; inserted: boolean }>;
  listAbove(chainId: number, blockNumber: number): Promise<TransferRecord[]>;
  deleteByIds(ids: number[]): Promise<number>;
  /** Aggregate over current transfers from `source` to `dest`, or null when none remain */
  aggregatePair(chainId: number, source: string, dest: string): Promise<PairAggregate | null>;
  /** Earliest current transfer touching `address`, by block then log index */
  earliestForAddress(chainId: number, address: string): Promise<TransferRecord | null>;
  /** Transfers sent by `address` on the chain with `since < block_timestamp <= until` */
  countSentBetween(chainId: number, address: string, since: Date, until: Date): Promise<number>;
  /** Distinct chains where `address` sent or received with `since < block_timestamp <= until` */
  countActiveChainsBetween(address: string, since: Date, until: Date): Promise<number>;
}

export interface GraphRepository {
  /** Conditional insert; true when this call created the row */
  insertFirstSeenIfAbsent(record: WalletFirstSeenRecord): Promise<boolean>;
  getFirstSeen(address: string, chainId: number): Promise<WalletFirstSeenRecord | null>;
  putFirstSeen(record: WalletFirstSeenRecord): Promise<void>;
  deleteFirstSeen(address: string, chainId: number): Promise<void>;
  /** Atomic upsert: count + 1, total + amount, widen first/last seen */
  incrementEdge(increment: EdgeIncrement): Promise<void>;
  getEdge(sourceAddress: string, destAddress: string, chainId: number): Promise<GraphEdgeRecord | null>;
  putEdge(edge: GraphEdgeRecord): Promise<void>;
  deleteEdge(sourceAddress: string, destAddress: string, chainId: number): Promise<void>;
}

export interface AnomalyRepository {
  /** Upsert by (transfer, type); never touches `resolved` */
  upsert(anomaly: AnomalyWrite): Promise<void>;
  deleteForTransfers(transferIds: number[]): Promise<number>;
}

export interface AttributionRepository {
  /** Labels for the address that are global or scoped to `chainId` */
  labelsForAddress(address: string, chainId: number): Promise<EntityLabelRecord[]>;
  watchlistForAddress(address: string): Promise<WatchlistEntryRecord[]>;
  providerWallet(chainId: number, address: string): Promise<ProviderWalletRecord | null>;
  upsertFlag(flag: EntityFlagWrite): Promise<void>;
  /** Insert unless the transfer is already attributed; true when inserted */
  insertOnramp(onramp: OnrampWrite): Promise<boolean>;
  deleteFlagsForTransfers(transferIds: number[]): Promise<number>;
  deleteOnrampForTransfers(transferIds: number[]): Promise<number>;
}

export interface RegistryRepository {
  upsertProvider(provider: ProviderWrite): Promise<number>;
  upsertProviderWallet(wallet: ProviderWalletWrite): Promise<void>;
  upsertLabel(label: EntityLabelWrite): Promise<number>;
  upsertWatchlistEntry(entry: WatchlistEntryWrite): Promise<void>;
  upsertKnownToken(token: KnownTokenWrite): Promise<void>;
}

/** Everything the pipeline persists, with a unit of work around it */
export interface IndexerStore {
  checkpoints: CheckpointRepository;
  transfers: TransferRepository;
  graph: GraphRepository;
  anomalies: AnomalyRepository;
  attribution: AttributionRepository;
  registry: RegistryRepository;
  /** Run `fn` atomically: every write inside commits together or not at all */
  transaction<T>(fn: (tx: IndexerStore) => Promise<T>): Promise<T>;
  /** Cheap liveness probe */
  ping(): Promise<void>;
}
