export type Address = string;

export enum LogLevel {
  INFO = 'info',
  DEBUG = 'debug',
  WARN = 'warn',
  ERROR = 'error',
}

export interface ControllerDescriptor {
  address: Address;
  /** Deployment block hint; 0 means unknown and triggers a code lookup. */
  creationBlock: number;
  collateralToken?: string;
  platform?: string;
}

export interface NetworkDescriptor {
  name: string;
  chainId: number;
  rpcEndpoints: string[];
  requiresAuthorityMiddleware: boolean;
  controllers: ControllerDescriptor[];
}

/** Inclusive on both ends, like eth_getLogs bounds. */
export interface BlockRange {
  startBlock: number;
  endBlock: number;
}

export interface ScanWindow {
  startDate?: Date;
  endDate?: Date;
}

// RPC configuration
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RpcConfig extends RetryPolicy {
  timeoutMs: number;
  failoverThreshold: number;
}

export interface ChunkSizingConfig {
  initialChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
  growAfterSuccesses: number;
  concurrency: number;
}

export interface ScanConfig extends ChunkSizingConfig {
  timestampConcurrency: number;
  /** WAD-scaled fallback discount (0.06e18 = 6%). */
  defaultLiquidationDiscount: bigint;
  /** Liquidations repaying less stablecoin debt than this (18 decimals) are dropped as dust. */
  minLiquidationDebt: bigint;
}

export interface ScannerConfig {
  networksFile: string;
  outputDir: string;
  checkpointFile: string;
  logLevel: LogLevel;
  logToFile: boolean;
  logDir: string;
  rpc: RpcConfig;
  scan: ScanConfig;
}

export interface BlockHeader {
  number: number;
  timestamp: number;
  hash: string | null;
  extraData: string;
  /** Bytes removed from an oversized Proof-of-Authority extraData field. */
  strippedExtraDataBytes: number;
}

export interface RawLogEvent {
  address: Address;
  blockNumber: number;
  transactionHash: string;
  transactionIndex: number;
  logIndex: number;
  topics: string[];
  data: string;
}

export interface PartialScanResult {
  events: RawLogEvent[];
  unresolvedRanges: BlockRange[];
  skipped: boolean;
  cancelled: boolean;
  stats: ChunkScanStats;
}

export interface ChunkScanStats {
  requests: number;
  completedChunks: number;
  splits: number;
  finalChunkSize: number;
}

// Domain events
export type DomainEventKind = 'Borrow' | 'Repay' | 'SoftLiquidation' | 'SelfLiquidation' | 'HardLiquidation';

export interface EventAmounts {
  collateral: bigint;
  stablecoin: bigint;
  debt: bigint;
}

interface DomainEventBase {
  network: string;
  controller: Address;
  user: Address;
  blockNumber: number;
  transactionIndex: number;
  logIndex: number;
  transactionHash: string;
  /** Block time in seconds; null when the block header could not be fetched. */
  timestamp: number | null;
  amounts: EventAmounts;
}

export interface BorrowEvent extends DomainEventBase {
  kind: 'Borrow';
}

export interface RepayEvent extends DomainEventBase {
  kind: 'Repay';
  remainingDebt: bigint | null;
  isFullRepay: boolean;
}

export interface SoftLiquidationEvent extends DomainEventBase {
  kind: 'SoftLiquidation';
  liquidator: Address;
  discount: bigint;
}

export interface SelfLiquidationEvent extends DomainEventBase {
  kind: 'SelfLiquidation';
  liquidator: Address;
  discount: bigint;
  origin: 'soft' | 'hard';
}

export interface HardLiquidationEvent extends DomainEventBase {
  kind: 'HardLiquidation';
  liquidator: Address;
  discount: bigint;
}

export type DomainEvent =
  | BorrowEvent
  | RepayEvent
  | SoftLiquidationEvent
  | SelfLiquidationEvent
  | HardLiquidationEvent;

export type LiquidationEvent = SoftLiquidationEvent | SelfLiquidationEvent | HardLiquidationEvent;

export type EpochCloseEvent = RepayEvent | SelfLiquidationEvent | HardLiquidationEvent;

export type EpochCloseReason = 'repay' | 'hard-liquidation' | 'self-liquidation';

export interface PositionEpoch {
  network: string;
  controller: Address;
  user: Address;
  epochIndex: number;
  status: 'open' | 'closed';
  openEvent: BorrowEvent | null;
  softLiquidationEvents: SoftLiquidationEvent[];
  closeEvent: EpochCloseEvent | null;
  closeReason: EpochCloseReason | null;
  isSelfLiquidation: boolean;
  truncatedHistory: boolean;
  additionalBorrows: number;
  partialRepays: number;
  totalDiscount: bigint;
  totalLoss: bigint;
}

export interface EpochSummary {
  totalEpochs: number;
  openEpochs: number;
  closedEpochs: number;
  truncatedEpochs: number;
  reopenedPositions: number;
  affectedUsers: number;
  softLiquidationCount: number;
  hardLiquidationCount: number;
  selfLiquidationCount: number;
  totalSoftLiquidationDiscount: bigint;
  totalSoftLiquidationLoss: bigint;
}

// Run reports
export type ControllerScanStatus = 'complete' | 'partial' | 'skipped' | 'degraded' | 'cancelled';

/** A gap left by an earlier run, fetched again outside the current window. */
export interface RecoveredGap {
  range: BlockRange;
  rawEvents: number;
  unresolvedRanges: BlockRange[];
}

export interface ControllerScanReport {
  controller: Address;
  status: ControllerScanStatus;
  range: BlockRange | null;
  rawEvents: number;
  unresolvedRanges: BlockRange[];
  recoveredGaps: RecoveredGap[];
  /** Labels from the network file, null when not configured. */
  collateralToken: string | null;
  platform: string | null;
  liquidationDiscount: bigint | null;
  reason?: string;
}

export type NetworkScanStatus = 'complete' | 'partial' | 'skipped' | 'degraded' | 'cancelled';

export interface NetworkScanReport {
  network: string;
  status: NetworkScanStatus;
  range: BlockRange | null;
  controllers: ControllerScanReport[];
  epochs: PositionEpoch[];
  summary: EpochSummary;
  unrecognizedEvents: number;
  malformedEvents: number;
  dustLiquidations: number;
  missingTimestamps: number;
  warnings: string[];
  durationMs: number;
}

export interface SkippedNetwork {
  name: string;
  reason: string;
}

export interface ScanRunReport {
  startedAt: string;
  finishedAt: string;
  window: { startDate: string | null; endDate: string | null };
  cancelled: boolean;
  networks: NetworkScanReport[];
  skippedNetworks: SkippedNetwork[];
  summary: EpochSummary;
}

// Checkpoints
export interface ControllerCheckpoint {
  network: string;
  controller: Address;
  lastScannedBlock: number;
  unresolvedRanges: BlockRange[];
  updatedAt: string;
}
