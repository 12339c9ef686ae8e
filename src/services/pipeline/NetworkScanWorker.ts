import pLimit from 'p-limit';
import {
  BlockRange,
  ControllerDescriptor,
  ControllerScanReport,
  DomainEvent,
  NetworkDescriptor,
  NetworkScanReport,
  NetworkScanStatus,
  RawLogEvent,
  RecoveredGap,
  ScannerConfig,
  ScanWindow,
} from '../../types';
import { createNetworkLogger, Logger } from '../../utils/logger';
import { BlockResolutionAmbiguous, BlockResolutionFailed, describeError, ScanCancelled } from '../../utils/errors';
import { RpcEndpointPool, RpcGateway, createJsonRpcClient, JsonRpcClient } from '../rpc';
import { BlockRangeResolver, ChunkedLogScanner, coalesceRanges } from '../scanning';
import { EventNormalizer } from '../events';
import { PositionLifecycleAnalyzer, emptySummary, summarizeEpochs } from '../analysis';
import { ScanCheckpointStore } from '../storage';
import { ControllerContracts, CONTROLLER_TOPIC_FILTER } from '../../contracts';

export interface NetworkScanDependencies {
  createClient?: (url: string) => JsonRpcClient;
  checkpoints?: ScanCheckpointStore;
  log?: Logger;
}

interface ControllerScanOutcome {
  report: ControllerScanReport;
  rawEvents: RawLogEvent[];
  liquidationDiscount: bigint;
}

/** Parts of `range` not covered by `cover`. */
const subtractRange = (range: BlockRange, cover: BlockRange): BlockRange[] => {
  const pieces: BlockRange[] = [];
  if (range.startBlock < cover.startBlock) {
    pieces.push({ startBlock: range.startBlock, endBlock: Math.min(range.endBlock, cover.startBlock - 1) });
  }
  if (range.endBlock > cover.endBlock) {
    pieces.push({ startBlock: Math.max(range.startBlock, cover.endBlock + 1), endBlock: range.endBlock });
  }
  return pieces;
};

/**
 * Scans one network end to end: window resolution, log retrieval per
 * controller, timestamps, normalization and lifecycle analysis. Owns its RPC
 * pool and logger; nothing is shared with other networks.
 */
class NetworkScanWorker {
  private readonly log: Logger;

  private readonly pool: RpcEndpointPool;

  private readonly gateway: RpcGateway;

  private readonly resolver: BlockRangeResolver;

  private readonly scanner: ChunkedLogScanner;

  private readonly contracts: ControllerContracts;

  private readonly analyzer: PositionLifecycleAnalyzer;

  private readonly checkpoints?: ScanCheckpointStore;

  constructor(
    private readonly network: NetworkDescriptor,
    private readonly config: ScannerConfig,
    dependencies: NetworkScanDependencies = {},
  ) {
    this.log = dependencies.log ?? createNetworkLogger(network.name);
    const createClient =
      dependencies.createClient ?? ((url: string) => createJsonRpcClient(url, network.chainId, config.rpc.timeoutMs));

    this.pool = new RpcEndpointPool(
      network.rpcEndpoints.map((url) => ({ url, client: createClient(url) })),
      config.rpc.failoverThreshold,
      this.log,
    );
    this.gateway = new RpcGateway(network, this.pool, config.rpc, this.log);
    this.resolver = new BlockRangeResolver(this.gateway, this.log);
    this.scanner = new ChunkedLogScanner(this.gateway, config.scan, this.log);
    this.contracts = new ControllerContracts(this.gateway, config.scan.defaultLiquidationDiscount, this.log);
    this.analyzer = new PositionLifecycleAnalyzer(this.log);
    this.checkpoints = dependencies.checkpoints;
  }

  async run(window: ScanWindow, signal?: AbortSignal): Promise<NetworkScanReport> {
    const startedAt = Date.now();
    const warnings: string[] = [];
    this.log.info('Network scan started', { chainId: this.network.chainId, controllers: this.network.controllers.length });

    try {
      let range: BlockRange;
      try {
        range = await this.resolver.resolve(window.startDate, window.endDate, signal);
      } catch (error) {
        if (error instanceof ScanCancelled) {
          return this.emptyReport('cancelled', warnings, startedAt);
        }
        if (error instanceof BlockResolutionFailed || error instanceof BlockResolutionAmbiguous) {
          this.log.warn('Skipping network, scan window could not be resolved', { error: describeError(error) });
          warnings.push(describeError(error));
          return this.emptyReport('skipped', warnings, startedAt);
        }
        throw error;
      }

      const outcomes: ControllerScanOutcome[] = [];
      for (const controller of this.network.controllers) {
        outcomes.push(await this.scanController(controller, range, warnings, signal));
      }

      const blocks = [...new Set(outcomes.flatMap((outcome) => outcome.rawEvents.map((event) => event.blockNumber)))];
      const timestamps = await this.fetchTimestamps(blocks, warnings, signal);
      const missingTimestamps = blocks.filter((block) => timestamps.get(block) === null).length;

      const normalizer = new EventNormalizer(
        this.network.name,
        (block) => timestamps.get(block) ?? null,
        this.log,
        this.config.scan.minLiquidationDebt,
      );
      const events: DomainEvent[] = [];
      for (const outcome of outcomes) {
        const batch = normalizer.normalizeAll(
          { address: outcome.report.controller, liquidationDiscount: outcome.liquidationDiscount },
          outcome.rawEvents,
        );
        events.push(...batch.events);
      }
      const counts = normalizer.getCounts();

      const epochs = this.analyzer.analyze(events);
      const summary = summarizeEpochs(epochs);
      const controllers = outcomes.map((outcome) => outcome.report);
      const status = this.networkStatus(controllers, missingTimestamps, signal);

      const report: NetworkScanReport = {
        network: this.network.name,
        status,
        range,
        controllers,
        epochs,
        summary,
        unrecognizedEvents: counts.unrecognized,
        malformedEvents: counts.malformed,
        dustLiquidations: counts.dust,
        missingTimestamps,
        warnings,
        durationMs: Date.now() - startedAt,
      };

      this.log.info('Network scan finished', {
        status,
        ...range,
        events: events.length,
        epochs: summary.totalEpochs,
        softLiquidations: summary.softLiquidationCount,
        selfLiquidations: summary.selfLiquidationCount,
        dustLiquidations: counts.dust,
        rpc: this.gateway.getTelemetry(),
        endpoints: this.pool.getStats(),
        durationMs: report.durationMs,
      });
      return report;
    } finally {
      this.pool.destroy();
    }
  }

  private async scanController(
    controller: ControllerDescriptor,
    window: BlockRange,
    warnings: string[],
    signal?: AbortSignal,
  ): Promise<ControllerScanOutcome> {
    const base = {
      controller: controller.address,
      rawEvents: 0,
      unresolvedRanges: [],
      recoveredGaps: [],
      collateralToken: controller.collateralToken ?? null,
      platform: controller.platform ?? null,
      liquidationDiscount: null,
    };
    const fallbackDiscount = this.config.scan.defaultLiquidationDiscount;

    if (signal?.aborted) {
      return {
        report: { ...base, status: 'cancelled', range: null, unresolvedRanges: [window] },
        rawEvents: [],
        liquidationDiscount: fallbackDiscount,
      };
    }

    try {
      const activity = await this.resolver.clampToActivity(controller, window.endBlock, signal);
      if (activity.kind === 'not-deployed') {
        const reason = `no contract code at block ${window.endBlock}`;
        warnings.push(`${controller.address}: ${reason}`);
        return { report: { ...base, status: 'skipped', range: null, reason }, rawEvents: [], liquidationDiscount: fallbackDiscount };
      }
      if (activity.kind === 'fallback') {
        warnings.push(activity.warning);
      }

      const range = { startBlock: Math.max(window.startBlock, activity.startBlock), endBlock: window.endBlock };
      const { discount } = await this.contracts.getLiquidationDiscount(controller.address, signal);

      const main = await this.scanner.scan(controller.address, range, CONTROLLER_TOPIC_FILTER, signal);
      if (main.skipped) {
        const reason = `empty block range ${range.startBlock}-${range.endBlock}`;
        return {
          report: { ...base, status: 'skipped', range, liquidationDiscount: discount, reason },
          rawEvents: [],
          liquidationDiscount: discount,
        };
      }

      // Gap events lie outside the window: they update the checkpoint, never the epochs.
      const recoveredGaps: RecoveredGap[] = [];
      let gapsCancelled = false;
      for (const gap of this.previousGaps(controller, range)) {
        this.log.info('Re-attempting range left unresolved by an earlier run', { controller: controller.address, ...gap });
        const result = await this.scanner.scan(controller.address, gap, CONTROLLER_TOPIC_FILTER, signal);
        gapsCancelled = gapsCancelled || result.cancelled;
        recoveredGaps.push({ range: gap, rawEvents: result.events.length, unresolvedRanges: result.unresolvedRanges });
        if (result.unresolvedRanges.length > 0) {
          this.log.warn('Earlier gap still unresolved', { controller: controller.address, ...gap, unresolved: result.unresolvedRanges });
        }
      }

      this.checkpoints?.record(
        this.network.name,
        controller.address,
        range.endBlock,
        coalesceRanges([...main.unresolvedRanges, ...recoveredGaps.flatMap((gap) => gap.unresolvedRanges)]),
      );

      let status: ControllerScanReport['status'] = 'complete';
      if (main.cancelled || gapsCancelled) status = 'cancelled';
      else if (main.unresolvedRanges.length > 0) status = main.stats.completedChunks === 0 ? 'degraded' : 'partial';

      if (status === 'partial' || status === 'degraded') {
        warnings.push(
          `${controller.address}: unresolved ${main.unresolvedRanges.map((gap) => `${gap.startBlock}-${gap.endBlock}`).join(', ')}`,
        );
      }

      return {
        report: {
          ...base,
          status,
          range,
          rawEvents: main.events.length,
          unresolvedRanges: main.unresolvedRanges,
          recoveredGaps,
          liquidationDiscount: discount,
        },
        rawEvents: main.events,
        liquidationDiscount: discount,
      };
    } catch (error) {
      const cancelled = error instanceof ScanCancelled;
      const reason = describeError(error);
      if (!cancelled) {
        this.log.error('Controller scan failed', { controller: controller.address, error: reason });
        warnings.push(`${controller.address}: ${reason}`);
      }
      return {
        report: { ...base, status: cancelled ? 'cancelled' : 'degraded', range: null, reason },
        rawEvents: [],
        liquidationDiscount: fallbackDiscount,
      };
    }
  }

  private previousGaps(controller: ControllerDescriptor, range: BlockRange): BlockRange[] {
    const checkpoint = this.checkpoints?.get(this.network.name, controller.address);
    if (!checkpoint) return [];
    return coalesceRanges(checkpoint.unresolvedRanges.flatMap((gap) => subtractRange(gap, range)));
  }

  private async fetchTimestamps(blocks: number[], warnings: string[], signal?: AbortSignal): Promise<Map<number, number | null>> {
    const limit = pLimit(this.config.scan.timestampConcurrency);
    const entries = await Promise.all(
      blocks.map((block) =>
        limit(async (): Promise<[number, number | null]> => {
          try {
            return [block, await this.gateway.fetchBlockTimestamp(block, signal)];
          } catch (error) {
            if (!(error instanceof ScanCancelled)) {
              this.log.warn('Block timestamp unavailable', { block, error: describeError(error) });
              warnings.push(`timestamp unavailable for block ${block}`);
            }
            return [block, null];
          }
        }),
      ),
    );
    return new Map(entries);
  }

  private networkStatus(controllers: ControllerScanReport[], missingTimestamps: number, signal?: AbortSignal): NetworkScanStatus {
    if (signal?.aborted || controllers.some((controller) => controller.status === 'cancelled')) return 'cancelled';
    if (controllers.every((controller) => controller.status === 'skipped')) return 'skipped';
    if (controllers.some((controller) => controller.status === 'degraded')) return 'degraded';
    if (missingTimestamps > 0 || controllers.some((controller) => controller.status === 'partial')) return 'partial';
    return 'complete';
  }

  private emptyReport(status: NetworkScanStatus, warnings: string[], startedAt: number): NetworkScanReport {
    return {
      network: this.network.name,
      status,
      range: null,
      controllers: [],
      epochs: [],
      summary: emptySummary(),
      unrecognizedEvents: 0,
      malformedEvents: 0,
      dustLiquidations: 0,
      missingTimestamps: 0,
      warnings,
      durationMs: Date.now() - startedAt,
    };
  }
}

export default NetworkScanWorker;
