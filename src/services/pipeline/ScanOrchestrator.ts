import {
  NetworkDescriptor,
  NetworkScanReport,
  ScannerConfig,
  ScanRunReport,
  ScanWindow,
  SkippedNetwork,
} from '../../types';
import { logger as rootLogger, logScanFinished, logScanStart, Logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { JsonRpcClient } from '../rpc';
import { emptySummary, summarizeEpochs } from '../analysis';
import { ScanCheckpointStore } from '../storage';
import NetworkScanWorker from './NetworkScanWorker';

export interface ScanOrchestratorOptions {
  createClient?: (network: NetworkDescriptor, url: string) => JsonRpcClient;
  checkpoints?: ScanCheckpointStore;
  log?: Logger;
}

/** Runs one worker per network concurrently and folds their reports into one run report. */
class ScanOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly config: ScannerConfig,
    private readonly options: ScanOrchestratorOptions = {},
  ) {
    this.log = options.log ?? rootLogger;
  }

  async run(
    networks: NetworkDescriptor[],
    skippedNetworks: SkippedNetwork[],
    window: ScanWindow,
    signal?: AbortSignal,
  ): Promise<ScanRunReport> {
    const startedAt = new Date();
    logScanStart({
      networks: networks.map((network) => network.name),
      skipped: skippedNetworks,
      startDate: window.startDate?.toISOString() ?? null,
      endDate: window.endDate?.toISOString() ?? null,
    });

    const settled = await Promise.allSettled(networks.map(async (network) => this.createWorker(network).run(window, signal)));

    const reports = settled.map((outcome, index) => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const network = networks[index];
      this.log.error('Network worker crashed', { network: network.name, error: describeError(outcome.reason) });
      return this.crashedReport(network, outcome.reason);
    });

    if (this.options.checkpoints) {
      try {
        await this.options.checkpoints.save();
      } catch (error) {
        this.log.error('Failed to save scan checkpoints', { error: describeError(error) });
      }
    }

    const summary = summarizeEpochs(reports.flatMap((report) => report.epochs));
    const report: ScanRunReport = {
      startedAt: startedAt.toISOString(),
      finishedAt: new Date().toISOString(),
      window: {
        startDate: window.startDate?.toISOString() ?? null,
        endDate: window.endDate?.toISOString() ?? null,
      },
      cancelled: signal?.aborted ?? false,
      networks: reports,
      skippedNetworks,
      summary,
    };

    logScanFinished({
      cancelled: report.cancelled,
      statuses: Object.fromEntries(reports.map((entry) => [entry.network, entry.status])),
      epochs: summary.totalEpochs,
      softLiquidations: summary.softLiquidationCount,
      selfLiquidations: summary.selfLiquidationCount,
      totalSoftLiquidationLoss: summary.totalSoftLiquidationLoss,
    });
    return report;
  }

  private createWorker(network: NetworkDescriptor): NetworkScanWorker {
    const { createClient, checkpoints } = this.options;
    return new NetworkScanWorker(network, this.config, {
      createClient: createClient ? (url) => createClient(network, url) : undefined,
      checkpoints,
    });
  }

  private crashedReport(network: NetworkDescriptor, reason: unknown): NetworkScanReport {
    return {
      network: network.name,
      status: 'degraded',
      range: null,
      controllers: [],
      epochs: [],
      summary: emptySummary(),
      unrecognizedEvents: 0,
      malformedEvents: 0,
      dustLiquidations: 0,
      missingTimestamps: 0,
      warnings: [`worker crashed: ${describeError(reason)}`],
      durationMs: 0,
    };
  }
}

export default ScanOrchestrator;
