import fs from 'fs/promises';
import path from 'path';
import { ControllerScanReport, PositionEpoch, ScanRunReport } from '../../types';
import { bigIntReplacer, logger as rootLogger, Logger } from '../../utils/logger';

export interface WrittenReport {
  jsonPath: string;
  csvPath: string;
}

export const EPOCH_CSV_COLUMNS = [
  'network',
  'controller',
  'collateral_token',
  'platform',
  'user',
  'epoch_index',
  'status',
  'close_reason',
  'is_self_liquidation',
  'truncated_history',
  'open_block',
  'open_timestamp',
  'soft_liquidations',
  'first_soft_liquidation_block',
  'last_soft_liquidation_block',
  'additional_borrows',
  'partial_repays',
  'close_block',
  'close_timestamp',
  'close_tx',
  'total_discount',
  'total_loss',
] as const;

const csvCell = (value: string | number | boolean | bigint | null | undefined): string => {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const epochRow = (epoch: PositionEpoch, controller: ControllerScanReport | undefined): string => {
  const soft = epoch.softLiquidationEvents;
  return [
    epoch.network,
    epoch.controller,
    controller?.collateralToken,
    controller?.platform,
    epoch.user,
    epoch.epochIndex,
    epoch.status,
    epoch.closeReason,
    epoch.isSelfLiquidation,
    epoch.truncatedHistory,
    epoch.openEvent?.blockNumber,
    epoch.openEvent?.timestamp,
    soft.length,
    soft[0]?.blockNumber,
    soft[soft.length - 1]?.blockNumber,
    epoch.additionalBorrows,
    epoch.partialRepays,
    epoch.closeEvent?.blockNumber,
    epoch.closeEvent?.timestamp,
    epoch.closeEvent?.transactionHash,
    epoch.totalDiscount,
    epoch.totalLoss,
  ]
    .map(csvCell)
    .join(',');
};

export const fileStamp = (date: Date): string => date.toISOString().replace(/[:.]/g, '-');

export const renderJson = (report: ScanRunReport): string => JSON.stringify(report, bigIntReplacer, 2);

export const renderEpochCsv = (report: ScanRunReport): string => {
  const rows = report.networks.flatMap((network) => {
    const controllers = new Map(network.controllers.map((controller) => [controller.controller.toLowerCase(), controller]));
    return network.epochs.map((epoch) => epochRow(epoch, controllers.get(epoch.controller.toLowerCase())));
  });
  return `${[EPOCH_CSV_COLUMNS.join(','), ...rows].join('\n')}\n`;
};

class ReportWriter {
  constructor(
    private readonly outputDir: string,
    private readonly log: Logger = rootLogger,
  ) {}

  async write(report: ScanRunReport, stamp: string = fileStamp(new Date(report.finishedAt))): Promise<WrittenReport> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const jsonPath = path.join(this.outputDir, `soft-liquidations-${stamp}.json`);
    const csvPath = path.join(this.outputDir, `soft-liquidation-epochs-${stamp}.csv`);

    await fs.writeFile(jsonPath, renderJson(report), 'utf-8');
    await fs.writeFile(csvPath, renderEpochCsv(report), 'utf-8');

    this.log.info('Reports written', { jsonPath, csvPath, cancelled: report.cancelled });
    return { jsonPath, csvPath };
  }
}

export default ReportWriter;
