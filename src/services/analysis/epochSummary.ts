import { EpochSummary, LiquidationEvent, PositionEpoch } from '../../types';

export const WAD = 10n ** 18n;

/** Liquidator's discount on one liquidation, in debt units. */
export const discountAmount = (event: LiquidationEvent): bigint => (event.amounts.debt * event.discount) / WAD;

/** Debt repaid plus the liquidator's discount. */
export const lossAmount = (event: LiquidationEvent): bigint => event.amounts.debt + discountAmount(event);

export const emptySummary = (): EpochSummary => ({
  totalEpochs: 0,
  openEpochs: 0,
  closedEpochs: 0,
  truncatedEpochs: 0,
  reopenedPositions: 0,
  affectedUsers: 0,
  softLiquidationCount: 0,
  hardLiquidationCount: 0,
  selfLiquidationCount: 0,
  totalSoftLiquidationDiscount: 0n,
  totalSoftLiquidationLoss: 0n,
});

const positionKey = (epoch: PositionEpoch): string =>
  `${epoch.network}:${epoch.controller.toLowerCase()}:${epoch.user.toLowerCase()}`;

/**
 * Aggregates epochs for reporting. Self-liquidated epochs are counted on their
 * own and stay out of the liquidation counts and loss totals.
 */
export const summarizeEpochs = (epochs: readonly PositionEpoch[]): EpochSummary => {
  const summary = emptySummary();
  const reopened = new Set<string>();
  const affected = new Set<string>();

  for (const epoch of epochs) {
    summary.totalEpochs += 1;
    if (epoch.status === 'open') summary.openEpochs += 1;
    else summary.closedEpochs += 1;
    if (epoch.truncatedHistory) summary.truncatedEpochs += 1;
    if (epoch.epochIndex > 0) reopened.add(positionKey(epoch));

    if (epoch.isSelfLiquidation) {
      summary.selfLiquidationCount += 1;
      continue;
    }

    summary.softLiquidationCount += epoch.softLiquidationEvents.length;
    if (epoch.closeReason === 'hard-liquidation') summary.hardLiquidationCount += 1;
    if (epoch.softLiquidationEvents.length > 0) {
      affected.add(`${epoch.network}:${epoch.user.toLowerCase()}`);
    }
    summary.totalSoftLiquidationDiscount += epoch.totalDiscount;
    summary.totalSoftLiquidationLoss += epoch.totalLoss;
  }

  summary.reopenedPositions = reopened.size;
  summary.affectedUsers = affected.size;
  return summary;
};
