import { BorrowEvent, DomainEvent, EpochCloseEvent, EpochCloseReason, LiquidationEvent, PositionEpoch } from '../../types';
import { logger as rootLogger, Logger } from '../../utils/logger';
import { compareCanonical, logIdentity } from '../events/ordering';
import { discountAmount, lossAmount } from './epochSummary';

const groupKey = (event: DomainEvent): string =>
  `${event.network}:${event.controller.toLowerCase()}:${event.user.toLowerCase()}`;

const newEpoch = (event: DomainEvent, epochIndex: number, openEvent: BorrowEvent | null): PositionEpoch => ({
  network: event.network,
  controller: event.controller,
  user: event.user,
  epochIndex,
  status: 'open',
  openEvent,
  softLiquidationEvents: [],
  closeEvent: null,
  closeReason: null,
  isSelfLiquidation: false,
  truncatedHistory: openEvent === null,
  additionalBorrows: 0,
  partialRepays: 0,
  totalDiscount: 0n,
  totalLoss: 0n,
});

const accumulate = (epoch: PositionEpoch, event: LiquidationEvent): void => {
  epoch.totalDiscount += discountAmount(event);
  epoch.totalLoss += lossAmount(event);
};

const close = (epoch: PositionEpoch, event: EpochCloseEvent, reason: EpochCloseReason): void => {
  epoch.status = 'closed';
  epoch.closeEvent = event;
  epoch.closeReason = reason;
  epoch.isSelfLiquidation = reason === 'self-liquidation';
};

/**
 * Rebuilds open → soft-liquidated → closed epochs per (controller, user). The
 * result depends only on the set of events, not on their arrival order.
 */
class PositionLifecycleAnalyzer {
  constructor(private readonly log: Logger = rootLogger) {}

  analyze(events: readonly DomainEvent[]): PositionEpoch[] {
    const groups = new Map<string, DomainEvent[]>();
    const seen = new Set<string>();
    let duplicates = 0;

    for (const event of [...events].sort(compareCanonical)) {
      const identity = logIdentity(event);
      if (seen.has(identity)) {
        duplicates += 1;
        continue;
      }
      seen.add(identity);

      const key = groupKey(event);
      const group = groups.get(key);
      if (group) group.push(event);
      else groups.set(key, [event]);
    }

    const epochs = [...groups.values()].flatMap((group) => this.buildEpochs(group));
    this.log.debug('Reconstructed position epochs', {
      events: events.length,
      duplicates,
      positions: groups.size,
      epochs: epochs.length,
    });
    return epochs;
  }

  private buildEpochs(events: DomainEvent[]): PositionEpoch[] {
    const epochs: PositionEpoch[] = [];
    let current: PositionEpoch | null = null;

    for (const event of events) {
      if (!current) {
        if (event.kind === 'Borrow') {
          current = newEpoch(event, epochs.length, event);
          epochs.push(current);
          continue;
        }
        // history starts mid-position
        current = newEpoch(event, epochs.length, null);
        epochs.push(current);
      }

      switch (event.kind) {
        case 'Borrow':
          current.additionalBorrows += 1;
          break;
        case 'SoftLiquidation':
          current.softLiquidationEvents.push(event);
          accumulate(current, event);
          break;
        case 'Repay':
          if (event.isFullRepay) {
            close(current, event, 'repay');
            current = null;
          } else {
            current.partialRepays += 1;
          }
          break;
        case 'HardLiquidation':
          accumulate(current, event);
          close(current, event, 'hard-liquidation');
          current = null;
          break;
        case 'SelfLiquidation':
          accumulate(current, event);
          close(current, event, 'self-liquidation');
          current = null;
          break;
        default: {
          const unreachable: never = event;
          throw new Error(`Unhandled domain event at ${logIdentity(unreachable)}`);
        }
      }
    }

    return epochs;
  }
}

export default PositionLifecycleAnalyzer;
