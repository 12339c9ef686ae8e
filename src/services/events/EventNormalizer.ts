import { getAddress, Result } from 'ethers';
import { Address, DomainEvent, EventAmounts, RawLogEvent } from '../../types';
import { Logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';
import { CONTROLLER_EVENT_TOPICS, controllerInterface } from '../../contracts';
import { compareCanonical } from './ordering';

export interface NormalizerController {
  address: Address;
  /** Controller-wide WAD discount, used when no per-user value is known. */
  liquidationDiscount: bigint;
}

export interface UserStateSnapshot {
  user: Address;
  transactionHash: string;
  logIndex: number;
  collateral: bigint;
  debt: bigint;
  liquidationDiscount: bigint;
}

export type NormalizeOutcome =
  | { kind: 'event'; event: DomainEvent }
  | { kind: 'user-state'; state: UserStateSnapshot }
  | { kind: 'dust'; event: DomainEvent }
  | { kind: 'unrecognized'; topic: string | null }
  | { kind: 'malformed'; reason: string };

export interface NormalizerCounts {
  unrecognized: number;
  malformed: number;
  dust: number;
}

export interface NormalizedBatch extends NormalizerCounts {
  events: DomainEvent[];
}

type DecodedLog =
  | { name: 'Borrow'; user: Address; amounts: EventAmounts }
  | { name: 'Repay'; user: Address; amounts: EventAmounts }
  | { name: 'SoftLiquidation'; liquidator: Address; user: Address; amounts: EventAmounts }
  | { name: 'Liquidate'; liquidator: Address; user: Address; amounts: EventAmounts }
  | { name: 'UserState'; user: Address; collateral: bigint; debt: bigint; liquidationDiscount: bigint };

export interface Enrichment {
  sameTxState?: UserStateSnapshot;
  knownDiscount?: bigint;
}

const readAddress = (args: Result, name: string): Address => {
  const value: unknown = args.getValue(name);
  if (typeof value !== 'string') {
    throw new Error(`argument ${name} is not an address`);
  }
  return getAddress(value);
};

const readUint = (args: Result, name: string): bigint => {
  const value: unknown = args.getValue(name);
  if (typeof value !== 'bigint') {
    throw new Error(`argument ${name} is not an integer`);
  }
  return value;
};

const stateKey = (transactionHash: string, user: Address): string =>
  `${transactionHash.toLowerCase()}:${user.toLowerCase()}`;

const toSnapshot = (raw: RawLogEvent, decoded: Extract<DecodedLog, { name: 'UserState' }>): UserStateSnapshot => ({
  user: decoded.user,
  transactionHash: raw.transactionHash.toLowerCase(),
  logIndex: raw.logIndex,
  collateral: decoded.collateral,
  debt: decoded.debt,
  liquidationDiscount: decoded.liquidationDiscount,
});

/**
 * Turns controller logs into domain events. Dispatch is keyed by topic0; logs
 * with an unknown topic are counted and dropped, and so are liquidations that
 * repay less than `minLiquidationDebt`.
 */
class EventNormalizer {
  private unrecognizedCount = 0;

  private malformedCount = 0;

  private dustCount = 0;

  constructor(
    private readonly network: string,
    private readonly timestampOf: (blockNumber: number) => number | null,
    private readonly log: Logger,
    private readonly minLiquidationDebt: bigint = 0n,
  ) {}

  normalize(controller: NormalizerController, raw: RawLogEvent, enrichment: Enrichment = {}): NormalizeOutcome {
    const classified = this.classify(raw);
    if (classified.kind !== 'decoded') return classified;
    return this.fromDecoded(controller, raw, classified.decoded, enrichment);
  }

  /**
   * Normalizes one controller's logs. UserState logs are not events of their own:
   * they supply the post-transaction debt for Repay and the per-user discount
   * for liquidations.
   */
  normalizeAll(controller: NormalizerController, raws: RawLogEvent[]): NormalizedBatch {
    const before = this.getCounts();

    const decoded: Array<{ raw: RawLogEvent; decoded: DecodedLog }> = [];
    for (const raw of [...raws].sort(compareCanonical)) {
      const classified = this.classify(raw);
      if (classified.kind === 'decoded') decoded.push({ raw, decoded: classified.decoded });
    }

    const sameTxStates = new Map<string, UserStateSnapshot>();
    for (const entry of decoded) {
      if (entry.decoded.name === 'UserState') {
        sameTxStates.set(stateKey(entry.raw.transactionHash, entry.decoded.user), toSnapshot(entry.raw, entry.decoded));
      }
    }

    const knownDiscounts = new Map<string, bigint>();
    const events: DomainEvent[] = [];
    for (const { raw, decoded: log } of decoded) {
      if (log.name === 'UserState') {
        if (log.liquidationDiscount > 0n) {
          knownDiscounts.set(log.user.toLowerCase(), log.liquidationDiscount);
        }
        continue;
      }
      const event = this.toDomainEvent(controller, raw, log, {
        sameTxState: sameTxStates.get(stateKey(raw.transactionHash, log.user)),
        knownDiscount: knownDiscounts.get(log.user.toLowerCase()),
      });
      if (!this.isDust(event)) events.push(event);
    }

    const after = this.getCounts();
    return {
      events,
      unrecognized: after.unrecognized - before.unrecognized,
      malformed: after.malformed - before.malformed,
      dust: after.dust - before.dust,
    };
  }

  getCounts(): NormalizerCounts {
    return { unrecognized: this.unrecognizedCount, malformed: this.malformedCount, dust: this.dustCount };
  }

  private isDust(event: DomainEvent): boolean {
    if (event.kind !== 'SoftLiquidation' && event.kind !== 'HardLiquidation' && event.kind !== 'SelfLiquidation') {
      return false;
    }
    if (event.amounts.debt >= this.minLiquidationDebt) return false;

    this.dustCount += 1;
    this.log.debug('Dropping dust liquidation', { kind: event.kind, tx: event.transactionHash, debt: event.amounts.debt.toString() });
    return true;
  }

  private classify(raw: RawLogEvent): { kind: 'decoded'; decoded: DecodedLog } | Exclude<NormalizeOutcome, { kind: 'event' | 'user-state' | 'dust' }> {
    const topic = raw.topics[0]?.toLowerCase() ?? null;
    if (topic === null || !CONTROLLER_EVENT_TOPICS.has(topic)) {
      this.unrecognizedCount += 1;
      this.log.debug('Dropping unrecognized controller log', { topic, tx: raw.transactionHash, logIndex: raw.logIndex });
      return { kind: 'unrecognized', topic };
    }

    try {
      return { kind: 'decoded', decoded: this.decode(raw) };
    } catch (error) {
      this.malformedCount += 1;
      const reason = describeError(error);
      this.log.warn('Dropping undecodable controller log', { tx: raw.transactionHash, logIndex: raw.logIndex, reason });
      return { kind: 'malformed', reason };
    }
  }

  private fromDecoded(controller: NormalizerController, raw: RawLogEvent, decoded: DecodedLog, enrichment: Enrichment): NormalizeOutcome {
    if (decoded.name === 'UserState') {
      return { kind: 'user-state', state: toSnapshot(raw, decoded) };
    }
    const event = this.toDomainEvent(controller, raw, decoded, enrichment);
    return this.isDust(event) ? { kind: 'dust', event } : { kind: 'event', event };
  }

  private decode(raw: RawLogEvent): DecodedLog {
    const description = controllerInterface.parseLog({ topics: raw.topics, data: raw.data });
    if (!description) {
      throw new Error(`no controller event for topic ${raw.topics[0] ?? '(none)'}`);
    }
    const { args } = description;

    switch (description.name) {
      case 'Borrow':
        return {
          name: 'Borrow',
          user: readAddress(args, 'user'),
          amounts: { collateral: readUint(args, 'collateral_increase'), stablecoin: 0n, debt: readUint(args, 'loan_increase') },
        };
      case 'Repay':
        return {
          name: 'Repay',
          user: readAddress(args, 'user'),
          amounts: { collateral: readUint(args, 'collateral_decrease'), stablecoin: 0n, debt: readUint(args, 'loan_decrease') },
        };
      case 'SoftLiquidation':
        return {
          name: 'SoftLiquidation',
          liquidator: readAddress(args, 'liquidator'),
          user: readAddress(args, 'user'),
          amounts: {
            collateral: readUint(args, 'collateral_sold'),
            stablecoin: readUint(args, 'stablecoin_received'),
            debt: readUint(args, 'debt_covered'),
          },
        };
      case 'Liquidate':
        return {
          name: 'Liquidate',
          liquidator: readAddress(args, 'liquidator'),
          user: readAddress(args, 'user'),
          amounts: {
            collateral: readUint(args, 'collateral_received'),
            stablecoin: readUint(args, 'stablecoin_received'),
            debt: readUint(args, 'debt'),
          },
        };
      case 'UserState':
        return {
          name: 'UserState',
          user: readAddress(args, 'user'),
          collateral: readUint(args, 'collateral'),
          debt: readUint(args, 'debt'),
          liquidationDiscount: readUint(args, 'liquidation_discount'),
        };
      default:
        throw new Error(`unhandled controller event ${description.name}`);
    }
  }

  private toDomainEvent(
    controller: NormalizerController,
    raw: RawLogEvent,
    decoded: Exclude<DecodedLog, { name: 'UserState' }>,
    enrichment: Enrichment,
  ): DomainEvent {
    const base = {
      network: this.network,
      controller: getAddress(controller.address),
      user: decoded.user,
      blockNumber: raw.blockNumber,
      transactionIndex: raw.transactionIndex,
      logIndex: raw.logIndex,
      transactionHash: raw.transactionHash.toLowerCase(),
      timestamp: this.timestampOf(raw.blockNumber),
      amounts: decoded.amounts,
    };

    const sameTxDiscount = enrichment.sameTxState?.liquidationDiscount;
    const discount =
      sameTxDiscount !== undefined && sameTxDiscount > 0n
        ? sameTxDiscount
        : enrichment.knownDiscount ?? controller.liquidationDiscount;

    switch (decoded.name) {
      case 'Borrow':
        return { ...base, kind: 'Borrow' };
      case 'Repay': {
        const remainingDebt = enrichment.sameTxState?.debt ?? null;
        return { ...base, kind: 'Repay', remainingDebt, isFullRepay: remainingDebt === 0n };
      }
      case 'SoftLiquidation':
      case 'Liquidate': {
        const isSelf = decoded.liquidator.toLowerCase() === decoded.user.toLowerCase();
        if (isSelf) {
          return {
            ...base,
            kind: 'SelfLiquidation',
            liquidator: decoded.liquidator,
            discount,
            origin: decoded.name === 'SoftLiquidation' ? 'soft' : 'hard',
          };
        }
        return decoded.name === 'SoftLiquidation'
          ? { ...base, kind: 'SoftLiquidation', liquidator: decoded.liquidator, discount }
          : { ...base, kind: 'HardLiquidation', liquidator: decoded.liquidator, discount };
      }
      default: {
        const unreachable: never = decoded;
        throw new Error(`unhandled decoded log at ${raw.transactionHash}:${raw.logIndex} (${typeof unreachable})`);
      }
    }
  }
}

export default EventNormalizer;
