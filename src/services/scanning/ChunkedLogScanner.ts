import { Address, BlockRange, ChunkScanStats, ChunkSizingConfig, PartialScanResult, RawLogEvent } from '../../types';
import { Logger } from '../../utils/logger';
import { describeError, RpcRangeTooLarge, RpcUnavailable, ScanCancelled } from '../../utils/errors';
import RpcGateway from '../rpc/RpcGateway';
import { logIdentity } from '../events/ordering';

interface ScanState {
  cursor: number;
  chunkSize: number;
  successStreak: number;
  events: Map<string, RawLogEvent>;
  unresolved: BlockRange[];
  stats: ChunkScanStats;
}

interface SplitGroup {
  remaining: number;
  unavailable: number;
  waiting: BlockRange[];
}

interface PendingWindow {
  range: BlockRange;
  group: SplitGroup | null;
}

const widthOf = (range: BlockRange): number => range.endBlock - range.startBlock + 1;

/** Sorts and merges touching or overlapping ranges. */
export const coalesceRanges = (ranges: BlockRange[]): BlockRange[] => {
  const sorted = [...ranges].sort((a, b) => a.startBlock - b.startBlock);
  const merged: BlockRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.startBlock <= last.endBlock + 1) {
      last.endBlock = Math.max(last.endBlock, range.endBlock);
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
};

/**
 * Walks a block range in adaptive windows. Failed windows are halved and
 * retried; what still fails at the minimum size is returned as a gap next to
 * everything that was fetched. An unavailable node stops the halving as soon
 * as both halves of a split fail with it.
 */
class ChunkedLogScanner {
  constructor(
    private readonly gateway: RpcGateway,
    private readonly sizing: ChunkSizingConfig,
    private readonly log: Logger,
  ) {}

  async scan(controller: Address, range: BlockRange, topics: string[], signal?: AbortSignal): Promise<PartialScanResult> {
    const state: ScanState = {
      cursor: range.startBlock,
      chunkSize: this.sizing.initialChunkSize,
      successStreak: 0,
      events: new Map(),
      unresolved: [],
      stats: { requests: 0, completedChunks: 0, splits: 0, finalChunkSize: this.sizing.initialChunkSize },
    };

    if (range.startBlock >= range.endBlock) {
      this.log.info('Skipping controller scan, empty or inverted range', { controller, ...range });
      return { events: [], unresolvedRanges: [], skipped: true, cancelled: false, stats: state.stats };
    }

    const workerCount = Math.max(1, Math.min(this.sizing.concurrency, Math.ceil(widthOf(range) / state.chunkSize)));
    await Promise.all(Array.from({ length: workerCount }, () => this.runWorker(controller, range, topics, state, signal)));

    const cancelled = signal?.aborted ?? false;
    if (cancelled && state.cursor <= range.endBlock) {
      state.unresolved.push({ startBlock: state.cursor, endBlock: range.endBlock });
    }

    state.stats.finalChunkSize = state.chunkSize;
    const unresolvedRanges = coalesceRanges(state.unresolved);
    this.log.debug('Controller scan finished', {
      controller,
      ...range,
      events: state.events.size,
      unresolved: unresolvedRanges.length,
      ...state.stats,
    });

    return { events: [...state.events.values()], unresolvedRanges, skipped: false, cancelled, stats: state.stats };
  }

  private async runWorker(
    controller: Address,
    range: BlockRange,
    topics: string[],
    state: ScanState,
    signal?: AbortSignal,
  ): Promise<void> {
    while (!signal?.aborted) {
      const window = this.nextWindow(range, state);
      if (!window) return;
      await this.fetchWindow(controller, window, topics, state, signal);
    }
  }

  private nextWindow(range: BlockRange, state: ScanState): BlockRange | null {
    if (state.cursor > range.endBlock) return null;
    const window = {
      startBlock: state.cursor,
      endBlock: Math.min(state.cursor + state.chunkSize - 1, range.endBlock),
    };
    state.cursor = window.endBlock + 1;
    return window;
  }

  private async fetchWindow(
    controller: Address,
    window: BlockRange,
    topics: string[],
    state: ScanState,
    signal?: AbortSignal,
  ): Promise<void> {
    const pending: PendingWindow[] = [{ range: window, group: null }];
    const deferred: BlockRange[] = [];
    const abandon = (current: BlockRange): void => {
      state.unresolved.push(current, ...pending.map((entry) => entry.range), ...deferred);
    };

    for (let current = pending.shift(); current; current = pending.shift()) {
      if (signal?.aborted) {
        abandon(current.range);
        return;
      }

      state.stats.requests += 1;
      try {
        const logs = await this.gateway.fetchLogs(controller, current.range, topics, signal);
        for (const log of logs) {
          state.events.set(logIdentity(log), log);
        }
        state.stats.completedChunks += 1;
        this.recordSuccess(state);
      } catch (error) {
        if (error instanceof ScanCancelled) {
          abandon(current.range);
          return;
        }

        state.successStreak = 0;
        const splittable = Math.floor(widthOf(current.range) / 2) >= this.sizing.minChunkSize;
        const halveNow = error instanceof RpcRangeTooLarge || (error instanceof RpcUnavailable && current.group === null);
        if (halveNow && splittable) {
          this.split(controller, current.range, pending, state, describeError(error));
        } else if (error instanceof RpcUnavailable && splittable && current.group !== null) {
          // Decided once the sibling settles.
          current.group.unavailable += 1;
          current.group.waiting.push(current.range);
          deferred.push(current.range);
        } else {
          if (error instanceof RpcUnavailable && current.group !== null) current.group.unavailable += 1;
          state.unresolved.push(current.range);
          this.log.warn('Giving up on log window', { controller, ...current.range, error: describeError(error) });
        }
      }

      this.settle(controller, current.group, pending, deferred, state);
    }
  }

  private split(
    controller: Address,
    range: BlockRange,
    pending: PendingWindow[],
    state: ScanState,
    reason: string,
  ): void {
    const half = Math.floor(widthOf(range) / 2);
    const middle = range.startBlock + half - 1;
    const group: SplitGroup = { remaining: 2, unavailable: 0, waiting: [] };
    pending.unshift(
      { range: { startBlock: range.startBlock, endBlock: middle }, group },
      { range: { startBlock: middle + 1, endBlock: range.endBlock }, group },
    );
    state.stats.splits += 1;
    state.chunkSize = Math.max(this.sizing.minChunkSize, Math.min(state.chunkSize, half));
    this.log.debug('Splitting log window', { controller, ...range, chunkSize: state.chunkSize, reason });
  }

  private settle(
    controller: Address,
    group: SplitGroup | null,
    pending: PendingWindow[],
    deferred: BlockRange[],
    state: ScanState,
  ): void {
    if (group === null) return;
    group.remaining -= 1;
    if (group.remaining > 0) return;

    for (const range of group.waiting) {
      deferred.splice(deferred.indexOf(range), 1);
    }
    if (group.unavailable >= 2) {
      state.unresolved.push(...group.waiting);
      for (const range of group.waiting) {
        this.log.warn('Giving up on log window, both halves unavailable', { controller, ...range });
      }
      return;
    }
    for (const range of group.waiting) {
      this.split(controller, range, pending, state, 'sibling window succeeded');
    }
  }

  private recordSuccess(state: ScanState): void {
    state.successStreak += 1;
    if (state.successStreak >= this.sizing.growAfterSuccesses && state.chunkSize < this.sizing.maxChunkSize) {
      state.chunkSize = Math.min(this.sizing.maxChunkSize, state.chunkSize * 2);
      state.successStreak = 0;
    }
  }
}

export default ChunkedLogScanner;
