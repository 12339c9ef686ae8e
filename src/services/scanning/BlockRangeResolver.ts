import { BlockRange, ControllerDescriptor } from '../../types';
import { Logger } from '../../utils/logger';
import {
  BlockResolutionAmbiguous,
  BlockResolutionFailed,
  describeError,
  ScanCancelled,
} from '../../utils/errors';
import RpcGateway from '../rpc/RpcGateway';

export type BlockSearchOutcome =
  | { kind: 'before-genesis'; block: number }
  | { kind: 'after-head'; block: number }
  | { kind: 'found'; block: number };

export type ActivityClamp =
  | { kind: 'hint'; startBlock: number }
  | { kind: 'located'; startBlock: number }
  | { kind: 'fallback'; startBlock: number; warning: string }
  | { kind: 'not-deployed' };

interface ResolvedBound {
  block: number;
  /** True when the bound is a deliberate one rather than a clamp to genesis or head. */
  exact: boolean;
}

/**
 * Maps wall-clock windows to inclusive block ranges on one network. Block
 * timestamps are assumed non-decreasing, so every lookup is a binary search.
 */
class BlockRangeResolver {
  constructor(
    private readonly gateway: RpcGateway,
    private readonly log: Logger,
  ) {}

  async resolve(startDate?: Date, endDate?: Date, signal?: AbortSignal): Promise<BlockRange> {
    if (startDate && endDate && startDate.getTime() > endDate.getTime()) {
      throw new BlockResolutionFailed(
        `Start date ${startDate.toISOString()} is after end date ${endDate.toISOString()}`,
      );
    }

    let start: ResolvedBound;
    let end: ResolvedBound;
    try {
      const head = await this.gateway.currentBlockNumber(signal);
      start = await this.resolveStart(startDate, head, signal);
      end = await this.resolveEnd(endDate, head, signal);
    } catch (error) {
      if (
        error instanceof ScanCancelled ||
        error instanceof BlockResolutionAmbiguous ||
        error instanceof BlockResolutionFailed
      ) {
        throw error;
      }
      throw new BlockResolutionFailed(
        `Block search failed on ${this.gateway.networkName}: ${describeError(error)}`,
        { cause: error },
      );
    }

    if (start.block > end.block) {
      throw new BlockResolutionAmbiguous(
        `Window resolves to no block on ${this.gateway.networkName} (start ${start.block} > end ${end.block})`,
      );
    }
    if (start.block === end.block && !(start.exact && end.exact)) {
      throw new BlockResolutionAmbiguous(
        `Window collapsed to block ${start.block} on ${this.gateway.networkName} without a converged search`,
      );
    }

    const range = { startBlock: start.block, endBlock: end.block };
    this.log.info('Resolved scan window', { ...range, startDate, endDate });
    return range;
  }

  /** First block whose timestamp is >= `time` (unix seconds). */
  async findFirstBlockAtOrAfter(time: number, head: number, signal?: AbortSignal): Promise<BlockSearchOutcome> {
    const genesisTime = await this.gateway.fetchBlockTimestamp(0, signal);
    if (time < genesisTime) return { kind: 'before-genesis', block: 0 };

    const headTime = await this.gateway.fetchBlockTimestamp(head, signal);
    if (time > headTime) return { kind: 'after-head', block: head };

    let low = 0;
    let high = head;
    let probes = 0;
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      probes += 1;
      if ((await this.gateway.fetchBlockTimestamp(mid, signal)) >= time) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }

    this.log.debug('Block search converged', { time, block: low, probes });
    return { kind: 'found', block: low };
  }

  /** First block at which `address` has code, or null when it has none at `head`. */
  async findDeploymentBlock(address: string, head: number, signal?: AbortSignal): Promise<number | null> {
    if (!(await this.gateway.hasCode(address, head, signal))) return null;

    let low = 0;
    let high = head;
    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      if (await this.gateway.hasCode(address, mid, signal)) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }
    return low;
  }

  /**
   * Start block for a controller. A zero creationBlock is treated as unknown and
   * replaced by the deployment block found on chain.
   */
  async clampToActivity(controller: ControllerDescriptor, head: number, signal?: AbortSignal): Promise<ActivityClamp> {
    if (controller.creationBlock > 0) {
      return { kind: 'hint', startBlock: controller.creationBlock };
    }

    try {
      const deployment = await this.findDeploymentBlock(controller.address, head, signal);
      if (deployment === null) return { kind: 'not-deployed' };
      this.log.info('Located controller deployment block', { controller: controller.address, deployment });
      return { kind: 'located', startBlock: deployment };
    } catch (error) {
      if (error instanceof ScanCancelled) throw error;
      const warning = `creationBlock is 0 and deployment lookup failed for ${controller.address}; scanning from block 0 (${describeError(error)})`;
      this.log.warn(warning);
      return { kind: 'fallback', startBlock: 0, warning };
    }
  }

  private async resolveStart(startDate: Date | undefined, head: number, signal?: AbortSignal): Promise<ResolvedBound> {
    if (!startDate) return { block: 0, exact: true };

    const outcome = await this.findFirstBlockAtOrAfter(toUnixSeconds(startDate), head, signal);
    return { block: outcome.block, exact: outcome.kind !== 'after-head' };
  }

  private async resolveEnd(endDate: Date | undefined, head: number, signal?: AbortSignal): Promise<ResolvedBound> {
    if (!endDate) return { block: head, exact: true };

    const outcome = await this.findFirstBlockAtOrAfter(toUnixSeconds(endDate), head, signal);
    switch (outcome.kind) {
      case 'before-genesis':
        throw new BlockResolutionAmbiguous(`End date ${endDate.toISOString()} precedes genesis on ${this.gateway.networkName}`);
      case 'after-head':
        return { block: head, exact: false };
      case 'found':
        // the end date itself is exclusive
        return { block: outcome.block - 1, exact: true };
    }
  }
}

const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

export default BlockRangeResolver;
