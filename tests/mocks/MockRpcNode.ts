import { toQuantity } from 'ethers';
import { JsonRpcClient } from '../../src/services/rpc';
import { RawLogEvent } from '../../src/types';

export interface MockRpcNodeOptions {
  head: number;
  genesisTimestamp?: number;
  blockTime?: number;
  /** Length of the extraData field in every block header. */
  extraDataBytes?: number;
}

interface FailureRule {
  method: string;
  error: () => Error;
  remaining: number;
  when?: (params: unknown[]) => boolean;
}

export interface RecordedCall {
  method: string;
  params: unknown[];
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

const readQuantity = (value: unknown): number => {
  if (typeof value !== 'string') throw new Error(`expected a quantity, got ${typeof value}`);
  return Number(value);
};

/** Block bounds of an eth_getLogs call, for use in `failOn` predicates. */
export const logRangeOf = (params: unknown[]): { fromBlock: number; toBlock: number } => {
  const filter = params[0];
  if (!isRecord(filter)) throw new Error('eth_getLogs without a filter');
  return { fromBlock: readQuantity(filter.fromBlock), toBlock: readQuantity(filter.toBlock) };
};

/**
 * In-process stand-in for a JSON-RPC node. Block timestamps follow
 * `genesisTimestamp + number * blockTime`; logs, code and eth_call results are
 * seeded by the test.
 */
export class MockRpcNode implements JsonRpcClient {
  readonly calls: RecordedCall[] = [];

  head: number;

  private readonly genesisTimestamp: number;

  private readonly blockTime: number;

  private readonly extraDataBytes: number;

  private readonly logs: RawLogEvent[] = [];

  private readonly deployments = new Map<string, number>();

  private readonly callResults = new Map<string, string>();

  private readonly failures: FailureRule[] = [];

  destroyed = false;

  constructor(options: MockRpcNodeOptions) {
    this.head = options.head;
    this.genesisTimestamp = options.genesisTimestamp ?? 1_600_000_000;
    this.blockTime = options.blockTime ?? 12;
    this.extraDataBytes = options.extraDataBytes ?? 32;
  }

  timestampOf(block: number): number {
    return this.genesisTimestamp + block * this.blockTime;
  }

  addLogs(...logs: RawLogEvent[]): this {
    this.logs.push(...logs);
    return this;
  }

  setCode(address: string, deployedAt: number): this {
    this.deployments.set(address.toLowerCase(), deployedAt);
    return this;
  }

  setCallResult(address: string, data: string): this {
    this.callResults.set(address.toLowerCase(), data);
    return this;
  }

  /** Makes the next `times` matching calls throw. */
  failOn(
    method: string,
    error: Error | (() => Error),
    options: { times?: number; when?: (params: unknown[]) => boolean } = {},
  ): this {
    this.failures.push({
      method,
      error: typeof error === 'function' ? error : () => error,
      remaining: options.times ?? Number.POSITIVE_INFINITY,
      when: options.when,
    });
    return this;
  }

  count(method: string): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  destroy(): void {
    this.destroyed = true;
  }

  async send(method: string, params: unknown[]): Promise<unknown> {
    this.calls.push({ method, params });

    const failure = this.failures.find(
      (rule) => rule.method === method && rule.remaining > 0 && (!rule.when || rule.when(params)),
    );
    if (failure) {
      failure.remaining -= 1;
      throw failure.error();
    }

    switch (method) {
      case 'eth_blockNumber':
        return toQuantity(this.head);
      case 'eth_getBlockByNumber':
        return this.block(readQuantity(params[0]));
      case 'eth_getLogs':
        return this.getLogs(params);
      case 'eth_getCode':
        return this.getCode(params);
      case 'eth_call':
        return this.call(params);
      default:
        throw new Error(`method ${method} not supported`);
    }
  }

  private block(number: number): Record<string, unknown> | null {
    if (number > this.head) return null;
    return {
      number: toQuantity(number),
      timestamp: toQuantity(this.timestampOf(number)),
      hash: `0x${number.toString(16).padStart(64, '0')}`,
      extraData: `0x${'ab'.repeat(this.extraDataBytes)}`,
    };
  }

  private getLogs(params: unknown[]): Array<Record<string, unknown>> {
    const { fromBlock, toBlock } = logRangeOf(params);
    const filter = params[0];
    const address = isRecord(filter) && typeof filter.address === 'string' ? filter.address.toLowerCase() : null;

    return this.logs
      .filter((log) => log.blockNumber >= fromBlock && log.blockNumber <= toBlock)
      .filter((log) => address === null || log.address.toLowerCase() === address)
      .map((log) => ({
        address: log.address,
        blockNumber: toQuantity(log.blockNumber),
        transactionHash: log.transactionHash,
        transactionIndex: toQuantity(log.transactionIndex),
        logIndex: toQuantity(log.logIndex),
        topics: log.topics,
        data: log.data,
        removed: false,
      }));
  }

  private getCode(params: unknown[]): string {
    const address = typeof params[0] === 'string' ? params[0].toLowerCase() : '';
    const deployedAt = this.deployments.get(address);
    return deployedAt !== undefined && readQuantity(params[1]) >= deployedAt ? '0x6080604052' : '0x';
  }

  private call(params: unknown[]): string {
    const request = params[0];
    const to = isRecord(request) && typeof request.to === 'string' ? request.to.toLowerCase() : '';
    const result = this.callResults.get(to);
    if (result === undefined) throw new Error('execution reverted');
    return result;
  }
}

export default MockRpcNode;
