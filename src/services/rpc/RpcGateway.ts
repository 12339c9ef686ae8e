import { toQuantity } from 'ethers';
import { Address, BlockHeader, BlockRange, NetworkDescriptor, RawLogEvent, RetryPolicy } from '../../types';
import { Logger } from '../../utils/logger';
import { describeError, RpcRangeTooLarge, RpcUnavailable, ScanCancelled } from '../../utils/errors';
import { retryWithBackoff } from '../../utils/retry';
import RpcEndpointPool from './RpcEndpointPool';
import { classifyRpcError } from './rpcErrors';
import { parseBlockHeader, parseBlockNumber, parseHexData, parseLogs } from './rpcResponses';

export interface RpcGatewayTelemetry {
  calls: number;
  retries: number;
  failures: number;
}

/**
 * Single-network JSON-RPC access. Every call is retried locally and fails with
 * RpcUnavailable once attempts and fallback endpoints are used up.
 */
class RpcGateway {
  private readonly timestamps = new Map<number, Promise<number>>();

  private readonly telemetry: RpcGatewayTelemetry = { calls: 0, retries: 0, failures: 0 };

  constructor(
    private readonly network: NetworkDescriptor,
    private readonly pool: RpcEndpointPool,
    private readonly policy: RetryPolicy,
    private readonly log: Logger,
  ) {}

  get networkName(): string {
    return this.network.name;
  }

  async currentBlockNumber(signal?: AbortSignal): Promise<number> {
    return this.request('eth_blockNumber', [], parseBlockNumber, signal);
  }

  async fetchBlockHeader(blockNumber: number, signal?: AbortSignal): Promise<BlockHeader> {
    const header = await this.request(
      'eth_getBlockByNumber',
      [toQuantity(blockNumber), false],
      (raw) => parseBlockHeader(raw, blockNumber, this.network.requiresAuthorityMiddleware),
      signal,
    );
    if (header.strippedExtraDataBytes > 0) {
      this.log.debug('Stripped authority extraData from block header', {
        block: header.number,
        strippedBytes: header.strippedExtraDataBytes,
      });
    }
    return header;
  }

  async fetchBlockTimestamp(blockNumber: number, signal?: AbortSignal): Promise<number> {
    const cached = this.timestamps.get(blockNumber);
    if (cached) return cached;

    const pending = this.fetchBlockHeader(blockNumber, signal).then((header) => header.timestamp);
    this.timestamps.set(blockNumber, pending);
    try {
      return await pending;
    } catch (error) {
      this.timestamps.delete(blockNumber);
      throw error;
    }
  }

  async fetchLogs(
    controller: Address,
    range: BlockRange,
    eventSignatures: string[],
    signal?: AbortSignal,
  ): Promise<RawLogEvent[]> {
    const filter = {
      address: controller,
      fromBlock: toQuantity(range.startBlock),
      toBlock: toQuantity(range.endBlock),
      topics: [eventSignatures],
    };
    const wanted = controller.toLowerCase();
    const logs = await this.request('eth_getLogs', [filter], parseLogs, signal, range);
    return logs.filter((log) => log.address.toLowerCase() === wanted);
  }

  async hasCode(address: Address, blockNumber: number, signal?: AbortSignal): Promise<boolean> {
    const code = await this.request(
      'eth_getCode',
      [address, toQuantity(blockNumber)],
      (raw) => parseHexData(raw, 'eth_getCode'),
      signal,
    );
    return code !== '0x';
  }

  async call(to: Address, data: string, signal?: AbortSignal): Promise<string> {
    return this.request('eth_call', [{ to, data }, 'latest'], (raw) => parseHexData(raw, 'eth_call'), signal);
  }

  getTelemetry(): RpcGatewayTelemetry {
    return { ...this.telemetry };
  }

  private async request<T>(
    method: string,
    params: unknown[],
    parse: (raw: unknown) => T,
    signal?: AbortSignal,
    range?: BlockRange,
  ): Promise<T> {
    this.telemetry.calls += 1;

    const result = await retryWithBackoff(
      async () => {
        const endpoint = this.pool.acquire();
        try {
          const value = parse(await endpoint.client.send(method, params));
          this.pool.reportSuccess(endpoint);
          return value;
        } catch (error) {
          // An oversized range is the request's fault, not the endpoint's.
          if (classifyRpcError(error) !== 'range') {
            this.pool.reportFailure(endpoint, error);
          }
          throw error;
        }
      },
      (error) => (classifyRpcError(error) === 'retryable' ? 'retryable' : 'fatal'),
      this.policy,
      {
        signal,
        onRetry: ({ attempt, delayMs, error }) => {
          this.telemetry.retries += 1;
          this.log.debug('RPC call failed, backing off', {
            method,
            attempt,
            delayMs,
            endpoint: this.activeEndpoint(),
            error: describeError(error),
          });
        },
      },
    );

    switch (result.status) {
      case 'success':
        return result.value;
      case 'cancelled':
        throw new ScanCancelled(method);
      case 'fatal':
        this.telemetry.failures += 1;
        if (range && classifyRpcError(result.error) === 'range') {
          throw new RpcRangeTooLarge(range, result.error);
        }
        throw result.error;
      case 'exhausted':
        this.telemetry.failures += 1;
        throw new RpcUnavailable(method, result.attempts, result.error);
    }
  }

  private activeEndpoint(): string {
    return this.pool.getStats().find((stats) => stats.active)?.url ?? 'unknown';
  }
}

export default RpcGateway;
