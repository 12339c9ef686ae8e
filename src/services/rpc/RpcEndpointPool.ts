import { FetchRequest, JsonRpcProvider, Network } from 'ethers';
import { Logger } from '../../utils/logger';
import { describeError } from '../../utils/errors';

/** The slice of a JSON-RPC provider the gateway talks to. */
export interface JsonRpcClient {
  send(method: string, params: unknown[]): Promise<unknown>;
  destroy?(): void;
}

export interface RpcEndpoint {
  url: string;
  client: JsonRpcClient;
}

export interface EndpointStats {
  url: string;
  requests: number;
  failures: number;
  active: boolean;
}

export const createJsonRpcClient = (url: string, chainId: number, timeoutMs: number): JsonRpcClient => {
  const request = new FetchRequest(url);
  request.timeout = timeoutMs;
  // A static network keeps ethers from probing eth_chainId before every call.
  const network = Network.from(chainId);
  return new JsonRpcProvider(request, network, { staticNetwork: network, batchMaxCount: 1 });
};

// Strip credentials (API keys in path or query) before a URL reaches the logs.
export const redactUrl = (url: string): string => {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}`;
  } catch {
    return '<invalid url>';
  }
};

/**
 * Ordered endpoints with round-robin fail-over. Calls go to the active endpoint
 * until it fails `failoverThreshold` times in a row, then the next one takes over.
 */
class RpcEndpointPool {
  private activeIndex = 0;

  private consecutiveFailures = 0;

  private readonly requests: number[];

  private readonly failures: number[];

  constructor(
    private readonly endpoints: RpcEndpoint[],
    private readonly failoverThreshold: number,
    private readonly log: Logger,
  ) {
    if (endpoints.length === 0) {
      throw new Error('RpcEndpointPool needs at least one endpoint');
    }
    this.requests = endpoints.map(() => 0);
    this.failures = endpoints.map(() => 0);
  }

  acquire(): RpcEndpoint {
    this.requests[this.activeIndex] += 1;
    return this.endpoints[this.activeIndex];
  }

  reportSuccess(endpoint: RpcEndpoint): void {
    if (this.endpoints[this.activeIndex] === endpoint) {
      this.consecutiveFailures = 0;
    }
  }

  reportFailure(endpoint: RpcEndpoint, error: unknown): void {
    const index = this.endpoints.indexOf(endpoint);
    if (index < 0) return;
    this.failures[index] += 1;

    // Late failures from an endpoint we already rotated away from do not count twice.
    if (index !== this.activeIndex) return;

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures < this.failoverThreshold || this.endpoints.length < 2) return;

    const previous = this.activeIndex;
    this.activeIndex = (this.activeIndex + 1) % this.endpoints.length;
    this.consecutiveFailures = 0;
    this.log.warn('RPC endpoint failing, switching to fallback', {
      from: redactUrl(this.endpoints[previous].url),
      to: redactUrl(this.endpoints[this.activeIndex].url),
      error: describeError(error),
    });
  }

  getStats(): EndpointStats[] {
    return this.endpoints.map((endpoint, index) => ({
      url: redactUrl(endpoint.url),
      requests: this.requests[index],
      failures: this.failures[index],
      active: index === this.activeIndex,
    }));
  }

  destroy(): void {
    for (const endpoint of this.endpoints) {
      endpoint.client.destroy?.();
    }
  }
}

export default RpcEndpointPool;
