import { RpcEndpointPool, redactUrl } from '../../src/services/rpc';
import { logger } from '../../src/utils/logger';
import { MockRpcNode } from '../mocks/MockRpcNode';
import { FALLBACK_RPC_URL, TEST_RPC_URL } from '../utils';

const buildPool = (endpointCount = 2, threshold = 2) => {
  const nodes = Array.from({ length: endpointCount }, () => new MockRpcNode({ head: 10 }));
  const urls = [TEST_RPC_URL, FALLBACK_RPC_URL];
  const endpoints = nodes.map((client, index) => ({ url: urls[index], client }));
  return { pool: new RpcEndpointPool(endpoints, threshold, logger), endpoints, nodes };
};

describe('RpcEndpointPool', () => {
  test('stays on the active endpoint below the failure threshold', () => {
    const { pool, endpoints } = buildPool();
    pool.reportFailure(pool.acquire(), new Error('request timeout'));
    expect(pool.acquire()).toBe(endpoints[0]);
  });

  test('fails over after consecutive failures', () => {
    const { pool, endpoints } = buildPool();
    pool.reportFailure(pool.acquire(), new Error('request timeout'));
    pool.reportFailure(pool.acquire(), new Error('request timeout'));

    expect(pool.acquire()).toBe(endpoints[1]);
    expect(pool.getStats()).toEqual([
      { url: 'https://rpc.test.invalid', requests: 2, failures: 2, active: false },
      { url: 'https://fallback.test.invalid', requests: 1, failures: 0, active: true },
    ]);
  });

  test('a success resets the consecutive failure count', () => {
    const { pool, endpoints } = buildPool();
    pool.reportFailure(pool.acquire(), new Error('request timeout'));
    pool.reportSuccess(pool.acquire());
    pool.reportFailure(pool.acquire(), new Error('request timeout'));

    expect(pool.acquire()).toBe(endpoints[0]);
  });

  test('ignores late failures from an endpoint that is no longer active', () => {
    const { pool, endpoints } = buildPool();
    const first = pool.acquire();
    pool.reportFailure(first, new Error('request timeout'));
    pool.reportFailure(first, new Error('request timeout'));
    pool.reportFailure(first, new Error('request timeout'));
    pool.reportFailure(first, new Error('request timeout'));

    expect(pool.acquire()).toBe(endpoints[1]);
  });

  test('wraps around to the first endpoint', () => {
    const { pool, endpoints } = buildPool(2, 1);
    pool.reportFailure(pool.acquire(), new Error('request timeout'));
    pool.reportFailure(pool.acquire(), new Error('request timeout'));

    expect(pool.acquire()).toBe(endpoints[0]);
  });

  test('never rotates with a single endpoint', () => {
    const { pool, endpoints } = buildPool(1);
    for (let i = 0; i < 5; i++) pool.reportFailure(pool.acquire(), new Error('request timeout'));
    expect(pool.acquire()).toBe(endpoints[0]);
  });

  test('destroy releases every client', () => {
    const { pool, nodes } = buildPool();
    pool.destroy();
    expect(nodes.map((node) => node.destroyed)).toEqual([true, true]);
  });

  test('rejects an empty endpoint list', () => {
    expect(() => new RpcEndpointPool([], 2, logger)).toThrow('at least one endpoint');
  });
});

describe('redactUrl', () => {
  test('drops path and query', () => {
    expect(redactUrl('https://rpc.test.invalid/v2/test-key?token=test-secret')).toBe('https://rpc.test.invalid');
  });

  test('hides unparsable urls', () => {
    expect(redactUrl('not a url')).toBe('<invalid url>');
  });
});
