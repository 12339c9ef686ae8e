import { RpcEndpointPool, RpcGateway } from '../../src/services/rpc';
import { ChunkedLogScanner, coalesceRanges } from '../../src/services/scanning';
import { logIdentity } from '../../src/services/events';
import { ChunkSizingConfig, RawLogEvent } from '../../src/types';
import { logger } from '../../src/utils/logger';
import { logRangeOf, MockRpcNode } from '../mocks/MockRpcNode';
import { borrowLog, createNetwork, DEBT_1000, TEST_ADDRESSES, TEST_RPC_URL } from '../utils';

const SIZING: ChunkSizingConfig = {
  initialChunkSize: 100,
  minChunkSize: 1,
  maxChunkSize: 1_000,
  growAfterSuccesses: 1_000,
  concurrency: 1,
};

const LOG_BLOCKS = [0, 3, 99, 100, 101, 250, 251, 499, 500, 777, 998, 999];

const seededNode = (): MockRpcNode =>
  new MockRpcNode({ head: 1_000 }).addLogs(
    ...LOG_BLOCKS.map((blockNumber, index) =>
      borrowLog(TEST_ADDRESSES.alice, 1n, DEBT_1000, { blockNumber, logIndex: index }),
    ),
  );

const buildScanner = (node: MockRpcNode, sizing: Partial<ChunkSizingConfig> = {}) => {
  const pool = new RpcEndpointPool([{ url: TEST_RPC_URL, client: node }], 2, logger);
  const gateway = new RpcGateway(createNetwork(), pool, { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }, logger);
  return new ChunkedLogScanner(gateway, { ...SIZING, ...sizing }, logger);
};

const blocksOf = (events: RawLogEvent[]): number[] => events.map((event) => event.blockNumber).sort((a, b) => a - b);

const identities = (events: RawLogEvent[]): string[] => events.map(logIdentity).sort();

describe('ChunkedLogScanner', () => {
  test.each([
    [7, 1],
    [50, 3],
    [100, 2],
    [333, 4],
    [1_000, 1],
  ])('returns the same events with chunk size %i and concurrency %i', async (initialChunkSize, concurrency) => {
    const node = seededNode();
    const scanner = buildScanner(node, { initialChunkSize, concurrency });

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 999 }, []);

    expect(blocksOf(result.events)).toEqual(LOG_BLOCKS);
    expect(result.unresolvedRanges).toEqual([]);
    expect(result.cancelled).toBe(false);
    expect(result.skipped).toBe(false);
  });

  test('removes duplicate logs', async () => {
    const log = borrowLog(TEST_ADDRESSES.alice, 1n, DEBT_1000, { blockNumber: 42 });
    const node = new MockRpcNode({ head: 100 }).addLogs(log, { ...log });
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 100 }, []);
    expect(identities(result.events)).toEqual([logIdentity(log)]);
  });

  test('keeps fetched chunks when a later chunk exhausts its retries', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('request timeout'), {
      when: (params) => logRangeOf(params).fromBlock >= 200,
    });
    const scanner = buildScanner(node, { minChunkSize: 100 });

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 100, endBlock: 299 }, []);

    expect(blocksOf(result.events)).toEqual([100, 101]);
    expect(result.unresolvedRanges).toEqual([{ startBlock: 200, endBlock: 299 }]);
    expect(result.stats.splits).toBe(0);
  });

  test('narrows a failing chunk down to the single block that keeps failing', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('request timeout'), {
      when: (params) => {
        const { fromBlock, toBlock } = logRangeOf(params);
        return toBlock >= 250 && fromBlock <= 250;
      },
    });
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 200, endBlock: 299 }, []);

    expect(blocksOf(result.events)).toEqual([251]);
    expect(result.unresolvedRanges).toEqual([{ startBlock: 250, endBlock: 250 }]);
    expect(result.stats.splits).toBe(6);
  });

  test('stops halving once both halves of a split are unavailable', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('request timeout'), {
      when: (params) => {
        const { fromBlock, toBlock } = logRangeOf(params);
        return toBlock >= 250 && fromBlock <= 251;
      },
    });
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 200, endBlock: 299 }, []);

    expect(blocksOf(result.events)).toEqual([]);
    expect(result.unresolvedRanges).toEqual([{ startBlock: 250, endBlock: 252 }]);
    expect(result.stats.splits).toBe(6);
  });

  test('splits only once when the node is down for the whole range', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('503 service unavailable'));
    const scanner = buildScanner(node, { initialChunkSize: 512 });

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 511 }, []);

    expect(result.unresolvedRanges).toEqual([{ startBlock: 0, endBlock: 511 }]);
    expect(result.stats).toEqual({ requests: 3, completedChunks: 0, splits: 1, finalChunkSize: 256 });
    expect(node.count('eth_getLogs')).toBe(9);
  });

  test('halves oversized ranges until the provider accepts them', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('query returned more than 10000 results'), {
      when: (params) => {
        const { fromBlock, toBlock } = logRangeOf(params);
        return toBlock - fromBlock + 1 > 25;
      },
    });
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 399 }, []);

    expect(blocksOf(result.events)).toEqual([0, 3, 99, 100, 101, 250, 251]);
    expect(result.unresolvedRanges).toEqual([]);
    expect(result.stats.finalChunkSize).toBe(25);
  });

  test('grows the chunk size after a run of successes', async () => {
    const node = seededNode();
    const scanner = buildScanner(node, { initialChunkSize: 10, maxChunkSize: 40, growAfterSuccesses: 2 });

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 199 }, []);

    expect(result.stats.finalChunkSize).toBe(40);
    expect(node.count('eth_getLogs')).toBe(8);
    expect(blocksOf(result.events)).toEqual([0, 3, 99, 100, 101]);
  });

  test('marks windows unresolved on non-recoverable errors without splitting', async () => {
    const node = seededNode().failOn('eth_getLogs', new Error('invalid params'));
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 99 }, []);

    expect(result.unresolvedRanges).toEqual([{ startBlock: 0, endBlock: 99 }]);
    expect(result.stats.splits).toBe(0);
    expect(node.count('eth_getLogs')).toBe(1);
  });

  test('skips an empty or inverted range', async () => {
    const node = seededNode();
    const scanner = buildScanner(node);

    const single = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 5, endBlock: 5 }, []);
    const inverted = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 9, endBlock: 5 }, []);

    expect(single.skipped).toBe(true);
    expect(inverted.skipped).toBe(true);
    expect(node.count('eth_getLogs')).toBe(0);
  });

  test('returns everything fetched so far when cancelled', async () => {
    const abort = new AbortController();
    const node = seededNode().failOn('eth_getLogs', new Error('unused'), {
      when: (params) => {
        if (logRangeOf(params).fromBlock >= 200) abort.abort();
        return false;
      },
    });
    const scanner = buildScanner(node);

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 499 }, [], abort.signal);

    expect(result.cancelled).toBe(true);
    expect(blocksOf(result.events)).toEqual([0, 3, 99, 100, 101, 250, 251]);
    expect(result.unresolvedRanges).toEqual([{ startBlock: 300, endBlock: 499 }]);
  });

  test('reports the whole range when cancelled before starting', async () => {
    const abort = new AbortController();
    abort.abort();
    const scanner = buildScanner(seededNode());

    const result = await scanner.scan(TEST_ADDRESSES.controller, { startBlock: 0, endBlock: 499 }, [], abort.signal);

    expect(result).toMatchObject({ cancelled: true, events: [], unresolvedRanges: [{ startBlock: 0, endBlock: 499 }] });
  });
});

describe('coalesceRanges', () => {
  test('merges touching and overlapping ranges', () => {
    expect(
      coalesceRanges([
        { startBlock: 20, endBlock: 29 },
        { startBlock: 0, endBlock: 9 },
        { startBlock: 10, endBlock: 12 },
        { startBlock: 25, endBlock: 40 },
        { startBlock: 50, endBlock: 50 },
      ]),
    ).toEqual([
      { startBlock: 0, endBlock: 12 },
      { startBlock: 20, endBlock: 40 },
      { startBlock: 50, endBlock: 50 },
    ]);
  });
});
