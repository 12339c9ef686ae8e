import { parseUnits } from 'ethers';
import { loadConfig } from '../../src/config';
import { LogLevel } from '../../src/types';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
  test('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      networksFile: 'config/networks.json',
      outputDir: 'reports',
      checkpointFile: 'data/scan_checkpoints.json',
      logLevel: LogLevel.INFO,
      logToFile: true,
      logDir: 'logs',
      rpc: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000, timeoutMs: 30000, failoverThreshold: 2 },
      scan: {
        initialChunkSize: 10000,
        minChunkSize: 1,
        maxChunkSize: 50000,
        growAfterSuccesses: 5,
        concurrency: 4,
        timestampConcurrency: 8,
        defaultLiquidationDiscount: parseUnits('0.06', 18),
        minLiquidationDebt: parseUnits('5', 18),
      },
    });
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      NETWORKS_FILE: 'custom/networks.json',
      OUTPUT_DIR: 'out',
      LOG_LEVEL: 'DEBUG',
      LOG_TO_FILE: 'false',
      RPC_MAX_ATTEMPTS: '4',
      SCAN_CHUNK_SIZE: '2000',
      SCAN_CONCURRENCY: '2',
      DEFAULT_LIQUIDATION_DISCOUNT: '0.03',
      MIN_LIQUIDATION_DEBT: '0.5',
    });

    expect(config.networksFile).toBe('custom/networks.json');
    expect(config.outputDir).toBe('out');
    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.logToFile).toBe(false);
    expect(config.rpc.maxAttempts).toBe(4);
    expect(config.scan.initialChunkSize).toBe(2000);
    expect(config.scan.concurrency).toBe(2);
    expect(config.scan.defaultLiquidationDiscount).toBe(parseUnits('0.03', 18));
    expect(config.scan.minLiquidationDebt).toBe(parseUnits('0.5', 18));
  });

  test.each([
    [{ RPC_MAX_ATTEMPTS: '2' }, 'RPC_MAX_ATTEMPTS must be greater than RPC_FAILOVER_THRESHOLD'],
    [{ SCAN_MIN_CHUNK_SIZE: '20000' }, 'Chunk sizes must satisfy SCAN_MIN_CHUNK_SIZE <= SCAN_CHUNK_SIZE <= SCAN_MAX_CHUNK_SIZE'],
    [{ SCAN_CONCURRENCY: '0' }, 'SCAN_CONCURRENCY must be a positive integer'],
    [{ RPC_TIMEOUT_MS: 'soon' }, 'Env RPC_TIMEOUT_MS must be a valid number'],
    [{ LOG_LEVEL: 'loud' }, 'LOG_LEVEL must be one of info, debug, warn, error'],
    [{ DEFAULT_LIQUIDATION_DISCOUNT: '1.5' }, 'DEFAULT_LIQUIDATION_DISCOUNT must be between 0 and 1'],
    [{ MIN_LIQUIDATION_DEBT: '-1' }, 'MIN_LIQUIDATION_DEBT must be >= 0'],
    [{ RPC_MAX_RETRY_DELAY_MS: '10' }, 'RPC_MAX_RETRY_DELAY_MS must be >= RPC_BASE_RETRY_DELAY_MS'],
  ])('rejects %p', (env, message) => {
    expect(() => loadConfig(env)).toThrow(ConfigurationError);
    expect(() => loadConfig(env)).toThrow(message);
  });
});
