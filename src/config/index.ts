import dotenv from 'dotenv';
import { parseUnits } from 'ethers';
import { LogLevel, ScannerConfig } from '../types';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

type Env = Record<string, string | undefined>;

const parseNumber = (name: string, value: string | undefined, defaultValue?: number): number => {
  if (value === undefined || value === '') {
    if (defaultValue === undefined) {
      throw new ConfigurationError(`Missing required numeric env: ${name}`);
    }
    return defaultValue;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Env ${name} must be a valid number`);
  }
  return parsed;
};

const parsePositiveInt = (name: string, value: string | undefined, defaultValue: number): number => {
  const parsed = parseNumber(name, value, defaultValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`);
  }
  return parsed;
};

const parseBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = (value || 'info').toLowerCase();
  const match = Object.values(LogLevel).find((candidate) => candidate === normalized);
  if (!match) {
    throw new ConfigurationError(`LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}`);
  }
  return match;
};

const parseDiscount = (value: string | undefined): bigint => {
  const raw = value === undefined || value.trim() === '' ? '0.06' : value.trim();
  const fraction = parseNumber('DEFAULT_LIQUIDATION_DISCOUNT', raw);
  if (fraction < 0 || fraction >= 1) {
    throw new ConfigurationError('DEFAULT_LIQUIDATION_DISCOUNT must be between 0 and 1');
  }
  try {
    return parseUnits(raw, 18);
  } catch (error) {
    throw new ConfigurationError('DEFAULT_LIQUIDATION_DISCOUNT must be a plain decimal such as 0.06', { cause: error });
  }
};

const parseMinDebt = (value: string | undefined): bigint => {
  const raw = value === undefined || value.trim() === '' ? '5' : value.trim();
  if (parseNumber('MIN_LIQUIDATION_DEBT', raw) < 0) {
    throw new ConfigurationError('MIN_LIQUIDATION_DEBT must be >= 0');
  }
  try {
    return parseUnits(raw, 18);
  } catch (error) {
    throw new ConfigurationError('MIN_LIQUIDATION_DEBT must be a plain decimal such as 5', { cause: error });
  }
};

export const loadConfig = (env: Env = process.env): ScannerConfig => {
  const maxAttempts = parsePositiveInt('RPC_MAX_ATTEMPTS', env.RPC_MAX_ATTEMPTS, 5);
  const baseDelayMs = parseNumber('RPC_BASE_RETRY_DELAY_MS', env.RPC_BASE_RETRY_DELAY_MS, 1000);
  if (baseDelayMs < 0) {
    throw new ConfigurationError('RPC_BASE_RETRY_DELAY_MS must be >= 0');
  }
  const maxDelayMs = parseNumber('RPC_MAX_RETRY_DELAY_MS', env.RPC_MAX_RETRY_DELAY_MS, 30000);
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigurationError('RPC_MAX_RETRY_DELAY_MS must be >= RPC_BASE_RETRY_DELAY_MS');
  }
  const timeoutMs = parsePositiveInt('RPC_TIMEOUT_MS', env.RPC_TIMEOUT_MS, 30000);
  const failoverThreshold = parsePositiveInt('RPC_FAILOVER_THRESHOLD', env.RPC_FAILOVER_THRESHOLD, 2);
  // A fallback endpoint must get at least one attempt before a call is given up.
  if (maxAttempts <= failoverThreshold) {
    throw new ConfigurationError('RPC_MAX_ATTEMPTS must be greater than RPC_FAILOVER_THRESHOLD');
  }

  const initialChunkSize = parsePositiveInt('SCAN_CHUNK_SIZE', env.SCAN_CHUNK_SIZE, 10000);
  const minChunkSize = parsePositiveInt('SCAN_MIN_CHUNK_SIZE', env.SCAN_MIN_CHUNK_SIZE, 1);
  const maxChunkSize = parsePositiveInt('SCAN_MAX_CHUNK_SIZE', env.SCAN_MAX_CHUNK_SIZE, 50000);
  if (minChunkSize > initialChunkSize || initialChunkSize > maxChunkSize) {
    throw new ConfigurationError('Chunk sizes must satisfy SCAN_MIN_CHUNK_SIZE <= SCAN_CHUNK_SIZE <= SCAN_MAX_CHUNK_SIZE');
  }

  return {
    networksFile: env.NETWORKS_FILE || 'config/networks.json',
    outputDir: env.OUTPUT_DIR || 'reports',
    checkpointFile: env.CHECKPOINT_FILE || 'data/scan_checkpoints.json',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logToFile: parseBoolean(env.LOG_TO_FILE, true),
    logDir: env.LOG_DIR || 'logs',
    rpc: {
      maxAttempts,
      baseDelayMs,
      maxDelayMs,
      timeoutMs,
      failoverThreshold,
    },
    scan: {
      initialChunkSize,
      minChunkSize,
      maxChunkSize,
      growAfterSuccesses: parsePositiveInt('SCAN_GROW_AFTER_SUCCESSES', env.SCAN_GROW_AFTER_SUCCESSES, 5),
      concurrency: parsePositiveInt('SCAN_CONCURRENCY', env.SCAN_CONCURRENCY, 4),
      timestampConcurrency: parsePositiveInt('TIMESTAMP_CONCURRENCY', env.TIMESTAMP_CONCURRENCY, 8),
      defaultLiquidationDiscount: parseDiscount(env.DEFAULT_LIQUIDATION_DISCOUNT),
      minLiquidationDebt: parseMinDebt(env.MIN_LIQUIDATION_DEBT),
    },
  };
};

export { loadNetworks } from './networks';
