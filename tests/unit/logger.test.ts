import fs from 'fs';
import os from 'os';
import path from 'path';
import winston from 'winston';
import { LogLevel } from '../../src/types';
import { bigIntReplacer, configureLogger, createNetworkLogger, logger } from '../../src/utils/logger';

describe('bigIntReplacer', () => {
  test('serializes bigints as decimal strings and errors by name and message', () => {
    const text = JSON.stringify({ debt: 10n ** 21n, error: new RangeError('too far') }, bigIntReplacer);
    expect(text).toBe('{"debt":"1000000000000000000000","error":{"name":"RangeError","message":"too far"}}');
  });
});

describe('configureLogger', () => {
  const initialLevel = logger.level;
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logs-'));
  });

  afterEach(() => {
    configureLogger({ logLevel: LogLevel.ERROR, logToFile: false, logDir: dir });
    logger.level = initialLevel;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('applies the configured level to the root and network loggers', () => {
    configureLogger({ logLevel: LogLevel.DEBUG, logToFile: false, logDir: dir });

    expect(logger.level).toBe('debug');
    expect(createNetworkLogger('testnet').isDebugEnabled()).toBe(true);
  });

  test('adds file transports when enabled and removes them again when disabled', () => {
    configureLogger({ logLevel: LogLevel.ERROR, logToFile: true, logDir: dir });
    expect(logger.transports).toHaveLength(4);

    configureLogger({ logLevel: LogLevel.ERROR, logToFile: true, logDir: dir });
    expect(logger.transports).toHaveLength(4);

    configureLogger({ logLevel: LogLevel.ERROR, logToFile: false, logDir: dir });
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});
