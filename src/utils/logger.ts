import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogLevel, ScannerConfig } from '../types';

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

const envLogLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const level = LOG_LEVELS.includes(envLogLevel) ? envLogLevel : LogLevel.INFO;
const logToFile = (process.env.LOG_TO_FILE || 'true').toLowerCase() === 'true';
const logDir = process.env.LOG_DIR || 'logs';

// BigInt serialization helper
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
};

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
    const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta, bigIntReplacer)}` : '';
    return `[${String(timestamp)}] ${lvl}: ${String(message)}${metaString}`;
  }),
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf((info) => JSON.stringify(info, bigIntReplacer)),
);

const consoleTransport = new winston.transports.Console({ level, format: consoleFormat });

const mkRotate = (fileLevel: string, dirname: string) =>
  new DailyRotateFile({
    level: fileLevel,
    dirname,
    filename: `%DATE%-${fileLevel}.log`,
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '20m',
    zippedArchive: false,
    format: fileFormat,
  });

const fileTransportsIn = (dirname: string): winston.transport[] => [
  mkRotate('error', dirname), // errors only
  mkRotate('warn', dirname),
  mkRotate('info', dirname),
];

let fileTransports: winston.transport[] = logToFile ? fileTransportsIn(logDir) : [];
let fileDir = logDir;

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level,
  transports: [consoleTransport, ...fileTransports],
});

/**
 * Applies the loaded configuration on top of the env-derived defaults used at
 * import time. File transports are added, moved or removed to match.
 */
export const configureLogger = (options: Pick<ScannerConfig, 'logLevel' | 'logToFile' | 'logDir'>): void => {
  logger.level = options.logLevel;
  consoleTransport.level = options.logLevel;

  const wantedDir = options.logToFile ? options.logDir : null;
  if (fileTransports.length > 0 && wantedDir === fileDir) return;

  for (const transport of fileTransports) {
    logger.remove(transport);
    transport.close?.();
  }
  fileTransports = wantedDir === null ? [] : fileTransportsIn(wantedDir);
  for (const transport of fileTransports) {
    logger.add(transport);
  }
  fileDir = wantedDir ?? fileDir;
};

/**
 * Each network worker logs through its own child so that nothing about a scan
 * lives in module state.
 */
export const createNetworkLogger = (network: string): Logger => logger.child({ network });

export const logScanStart = (payload: Record<string, unknown>): void => {
  logger.info('Soft-liquidation scan started', payload);
};

export const logScanFinished = (payload: Record<string, unknown>): void => {
  logger.info('Soft-liquidation scan finished', payload);
};
