import winston from 'winston';
import path from 'path';
import fs from 'fs';
import config from '../config';

/**
 * Custom log format with timestamp
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

/**
 * Console format with colors
 */
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;

    // Add metadata if present
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta, bigintReplacer)}`;
    }

    return msg;
  })
);

/**
 * Amounts are bigints; JSON.stringify cannot serialise them on its own
 */
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * File transports, only when logging to disk is enabled
 */
function fileTransports(logsDir: string) {
  return [
    // Write all logs to combined.log
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: config.logging.maxSize,
      maxFiles: config.logging.maxFiles,
    }),

    // Write errors to error.log
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: config.logging.maxSize,
      maxFiles: config.logging.maxFiles,
    }),

    // Write transaction logs separately
    new winston.transports.File({
      filename: path.join(logsDir, 'transactions.log'),
      level: 'info',
      maxsize: 50 * 1024 * 1024, // 50MB for transactions
      maxFiles: config.logging.maxFiles,
    }),
  ];
}

function createWinstonLogger(): winston.Logger {
  if (!config.logging.toFile) {
    return winston.createLogger({
      level: config.logging.level,
      format: logFormat,
      defaultMeta: { service: 'batch-disperser' },
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          silent: config.isTest,
        }),
      ],
    });
  }

  // Ensure logs directory exists
  const logsDir = config.logging.dir;
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  const instance = winston.createLogger({
    level: config.logging.level,
    format: logFormat,
    defaultMeta: { service: 'batch-disperser' },
    transports: fileTransports(logsDir),
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logsDir, 'exceptions.log'),
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logsDir, 'rejections.log'),
      }),
    ],
  });

  if (config.isDevelopment) {
    instance.add(
      new winston.transports.Console({
        format: consoleFormat,
      })
    );
  }

  return instance;
}

const logger = createWinstonLogger();

export type LogMeta = Record<string, unknown>;

/**
 * Enhanced logger with additional methods
 */
export class Logger {
  private logger: winston.Logger;

  constructor(logger: winston.Logger) {
    this.logger = logger;
  }

  /**
   * Info level log
   */
  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, normalize(meta));
  }

  /**
   * Error level log
   */
  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        error: error.message,
        stack: error.stack,
        ...normalize({ ...error }),
      });
    } else if (isMeta(error)) {
      this.logger.error(message, normalize(error));
    } else {
      this.logger.error(message, { error });
    }
  }

  /**
   * Warning level log
   */
  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, normalize(meta));
  }

  /**
   * Debug level log
   */
  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, normalize(meta));
  }

  /**
   * Transaction log (disperse, refund and rescue events)
   */
  transaction(message: string, data: TransactionLogData): void {
    this.logger.info(`[TX] ${message}`, normalize({
      type: 'transaction',
      ...data,
    }));
  }

  /**
   * Ledger operation log
   */
  ledger(message: string, data: LedgerLogData): void {
    this.logger.info(`[LEDGER] ${message}`, normalize({
      type: 'ledger',
      ...data,
    }));
  }

  /**
   * Start operation log
   */
  start(operation: string, meta?: LogMeta): void {
    this.logger.info(`🚀 Starting: ${operation}`, normalize(meta));
  }

  /**
   * Complete operation log
   */
  complete(operation: string, meta?: LogMeta): void {
    this.logger.info(`✅ Completed: ${operation}`, normalize(meta));
  }
}

function isMeta(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Stringify bigint values one level deep so the json format can serialise them
 */
function normalize(meta?: LogMeta): LogMeta | undefined {
  if (!meta) return meta;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (typeof value === 'bigint') {
      out[key] = value.toString();
    } else if (value instanceof Error) {
      out[key] = value.message;
    } else {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Transaction log data interface
 */
export interface TransactionLogData {
  caller?: string;
  from?: string;
  to?: string;
  token?: string;
  amount?: bigint;
  total?: bigint;
  refund?: bigint;
  legs?: number;
  gasUsed?: number;
  type?: 'disperse_native' | 'disperse_token' | 'refund' | 'rescue_native' | 'rescue_token' | 'other';
  status?: 'confirmed' | 'failed';
  error?: string;
  code?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Ledger log data interface
 */
export interface LedgerLogData {
  backend?: string;
  operation?: 'commit' | 'rollback' | 'seed' | 'migrate';
  writes?: number;
  error?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Create logger instance
 */
const loggerInstance = new Logger(logger);

/**
 * Export logger
 */
export default loggerInstance;

/**
 * Export raw winston logger for advanced usage
 */
export { logger as winstonLogger };
