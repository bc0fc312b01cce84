import dotenv from 'dotenv';
import { PublicKey } from '@solana/web3.js';

// Load environment variables
dotenv.config();

/**
 * Gets optional environment variable with default value
 */
function getEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Gets numeric environment variable with default
 */
function getNumericEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

/**
 * Gets boolean environment variable
 */
function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

export type LedgerBackend = 'memory' | 'postgres';

const LEDGER_BACKENDS: readonly LedgerBackend[] = ['memory', 'postgres'];

function getLedgerBackend(): LedgerBackend {
  const value = getEnv('LEDGER_BACKEND', 'memory');
  const backend = LEDGER_BACKENDS.find(b => b === value);
  if (!backend) {
    throw new Error(`LEDGER_BACKEND must be one of: ${LEDGER_BACKENDS.join(', ')}`);
  }
  return backend;
}

const nodeEnv = getEnv('NODE_ENV', 'development');

/**
 * Application Configuration
 */
export const config = {
  // Environment
  nodeEnv,
  isDevelopment: nodeEnv === 'development',
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',

  // Disperser
  disperser: {
    // Address the disperser contract is deployed at on the ledger
    address: getEnv('DISPERSER_ADDRESS', 'Disperse111111111111111111111111111111111111'),
    recordReceipts: getBooleanEnv('RECORD_RECEIPTS', false),
  },

  // Runtime (execution budget per call)
  runtime: {
    callGasLimit: getNumericEnv('CALL_GAS_LIMIT', 30_000_000),
  },

  // Ledger storage
  ledger: {
    backend: getLedgerBackend(),
  },

  // Database Configuration
  database: {
    url: getEnv('DATABASE_URL', ''),
    host: getEnv('DB_HOST', 'localhost'),
    port: getNumericEnv('DB_PORT', 5432),
    user: getEnv('DB_USER', 'postgres'),
    password: getEnv('DB_PASSWORD', ''),
    database: getEnv('DB_NAME', 'disperser'),
    // Connection pool settings
    max: getNumericEnv('DB_MAX_CONNECTIONS', 20),
    idleTimeoutMillis: getNumericEnv('DB_IDLE_TIMEOUT', 30000),
    connectionTimeoutMillis: getNumericEnv('DB_CONNECTION_TIMEOUT', 2000),
  },

  // Logging Configuration
  logging: {
    level: getEnv('LOG_LEVEL', 'info'),
    dir: getEnv('LOG_DIR', './logs'),
    toFile: getBooleanEnv('LOG_TO_FILE', nodeEnv !== 'test'),
    maxFiles: 30,
    maxSize: 20 * 1024 * 1024,
  },
};

/**
 * Validates the configuration on startup
 */
export function validateConfig(cfg: Config = config): void {
  try {
    new PublicKey(cfg.disperser.address);
  } catch (error) {
    throw new Error(`DISPERSER_ADDRESS is not a valid address: ${cfg.disperser.address}`);
  }

  if (!Number.isInteger(cfg.runtime.callGasLimit) || cfg.runtime.callGasLimit <= 0) {
    throw new Error('CALL_GAS_LIMIT must be a positive integer');
  }

  if (cfg.ledger.backend === 'postgres' && !cfg.database.url && !cfg.database.host) {
    throw new Error('Postgres ledger requires DATABASE_URL or DB_HOST');
  }
}

/**
 * Type-safe config export
 */
export type Config = typeof config;

export default config;
