import { Pool, PoolConfig, QueryResult, QueryResultRow } from 'pg';
import config from '../config';
import logger from '../utils/logger';

/**
 * Anything that can run a parameterised query: the pool wrapper itself, or
 * the client of an open transaction
 */
export interface SqlClient {
  query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;
}

export type DatabaseOptions = typeof config.database;

function poolConfig(options: DatabaseOptions): PoolConfig {
  const pool: PoolConfig = {
    max: options.max,
    idleTimeoutMillis: options.idleTimeoutMillis,
    connectionTimeoutMillis: options.connectionTimeoutMillis,
  };

  if (options.url) {
    return { ...pool, connectionString: options.url };
  }

  return {
    ...pool,
    host: options.host,
    port: options.port,
    user: options.user,
    password: options.password,
    database: options.database,
  };
}

/**
 * PostgreSQL Connection Pool
 */
class Database implements SqlClient {
  private pool: Pool;
  private isConnected: boolean = false;

  constructor(options: DatabaseOptions = config.database) {
    this.pool = new Pool(poolConfig(options));

    // Handle pool errors
    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error', err);
      this.isConnected = false;
    });

    // Log successful connections
    this.pool.on('connect', () => {
      if (!this.isConnected) {
        logger.info('Database pool connected successfully');
        this.isConnected = true;
      }
    });
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.pool.query<{ now: Date }>('SELECT NOW() AS now');

      logger.info('Database connection test successful', {
        serverTime: result.rows[0].now,
      });

      this.isConnected = true;
      return true;
    } catch (error) {
      logger.error('Database connection test failed', error);
      this.isConnected = false;
      return false;
    }
  }

  /**
   * Execute a query
   */
  async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const start = Date.now();
    try {
      const result = await this.pool.query<T>(text, params);
      const duration = Date.now() - start;

      logger.debug('Query executed', {
        text: text.substring(0, 100), // Log first 100 chars
        duration: `${duration}ms`,
        rows: result.rowCount,
      });

      return result;
    } catch (error) {
      logger.error('Query execution failed', {
        text: text.substring(0, 100),
        error,
      });
      throw error;
    }
  }

  /**
   * Execute queries in a transaction
   *
   * The callback gets a client bound to one pooled connection; everything it
   * runs commits together or is rolled back.
   */
  async transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const sql: SqlClient = {
      query: <R extends QueryResultRow>(text: string, params?: unknown[]) =>
        client.query<R>(text, params),
    };

    try {
      await client.query('BEGIN');
      logger.debug('Transaction started');

      const result = await callback(sql);

      await client.query('COMMIT');
      logger.debug('Transaction committed');

      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      logger.debug('Transaction rolled back', { error });
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.isConnected = false;
      logger.info('Database pool closed');
    } catch (error) {
      logger.error('Error closing database pool', error);
      throw error;
    }
  }

  /**
   * Get pool statistics
   */
  getPoolStats() {
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
      isConnected: this.isConnected,
    };
  }

  /**
   * Check if database is connected
   */
  isHealthy(): boolean {
    return this.isConnected;
  }
}

/**
 * Create and export database instance
 */
const db = new Database();

/**
 * Initialize database connection and tables
 */
export async function initializeDatabase(database: Database = db): Promise<void> {
  try {
    logger.info('Initializing database...');

    // Test connection
    const connected = await database.testConnection();
    if (!connected) {
      throw new Error('Failed to connect to database');
    }

    await database.query(SCHEMA);

    logger.ledger('Database schema ready', { backend: 'postgres', operation: 'migrate' });
  } catch (error) {
    logger.error('Failed to initialize database', error);
    throw error;
  }
}

/**
 * Ledger and receipt schema; every statement is idempotent
 */
export const SCHEMA = `
  -- Native balances
  CREATE TABLE IF NOT EXISTS native_balances (
    address VARCHAR(44) PRIMARY KEY,
    amount NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (amount >= 0),
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  -- Token balances
  CREATE TABLE IF NOT EXISTS token_balances (
    token VARCHAR(44) NOT NULL,
    owner VARCHAR(44) NOT NULL,
    amount NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (amount >= 0),
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (token, owner)
  );

  -- Token allowances
  CREATE TABLE IF NOT EXISTS token_allowances (
    token VARCHAR(44) NOT NULL,
    owner VARCHAR(44) NOT NULL,
    spender VARCHAR(44) NOT NULL,
    amount NUMERIC(78, 0) NOT NULL DEFAULT 0 CHECK (amount >= 0),
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (token, owner, spender)
  );

  -- Committed disperse calls
  CREATE TABLE IF NOT EXISTS disperse_receipts (
    id SERIAL PRIMARY KEY,
    kind VARCHAR(10) NOT NULL,
    caller VARCHAR(44) NOT NULL,
    token VARCHAR(44),
    legs JSONB NOT NULL,
    total NUMERIC(78, 0) NOT NULL,
    refund NUMERIC(78, 0) NOT NULL DEFAULT 0,
    gas_used INTEGER NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_disperse_receipts_caller ON disperse_receipts(caller);
`;

/**
 * Export database instance and helpers
 */
export default db;
export { Database };
