/**
 * Database Module
 *
 * PostgreSQL ledger backend and receipt storage
 */

// Export connection and initialization
export { default as db, initializeDatabase, Database, SCHEMA } from './connection';
export type { SqlClient, DatabaseOptions } from './connection';
export { PgLedgerStore, PgLedgerState, LEDGER_LOCK_KEY } from './ledger';
export type { TransactionRunner } from './ledger';

// Export all models
export * from './models';
