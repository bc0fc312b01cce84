/**
 * Batch disperser
 *
 * Atomic one-to-many payouts of native value or fungible tokens, with the
 * runtime and ledger they execute on.
 */

export { default as config, validateConfig } from './config';
export type { Config, LedgerBackend } from './config';
export { GAS, MAX_UINT256 } from './constants/gas';
export * from './core/errors';
export * from './core/ledger';
export * from './core/runtime';
export * from './core/token';
export * from './core/disperser';
export { PgLedgerStore, PgLedgerState, Database, initializeDatabase, DisperseModel } from './db';
export type { SqlClient, TransactionRunner, DisperseRecord, StoredLeg } from './db';
export { generateAddress, isValidAddress, formatAddress } from './utils/address';
export { default as logger, Logger } from './utils/logger';
