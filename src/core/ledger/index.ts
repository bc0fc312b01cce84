/**
 * Ledger Module
 *
 * Balance storage behind an all-or-nothing transaction envelope
 */

export { MemoryLedgerStore } from './memory';
export * from './types';
