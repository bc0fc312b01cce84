/**
 * Token Module
 *
 * Fungible-token interface, a ledger-backed implementation and the
 * safe-transfer wrappers the disperser calls tokens through
 */

export { LedgerToken } from './ledger-token';
export { safeTransfer, safeTransferFrom } from './safe';
export * from './types';
