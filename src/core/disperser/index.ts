/**
 * Disperser Module
 *
 * Atomic one-to-many payouts
 *
 * Features:
 * - Native disperse: push value to every recipient, refund the surplus
 * - Token disperse: pull from the caller's allowance to every recipient
 * - Rescue: sweep anything left on the disperser to whoever asks
 */

export { Disperser } from './disperser';
export {
  DisperserService,
  createDisperserService,
  createLedgerStore,
} from './service';
export type { ReceiptRecorder, DisperserServiceOptions } from './service';
export {
  parseAddress,
  parseAmount,
  parseBatch,
  batchTotal,
  inRange,
  toLegs,
  fromLegs,
  estimateNativeCost,
  estimateTokenCost,
  estimateSavings,
} from './batch';

// Export types
export * from './types';
