import { Address } from '../ledger/types';

/**
 * Batch: equal-length recipient and amount sequences, paid in order
 */
export interface Batch {
  recipients: Address[];
  amounts: bigint[];
}

/**
 * One (recipient, amount) pair of a batch
 */
export interface Leg {
  recipient: Address;
  amount: bigint;
}

/**
 * Batch entry as handed in from outside (file, API payload)
 */
export interface BatchEntry {
  address: string;
  amount: bigint | number | string;
}

export type DisperseKind = 'native' | 'token';

/**
 * Outcome of a committed disperse call
 */
export interface DisperseReceipt {
  kind: DisperseKind;
  caller: Address;
  token?: Address;
  recipients: Address[];
  amounts: bigint[];
  total: bigint;
  // Native value returned to the caller after the loop (always 0n for tokens)
  refund: bigint;
  gasUsed: number;
}

/**
 * Outcome of a rescue call
 */
export interface RescueResult {
  kind: DisperseKind;
  caller: Address;
  token?: Address;
  // Amount that left the disperser
  swept: bigint;
  // False only when a native sweep was refused by the caller
  delivered: boolean;
  gasUsed: number;
}

/**
 * Gas estimate for one batch against paying each recipient separately
 */
export interface CostEstimate {
  recipients: number;
  batched: number;
  individual: number;
  perRecipient: number;
  saved: number;
}
