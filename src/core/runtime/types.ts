import { Address, LedgerState } from '../ledger/types';
import { GasMeter } from './gas';

/**
 * Execution context of one call
 */
export interface CallContext {
  // Who invoked the call (and paid any attached value)
  readonly caller: Address;
  // The account whose code is running
  readonly self: Address;
  // Native value attached to the call
  readonly value: bigint;
  readonly state: LedgerState;
  readonly meter: GasMeter;
}

/**
 * What receiver code sees when value is pushed to it
 */
export interface ReceiveContext {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  // Forwarded budget; consuming past it reverts the push
  readonly meter: GasMeter;
}

/**
 * Fallback logic of a contract account. Returning `false` or throwing rejects
 * the incoming value.
 */
export type ReceiveHook = (ctx: ReceiveContext) => boolean | void | Promise<boolean | void>;

export interface RuntimeOptions {
  gasLimit?: number;
}
