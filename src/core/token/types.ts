import { Address, LedgerState } from '../ledger/types';
import { GasMeter } from '../runtime/gas';

/**
 * Context a token method runs in
 */
export interface TokenCallContext {
  // Account calling the token (the spender for transferFrom)
  readonly sender: Address;
  readonly state: LedgerState;
  readonly meter: GasMeter;
}

/**
 * Result of a state-changing token method.
 *
 * Conforming tokens return `true` or throw; some return `false` on failure,
 * others return nothing at all.
 */
export type TokenResult = boolean | void;

/**
 * Standard fungible-token capability set
 */
export interface FungibleToken {
  readonly address: Address;
  balanceOf(state: LedgerState, owner: Address): Promise<bigint>;
  transfer(ctx: TokenCallContext, to: Address, amount: bigint): Promise<TokenResult>;
  transferFrom(ctx: TokenCallContext, owner: Address, to: Address, amount: bigint): Promise<TokenResult>;
  approve(ctx: TokenCallContext, spender: Address, amount: bigint): Promise<TokenResult>;
}

/**
 * How a `LedgerToken` signals failure
 */
export type TokenFailureMode = 'revert' | 'return-false';

export interface LedgerTokenOptions {
  symbol?: string;
  failureMode?: TokenFailureMode;
  // When false, successful calls return nothing instead of `true`
  returnsValue?: boolean;
}
