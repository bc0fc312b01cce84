/**
 * Base58 encoded 32-byte account address
 */
export type Address = string;

/**
 * Transaction-scoped view of the ledger
 *
 * Reads see every write made earlier in the same transaction. Nothing is
 * visible to other transactions until the owning `LedgerStore` commits.
 */
export interface LedgerState {
  getBalance(address: Address): Promise<bigint>;
  setBalance(address: Address, amount: bigint): Promise<void>;

  getTokenBalance(token: Address, owner: Address): Promise<bigint>;
  setTokenBalance(token: Address, owner: Address, amount: bigint): Promise<void>;

  getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint>;
  setAllowance(token: Address, owner: Address, spender: Address, amount: bigint): Promise<void>;

  /**
   * Run `fn` in a nested scope: if it throws, its writes are discarded and
   * the error is re-thrown; otherwise they become part of this transaction.
   */
  savepoint<T>(fn: (state: LedgerState) => Promise<T>): Promise<T>;
}

/**
 * All-or-nothing envelope around a `LedgerState`
 *
 * Transactions on one store never interleave.
 */
export interface LedgerStore {
  readonly backend: string;
  transaction<T>(fn: (state: LedgerState) => Promise<T>): Promise<T>;
}
