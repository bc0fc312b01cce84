import { Mutex } from 'async-mutex';
import logger from '../../utils/logger';
import { Address, LedgerState, LedgerStore } from './types';

type Key = string;

const nativeKey = (address: Address): Key => `native:${address}`;
const tokenKey = (token: Address, owner: Address): Key => `token:${token}:${owner}`;
const allowanceKey = (token: Address, owner: Address, spender: Address): Key =>
  `allowance:${token}:${owner}:${spender}`;

/**
 * Staged writes layered over a parent reader
 *
 * A transaction is one overlay over the committed maps; every savepoint adds
 * another overlay on top. Merging a child into its parent is the "commit"
 * of that savepoint; dropping it is the rollback.
 */
class OverlayState implements LedgerState {
  readonly writes = new Map<Key, bigint>();

  constructor(private readonly parent: (key: Key) => bigint) {}

  private read(key: Key): bigint {
    const staged = this.writes.get(key);
    return staged === undefined ? this.parent(key) : staged;
  }

  private write(key: Key, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Ledger value for ${key} cannot be negative`);
    }
    this.writes.set(key, amount);
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.read(nativeKey(address));
  }

  async setBalance(address: Address, amount: bigint): Promise<void> {
    this.write(nativeKey(address), amount);
  }

  async getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    return this.read(tokenKey(token, owner));
  }

  async setTokenBalance(token: Address, owner: Address, amount: bigint): Promise<void> {
    this.write(tokenKey(token, owner), amount);
  }

  async getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint> {
    return this.read(allowanceKey(token, owner, spender));
  }

  async setAllowance(token: Address, owner: Address, spender: Address, amount: bigint): Promise<void> {
    this.write(allowanceKey(token, owner, spender), amount);
  }

  async savepoint<T>(fn: (state: LedgerState) => Promise<T>): Promise<T> {
    const child = new OverlayState(key => this.read(key));
    const result = await fn(child);
    for (const [key, value] of child.writes) {
      this.writes.set(key, value);
    }
    return result;
  }
}

/**
 * In-memory ledger with staged-apply-then-commit transactions
 */
export class MemoryLedgerStore implements LedgerStore {
  readonly backend = 'memory';
  private readonly committed = new Map<Key, bigint>();
  private readonly mutex = new Mutex();

  async transaction<T>(fn: (state: LedgerState) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const state = new OverlayState(key => this.committed.get(key) ?? 0n);

      // A rejection leaves `committed` untouched
      const result = await fn(state);

      for (const [key, value] of state.writes) {
        if (value === 0n) {
          this.committed.delete(key);
        } else {
          this.committed.set(key, value);
        }
      }

      logger.debug('Memory ledger commit', { writes: state.writes.size });
      return result;
    });
  }

  /**
   * Seed helpers write straight to committed state (fixtures and tests)
   */
  seedBalance(address: Address, amount: bigint): void {
    this.seed(nativeKey(address), amount);
  }

  seedTokenBalance(token: Address, owner: Address, amount: bigint): void {
    this.seed(tokenKey(token, owner), amount);
  }

  seedAllowance(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.seed(allowanceKey(token, owner, spender), amount);
  }

  /**
   * Number of non-zero entries currently committed
   */
  get size(): number {
    return this.committed.size;
  }

  private seed(key: Key, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Ledger value for ${key} cannot be negative`);
    }
    if (amount === 0n) {
      this.committed.delete(key);
    } else {
      this.committed.set(key, amount);
    }
  }
}
