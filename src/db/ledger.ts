import { Address, LedgerState, LedgerStore } from '../core/ledger/types';
import db, { SqlClient } from './connection';

/**
 * Advisory lock key shared by every ledger transaction
 */
export const LEDGER_LOCK_KEY = 0x64697370;

interface AmountRow {
  amount: string;
}

/**
 * Runs a callback inside one database transaction
 */
export interface TransactionRunner {
  transaction<T>(callback: (client: SqlClient) => Promise<T>): Promise<T>;
}

function toAmount(rows: AmountRow[]): bigint {
  return rows.length > 0 ? BigInt(rows[0].amount) : 0n;
}

function assertUnsigned(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Ledger amount cannot be negative: ${amount}`);
  }
}

/**
 * Ledger view over one open PostgreSQL transaction
 */
export class PgLedgerState implements LedgerState {
  constructor(
    private readonly client: SqlClient,
    private readonly depth: number = 0
  ) {}

  async getBalance(address: Address): Promise<bigint> {
    const result = await this.client.query<AmountRow>(
      'SELECT amount FROM native_balances WHERE address = $1 FOR UPDATE',
      [address]
    );
    return toAmount(result.rows);
  }

  async setBalance(address: Address, amount: bigint): Promise<void> {
    assertUnsigned(amount);
    await this.client.query(
      `INSERT INTO native_balances (address, amount) VALUES ($1, $2)
       ON CONFLICT (address) DO UPDATE SET amount = EXCLUDED.amount, updated_at = CURRENT_TIMESTAMP`,
      [address, amount.toString()]
    );
  }

  async getTokenBalance(token: Address, owner: Address): Promise<bigint> {
    const result = await this.client.query<AmountRow>(
      'SELECT amount FROM token_balances WHERE token = $1 AND owner = $2 FOR UPDATE',
      [token, owner]
    );
    return toAmount(result.rows);
  }

  async setTokenBalance(token: Address, owner: Address, amount: bigint): Promise<void> {
    assertUnsigned(amount);
    await this.client.query(
      `INSERT INTO token_balances (token, owner, amount) VALUES ($1, $2, $3)
       ON CONFLICT (token, owner) DO UPDATE SET amount = EXCLUDED.amount, updated_at = CURRENT_TIMESTAMP`,
      [token, owner, amount.toString()]
    );
  }

  async getAllowance(token: Address, owner: Address, spender: Address): Promise<bigint> {
    const result = await this.client.query<AmountRow>(
      'SELECT amount FROM token_allowances WHERE token = $1 AND owner = $2 AND spender = $3 FOR UPDATE',
      [token, owner, spender]
    );
    return toAmount(result.rows);
  }

  async setAllowance(token: Address, owner: Address, spender: Address, amount: bigint): Promise<void> {
    assertUnsigned(amount);
    await this.client.query(
      `INSERT INTO token_allowances (token, owner, spender, amount) VALUES ($1, $2, $3, $4)
       ON CONFLICT (token, owner, spender) DO UPDATE SET amount = EXCLUDED.amount, updated_at = CURRENT_TIMESTAMP`,
      [token, owner, spender, amount.toString()]
    );
  }

  async savepoint<T>(fn: (state: LedgerState) => Promise<T>): Promise<T> {
    const name = `sp_${this.depth + 1}`;
    await this.client.query(`SAVEPOINT ${name}`);

    try {
      const result = await fn(new PgLedgerState(this.client, this.depth + 1));
      await this.client.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (error) {
      await this.client.query(`ROLLBACK TO SAVEPOINT ${name}`);
      await this.client.query(`RELEASE SAVEPOINT ${name}`);
      throw error;
    }
  }
}

/**
 * Ledger store backed by PostgreSQL
 *
 * Each transaction takes a transaction-scoped advisory lock before touching
 * the ledger, so transactions run one at a time. `FOR UPDATE` alone does not
 * cover rows that do not exist yet.
 */
export class PgLedgerStore implements LedgerStore {
  readonly backend = 'postgres';

  constructor(private readonly database: TransactionRunner = db) {}

  async transaction<T>(fn: (state: LedgerState) => Promise<T>): Promise<T> {
    return this.database.transaction(async client => {
      await client.query('SELECT pg_advisory_xact_lock($1)', [LEDGER_LOCK_KEY]);
      return fn(new PgLedgerState(client));
    });
  }
}
