import config from '../../config';
import { GAS } from '../../constants/gas';
import logger from '../../utils/logger';
import { DisperseError, insufficientBalance, invalidAmount, isRevert } from '../errors';
import { Address, LedgerState, LedgerStore } from '../ledger/types';
import { FungibleToken } from '../token/types';
import { GasMeter } from './gas';
import { CallContext, ReceiveHook, RuntimeOptions } from './types';

/**
 * Move native value between two accounts inside a ledger scope
 */
async function transferBalance(
  state: LedgerState,
  from: Address,
  to: Address,
  amount: bigint
): Promise<void> {
  if (amount < 0n) {
    throw invalidAmount(amount);
  }
  const available = await state.getBalance(from);
  if (available < amount) {
    throw insufficientBalance(from, amount, available);
  }
  await state.setBalance(from, available - amount);
  await state.setBalance(to, (await state.getBalance(to)) + amount);
}

/**
 * Execution host
 *
 * Provides what a chain gives a contract: an atomic call envelope over the
 * ledger, a gas-forwarding value push that reports success instead of
 * throwing, contract accounts with receive hooks and a token registry.
 *
 * Receive hooks and token methods run inside the caller's transaction and
 * must not call back into `call()` on the same runtime.
 */
export class Runtime {
  readonly gasLimit: number;
  private readonly receivers = new Map<Address, ReceiveHook>();
  private readonly tokens = new Map<Address, FungibleToken>();

  constructor(readonly store: LedgerStore, options: RuntimeOptions = {}) {
    this.gasLimit = options.gasLimit ?? config.runtime.callGasLimit;
  }

  /**
   * Turn `address` into a contract account with fallback logic
   */
  registerReceiver(address: Address, hook: ReceiveHook): void {
    this.receivers.set(address, hook);
  }

  isContract(address: Address): boolean {
    return this.receivers.has(address) || this.tokens.has(address);
  }

  registerToken(token: FungibleToken): void {
    this.tokens.set(token.address, token);
  }

  getToken(address: Address): FungibleToken {
    const token = this.tokens.get(address);
    if (!token) {
      throw new DisperseError('UNKNOWN_TOKEN', `No token registered at ${address}`);
    }
    return token;
  }

  /**
   * Atomic call envelope
   *
   * Moves `value` from `caller` to `target`, then runs `body`. Everything the
   * body does commits together, or nothing does.
   */
  async call<T>(
    caller: Address,
    target: Address,
    value: bigint,
    body: (ctx: CallContext) => Promise<T>
  ): Promise<T> {
    if (value < 0n) {
      throw invalidAmount(value);
    }

    return this.store.transaction(async state => {
      const meter = new GasMeter(this.gasLimit);
      meter.consume(GAS.CALL_BASE);

      if (value > 0n) {
        await transferBalance(state, caller, target, value);
      }

      return body({ caller, self: target, value, state, meter });
    });
  }

  /**
   * Value-transfer primitive
   *
   * Pushes `amount` from the running account to `to`, forwarding the gas
   * budget to `to`'s receive hook. Returns false (with the push undone) when
   * the push reverts. Running out of the caller's own budget, and any
   * non-revert error, propagates.
   */
  async pushValue(ctx: CallContext, to: Address, amount: bigint): Promise<boolean> {
    ctx.meter.consume(GAS.VALUE_TRANSFER);

    const hook = this.receivers.get(to);
    const forwarded = ctx.meter.fork();

    try {
      await ctx.state.savepoint(async state => {
        await transferBalance(state, ctx.self, to, amount);
        if (hook) {
          await this.runHook(hook, ctx.self, to, amount, forwarded);
        }
      });
      return true;
    } catch (error) {
      if (!isRevert(error)) {
        throw error;
      }
      logger.debug('Value push reverted', { to, amount, code: error.code });
      return false;
    } finally {
      ctx.meter.settle(forwarded);
    }
  }

  private async runHook(
    hook: ReceiveHook,
    from: Address,
    to: Address,
    value: bigint,
    meter: GasMeter
  ): Promise<void> {
    let accepted: boolean | void;
    try {
      accepted = await hook({ from, to, value, meter });
    } catch (error) {
      if (isRevert(error)) {
        throw error;
      }
      throw new DisperseError('RECEIVER_REJECTED', `${to} reverted on receive`, {
        recipient: to,
        amount: value,
        cause: error,
      });
    }

    if (accepted === false) {
      throw new DisperseError('RECEIVER_REJECTED', `${to} rejected ${value}`, {
        recipient: to,
        amount: value,
      });
    }
  }

  /**
   * Read-only helpers; each runs in its own transaction
   */
  async balanceOf(address: Address): Promise<bigint> {
    return this.store.transaction(state => state.getBalance(address));
  }

  async tokenBalanceOf(token: Address, owner: Address): Promise<bigint> {
    return this.store.transaction(state => state.getTokenBalance(token, owner));
  }

  async allowance(token: Address, owner: Address, spender: Address): Promise<bigint> {
    return this.store.transaction(state => state.getAllowance(token, owner, spender));
  }
}

export { GasMeter } from './gas';
export * from './types';
