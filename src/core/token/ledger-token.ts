import { GAS, MAX_UINT256 } from '../../constants/gas';
import { DisperseError, insufficientBalance, invalidAmount } from '../errors';
import { Address, LedgerState } from '../ledger/types';
import {
  FungibleToken,
  LedgerTokenOptions,
  TokenCallContext,
  TokenFailureMode,
  TokenResult,
} from './types';

/**
 * Fungible token whose balances and allowances live in the ledger
 *
 * `failureMode` and `returnsValue` reproduce the ways real tokens deviate
 * from the standard, so the safe-transfer wrappers can be exercised against
 * each of them.
 */
export class LedgerToken implements FungibleToken {
  readonly symbol: string;
  private readonly failureMode: TokenFailureMode;
  private readonly returnsValue: boolean;

  constructor(readonly address: Address, options: LedgerTokenOptions = {}) {
    this.symbol = options.symbol ?? 'TOKEN';
    this.failureMode = options.failureMode ?? 'revert';
    this.returnsValue = options.returnsValue ?? true;
  }

  async balanceOf(state: LedgerState, owner: Address): Promise<bigint> {
    return state.getTokenBalance(this.address, owner);
  }

  async transfer(ctx: TokenCallContext, to: Address, amount: bigint): Promise<TokenResult> {
    ctx.meter.consume(GAS.TOKEN_TRANSFER);
    const error = await this.move(ctx.state, ctx.sender, to, amount);
    return error ? this.fail(error) : this.ok();
  }

  async transferFrom(
    ctx: TokenCallContext,
    owner: Address,
    to: Address,
    amount: bigint
  ): Promise<TokenResult> {
    ctx.meter.consume(GAS.TOKEN_TRANSFER + GAS.TOKEN_ALLOWANCE_UPDATE);
    if (amount < 0n) {
      return this.fail(invalidAmount(amount));
    }

    const allowance = await ctx.state.getAllowance(this.address, owner, ctx.sender);
    if (allowance < amount) {
      return this.fail(new DisperseError(
        'INSUFFICIENT_ALLOWANCE',
        `${ctx.sender} may spend ${allowance} of ${owner}'s ${this.symbol}, needs ${amount}`,
        { recipient: owner, amount }
      ));
    }

    const error = await this.move(ctx.state, owner, to, amount);
    if (error) {
      return this.fail(error);
    }

    // Unlimited approvals are never drawn down
    if (allowance !== MAX_UINT256) {
      await ctx.state.setAllowance(this.address, owner, ctx.sender, allowance - amount);
    }
    return this.ok();
  }

  async approve(ctx: TokenCallContext, spender: Address, amount: bigint): Promise<TokenResult> {
    await ctx.state.setAllowance(this.address, ctx.sender, spender, amount);
    return this.ok();
  }

  /**
   * Create new supply (fixtures and tests)
   */
  async mint(state: LedgerState, to: Address, amount: bigint): Promise<void> {
    const balance = await state.getTokenBalance(this.address, to);
    await state.setTokenBalance(this.address, to, balance + amount);
  }

  private async move(
    state: LedgerState,
    from: Address,
    to: Address,
    amount: bigint
  ): Promise<DisperseError | null> {
    if (amount < 0n) {
      return invalidAmount(amount);
    }
    const available = await state.getTokenBalance(this.address, from);
    if (available < amount) {
      return insufficientBalance(from, amount, available);
    }

    await state.setTokenBalance(this.address, from, available - amount);
    const received = await state.getTokenBalance(this.address, to);
    await state.setTokenBalance(this.address, to, received + amount);
    return null;
  }

  private fail(error: DisperseError): TokenResult {
    if (this.failureMode === 'revert') {
      throw error;
    }
    return false;
  }

  private ok(): TokenResult {
    return this.returnsValue ? true : undefined;
  }
}
