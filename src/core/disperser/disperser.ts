import { GAS } from '../../constants/gas';
import { invalidAmount, legTransferFailed, refundFailed, shapeMismatch } from '../errors';
import { Address } from '../ledger/types';
import { Runtime } from '../runtime';
import { CallContext } from '../runtime/types';
import { safeTransfer, safeTransferFrom } from '../token/safe';
import { TokenCallContext } from '../token/types';
import { batchTotal, inRange } from './batch';
import { DisperseReceipt, RescueResult } from './types';

/**
 * Disperser
 *
 * Pays many recipients from one caller in a single call. Every leg lands or
 * none does: each entry point runs inside `Runtime.call`, and any throw from
 * the loop rolls the whole call back.
 *
 * The disperser owns no funds between calls. Value left on it (sent directly,
 * or pulled in by mistake) can be swept by anyone through the rescue methods.
 */
export class Disperser {
  constructor(
    private readonly runtime: Runtime,
    readonly address: Address
  ) {}

  /**
   * Push `amounts[i]` of native value to `recipients[i]`, then return whatever
   * the disperser still holds to the caller.
   *
   * `value` is attached to the call and must cover the batch; a shortfall
   * surfaces as the first leg that cannot be paid.
   */
  async sendNative(
    caller: Address,
    recipients: Address[],
    amounts: bigint[],
    value: bigint
  ): Promise<DisperseReceipt> {
    assertValidBatch(recipients, amounts);
    if (!inRange(value)) {
      throw invalidAmount(value);
    }

    return this.runtime.call(caller, this.address, value, async (ctx): Promise<DisperseReceipt> => {
      const count = recipients.length;
      ctx.meter.consume(count * GAS.CALLDATA_PER_LEG);

      for (let i = 0; i < count; i++) {
        if (!(await this.runtime.pushValue(ctx, recipients[i], amounts[i]))) {
          throw legTransferFailed(i, recipients[i], amounts[i]);
        }
      }

      ctx.meter.consume(GAS.BALANCE_READ);
      const refund = await ctx.state.getBalance(this.address);
      if (refund > 0n && !(await this.runtime.pushValue(ctx, caller, refund))) {
        throw refundFailed(caller, refund);
      }

      return {
        kind: 'native',
        caller,
        recipients: [...recipients],
        amounts: [...amounts],
        total: batchTotal(amounts),
        refund,
        gasUsed: ctx.meter.gasUsed,
      };
    });
  }

  /**
   * Move `amounts[i]` of `token` from the caller to `recipients[i]` using the
   * allowance the caller granted the disperser. Tokens never rest on the
   * disperser, so there is no refund step.
   */
  async sendToken(
    caller: Address,
    token: Address,
    recipients: Address[],
    amounts: bigint[]
  ): Promise<DisperseReceipt> {
    assertValidBatch(recipients, amounts);

    return this.runtime.call(caller, this.address, 0n, async (ctx): Promise<DisperseReceipt> => {
      const handle = this.runtime.getToken(token);
      const tokenCtx = this.asSender(ctx);
      const count = recipients.length;
      ctx.meter.consume(count * GAS.CALLDATA_PER_LEG);

      for (let i = 0; i < count; i++) {
        try {
          await safeTransferFrom(handle, tokenCtx, caller, recipients[i], amounts[i]);
        } catch (error) {
          throw legTransferFailed(i, recipients[i], amounts[i], error);
        }
      }

      return {
        kind: 'token',
        caller,
        token,
        recipients: [...recipients],
        amounts: [...amounts],
        total: batchTotal(amounts),
        refund: 0n,
        gasUsed: ctx.meter.gasUsed,
      };
    });
  }

  /**
   * Send the disperser's whole balance of `token` to the caller. A zero
   * balance is a zero transfer; a failing transfer fails the call.
   */
  async rescueToken(caller: Address, token: Address): Promise<RescueResult> {
    return this.runtime.call(caller, this.address, 0n, async (ctx): Promise<RescueResult> => {
      const handle = this.runtime.getToken(token);
      ctx.meter.consume(GAS.BALANCE_READ);
      const balance = await handle.balanceOf(ctx.state, this.address);

      await safeTransfer(handle, this.asSender(ctx), caller, balance);

      return {
        kind: 'token',
        caller,
        token,
        swept: balance,
        delivered: true,
        gasUsed: ctx.meter.gasUsed,
      };
    });
  }

  /**
   * Push the disperser's whole native balance to the caller. Best effort: if
   * the caller refuses the value, the balance stays where it was and the call
   * still succeeds.
   */
  async rescueNative(caller: Address): Promise<RescueResult> {
    return this.runtime.call(caller, this.address, 0n, async (ctx): Promise<RescueResult> => {
      ctx.meter.consume(GAS.BALANCE_READ);
      const balance = await ctx.state.getBalance(this.address);
      const delivered = await this.runtime.pushValue(ctx, caller, balance);

      return {
        kind: 'native',
        caller,
        swept: delivered ? balance : 0n,
        delivered,
        gasUsed: ctx.meter.gasUsed,
      };
    });
  }

  private asSender(ctx: CallContext): TokenCallContext {
    return { sender: this.address, state: ctx.state, meter: ctx.meter };
  }
}

/**
 * Upfront checks, before any value moves: equal lengths and unsigned amounts
 */
function assertValidBatch(recipients: Address[], amounts: bigint[]): void {
  if (recipients.length !== amounts.length) {
    throw shapeMismatch(recipients.length, amounts.length);
  }

  const bad = amounts.findIndex(amount => !inRange(amount));
  if (bad !== -1) {
    throw invalidAmount(amounts[bad], bad);
  }
}
