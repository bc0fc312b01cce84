import { GAS } from '../../constants/gas';
import { DisperseError, errorMessage } from '../errors';
import { Address } from '../ledger/types';
import { FungibleToken, TokenCallContext, TokenResult } from './types';

/**
 * Run one token call as a nested all-or-nothing scope, normalising the
 * failure signal: a throw or an explicit `false` both become
 * `TOKEN_TRANSFER_FAILED`; `true` and no return value both succeed.
 */
async function callToken(
  ctx: TokenCallContext,
  description: string,
  invoke: (ctx: TokenCallContext) => Promise<TokenResult>
): Promise<void> {
  ctx.meter.consume(GAS.EXTERNAL_CALL);

  try {
    await ctx.state.savepoint(async state => {
      const result = await invoke({ ...ctx, state });
      if (result === false) {
        throw new DisperseError('TOKEN_TRANSFER_FAILED', `${description} returned false`);
      }
    });
  } catch (error) {
    if (error instanceof DisperseError && error.code === 'TOKEN_TRANSFER_FAILED') {
      throw error;
    }
    throw new DisperseError(
      'TOKEN_TRANSFER_FAILED',
      `${description} failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export async function safeTransfer(
  token: FungibleToken,
  ctx: TokenCallContext,
  to: Address,
  amount: bigint
): Promise<void> {
  await callToken(ctx, `transfer(${to}, ${amount})`, c => token.transfer(c, to, amount));
}

export async function safeTransferFrom(
  token: FungibleToken,
  ctx: TokenCallContext,
  from: Address,
  to: Address,
  amount: bigint
): Promise<void> {
  await callToken(
    ctx,
    `transferFrom(${from}, ${to}, ${amount})`,
    c => token.transferFrom(c, from, to, amount)
  );
}
