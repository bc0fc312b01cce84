import { PublicKey } from '@solana/web3.js';
import { GAS, MAX_UINT256 } from '../../constants/gas';
import { DisperseError, invalidAmount } from '../errors';
import { Address } from '../ledger/types';
import { Batch, BatchEntry, CostEstimate, Leg } from './types';

/**
 * Parse and normalise an address (base58, 32 bytes)
 */
export function parseAddress(value: string): Address {
  try {
    return new PublicKey(value.trim()).toBase58();
  } catch (error) {
    throw new DisperseError('INVALID_ADDRESS', `Invalid address: ${value}`, { cause: error });
  }
}

/**
 * Parse an unsigned integer amount
 *
 * Numbers must be safe integers; strings must be plain decimal digits.
 */
export function parseAmount(value: bigint | number | string): bigint {
  let amount: bigint;

  if (typeof value === 'bigint') {
    amount = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new DisperseError('INVALID_AMOUNT', `Amount must be a safe integer: ${value}`);
    }
    amount = BigInt(value);
  } else {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new DisperseError('INVALID_AMOUNT', `Amount must be an unsigned integer: ${value}`);
    }
    amount = BigInt(trimmed);
  }

  if (!inRange(amount)) {
    throw invalidAmount(amount);
  }
  return amount;
}

/**
 * True for an unsigned amount that fits in 256 bits
 */
export function inRange(amount: bigint): boolean {
  return amount >= 0n && amount <= MAX_UINT256;
}

/**
 * Build a batch from external entries, validating every address and amount
 */
export function parseBatch(entries: BatchEntry[]): Batch {
  const recipients: Address[] = [];
  const amounts: bigint[] = [];

  entries.forEach((entry, index) => {
    try {
      recipients.push(parseAddress(entry.address));
      amounts.push(parseAmount(entry.amount));
    } catch (error) {
      if (error instanceof DisperseError) {
        error.index = index;
      }
      throw error;
    }
  });

  return { recipients, amounts };
}

export function batchTotal(amounts: bigint[]): bigint {
  return amounts.reduce((sum, amount) => sum + amount, 0n);
}

export function toLegs(batch: Batch): Leg[] {
  return batch.recipients.map((recipient, i) => ({ recipient, amount: batch.amounts[i] }));
}

export function fromLegs(legs: Leg[]): Batch {
  return {
    recipients: legs.map(leg => leg.recipient),
    amounts: legs.map(leg => leg.amount),
  };
}

/**
 * Gas for a native batch paying plain (non-contract) recipients
 */
export function estimateNativeCost(recipients: number, withRefund = false): number {
  return (
    GAS.CALL_BASE +
    recipients * (GAS.CALLDATA_PER_LEG + GAS.VALUE_TRANSFER) +
    GAS.BALANCE_READ +
    (withRefund ? GAS.VALUE_TRANSFER : 0)
  );
}

/**
 * Gas for a token batch against a standard token
 */
export function estimateTokenCost(recipients: number): number {
  return (
    GAS.CALL_BASE +
    recipients *
      (GAS.CALLDATA_PER_LEG + GAS.EXTERNAL_CALL + GAS.TOKEN_TRANSFER + GAS.TOKEN_ALLOWANCE_UPDATE)
  );
}

/**
 * Compare one batched call against one plain transfer per recipient
 *
 * The per-recipient cost falls as the batch grows and levels off at the
 * marginal cost of one leg.
 */
export function estimateSavings(recipients: number, kind: 'native' | 'token' = 'native'): CostEstimate {
  const batched = kind === 'native'
    ? estimateNativeCost(recipients)
    : estimateTokenCost(recipients);
  const individual = kind === 'native'
    ? recipients * GAS.CALL_BASE
    : recipients * (GAS.CALL_BASE + GAS.TOKEN_TRANSFER);

  return {
    recipients,
    batched,
    individual,
    perRecipient: recipients > 0 ? Math.ceil(batched / recipients) : batched,
    saved: individual - batched,
  };
}
