/**
 * Disperser error taxonomy
 *
 * Every failure inside a call is a `DisperseError`. Codes listed in
 * `REVERT_CODES` are host-level reverts: the runtime rolls the call back and,
 * for a nested value push, reports `false` instead of propagating. Anything
 * else (a database outage, a bug) is an infrastructure error and always
 * propagates.
 */

export type DisperseErrorCode =
  | 'SHAPE_MISMATCH'
  | 'LEG_TRANSFER_FAILED'
  | 'REFUND_FAILED'
  | 'TOKEN_TRANSFER_FAILED'
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_ALLOWANCE'
  | 'OUT_OF_GAS'
  | 'RECEIVER_REJECTED'
  | 'UNKNOWN_TOKEN'
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT';

const REVERT_CODES: ReadonlySet<DisperseErrorCode> = new Set<DisperseErrorCode>([
  'SHAPE_MISMATCH',
  'LEG_TRANSFER_FAILED',
  'REFUND_FAILED',
  'TOKEN_TRANSFER_FAILED',
  'INSUFFICIENT_BALANCE',
  'INSUFFICIENT_ALLOWANCE',
  'OUT_OF_GAS',
  'RECEIVER_REJECTED',
  'UNKNOWN_TOKEN',
  'INVALID_AMOUNT',
]);

export interface DisperseErrorDetails {
  index?: number;
  recipient?: string;
  amount?: bigint;
  cause?: unknown;
}

export class DisperseError extends Error {
  code: DisperseErrorCode;
  index?: number;
  recipient?: string;
  amount?: bigint;
  cause?: unknown;

  constructor(code: DisperseErrorCode, message: string, details: DisperseErrorDetails = {}) {
    super(message);
    this.code = code;
    this.name = 'DisperseError';
    this.index = details.index;
    this.recipient = details.recipient;
    this.amount = details.amount;
    this.cause = details.cause;
  }
}

/**
 * True when the error is a host-level revert rather than an infrastructure failure
 */
export function isRevert(error: unknown): error is DisperseError {
  return error instanceof DisperseError && REVERT_CODES.has(error.code);
}

export function shapeMismatch(recipients: number, amounts: number): DisperseError {
  return new DisperseError(
    'SHAPE_MISMATCH',
    `Recipient count (${recipients}) does not match amount count (${amounts})`
  );
}

export function legTransferFailed(
  index: number,
  recipient: string,
  amount: bigint,
  cause?: unknown
): DisperseError {
  return new DisperseError(
    'LEG_TRANSFER_FAILED',
    `Transfer of ${amount} to ${recipient} failed at leg ${index}`,
    { index, recipient, amount, cause }
  );
}

export function refundFailed(caller: string, amount: bigint): DisperseError {
  return new DisperseError(
    'REFUND_FAILED',
    `Refund of ${amount} to ${caller} failed`,
    { recipient: caller, amount }
  );
}

export function insufficientBalance(owner: string, needed: bigint, available: bigint): DisperseError {
  return new DisperseError(
    'INSUFFICIENT_BALANCE',
    `${owner} holds ${available}, needs ${needed}`,
    { recipient: owner, amount: needed }
  );
}

export function invalidAmount(amount: bigint, index?: number): DisperseError {
  const where = index === undefined ? '' : ` at leg ${index}`;
  return new DisperseError('INVALID_AMOUNT', `Amount out of range${where}: ${amount}`, {
    index,
    amount,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
