/**
 * Execution cost table
 *
 * Units are abstract gas. A call pays `CALL_BASE` once; batching N legs into
 * one call pays it once instead of N times, which is where the per-recipient
 * saving comes from.
 */
export const GAS = {
  // Intrinsic cost of any call
  CALL_BASE: 21_000,

  // Decoding one (recipient, amount) pair from the call arguments
  CALLDATA_PER_LEG: 1_024,

  // Value-bearing push to an address (before receiver code runs)
  VALUE_TRANSFER: 9_000,

  // Reading the caller-visible balance of the disperser
  BALANCE_READ: 100,

  // Calling into a token contract
  EXTERNAL_CALL: 2_600,

  // Token-side storage writes
  TOKEN_TRANSFER: 25_000,
  TOKEN_ALLOWANCE_UPDATE: 5_000,

  // A pushed call gets everything but 1/64th of the remaining budget
  FORWARD_RESERVE_DIVISOR: 64,
} as const;

/**
 * Largest value an amount may hold (unsigned 256-bit)
 */
export const MAX_UINT256 = (1n << 256n) - 1n;
