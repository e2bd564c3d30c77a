/** Checksummed or lower-case 20-byte hex account identifier. */
export type Address = string;

/** 0x-prefixed hex string. */
export type Hex = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

export const EMPTY_BYTES: Hex = '0x';

/**
 * Chain state an operation is evaluated against. Every time-dependent
 * rule reads these values at call time; nothing is scheduled.
 */
export interface ExecutionContext {
  /** Block timestamp in seconds */
  now: bigint;
  blockNumber: bigint;
  /** Priority fee paid by the filling transaction, in wei */
  priorityFee: bigint;
}
