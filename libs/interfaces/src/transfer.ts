import { Address, Hex } from '@fillway/types';

/**
 * Signature-based transfer request. The owner signs over the permitted
 * amount, spender, nonce, deadline and a witness (the order hash).
 */
export interface PermitTransferRequest {
  owner: Address;
  spender: Address;
  token: Address;
  /** Amount the signature authorizes */
  permittedAmount: bigint;
  /** Amount actually moved, never above `permittedAmount` */
  requestedAmount: bigint;
  nonce: bigint;
  deadline: bigint;
  witness: Hex;
  signature: Hex;
  to: Address;
}

/** Permit-style pre-authorization service used to collect maker funds. */
export interface PermitTransfer {
  permitWitnessTransferFrom(request: PermitTransferRequest): void;
}

/** Allowance-based token movement used for filler and challenger funds. */
export interface TokenTransferer {
  transfer(token: Address, from: Address, to: Address, amount: bigint): void;
  transferFrom(spender: Address, token: Address, from: Address, to: Address, amount: bigint): void;
  balanceOf(token: Address, account: Address): bigint;
}
