import { Address, Hex } from '../common/common.types';

export enum OrderType {
  LIMIT = 'limit',
  DUTCH = 'dutch',
  PRIORITY = 'priority',
  HYBRID = 'hybrid',
  SETTLEMENT = 'settlement'
}

export type ReactorOrderType = Exclude<OrderType, OrderType.SETTLEMENT>;

export interface OrderInfo {
  /** Reactor (or settler) allowed to fill this order */
  reactor: Address;
  offerer: Address;
  /** Permit nonce; consumed on the first successful fill */
  nonce: bigint;
  deadline: bigint;
  additionalValidationContract: Address;
  additionalValidationData: Hex;
  preExecutionHook: Address;
  preExecutionHookData: Hex;
  postExecutionHook: Address;
  postExecutionHookData: Hex;
}

export interface InputToken {
  token: Address;
  amount: bigint;
  /** Amount authorized by the maker's permit signature */
  maxAmount: bigint;
}

export interface OutputToken {
  token: Address;
  amount: bigint;
  recipient: Address;
  /** Destination domain, set only on cross-chain outputs */
  chainId?: bigint;
}

/**
 * Concrete instantiation of a signed order at fill time. Produced fresh on
 * every attempt; `hash` is computed over the signed, unresolved fields.
 */
export interface ResolvedOrder {
  type: OrderType;
  info: OrderInfo;
  input: InputToken;
  outputs: OutputToken[];
  sig: Hex;
  hash: Hex;
}

/** Opaque order payload as handed to a reactor, tagged with its variant. */
export interface SignedOrder {
  type: OrderType;
  order: Hex;
  sig: Hex;
}
