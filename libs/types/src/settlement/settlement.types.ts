import { Address, Hex } from '../common/common.types';
import { InputToken, OrderInfo, OutputToken, ResolvedOrder } from '../order/order.types';
import { Collateral } from '../order/variants.types';

export enum SettlementStatus {
  PENDING = 'Pending',
  CHALLENGED = 'Challenged',
  CANCELLED = 'Cancelled',
  SUCCESS = 'Success'
}

export interface ResolvedSettlementOutput extends OutputToken {
  /** Destination chain the output is delivered on */
  chainId: bigint;
}

export interface ResolvedSettlementOrder extends ResolvedOrder {
  outputs: ResolvedSettlementOutput[];
  settlementOracle: Address;
  fillPeriod: bigint;
  optimisticSettlementPeriod: bigint;
  challengePeriod: bigint;
  fillerCollateral: Collateral;
  challengerCollateral: Collateral;
}

/** Escrow record persisted by the settler, keyed by order hash. */
export interface ActiveSettlement {
  orderHash: Hex;
  status: SettlementStatus;
  offerer: Address;
  /** Origin-domain filler, paid on success */
  originFiller: Address;
  /** Filler expected to deliver on the destination domain */
  destinationFiller: Address;
  challenger?: Address;
  settlementOracle: Address;
  fillDeadline: bigint;
  optimisticDeadline: bigint;
  challengeDeadline: bigint;
  input: InputToken;
  fillerCollateral: Collateral;
  challengerCollateral: Collateral;
  outputs: ResolvedSettlementOutput[];
  info: OrderInfo;
}
