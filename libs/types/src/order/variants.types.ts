import { Address, Hex } from '../common/common.types';
import { OrderInfo, OrderType } from './order.types';

// Limit

export interface LimitInput {
  token: Address;
  amount: bigint;
}

export interface LimitOutput {
  token: Address;
  amount: bigint;
  recipient: Address;
}

export interface LimitOrder {
  info: OrderInfo;
  input: LimitInput;
  outputs: LimitOutput[];
}

// Dutch (time decay, cosigned)

export interface DutchInput {
  token: Address;
  startAmount: bigint;
  endAmount: bigint;
}

export interface DutchOutput {
  token: Address;
  startAmount: bigint;
  endAmount: bigint;
  recipient: Address;
}

export interface DutchCosignerData {
  /** Zero keeps the signed bound */
  decayStartTime: bigint;
  decayEndTime: bigint;
  exclusiveFiller: Address;
  exclusivityOverrideBps: bigint;
  /** Zero means no override */
  inputOverride: bigint;
  /** Empty, or one entry per output where zero means no override */
  outputOverrides: bigint[];
}

export interface DutchOrder {
  info: OrderInfo;
  cosigner: Address;
  decayStartTime: bigint;
  decayEndTime: bigint;
  input: DutchInput;
  outputs: DutchOutput[];
  cosignerData: DutchCosignerData;
  cosignature: Hex;
}

// Priority (block start, priority fee scaling)

/**
 * Breakpoint of a priority fee curve. `multiplier` is expressed in
 * milli-bips (1e7 is identity) and applies once the fee above baseline
 * reaches `threshold` wei.
 */
export interface PriorityCurvePoint {
  threshold: bigint;
  multiplier: bigint;
}

export interface PriorityInput {
  token: Address;
  amount: bigint;
  curve: PriorityCurvePoint[];
}

export interface PriorityOutput {
  token: Address;
  amount: bigint;
  recipient: Address;
  curve: PriorityCurvePoint[];
}

export interface BlockCosignerData {
  /** Block the auction opens at once the cosigner vouches for the price */
  auctionTargetBlock: bigint;
  inputOverride: bigint;
  outputOverrides: bigint[];
}

export interface PriorityOrder {
  info: OrderInfo;
  cosigner: Address;
  auctionStartBlock: bigint;
  baselinePriorityFee: bigint;
  input: PriorityInput;
  outputs: PriorityOutput[];
  cosignerData: BlockCosignerData;
  cosignature: Hex;
}

// Hybrid (block curve decay composed with priority scaling)

/** Breakpoint relative to the auction start block; amounts are subtracted from the start amount. */
export interface DecayCurvePoint {
  relativeBlock: bigint;
  relativeAmount: bigint;
}

export interface HybridInput {
  token: Address;
  startAmount: bigint;
  maxAmount: bigint;
  curve: DecayCurvePoint[];
}

export interface HybridOutput {
  token: Address;
  startAmount: bigint;
  minAmount: bigint;
  recipient: Address;
  curve: DecayCurvePoint[];
}

export interface HybridOrder {
  info: OrderInfo;
  cosigner: Address;
  auctionStartBlock: bigint;
  baselinePriorityFee: bigint;
  input: HybridInput;
  outputs: HybridOutput[];
  inputPriorityCurve: PriorityCurvePoint[];
  outputPriorityCurve: PriorityCurvePoint[];
  cosignerData: BlockCosignerData;
  cosignature: Hex;
}

// Cross-chain settlement

export interface Collateral {
  token: Address;
  amount: bigint;
}

export interface SettlementOutput {
  token: Address;
  startAmount: bigint;
  endAmount: bigint;
  recipient: Address;
  chainId: bigint;
}

export interface SettlementOrder {
  /** `info.reactor` names the settler */
  info: OrderInfo;
  settlementOracle: Address;
  fillPeriod: bigint;
  optimisticSettlementPeriod: bigint;
  challengePeriod: bigint;
  decayStartTime: bigint;
  decayEndTime: bigint;
  input: DutchInput;
  fillerCollateral: Collateral;
  challengerCollateral: Collateral;
  outputs: SettlementOutput[];
}

export interface OrderVariants {
  [OrderType.LIMIT]: LimitOrder;
  [OrderType.DUTCH]: DutchOrder;
  [OrderType.PRIORITY]: PriorityOrder;
  [OrderType.HYBRID]: HybridOrder;
  [OrderType.SETTLEMENT]: SettlementOrder;
}

/** Closed set of order shapes, discriminated by `type`. */
export type AnyOrder = {
  [K in OrderType]: { type: K; order: OrderVariants[K] };
}[OrderType];
