import { Address, Hex } from '../common/common.types';
import { OutputToken } from '../order/order.types';
import { SettlementStatus } from '../settlement/settlement.types';

export interface FillEvent {
  orderHash: Hex;
  filler: Address;
  offerer: Address;
  nonce: bigint;
}

export interface InitiateSettlementEvent {
  orderHash: Hex;
  offerer: Address;
  originFiller: Address;
  destinationFiller: Address;
  fillDeadline: bigint;
  optimisticDeadline: bigint;
  challengeDeadline: bigint;
  outputs: OutputToken[];
}

export interface SettlementChallengedEvent {
  orderHash: Hex;
  challenger: Address;
}

export interface SettlementResolvedEvent {
  orderHash: Hex;
  status: SettlementStatus.SUCCESS | SettlementStatus.CANCELLED;
  /** Set when an oracle attestation finalized the settlement */
  fillTimestamp?: bigint;
  optimistic: boolean;
}

/** Delivery attestation relayed from the destination domain. */
export interface SettlementFillInfo {
  orderId: Hex;
  filler: Address;
  outputs: OutputToken[];
  fillTimestamp: bigint;
}
