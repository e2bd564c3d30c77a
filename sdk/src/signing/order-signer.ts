import { SigningKey } from 'ethers';
import {
  Address,
  AnyOrder,
  DutchOrder,
  Hex,
  HybridOrder,
  OrderType,
  PriorityOrder,
  SignedOrder
} from '@fillway/types';
import { cosignerDigest } from '../cosigner/cosigner-verifier';
import { hashOrder, hashOrderOf } from '../encoding/eip712';
import { encodeBlockCosignerData, encodeDutchCosignerData, encodeOrder } from '../encoding/order-codec';
import { PermitMessage, SigningDomain, permitDigest } from './permit';

export interface PermittedInput {
  token: Address;
  /** Most the maker can ever be charged for this order */
  amount: bigint;
}

export function permittedInput(order: AnyOrder): PermittedInput {
  switch (order.type) {
    case OrderType.LIMIT:
      return { token: order.order.input.token, amount: order.order.input.amount };
    case OrderType.DUTCH:
    case OrderType.SETTLEMENT:
      return { token: order.order.input.token, amount: order.order.input.endAmount };
    case OrderType.PRIORITY:
      return { token: order.order.input.token, amount: order.order.input.amount };
    case OrderType.HYBRID:
      return { token: order.order.input.token, amount: order.order.input.maxAmount };
  }
}

/** Permit message the maker signs for `order`; the spender is the order's reactor. */
export function orderPermitMessage(order: AnyOrder, orderHash: Hex = hashOrder(order)): PermitMessage {
  const { info } = order.order;
  return {
    permitted: permittedInput(order),
    spender: info.reactor,
    nonce: info.nonce,
    deadline: info.deadline,
    witness: orderHash
  };
}

export function signOrder(maker: SigningKey, order: AnyOrder, domain: SigningDomain): SignedOrder {
  const message = orderPermitMessage(order);
  return {
    type: order.type,
    order: encodeOrder(order),
    sig: maker.sign(permitDigest(domain, message)).serialized
  };
}

export function cosignDutchOrder(cosigner: SigningKey, order: DutchOrder): DutchOrder {
  const digest = cosignerDigest(
    hashOrderOf(OrderType.DUTCH, order),
    encodeDutchCosignerData(order.cosignerData)
  );
  return { ...order, cosignature: cosigner.sign(digest).serialized };
}

export function cosignPriorityOrder(cosigner: SigningKey, order: PriorityOrder): PriorityOrder {
  const digest = cosignerDigest(
    hashOrderOf(OrderType.PRIORITY, order),
    encodeBlockCosignerData(order.cosignerData)
  );
  return { ...order, cosignature: cosigner.sign(digest).serialized };
}

export function cosignHybridOrder(cosigner: SigningKey, order: HybridOrder): HybridOrder {
  const digest = cosignerDigest(
    hashOrderOf(OrderType.HYBRID, order),
    encodeBlockCosignerData(order.cosignerData)
  );
  return { ...order, cosignature: cosigner.sign(digest).serialized };
}
