import { TypedDataEncoder, TypedDataField } from 'ethers';
import { AnyOrder, Hex, OrderType, OrderVariants } from '@fillway/types';

type TypeTree = Record<string, TypedDataField[]>;

interface OrderTypeDefinition {
  primaryType: string;
  types: TypeTree;
}

const ORDER_INFO: TypedDataField[] = [
  { name: 'reactor', type: 'address' },
  { name: 'offerer', type: 'address' },
  { name: 'nonce', type: 'uint256' },
  { name: 'deadline', type: 'uint256' },
  { name: 'additionalValidationContract', type: 'address' },
  { name: 'additionalValidationData', type: 'bytes' },
  { name: 'preExecutionHook', type: 'address' },
  { name: 'preExecutionHookData', type: 'bytes' },
  { name: 'postExecutionHook', type: 'address' },
  { name: 'postExecutionHookData', type: 'bytes' }
];

const DUTCH_INPUT: TypedDataField[] = [
  { name: 'token', type: 'address' },
  { name: 'startAmount', type: 'uint256' },
  { name: 'endAmount', type: 'uint256' }
];

const PRIORITY_CURVE_POINT: TypedDataField[] = [
  { name: 'threshold', type: 'uint256' },
  { name: 'multiplier', type: 'uint256' }
];

const DECAY_CURVE_POINT: TypedDataField[] = [
  { name: 'relativeBlock', type: 'uint256' },
  { name: 'relativeAmount', type: 'int256' }
];

/**
 * One self-contained type tree per variant. Cosigner data and the
 * cosignature are attached after the maker signs and are not part of it.
 */
export const ORDER_TYPES: Record<OrderType, OrderTypeDefinition> = {
  [OrderType.LIMIT]: {
    primaryType: 'LimitOrder',
    types: {
      LimitOrder: [
        { name: 'info', type: 'OrderInfo' },
        { name: 'input', type: 'LimitInput' },
        { name: 'outputs', type: 'LimitOutput[]' }
      ],
      OrderInfo: ORDER_INFO,
      LimitInput: [
        { name: 'token', type: 'address' },
        { name: 'amount', type: 'uint256' }
      ],
      LimitOutput: [
        { name: 'token', type: 'address' },
        { name: 'amount', type: 'uint256' },
        { name: 'recipient', type: 'address' }
      ]
    }
  },
  [OrderType.DUTCH]: {
    primaryType: 'DutchOrder',
    types: {
      DutchOrder: [
        { name: 'info', type: 'OrderInfo' },
        { name: 'cosigner', type: 'address' },
        { name: 'decayStartTime', type: 'uint256' },
        { name: 'decayEndTime', type: 'uint256' },
        { name: 'input', type: 'DutchInput' },
        { name: 'outputs', type: 'DutchOutput[]' }
      ],
      OrderInfo: ORDER_INFO,
      DutchInput: DUTCH_INPUT,
      DutchOutput: [
        { name: 'token', type: 'address' },
        { name: 'startAmount', type: 'uint256' },
        { name: 'endAmount', type: 'uint256' },
        { name: 'recipient', type: 'address' }
      ]
    }
  },
  [OrderType.PRIORITY]: {
    primaryType: 'PriorityOrder',
    types: {
      PriorityOrder: [
        { name: 'info', type: 'OrderInfo' },
        { name: 'cosigner', type: 'address' },
        { name: 'auctionStartBlock', type: 'uint256' },
        { name: 'baselinePriorityFee', type: 'uint256' },
        { name: 'input', type: 'PriorityInput' },
        { name: 'outputs', type: 'PriorityOutput[]' }
      ],
      OrderInfo: ORDER_INFO,
      PriorityInput: [
        { name: 'token', type: 'address' },
        { name: 'amount', type: 'uint256' },
        { name: 'curve', type: 'PriorityCurvePoint[]' }
      ],
      PriorityOutput: [
        { name: 'token', type: 'address' },
        { name: 'amount', type: 'uint256' },
        { name: 'recipient', type: 'address' },
        { name: 'curve', type: 'PriorityCurvePoint[]' }
      ],
      PriorityCurvePoint: PRIORITY_CURVE_POINT
    }
  },
  [OrderType.HYBRID]: {
    primaryType: 'HybridOrder',
    types: {
      HybridOrder: [
        { name: 'info', type: 'OrderInfo' },
        { name: 'cosigner', type: 'address' },
        { name: 'auctionStartBlock', type: 'uint256' },
        { name: 'baselinePriorityFee', type: 'uint256' },
        { name: 'input', type: 'HybridInput' },
        { name: 'outputs', type: 'HybridOutput[]' },
        { name: 'inputPriorityCurve', type: 'PriorityCurvePoint[]' },
        { name: 'outputPriorityCurve', type: 'PriorityCurvePoint[]' }
      ],
      OrderInfo: ORDER_INFO,
      HybridInput: [
        { name: 'token', type: 'address' },
        { name: 'startAmount', type: 'uint256' },
        { name: 'maxAmount', type: 'uint256' },
        { name: 'curve', type: 'DecayCurvePoint[]' }
      ],
      HybridOutput: [
        { name: 'token', type: 'address' },
        { name: 'startAmount', type: 'uint256' },
        { name: 'minAmount', type: 'uint256' },
        { name: 'recipient', type: 'address' },
        { name: 'curve', type: 'DecayCurvePoint[]' }
      ],
      DecayCurvePoint: DECAY_CURVE_POINT,
      PriorityCurvePoint: PRIORITY_CURVE_POINT
    }
  },
  [OrderType.SETTLEMENT]: {
    primaryType: 'SettlementOrder',
    types: {
      SettlementOrder: [
        { name: 'info', type: 'OrderInfo' },
        { name: 'settlementOracle', type: 'address' },
        { name: 'fillPeriod', type: 'uint256' },
        { name: 'optimisticSettlementPeriod', type: 'uint256' },
        { name: 'challengePeriod', type: 'uint256' },
        { name: 'decayStartTime', type: 'uint256' },
        { name: 'decayEndTime', type: 'uint256' },
        { name: 'input', type: 'DutchInput' },
        { name: 'fillerCollateral', type: 'Collateral' },
        { name: 'challengerCollateral', type: 'Collateral' },
        { name: 'outputs', type: 'SettlementOutput[]' }
      ],
      OrderInfo: ORDER_INFO,
      DutchInput: DUTCH_INPUT,
      Collateral: [
        { name: 'token', type: 'address' },
        { name: 'amount', type: 'uint256' }
      ],
      SettlementOutput: [
        { name: 'token', type: 'address' },
        { name: 'startAmount', type: 'uint256' },
        { name: 'endAmount', type: 'uint256' },
        { name: 'recipient', type: 'address' },
        { name: 'chainId', type: 'uint256' }
      ]
    }
  }
};

/** Canonical identity of an order: the EIP-712 struct hash of its signed fields. */
export function hashOrderOf<K extends OrderType>(type: K, order: OrderVariants[K]): Hex {
  const { primaryType, types } = ORDER_TYPES[type];
  return TypedDataEncoder.hashStruct(primaryType, types, order);
}

export function hashOrder(order: AnyOrder): Hex {
  return hashOrderOf(order.type, order.order);
}

export function orderTypeString(type: OrderType): string {
  const { primaryType, types } = ORDER_TYPES[type];
  return TypedDataEncoder.from(types).encodeType(primaryType);
}
