import { AbiCoder, Result } from 'ethers';
import { MalformedOrderError } from '@fillway/errors';
import {
  Address,
  AnyOrder,
  BlockCosignerData,
  Collateral,
  DecayCurvePoint,
  DutchCosignerData,
  DutchInput,
  DutchOrder,
  Hex,
  HybridOrder,
  LimitOrder,
  OrderInfo,
  OrderType,
  OrderVariants,
  PriorityCurvePoint,
  PriorityOrder,
  SettlementOrder,
  isAddress,
  isHex
} from '@fillway/types';

const coder = AbiCoder.defaultAbiCoder();

const INFO = 'tuple(address reactor,address offerer,uint256 nonce,uint256 deadline,'
  + 'address additionalValidationContract,bytes additionalValidationData,'
  + 'address preExecutionHook,bytes preExecutionHookData,'
  + 'address postExecutionHook,bytes postExecutionHookData) info';
const DUTCH_INPUT = 'tuple(address token,uint256 startAmount,uint256 endAmount) input';
const PRIORITY_CURVE = 'tuple(uint256 threshold,uint256 multiplier)[]';
const DECAY_CURVE = 'tuple(uint256 relativeBlock,int256 relativeAmount)[]';

export const DUTCH_COSIGNER_DATA_ABI = 'tuple(uint256 decayStartTime,uint256 decayEndTime,'
  + 'address exclusiveFiller,uint256 exclusivityOverrideBps,uint256 inputOverride,uint256[] outputOverrides)';
export const BLOCK_COSIGNER_DATA_ABI = 'tuple(uint256 auctionTargetBlock,uint256 inputOverride,uint256[] outputOverrides)';

/** Wire layout of each variant, cosigner fields included. */
export const ORDER_ABI: Record<OrderType, string> = {
  [OrderType.LIMIT]: `tuple(${INFO},`
    + 'tuple(address token,uint256 amount) input,'
    + 'tuple(address token,uint256 amount,address recipient)[] outputs)',
  [OrderType.DUTCH]: `tuple(${INFO},address cosigner,uint256 decayStartTime,uint256 decayEndTime,${DUTCH_INPUT},`
    + 'tuple(address token,uint256 startAmount,uint256 endAmount,address recipient)[] outputs,'
    + `${DUTCH_COSIGNER_DATA_ABI} cosignerData,bytes cosignature)`,
  [OrderType.PRIORITY]: `tuple(${INFO},address cosigner,uint256 auctionStartBlock,uint256 baselinePriorityFee,`
    + `tuple(address token,uint256 amount,${PRIORITY_CURVE} curve) input,`
    + `tuple(address token,uint256 amount,address recipient,${PRIORITY_CURVE} curve)[] outputs,`
    + `${BLOCK_COSIGNER_DATA_ABI} cosignerData,bytes cosignature)`,
  [OrderType.HYBRID]: `tuple(${INFO},address cosigner,uint256 auctionStartBlock,uint256 baselinePriorityFee,`
    + `tuple(address token,uint256 startAmount,uint256 maxAmount,${DECAY_CURVE} curve) input,`
    + `tuple(address token,uint256 startAmount,uint256 minAmount,address recipient,${DECAY_CURVE} curve)[] outputs,`
    + `${PRIORITY_CURVE} inputPriorityCurve,${PRIORITY_CURVE} outputPriorityCurve,`
    + `${BLOCK_COSIGNER_DATA_ABI} cosignerData,bytes cosignature)`,
  [OrderType.SETTLEMENT]: `tuple(${INFO},address settlementOracle,uint256 fillPeriod,`
    + 'uint256 optimisticSettlementPeriod,uint256 challengePeriod,uint256 decayStartTime,uint256 decayEndTime,'
    + `${DUTCH_INPUT},tuple(address token,uint256 amount) fillerCollateral,`
    + 'tuple(address token,uint256 amount) challengerCollateral,'
    + 'tuple(address token,uint256 startAmount,uint256 endAmount,address recipient,uint256 chainId)[] outputs)'
};

/** Typed view over a decoded ABI tuple; every accessor rejects values of the wrong shape. */
class StructReader {
  private constructor(
    private readonly orderType: string,
    private readonly tuple: Result,
    private readonly path: string
  ) {}

  static from(orderType: string, value: unknown, path: string): StructReader {
    if (!(value instanceof Result)) {
      throw new MalformedOrderError(orderType, `${path} is not a struct`);
    }
    return new StructReader(orderType, value, path);
  }

  bigint(name: string): bigint {
    const value = this.raw(name);
    if (typeof value !== 'bigint') {
      throw this.malformed(name, 'is not an integer');
    }
    return value;
  }

  address(name: string): Address {
    const value = this.raw(name);
    if (!isAddress(value)) {
      throw this.malformed(name, 'is not an address');
    }
    return value;
  }

  bytes(name: string): Hex {
    const value = this.raw(name);
    if (!isHex(value)) {
      throw this.malformed(name, 'is not hex bytes');
    }
    return value;
  }

  struct(name: string): StructReader {
    return StructReader.from(this.orderType, this.raw(name), `${this.path}.${name}`);
  }

  structs<T>(name: string, read: (item: StructReader) => T): T[] {
    return this.items(name).map((item, index) =>
      read(StructReader.from(this.orderType, item, `${this.path}.${name}[${index}]`))
    );
  }

  bigints(name: string): bigint[] {
    return this.items(name).map((item, index) => {
      if (typeof item !== 'bigint') {
        throw this.malformed(`${name}[${index}]`, 'is not an integer');
      }
      return item;
    });
  }

  private items(name: string): unknown[] {
    const value = this.raw(name);
    if (!(value instanceof Result)) {
      throw this.malformed(name, 'is not a list');
    }
    return value.toArray();
  }

  private raw(name: string): unknown {
    try {
      return this.tuple.getValue(name);
    } catch (error) {
      throw new MalformedOrderError(
        this.orderType,
        `${this.path}.${name} is missing`,
        error instanceof Error ? error : undefined
      );
    }
  }

  private malformed(name: string, reason: string): MalformedOrderError {
    return new MalformedOrderError(this.orderType, `${this.path}.${name} ${reason}`);
  }
}

function readInfo(reader: StructReader): OrderInfo {
  const info = reader.struct('info');
  return {
    reactor: info.address('reactor'),
    offerer: info.address('offerer'),
    nonce: info.bigint('nonce'),
    deadline: info.bigint('deadline'),
    additionalValidationContract: info.address('additionalValidationContract'),
    additionalValidationData: info.bytes('additionalValidationData'),
    preExecutionHook: info.address('preExecutionHook'),
    preExecutionHookData: info.bytes('preExecutionHookData'),
    postExecutionHook: info.address('postExecutionHook'),
    postExecutionHookData: info.bytes('postExecutionHookData')
  };
}

function readDutchInput(reader: StructReader): DutchInput {
  return {
    token: reader.address('token'),
    startAmount: reader.bigint('startAmount'),
    endAmount: reader.bigint('endAmount')
  };
}

function readPriorityPoint(reader: StructReader): PriorityCurvePoint {
  return { threshold: reader.bigint('threshold'), multiplier: reader.bigint('multiplier') };
}

function readDecayPoint(reader: StructReader): DecayCurvePoint {
  return { relativeBlock: reader.bigint('relativeBlock'), relativeAmount: reader.bigint('relativeAmount') };
}

function readCollateral(reader: StructReader): Collateral {
  return { token: reader.address('token'), amount: reader.bigint('amount') };
}

function readDutchCosignerData(reader: StructReader): DutchCosignerData {
  return {
    decayStartTime: reader.bigint('decayStartTime'),
    decayEndTime: reader.bigint('decayEndTime'),
    exclusiveFiller: reader.address('exclusiveFiller'),
    exclusivityOverrideBps: reader.bigint('exclusivityOverrideBps'),
    inputOverride: reader.bigint('inputOverride'),
    outputOverrides: reader.bigints('outputOverrides')
  };
}

function readBlockCosignerData(reader: StructReader): BlockCosignerData {
  return {
    auctionTargetBlock: reader.bigint('auctionTargetBlock'),
    inputOverride: reader.bigint('inputOverride'),
    outputOverrides: reader.bigints('outputOverrides')
  };
}

const DECODERS: { [K in OrderType]: (reader: StructReader) => OrderVariants[K] } = {
  [OrderType.LIMIT]: (reader): LimitOrder => ({
    info: readInfo(reader),
    input: {
      token: reader.struct('input').address('token'),
      amount: reader.struct('input').bigint('amount')
    },
    outputs: reader.structs('outputs', (output) => ({
      token: output.address('token'),
      amount: output.bigint('amount'),
      recipient: output.address('recipient')
    }))
  }),

  [OrderType.DUTCH]: (reader): DutchOrder => ({
    info: readInfo(reader),
    cosigner: reader.address('cosigner'),
    decayStartTime: reader.bigint('decayStartTime'),
    decayEndTime: reader.bigint('decayEndTime'),
    input: readDutchInput(reader.struct('input')),
    outputs: reader.structs('outputs', (output) => ({
      ...readDutchInput(output),
      recipient: output.address('recipient')
    })),
    cosignerData: readDutchCosignerData(reader.struct('cosignerData')),
    cosignature: reader.bytes('cosignature')
  }),

  [OrderType.PRIORITY]: (reader): PriorityOrder => {
    const input = reader.struct('input');
    return {
      info: readInfo(reader),
      cosigner: reader.address('cosigner'),
      auctionStartBlock: reader.bigint('auctionStartBlock'),
      baselinePriorityFee: reader.bigint('baselinePriorityFee'),
      input: {
        token: input.address('token'),
        amount: input.bigint('amount'),
        curve: input.structs('curve', readPriorityPoint)
      },
      outputs: reader.structs('outputs', (output) => ({
        token: output.address('token'),
        amount: output.bigint('amount'),
        recipient: output.address('recipient'),
        curve: output.structs('curve', readPriorityPoint)
      })),
      cosignerData: readBlockCosignerData(reader.struct('cosignerData')),
      cosignature: reader.bytes('cosignature')
    };
  },

  [OrderType.HYBRID]: (reader): HybridOrder => {
    const input = reader.struct('input');
    return {
      info: readInfo(reader),
      cosigner: reader.address('cosigner'),
      auctionStartBlock: reader.bigint('auctionStartBlock'),
      baselinePriorityFee: reader.bigint('baselinePriorityFee'),
      input: {
        token: input.address('token'),
        startAmount: input.bigint('startAmount'),
        maxAmount: input.bigint('maxAmount'),
        curve: input.structs('curve', readDecayPoint)
      },
      outputs: reader.structs('outputs', (output) => ({
        token: output.address('token'),
        startAmount: output.bigint('startAmount'),
        minAmount: output.bigint('minAmount'),
        recipient: output.address('recipient'),
        curve: output.structs('curve', readDecayPoint)
      })),
      inputPriorityCurve: reader.structs('inputPriorityCurve', readPriorityPoint),
      outputPriorityCurve: reader.structs('outputPriorityCurve', readPriorityPoint),
      cosignerData: readBlockCosignerData(reader.struct('cosignerData')),
      cosignature: reader.bytes('cosignature')
    };
  },

  [OrderType.SETTLEMENT]: (reader): SettlementOrder => ({
    info: readInfo(reader),
    settlementOracle: reader.address('settlementOracle'),
    fillPeriod: reader.bigint('fillPeriod'),
    optimisticSettlementPeriod: reader.bigint('optimisticSettlementPeriod'),
    challengePeriod: reader.bigint('challengePeriod'),
    decayStartTime: reader.bigint('decayStartTime'),
    decayEndTime: reader.bigint('decayEndTime'),
    input: readDutchInput(reader.struct('input')),
    fillerCollateral: readCollateral(reader.struct('fillerCollateral')),
    challengerCollateral: readCollateral(reader.struct('challengerCollateral')),
    outputs: reader.structs('outputs', (output) => ({
      ...readDutchInput(output),
      recipient: output.address('recipient'),
      chainId: output.bigint('chainId')
    }))
  })
};

export function encodeOrderOf<K extends OrderType>(type: K, order: OrderVariants[K]): Hex {
  return coder.encode([ORDER_ABI[type]], [order]);
}

export function encodeOrder(order: AnyOrder): Hex {
  return encodeOrderOf(order.type, order.order);
}

export function decodeOrder<K extends OrderType>(type: K, encoded: Hex): OrderVariants[K] {
  let decoded: Result;
  try {
    decoded = coder.decode([ORDER_ABI[type]], encoded);
  } catch (error) {
    throw new MalformedOrderError(type, 'payload does not decode', error instanceof Error ? error : undefined);
  }
  return DECODERS[type](StructReader.from(type, decoded[0], 'order'));
}

/**
 * Builds a typed order from loosely typed input (JSON with decimal or hex
 * strings for integers) by running it through the wire codec.
 */
export function parseOrder<K extends OrderType>(type: K, value: unknown): OrderVariants[K] {
  let encoded: Hex;
  try {
    encoded = coder.encode([ORDER_ABI[type]], [value]);
  } catch (error) {
    throw new MalformedOrderError(type, 'fields do not match the order layout', error instanceof Error ? error : undefined);
  }
  return decodeOrder(type, encoded);
}

export function encodeDutchCosignerData(data: DutchCosignerData): Hex {
  return coder.encode([DUTCH_COSIGNER_DATA_ABI], [data]);
}

export function encodeBlockCosignerData(data: BlockCosignerData): Hex {
  return coder.encode([BLOCK_COSIGNER_DATA_ABI], [data]);
}

/** Loosely typed input of any variant, tagged with its type. */
export function parseAnyOrder(type: OrderType, value: unknown): AnyOrder {
  switch (type) {
    case OrderType.LIMIT:
      return { type, order: parseOrder(type, value) };
    case OrderType.DUTCH:
      return { type, order: parseOrder(type, value) };
    case OrderType.PRIORITY:
      return { type, order: parseOrder(type, value) };
    case OrderType.HYBRID:
      return { type, order: parseOrder(type, value) };
    case OrderType.SETTLEMENT:
      return { type, order: parseOrder(type, value) };
  }
}
