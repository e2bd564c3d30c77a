import {
  Address,
  BlockCosignerData,
  Collateral,
  DecayCurvePoint,
  DutchCosignerData,
  DutchOrder,
  DutchOutput,
  EMPTY_BYTES,
  Hex,
  HybridOrder,
  HybridOutput,
  LimitOrder,
  LimitOutput,
  OrderInfo,
  PriorityCurvePoint,
  PriorityOrder,
  PriorityOutput,
  SettlementOrder,
  SettlementOutput,
  ZERO_ADDRESS
} from '@fillway/types';
import { TEST_ADDRESSES, TEST_DESTINATION_CHAIN_ID, TEST_TOKENS } from '../fixtures/accounts';
import { OrderInfoBuilder } from './order-info.builder';

const ONE = 10n ** 18n;

abstract class OrderBuilder<T extends { info: OrderInfo }> {
  protected info: OrderInfo;

  constructor(reactor: Address) {
    this.info = new OrderInfoBuilder().withReactor(reactor).build();
  }

  withInfo(patch: Partial<OrderInfo>): this {
    this.info = { ...this.info, ...patch };
    return this;
  }

  abstract build(): T;
}

export class LimitOrderBuilder extends OrderBuilder<LimitOrder> {
  private input = { token: TEST_TOKENS.tokenIn, amount: ONE };
  private outputs: LimitOutput[] = [];

  constructor() {
    super(TEST_ADDRESSES.reactor);
  }

  withInput(token: Address, amount: bigint): this {
    this.input = { token, amount };
    return this;
  }

  withOutput(token: Address, amount: bigint, recipient: Address = TEST_ADDRESSES.recipient): this {
    this.outputs.push({ token, amount, recipient });
    return this;
  }

  build(): LimitOrder {
    const outputs = this.outputs.length > 0
      ? this.outputs
      : [{ token: TEST_TOKENS.tokenOut, amount: 2n * ONE, recipient: this.info.offerer }];
    return {
      info: { ...this.info },
      input: { ...this.input },
      outputs: outputs.map((output) => ({ ...output }))
    };
  }
}

export class DutchOrderBuilder extends OrderBuilder<DutchOrder> {
  private cosigner: Address = ZERO_ADDRESS;
  private decayStartTime = 1_000n;
  private decayEndTime = 2_000n;
  private input = { token: TEST_TOKENS.tokenIn, startAmount: ONE, endAmount: ONE };
  private outputs: DutchOutput[] = [];
  private cosignerData: DutchCosignerData = {
    decayStartTime: 0n,
    decayEndTime: 0n,
    exclusiveFiller: ZERO_ADDRESS,
    exclusivityOverrideBps: 0n,
    inputOverride: 0n,
    outputOverrides: []
  };
  private cosignature: Hex = EMPTY_BYTES;

  constructor() {
    super(TEST_ADDRESSES.reactor);
  }

  withDecay(startTime: bigint, endTime: bigint): this {
    this.decayStartTime = startTime;
    this.decayEndTime = endTime;
    return this;
  }

  withInput(token: Address, startAmount: bigint, endAmount: bigint = startAmount): this {
    this.input = { token, startAmount, endAmount };
    return this;
  }

  withOutput(
    token: Address,
    startAmount: bigint,
    endAmount: bigint = startAmount,
    recipient: Address = TEST_ADDRESSES.recipient
  ): this {
    this.outputs.push({ token, startAmount, endAmount, recipient });
    return this;
  }

  withCosigner(cosigner: Address, data: Partial<DutchCosignerData> = {}): this {
    this.cosigner = cosigner;
    this.cosignerData = { ...this.cosignerData, ...data };
    return this;
  }

  withCosignature(cosignature: Hex): this {
    this.cosignature = cosignature;
    return this;
  }

  build(): DutchOrder {
    const outputs = this.outputs.length > 0
      ? this.outputs
      : [{ token: TEST_TOKENS.tokenOut, startAmount: 2n * ONE, endAmount: ONE, recipient: this.info.offerer }];
    return {
      info: { ...this.info },
      cosigner: this.cosigner,
      decayStartTime: this.decayStartTime,
      decayEndTime: this.decayEndTime,
      input: { ...this.input },
      outputs: outputs.map((output) => ({ ...output })),
      cosignerData: { ...this.cosignerData, outputOverrides: [...this.cosignerData.outputOverrides] },
      cosignature: this.cosignature
    };
  }
}

export class PriorityOrderBuilder extends OrderBuilder<PriorityOrder> {
  private cosigner: Address = ZERO_ADDRESS;
  private auctionStartBlock = 100n;
  private baselinePriorityFee = 0n;
  private input: PriorityOrder['input'] = { token: TEST_TOKENS.tokenIn, amount: ONE, curve: [] };
  private outputs: PriorityOutput[] = [];
  private cosignerData: BlockCosignerData = { auctionTargetBlock: 0n, inputOverride: 0n, outputOverrides: [] };
  private cosignature: Hex = EMPTY_BYTES;

  constructor() {
    super(TEST_ADDRESSES.reactor);
  }

  withAuctionStartBlock(block: bigint): this {
    this.auctionStartBlock = block;
    return this;
  }

  withBaselinePriorityFee(fee: bigint): this {
    this.baselinePriorityFee = fee;
    return this;
  }

  withInput(token: Address, amount: bigint, curve: PriorityCurvePoint[] = []): this {
    this.input = { token, amount, curve };
    return this;
  }

  withOutput(
    token: Address,
    amount: bigint,
    curve: PriorityCurvePoint[] = [],
    recipient: Address = TEST_ADDRESSES.recipient
  ): this {
    this.outputs.push({ token, amount, recipient, curve });
    return this;
  }

  withCosigner(cosigner: Address, data: Partial<BlockCosignerData> = {}): this {
    this.cosigner = cosigner;
    this.cosignerData = { ...this.cosignerData, ...data };
    return this;
  }

  withCosignature(cosignature: Hex): this {
    this.cosignature = cosignature;
    return this;
  }

  build(): PriorityOrder {
    const outputs = this.outputs.length > 0
      ? this.outputs
      : [{ token: TEST_TOKENS.tokenOut, amount: 2n * ONE, recipient: this.info.offerer, curve: [] }];
    return {
      info: { ...this.info },
      cosigner: this.cosigner,
      auctionStartBlock: this.auctionStartBlock,
      baselinePriorityFee: this.baselinePriorityFee,
      input: { ...this.input, curve: this.input.curve.map((point) => ({ ...point })) },
      outputs: outputs.map((output) => ({ ...output, curve: output.curve.map((point) => ({ ...point })) })),
      cosignerData: { ...this.cosignerData, outputOverrides: [...this.cosignerData.outputOverrides] },
      cosignature: this.cosignature
    };
  }
}

export class HybridOrderBuilder extends OrderBuilder<HybridOrder> {
  private cosigner: Address = ZERO_ADDRESS;
  private auctionStartBlock = 100n;
  private baselinePriorityFee = 0n;
  private input: HybridOrder['input'] = { token: TEST_TOKENS.tokenIn, startAmount: ONE, maxAmount: ONE, curve: [] };
  private outputs: HybridOutput[] = [];
  private inputPriorityCurve: PriorityCurvePoint[] = [];
  private outputPriorityCurve: PriorityCurvePoint[] = [];
  private cosignerData: BlockCosignerData = { auctionTargetBlock: 0n, inputOverride: 0n, outputOverrides: [] };
  private cosignature: Hex = EMPTY_BYTES;

  constructor() {
    super(TEST_ADDRESSES.reactor);
  }

  withAuctionStartBlock(block: bigint): this {
    this.auctionStartBlock = block;
    return this;
  }

  withBaselinePriorityFee(fee: bigint): this {
    this.baselinePriorityFee = fee;
    return this;
  }

  withInput(token: Address, startAmount: bigint, maxAmount: bigint, curve: DecayCurvePoint[] = []): this {
    this.input = { token, startAmount, maxAmount, curve };
    return this;
  }

  withOutput(
    token: Address,
    startAmount: bigint,
    minAmount: bigint,
    curve: DecayCurvePoint[] = [],
    recipient: Address = TEST_ADDRESSES.recipient
  ): this {
    this.outputs.push({ token, startAmount, minAmount, recipient, curve });
    return this;
  }

  withPriorityCurves(inputCurve: PriorityCurvePoint[], outputCurve: PriorityCurvePoint[]): this {
    this.inputPriorityCurve = inputCurve;
    this.outputPriorityCurve = outputCurve;
    return this;
  }

  withCosigner(cosigner: Address, data: Partial<BlockCosignerData> = {}): this {
    this.cosigner = cosigner;
    this.cosignerData = { ...this.cosignerData, ...data };
    return this;
  }

  withCosignature(cosignature: Hex): this {
    this.cosignature = cosignature;
    return this;
  }

  build(): HybridOrder {
    const outputs = this.outputs.length > 0
      ? this.outputs
      : [{ token: TEST_TOKENS.tokenOut, startAmount: 2n * ONE, minAmount: 2n * ONE, recipient: this.info.offerer, curve: [] }];
    return {
      info: { ...this.info },
      cosigner: this.cosigner,
      auctionStartBlock: this.auctionStartBlock,
      baselinePriorityFee: this.baselinePriorityFee,
      input: { ...this.input, curve: this.input.curve.map((point) => ({ ...point })) },
      outputs: outputs.map((output) => ({ ...output, curve: output.curve.map((point) => ({ ...point })) })),
      inputPriorityCurve: this.inputPriorityCurve.map((point) => ({ ...point })),
      outputPriorityCurve: this.outputPriorityCurve.map((point) => ({ ...point })),
      cosignerData: { ...this.cosignerData, outputOverrides: [...this.cosignerData.outputOverrides] },
      cosignature: this.cosignature
    };
  }
}

export class SettlementOrderBuilder extends OrderBuilder<SettlementOrder> {
  private settlementOracle: Address = TEST_ADDRESSES.oracle;
  private fillPeriod = 100n;
  private optimisticSettlementPeriod = 200n;
  private challengePeriod = 300n;
  private decayStartTime = 1_000n;
  private decayEndTime = 2_000n;
  private input = { token: TEST_TOKENS.tokenIn, startAmount: ONE, endAmount: ONE };
  private fillerCollateral: Collateral = { token: TEST_TOKENS.collateral, amount: ONE };
  private challengerCollateral: Collateral = { token: TEST_TOKENS.collateral, amount: ONE / 2n };
  private outputs: SettlementOutput[] = [];

  constructor() {
    super(TEST_ADDRESSES.settler);
  }

  withOracle(oracle: Address): this {
    this.settlementOracle = oracle;
    return this;
  }

  withPeriods(fillPeriod: bigint, optimisticSettlementPeriod: bigint, challengePeriod: bigint): this {
    this.fillPeriod = fillPeriod;
    this.optimisticSettlementPeriod = optimisticSettlementPeriod;
    this.challengePeriod = challengePeriod;
    return this;
  }

  withDecay(startTime: bigint, endTime: bigint): this {
    this.decayStartTime = startTime;
    this.decayEndTime = endTime;
    return this;
  }

  withInput(token: Address, startAmount: bigint, endAmount: bigint = startAmount): this {
    this.input = { token, startAmount, endAmount };
    return this;
  }

  withCollateral(filler: Collateral, challenger: Collateral): this {
    this.fillerCollateral = filler;
    this.challengerCollateral = challenger;
    return this;
  }

  withOutput(
    token: Address,
    startAmount: bigint,
    endAmount: bigint = startAmount,
    recipient: Address = TEST_ADDRESSES.recipient,
    chainId: bigint = TEST_DESTINATION_CHAIN_ID
  ): this {
    this.outputs.push({ token, startAmount, endAmount, recipient, chainId });
    return this;
  }

  build(): SettlementOrder {
    const outputs = this.outputs.length > 0
      ? this.outputs
      : [{
        token: TEST_TOKENS.tokenOut,
        startAmount: 2n * ONE,
        endAmount: 2n * ONE,
        recipient: this.info.offerer,
        chainId: TEST_DESTINATION_CHAIN_ID
      }];
    return {
      info: { ...this.info },
      settlementOracle: this.settlementOracle,
      fillPeriod: this.fillPeriod,
      optimisticSettlementPeriod: this.optimisticSettlementPeriod,
      challengePeriod: this.challengePeriod,
      decayStartTime: this.decayStartTime,
      decayEndTime: this.decayEndTime,
      input: { ...this.input },
      fillerCollateral: { ...this.fillerCollateral },
      challengerCollateral: { ...this.challengerCollateral },
      outputs: outputs.map((output) => ({ ...output }))
    };
  }
}

// Factory functions
export function createLimitOrder(): LimitOrderBuilder {
  return new LimitOrderBuilder();
}

export function createDutchOrder(): DutchOrderBuilder {
  return new DutchOrderBuilder();
}

export function createPriorityOrder(): PriorityOrderBuilder {
  return new PriorityOrderBuilder();
}

export function createHybridOrder(): HybridOrderBuilder {
  return new HybridOrderBuilder();
}

export function createSettlementOrder(): SettlementOrderBuilder {
  return new SettlementOrderBuilder();
}
