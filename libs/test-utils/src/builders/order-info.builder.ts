import { Address, EMPTY_BYTES, Hex, OrderInfo, ZERO_ADDRESS } from '@fillway/types';
import { TEST_ADDRESSES, TEST_WALLETS } from '../fixtures/accounts';

let nextNonce = 1n;

/** Fresh nonce per built order so fills never collide inside a test file. */
export function takeTestNonce(): bigint {
  const nonce = nextNonce;
  nextNonce += 1n;
  return nonce;
}

export class OrderInfoBuilder {
  private info: OrderInfo = {
    reactor: TEST_ADDRESSES.reactor,
    offerer: TEST_WALLETS.maker.address,
    nonce: takeTestNonce(),
    deadline: 3_000n,
    additionalValidationContract: ZERO_ADDRESS,
    additionalValidationData: EMPTY_BYTES,
    preExecutionHook: ZERO_ADDRESS,
    preExecutionHookData: EMPTY_BYTES,
    postExecutionHook: ZERO_ADDRESS,
    postExecutionHookData: EMPTY_BYTES
  };

  withReactor(reactor: Address): this {
    this.info.reactor = reactor;
    return this;
  }

  withOfferer(offerer: Address): this {
    this.info.offerer = offerer;
    return this;
  }

  withNonce(nonce: bigint): this {
    this.info.nonce = nonce;
    return this;
  }

  withDeadline(deadline: bigint): this {
    this.info.deadline = deadline;
    return this;
  }

  withValidation(contract: Address, data: Hex = EMPTY_BYTES): this {
    this.info.additionalValidationContract = contract;
    this.info.additionalValidationData = data;
    return this;
  }

  withPreExecutionHook(hook: Address, data: Hex = EMPTY_BYTES): this {
    this.info.preExecutionHook = hook;
    this.info.preExecutionHookData = data;
    return this;
  }

  withPostExecutionHook(hook: Address, data: Hex = EMPTY_BYTES): this {
    this.info.postExecutionHook = hook;
    this.info.postExecutionHookData = data;
    return this;
  }

  build(): OrderInfo {
    return { ...this.info };
  }
}

export function createOrderInfo(): OrderInfoBuilder {
  return new OrderInfoBuilder();
}
