import {
  BatchTooLargeError,
  DeadlinePassedError,
  DuplicateFeeOutputError,
  FeeTooLargeError,
  HookNotRegisteredError,
  InsufficientBalanceError,
  InvalidFeeTokenError,
  InvalidNonceError,
  InvalidReactorError,
  OrderValidationFailedError,
  UnauthorizedError
} from '@fillway/errors';
import { FeeController, Filler } from '@fillway/interfaces';
import { hashOrderOf } from '@fillway/sdk';
import { FillEvent, Hex, OrderType, ResolvedOrder } from '@fillway/types';
import {
  TEST_ADDRESSES,
  TEST_TOKENS,
  TEST_WALLETS,
  createDutchOrder,
  createLimitOrder
} from '@fillway/test-utils';
import { BpsFeeController } from '../../src/reactor/fee-controller';
import { FILL_EVENT } from '../../src/reactor/reactor';
import { ONE, ReactorHarness, createReactorHarness, fund, signAs } from '../helpers/origin-harness';

describe('Reactor', () => {
  const { tokenIn, tokenOut, tokenOut2 } = TEST_TOKENS;
  const { reactor: reactorAddress, filler: fillerAddress, feeRecipient, owner } = TEST_ADDRESSES;
  const maker = TEST_WALLETS.maker;
  const otherMaker = TEST_WALLETS.otherMaker;
  const filler: Filler = { address: fillerAddress };

  let harness: ReactorHarness;
  let fills: FillEvent[];

  function limitOrder() {
    return createLimitOrder().build();
  }

  function setup(options: Parameters<typeof createReactorHarness>[0] = {}): void {
    harness = createReactorHarness(options);
    fills = [];
    harness.reactor.on(FILL_EVENT, (event: FillEvent) => fills.push(event));
    fund(harness.ledger, tokenIn, maker.address, 10n * ONE);
    fund(harness.ledger, tokenOut, fillerAddress, 10n * ONE, reactorAddress);
  }

  function balance(token: string, account: string): bigint {
    return harness.ledger.balanceOf(token, account);
  }

  beforeEach(() => setup());

  describe('execute', () => {
    it('should swap the maker input for the signed outputs', () => {
      const order = limitOrder();

      const resolved = harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler);

      expect(resolved.hash).toBe(hashOrderOf(OrderType.LIMIT, order));
      expect(balance(tokenIn, maker.address)).toBe(9n * ONE);
      expect(balance(tokenIn, fillerAddress)).toBe(ONE);
      expect(balance(tokenOut, maker.address)).toBe(2n * ONE);
      expect(balance(tokenOut, fillerAddress)).toBe(8n * ONE);
    });

    it('should emit one fill event per order', () => {
      const order = limitOrder();
      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler);

      expect(fills).toEqual([{
        orderHash: hashOrderOf(OrderType.LIMIT, order),
        filler: fillerAddress,
        offerer: maker.address,
        nonce: order.info.nonce
      }]);
    });

    it('should fill decaying orders at the current amount', () => {
      harness.clock.setTime(1_500n);
      const order = createDutchOrder().build();

      harness.reactor.execute(signAs({ type: OrderType.DUTCH, order }), filler);

      expect(balance(tokenOut, maker.address)).toBe(3n * ONE / 2n);
      expect(balance(tokenIn, fillerAddress)).toBe(ONE);
    });

    it('should not fill the same order twice', () => {
      const signed = signAs({ type: OrderType.LIMIT, order: limitOrder() });
      harness.reactor.execute(signed, filler);

      expect(() => harness.reactor.execute(signed, filler)).toThrow(InvalidNonceError);
      expect(balance(tokenIn, maker.address)).toBe(9n * ONE);
      expect(fills).toHaveLength(1);
    });

    it('should not fill a different order that reuses the nonce', () => {
      const first = limitOrder();
      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: first }), filler);
      const reused = createLimitOrder()
        .withInfo({ nonce: first.info.nonce })
        .withInput(tokenIn, 2n * ONE)
        .withOutput(tokenOut, ONE)
        .build();

      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: reused }), filler))
        .toThrow(InvalidNonceError);
      expect(balance(tokenIn, maker.address)).toBe(9n * ONE);
      expect(fills).toHaveLength(1);
    });

    it('should refuse orders addressed to another reactor', () => {
      const order = createLimitOrder().withInfo({ reactor: TEST_ADDRESSES.settler }).build();
      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler))
        .toThrow(InvalidReactorError);
    });

    it('should refuse orders past their deadline', () => {
      harness.clock.setTime(3_001n);
      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler))
        .toThrow(DeadlinePassedError);
    });

    it('should fill at the deadline itself', () => {
      harness.clock.setTime(3_000n);
      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler);
      expect(balance(tokenOut, maker.address)).toBe(2n * ONE);
    });
  });

  describe('filler callback', () => {
    it('should call back once with the whole batch after inputs arrive', () => {
      const seen: bigint[] = [];
      const callback = jest.fn((orders: readonly ResolvedOrder[], data: Hex) => {
        seen.push(balance(tokenIn, fillerAddress));
        expect(orders).toHaveLength(2);
        expect(data).toBe('0xbeef');
      });
      const first = limitOrder();
      const second = limitOrder();

      harness.reactor.executeBatch(
        [signAs({ type: OrderType.LIMIT, order: first }), signAs({ type: OrderType.LIMIT, order: second })],
        { address: fillerAddress, reactorCallback: callback },
        '0xbeef'
      );

      expect(callback).toHaveBeenCalledTimes(1);
      expect(seen).toEqual([2n * ONE]);
      expect(balance(tokenOut, maker.address)).toBe(4n * ONE);
    });
  });

  describe('batch atomicity', () => {
    it('should move nothing when a later order cannot be paid for', () => {
      const good = signAs({ type: OrderType.LIMIT, order: limitOrder() });
      const unfunded = signAs(
        { type: OrderType.LIMIT, order: createLimitOrder().withInfo({ offerer: otherMaker.address }).build() },
        otherMaker
      );

      expect(() => harness.reactor.executeBatch([good, unfunded], filler)).toThrow(InsufficientBalanceError);

      expect(balance(tokenIn, maker.address)).toBe(10n * ONE);
      expect(balance(tokenIn, fillerAddress)).toBe(0n);
      expect(balance(tokenOut, fillerAddress)).toBe(10n * ONE);
      expect(balance(tokenOut, maker.address)).toBe(0n);
      expect(fills).toEqual([]);

      harness.reactor.execute(good, filler);
      expect(balance(tokenIn, fillerAddress)).toBe(ONE);
    });

    it('should move nothing when the filler cannot cover the outputs', () => {
      const order = createLimitOrder().withOutput(tokenOut, 11n * ONE, maker.address).build();

      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler))
        .toThrow(InsufficientBalanceError);

      expect(balance(tokenIn, maker.address)).toBe(10n * ONE);
      expect(harness.ledger.isNonceUsed(maker.address, order.info.nonce)).toBe(false);
    });

    it('should fill orders of several makers, each with its own permit', () => {
      fund(harness.ledger, tokenIn, otherMaker.address, ONE);
      const first = limitOrder();
      const second = createLimitOrder().withInfo({ offerer: otherMaker.address }).build();

      harness.reactor.executeBatch([
        signAs({ type: OrderType.LIMIT, order: first }),
        signAs({ type: OrderType.LIMIT, order: second }, otherMaker)
      ], filler);

      expect(fills.map((fill) => fill.offerer)).toEqual([maker.address, otherMaker.address]);
      expect(balance(tokenIn, otherMaker.address)).toBe(0n);
      expect(balance(tokenOut, otherMaker.address)).toBe(2n * ONE);
    });

    it('should refuse oversized batches', () => {
      setup({ maxBatchSize: 1 });
      const orders = [limitOrder(), limitOrder()].map((order) => signAs({ type: OrderType.LIMIT, order }));
      expect(() => harness.reactor.executeBatch(orders, filler)).toThrow(BatchTooLargeError);
    });
  });

  describe('validation and hooks', () => {
    it('should run the order validator with the filler', () => {
      const validate = jest.fn(() => true);
      harness.hooks.registerValidator(TEST_ADDRESSES.validator, { validate });
      const order = createLimitOrder().withInfo({ additionalValidationContract: TEST_ADDRESSES.validator }).build();

      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler);

      expect(validate).toHaveBeenCalledWith(fillerAddress, expect.objectContaining({ hash: hashOrderOf(OrderType.LIMIT, order) }));
    });

    it('should fail the whole batch when a validator rejects', () => {
      harness.hooks.registerValidator(TEST_ADDRESSES.validator, { validate: () => false });
      const rejected = createLimitOrder().withInfo({ additionalValidationContract: TEST_ADDRESSES.validator }).build();

      expect(() => harness.reactor.executeBatch([
        signAs({ type: OrderType.LIMIT, order: limitOrder() }),
        signAs({ type: OrderType.LIMIT, order: rejected })
      ], filler)).toThrow(OrderValidationFailedError);
      expect(balance(tokenIn, maker.address)).toBe(10n * ONE);
    });

    it('should refuse orders naming an unknown validator', () => {
      const order = createLimitOrder().withInfo({ additionalValidationContract: TEST_ADDRESSES.validator }).build();
      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), filler))
        .toThrow(HookNotRegisteredError);
    });

    it('should run the pre hook before collection and the post hook after distribution', () => {
      const calls: string[] = [];
      harness.hooks
        .registerHook(TEST_ADDRESSES.preHook, {
          execute: () => calls.push(`pre:${balance(tokenIn, fillerAddress)}`)
        })
        .registerHook(TEST_ADDRESSES.postHook, {
          execute: () => calls.push(`post:${balance(tokenOut, maker.address)}`)
        });
      const order = createLimitOrder()
        .withInfo({ preExecutionHook: TEST_ADDRESSES.preHook, postExecutionHook: TEST_ADDRESSES.postHook })
        .build();

      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order }), {
        address: fillerAddress,
        reactorCallback: () => {
          calls.push('callback');
        }
      });

      expect(calls).toEqual(['pre:0', 'callback', `post:${2n * ONE}`]);
    });
  });

  describe('protocol fees', () => {
    it('should append fee outputs paid by the filler', () => {
      setup({ feeController: new BpsFeeController(feeRecipient).setFee(tokenIn, tokenOut, 5n) });

      const resolved = harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler);

      expect(resolved.outputs).toHaveLength(2);
      expect(resolved.outputs[1]).toEqual({ token: tokenOut, amount: 10n ** 15n, recipient: feeRecipient });
      expect(balance(tokenOut, feeRecipient)).toBe(10n ** 15n);
      expect(balance(tokenOut, fillerAddress)).toBe(8n * ONE - 10n ** 15n);
    });

    it('should cap fees at the configured share of the traded amount', () => {
      setup({ feeController: new BpsFeeController(feeRecipient).setFee(tokenIn, tokenOut, 10n) });
      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler))
        .toThrow(FeeTooLargeError);
    });

    it('should refuse duplicate fee outputs', () => {
      const fee = { token: tokenOut, amount: 1n, recipient: feeRecipient };
      const controller: FeeController = { getFeeOutputs: () => [fee, { ...fee }] };
      setup({ feeController: controller });

      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler))
        .toThrow(DuplicateFeeOutputError);
    });

    it('should refuse fees in tokens the order does not trade', () => {
      const controller: FeeController = {
        getFeeOutputs: () => [{ token: tokenOut2, amount: 1n, recipient: feeRecipient }]
      };
      setup({ feeController: controller });

      expect(() => harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler))
        .toThrow(InvalidFeeTokenError);
    });

    it('should let only the owner change the fee controller', () => {
      const controller = new BpsFeeController(feeRecipient).setFee(tokenIn, tokenOut, 5n);

      expect(() => harness.reactor.setFeeController(fillerAddress, controller)).toThrow(UnauthorizedError);

      harness.reactor.setFeeController(owner, controller);
      harness.reactor.execute(signAs({ type: OrderType.LIMIT, order: limitOrder() }), filler);
      expect(balance(tokenOut, feeRecipient)).toBe(10n ** 15n);
    });
  });
});
