import { MalformedOrderError } from '@fillway/errors';
import { OrderType } from '@fillway/types';
import {
  TEST_ADDRESSES,
  TEST_TOKENS,
  TEST_WALLETS,
  createDutchOrder,
  createHybridOrder,
  createLimitOrder,
  createPriorityOrder,
  createSettlementOrder
} from '@fillway/test-utils';
import { hashOrder, hashOrderOf, orderTypeString } from '../../src/encoding/eip712';
import { decodeOrder, encodeOrder, encodeOrderOf, parseAnyOrder, parseOrder } from '../../src/encoding/order-codec';

describe('Order Encoding', () => {
  describe('codec', () => {
    it('should decode a cosigned dutch order to the same value', () => {
      const order = createDutchOrder()
        .withCosigner(TEST_WALLETS.cosigner.address, {
          exclusiveFiller: TEST_ADDRESSES.filler,
          exclusivityOverrideBps: 50n,
          outputOverrides: [3n * 10n ** 18n]
        })
        .withCosignature('0x1234')
        .build();

      expect(decodeOrder(OrderType.DUTCH, encodeOrderOf(OrderType.DUTCH, order))).toEqual(order);
    });

    it('should keep negative curve amounts of hybrid orders', () => {
      const order = createHybridOrder()
        .withInput(TEST_TOKENS.tokenIn, 10n ** 18n, 2n * 10n ** 18n, [{ relativeBlock: 5n, relativeAmount: -(10n ** 17n) }])
        .build();

      const decoded = decodeOrder(OrderType.HYBRID, encodeOrderOf(OrderType.HYBRID, order));
      expect(decoded.input.curve).toEqual([{ relativeBlock: 5n, relativeAmount: -(10n ** 17n) }]);
    });

    it('should reject payloads that do not decode', () => {
      expect(() => decodeOrder(OrderType.LIMIT, '0x1234')).toThrow(MalformedOrderError);
    });

    it('should parse JSON with string amounts', () => {
      const order = createLimitOrder().withInfo({ nonce: 7n }).build();
      const json = JSON.parse(JSON.stringify(order, (_key, value: unknown) =>
        (typeof value === 'bigint' ? value.toString() : value)
      ));

      expect(parseOrder(OrderType.LIMIT, json)).toEqual(order);
      expect(parseAnyOrder(OrderType.LIMIT, json)).toEqual({ type: OrderType.LIMIT, order });
    });

    it('should reject JSON missing fields', () => {
      expect(() => parseOrder(OrderType.LIMIT, { info: {} })).toThrow(MalformedOrderError);
    });
  });

  describe('hashing', () => {
    it('should be deterministic and sensitive to signed fields', () => {
      const order = createLimitOrder().withInfo({ nonce: 1n }).build();
      const sameOrder = createLimitOrder().withInfo({ nonce: 1n }).build();
      const otherNonce = { ...order, info: { ...order.info, nonce: 2n } };

      expect(hashOrderOf(OrderType.LIMIT, order)).toBe(hashOrderOf(OrderType.LIMIT, sameOrder));
      expect(hashOrderOf(OrderType.LIMIT, otherNonce)).not.toBe(hashOrderOf(OrderType.LIMIT, order));
    });

    it('should ignore cosigner data and the cosignature', () => {
      const order = createDutchOrder().withCosigner(TEST_WALLETS.cosigner.address).build();
      const cosigned = {
        ...order,
        cosignerData: { ...order.cosignerData, inputOverride: 1n },
        cosignature: '0xabcd'
      };

      expect(hashOrder({ type: OrderType.DUTCH, order: cosigned })).toBe(hashOrder({ type: OrderType.DUTCH, order }));
    });

    it('should match the hash of the decoded payload', () => {
      const order = createSettlementOrder().build();
      const decoded = decodeOrder(OrderType.SETTLEMENT, encodeOrder({ type: OrderType.SETTLEMENT, order }));

      expect(hashOrderOf(OrderType.SETTLEMENT, decoded)).toBe(hashOrderOf(OrderType.SETTLEMENT, order));
    });

    it('should survive a round trip for limit orders', () => {
      const order = createLimitOrder()
        .withOutput(TEST_TOKENS.tokenOut, 10n ** 18n)
        .withOutput(TEST_TOKENS.tokenOut2, 5n, TEST_ADDRESSES.feeRecipient)
        .build();
      const decoded = decodeOrder(OrderType.LIMIT, encodeOrderOf(OrderType.LIMIT, order));

      expect(decoded).toEqual(order);
      expect(hashOrderOf(OrderType.LIMIT, decoded)).toBe(hashOrderOf(OrderType.LIMIT, order));
    });

    it('should survive a round trip for cosigned priority orders', () => {
      const order = createPriorityOrder()
        .withAuctionStartBlock(120n)
        .withBaselinePriorityFee(30n)
        .withInput(TEST_TOKENS.tokenIn, 10n ** 18n, [{ threshold: 100n, multiplier: 9_000_000n }])
        .withOutput(TEST_TOKENS.tokenOut, 2n * 10n ** 18n)
        .withCosigner(TEST_WALLETS.cosigner.address, { auctionTargetBlock: 110n, outputOverrides: [3n * 10n ** 18n] })
        .withCosignature('0xbeef')
        .build();
      const decoded = decodeOrder(OrderType.PRIORITY, encodeOrderOf(OrderType.PRIORITY, order));

      expect(decoded).toEqual(order);
      expect(hashOrderOf(OrderType.PRIORITY, decoded)).toBe(hashOrderOf(OrderType.PRIORITY, order));
    });

    it('should survive a round trip for whole hybrid orders', () => {
      const order = createHybridOrder()
        .withAuctionStartBlock(100n)
        .withInput(TEST_TOKENS.tokenIn, 10n ** 18n, 2n * 10n ** 18n, [{ relativeBlock: 10n, relativeAmount: -(10n ** 17n) }])
        .withOutput(TEST_TOKENS.tokenOut, 2n * 10n ** 18n, 10n ** 18n, [{ relativeBlock: 20n, relativeAmount: 10n ** 18n }])
        .withPriorityCurves([], [{ threshold: 50n, multiplier: 11_000_000n }])
        .withCosigner(TEST_WALLETS.cosigner.address, { auctionTargetBlock: 90n, inputOverride: 9n * 10n ** 17n })
        .withCosignature('0xbeef')
        .build();
      const decoded = decodeOrder(OrderType.HYBRID, encodeOrderOf(OrderType.HYBRID, order));

      expect(decoded).toEqual(order);
      expect(hashOrderOf(OrderType.HYBRID, decoded)).toBe(hashOrderOf(OrderType.HYBRID, order));
    });

    it('should expose the canonical type string', () => {
      expect(orderTypeString(OrderType.LIMIT)).toBe(
        'LimitOrder(OrderInfo info,LimitInput input,LimitOutput[] outputs)'
        + 'LimitInput(address token,uint256 amount)'
        + 'LimitOutput(address token,uint256 amount,address recipient)'
        + 'OrderInfo(address reactor,address offerer,uint256 nonce,uint256 deadline,'
        + 'address additionalValidationContract,bytes additionalValidationData,'
        + 'address preExecutionHook,bytes preExecutionHookData,'
        + 'address postExecutionHook,bytes postExecutionHookData)'
      );
    });
  });
});
