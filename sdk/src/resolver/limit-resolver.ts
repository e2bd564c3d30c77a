import { Hex, LimitOrder, OrderType, ResolvedOrder } from '@fillway/types';
import { VariantResolver } from './order-resolver';

/** Fixed-price orders: amounts are exactly what the maker signed. */
export class LimitOrderResolver extends VariantResolver<OrderType.LIMIT> {
  readonly type = OrderType.LIMIT;

  protected resolveOrder(order: LimitOrder, sig: Hex, orderHash: Hex): ResolvedOrder {
    return {
      type: this.type,
      info: order.info,
      input: { token: order.input.token, amount: order.input.amount, maxAmount: order.input.amount },
      outputs: order.outputs.map((output) => ({ ...output })),
      sig,
      hash: orderHash
    };
  }
}
