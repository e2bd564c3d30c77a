import {
  Address,
  ExecutionContext,
  Hex,
  OrderType,
  OrderVariants,
  ResolvedOrder,
  SignedOrder
} from '@fillway/types';
import { hashOrderOf } from '../encoding/eip712';
import { decodeOrder } from '../encoding/order-codec';

export interface ResolutionContext extends ExecutionContext {
  /** Filler attempting the fill; exclusivity treats an unknown filler as a stranger */
  filler?: Address;
}

/** Turns one variant's signed payload into concrete fill amounts. */
export interface OrderResolver<R extends ResolvedOrder = ResolvedOrder> {
  readonly type: OrderType;
  hash(signed: SignedOrder): Hex;
  resolve(signed: SignedOrder, context: ResolutionContext): R;
}

export abstract class VariantResolver<K extends OrderType, R extends ResolvedOrder = ResolvedOrder>
  implements OrderResolver<R> {
  abstract readonly type: K;

  decode(encoded: Hex): OrderVariants[K] {
    return decodeOrder(this.type, encoded);
  }

  hash(signed: SignedOrder): Hex {
    return hashOrderOf(this.type, this.decode(signed.order));
  }

  resolve(signed: SignedOrder, context: ResolutionContext): R {
    const order = this.decode(signed.order);
    return this.resolveOrder(order, signed.sig, hashOrderOf(this.type, order), context);
  }

  protected abstract resolveOrder(
    order: OrderVariants[K],
    sig: Hex,
    orderHash: Hex,
    context: ResolutionContext
  ): R;
}
