import { Logger } from 'pino';
import { UnknownOrderTypeError } from '@fillway/errors';
import { Hex, ResolvedOrder, SignedOrder } from '@fillway/types';
import { DutchOrderResolver } from './dutch-resolver';
import { HybridOrderResolver } from './hybrid-resolver';
import { LimitOrderResolver } from './limit-resolver';
import { OrderResolver, ResolutionContext } from './order-resolver';
import { PriorityOrderResolver } from './priority-resolver';

/** Dispatches signed orders to the resolver registered for their variant. */
export class AuctionResolver {
  private readonly resolvers = new Map<string, OrderResolver>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'AuctionResolver' });
  }

  register(resolver: OrderResolver): this {
    this.resolvers.set(resolver.type, resolver);
    return this;
  }

  supports(type: string): boolean {
    return this.resolvers.has(type);
  }

  hash(signed: SignedOrder): Hex {
    return this.resolverFor(signed.type).hash(signed);
  }

  resolve(signed: SignedOrder, context: ResolutionContext): ResolvedOrder {
    const resolved = this.resolverFor(signed.type).resolve(signed, context);
    this.logger.debug({
      orderHash: resolved.hash,
      type: resolved.type,
      inputAmount: resolved.input.amount.toString(),
      outputs: resolved.outputs.map((output) => output.amount.toString()),
      blockNumber: context.blockNumber.toString(),
      now: context.now.toString()
    }, 'Resolved order');
    return resolved;
  }

  private resolverFor(type: string): OrderResolver {
    const resolver = this.resolvers.get(type);
    if (!resolver) {
      throw new UnknownOrderTypeError(type);
    }
    return resolver;
  }
}

/** Resolver for every variant a reactor fills directly. */
export function createAuctionResolver(logger: Logger): AuctionResolver {
  return new AuctionResolver(logger)
    .register(new LimitOrderResolver())
    .register(new DutchOrderResolver())
    .register(new PriorityOrderResolver())
    .register(new HybridOrderResolver());
}
