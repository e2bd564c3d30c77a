export { OrderResolver, ResolutionContext, VariantResolver } from './order-resolver';
export { LimitOrderResolver } from './limit-resolver';
export { DutchOrderResolver } from './dutch-resolver';
export { PriorityOrderResolver } from './priority-resolver';
export { HybridOrderResolver } from './hybrid-resolver';
export { SettlementOrderResolver } from './settlement-resolver';
export { AuctionResolver, createAuctionResolver } from './auction-resolver';
