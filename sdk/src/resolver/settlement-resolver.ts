import { Hex, OrderType, ResolvedSettlementOrder, SettlementOrder } from '@fillway/types';
import { decay, decayInput } from '../decay/decay-lib';
import { checkDecayAmounts, checkDecayWindow } from './order-checks';
import { ResolutionContext, VariantResolver } from './order-resolver';

/** Cross-chain orders: dutch-style time decay plus the escrow terms the settler needs. */
export class SettlementOrderResolver extends VariantResolver<OrderType.SETTLEMENT, ResolvedSettlementOrder> {
  readonly type = OrderType.SETTLEMENT;

  protected resolveOrder(
    order: SettlementOrder,
    sig: Hex,
    orderHash: Hex,
    context: ResolutionContext
  ): ResolvedSettlementOrder {
    checkDecayAmounts(order.input, order.outputs, orderHash);
    checkDecayWindow(order.decayStartTime, order.decayEndTime, order.info.deadline, orderHash);

    return {
      type: this.type,
      info: order.info,
      input: decayInput(order.input, order.decayStartTime, order.decayEndTime, context.now),
      outputs: order.outputs.map((output) => ({
        token: output.token,
        amount: decay(output.startAmount, output.endAmount, order.decayStartTime, order.decayEndTime, context.now),
        recipient: output.recipient,
        chainId: output.chainId
      })),
      sig,
      hash: orderHash,
      settlementOracle: order.settlementOracle,
      fillPeriod: order.fillPeriod,
      optimisticSettlementPeriod: order.optimisticSettlementPeriod,
      challengePeriod: order.challengePeriod,
      fillerCollateral: order.fillerCollateral,
      challengerCollateral: order.challengerCollateral
    };
  }
}
