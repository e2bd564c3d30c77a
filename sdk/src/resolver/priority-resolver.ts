import { Hex, OrderType, PriorityOrder, ResolvedOrder } from '@fillway/types';
import { priorityFeeAboveBaseline, scaleInput, scaleOutput, validatePriorityCurve } from '../decay/priority-fee-lib';
import { resolveBlockAuction } from './block-auction';
import { checkSingleSidedDecay } from './order-checks';
import { ResolutionContext, VariantResolver } from './order-resolver';

/** Block-started orders whose amounts improve with the filler's priority fee. */
export class PriorityOrderResolver extends VariantResolver<OrderType.PRIORITY> {
  readonly type = OrderType.PRIORITY;

  protected resolveOrder(order: PriorityOrder, sig: Hex, orderHash: Hex, context: ResolutionContext): ResolvedOrder {
    validatePriorityCurve(order.input.curve, 'input', orderHash);
    order.outputs.forEach((output) => validatePriorityCurve(output.curve, 'output', orderHash));
    checkSingleSidedDecay(
      order.input.curve.length > 0,
      order.outputs.some((output) => output.curve.length > 0),
      orderHash
    );

    const terms = resolveBlockAuction(
      order,
      order.input.amount,
      order.outputs.map((output) => output.amount),
      context.blockNumber,
      orderHash
    );
    const fee = priorityFeeAboveBaseline(context.priorityFee, order.baselinePriorityFee);

    return {
      type: this.type,
      info: order.info,
      input: {
        token: order.input.token,
        amount: scaleInput(terms.inputAmount, order.input.curve, fee),
        maxAmount: order.input.amount
      },
      outputs: order.outputs.map((output, index) => ({
        token: output.token,
        amount: scaleOutput(terms.outputAmounts[index], output.curve, fee),
        recipient: output.recipient
      })),
      sig,
      hash: orderHash
    };
  }
}
