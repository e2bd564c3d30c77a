import { MaxUint256 } from 'ethers';
import { IncorrectAmountsError } from '@fillway/errors';
import { Hex, HybridOrder, OrderType, ResolvedOrder } from '@fillway/types';
import { decayCurve, validateDecayCurve } from '../decay/decay-lib';
import { priorityFeeAboveBaseline, scaleInput, scaleOutput, validatePriorityCurve } from '../decay/priority-fee-lib';
import { resolveBlockAuction } from './block-auction';
import { checkSingleSidedDecay } from './order-checks';
import { ResolutionContext, VariantResolver } from './order-resolver';

/**
 * Block curve decay from the auction start, then priority fee scaling of
 * the decayed amounts. Inputs stay within `[0, maxAmount]`, outputs at or
 * above `minAmount`.
 */
export class HybridOrderResolver extends VariantResolver<OrderType.HYBRID> {
  readonly type = OrderType.HYBRID;

  protected resolveOrder(order: HybridOrder, sig: Hex, orderHash: Hex, context: ResolutionContext): ResolvedOrder {
    this.validate(order, orderHash);

    const terms = resolveBlockAuction(
      order,
      order.input.startAmount,
      order.outputs.map((output) => output.startAmount),
      context.blockNumber,
      orderHash
    );
    const fee = priorityFeeAboveBaseline(context.priorityFee, order.baselinePriorityFee);

    const decayedInput = decayCurve(
      order.input.curve,
      terms.inputAmount,
      terms.startBlock,
      context.blockNumber,
      0n,
      order.input.maxAmount
    );

    return {
      type: this.type,
      info: order.info,
      input: {
        token: order.input.token,
        amount: scaleInput(decayedInput, order.inputPriorityCurve, fee),
        maxAmount: order.input.maxAmount
      },
      outputs: order.outputs.map((output, index) => ({
        token: output.token,
        amount: scaleOutput(
          decayCurve(output.curve, terms.outputAmounts[index], terms.startBlock, context.blockNumber, output.minAmount, MaxUint256),
          order.outputPriorityCurve,
          fee
        ),
        recipient: output.recipient
      })),
      sig,
      hash: orderHash
    };
  }

  private validate(order: HybridOrder, orderHash: Hex): void {
    if (order.input.startAmount > order.input.maxAmount) {
      throw new IncorrectAmountsError('input', 0, orderHash);
    }
    order.outputs.forEach((output, index) => {
      if (output.startAmount < output.minAmount) {
        throw new IncorrectAmountsError('output', index, orderHash);
      }
      validateDecayCurve(output.curve, 'output', orderHash);
    });
    validateDecayCurve(order.input.curve, 'input', orderHash);
    validatePriorityCurve(order.inputPriorityCurve, 'input', orderHash);
    validatePriorityCurve(order.outputPriorityCurve, 'output', orderHash);

    checkSingleSidedDecay(
      order.input.curve.length > 0 || order.inputPriorityCurve.length > 0,
      order.outputs.some((output) => output.curve.length > 0) || order.outputPriorityCurve.length > 0,
      orderHash
    );
  }
}
