import { DutchOrder, Hex, OrderType, ResolvedOrder, isZeroAddress } from '@fillway/types';
import { applyInputOverride, applyOutputOverrides, cosignerDigest, verifyCosignature } from '../cosigner/cosigner-verifier';
import { decayInput, decayOutputs } from '../decay/decay-lib';
import { applyExclusivity } from '../decay/exclusivity-lib';
import { encodeDutchCosignerData } from '../encoding/order-codec';
import { checkDecayAmounts, checkDecayWindow } from './order-checks';
import { ResolutionContext, VariantResolver } from './order-resolver';

/**
 * Time-decay orders. A non-zero cosigner must always vouch for its data,
 * which can narrow the decay window, improve amounts for the maker and
 * grant a filler exclusivity until decay starts. Without a cosigner the
 * cosigner fields carry no authority and are ignored.
 */
export class DutchOrderResolver extends VariantResolver<OrderType.DUTCH> {
  readonly type = OrderType.DUTCH;

  protected resolveOrder(order: DutchOrder, sig: Hex, orderHash: Hex, context: ResolutionContext): ResolvedOrder {
    checkDecayAmounts(order.input, order.outputs, orderHash);

    let decayStartTime = order.decayStartTime;
    let decayEndTime = order.decayEndTime;
    let input = order.input;
    let outputs = order.outputs;
    const cosigned = !isZeroAddress(order.cosigner);

    if (cosigned) {
      const data = order.cosignerData;
      verifyCosignature(
        order.cosigner,
        cosignerDigest(orderHash, encodeDutchCosignerData(data)),
        order.cosignature,
        orderHash
      );
      if (data.decayStartTime !== 0n) decayStartTime = data.decayStartTime;
      if (data.decayEndTime !== 0n) decayEndTime = data.decayEndTime;
      input = { ...input, startAmount: applyInputOverride(input.startAmount, data.inputOverride, orderHash) };
      const starts = applyOutputOverrides(outputs.map((output) => output.startAmount), data.outputOverrides, orderHash);
      outputs = outputs.map((output, index) => ({ ...output, startAmount: starts[index] }));
    }

    checkDecayWindow(decayStartTime, decayEndTime, order.info.deadline, orderHash);

    let resolvedOutputs = decayOutputs(outputs, decayStartTime, decayEndTime, context.now);
    if (cosigned) {
      resolvedOutputs = applyExclusivity(
        resolvedOutputs,
        {
          exclusiveFiller: order.cosignerData.exclusiveFiller,
          exclusivityEnd: decayStartTime,
          overrideBps: order.cosignerData.exclusivityOverrideBps
        },
        context.now,
        context.filler,
        orderHash
      );
    }

    return {
      type: this.type,
      info: order.info,
      input: decayInput(input, decayStartTime, decayEndTime, context.now),
      outputs: resolvedOutputs,
      sig,
      hash: orderHash
    };
  }
}
