import { DecayEndBeforeStartError, InvalidDecayCurveError } from '@fillway/errors';
import { DecayCurvePoint, DutchInput, DutchOutput, Hex, InputToken, OutputToken } from '@fillway/types';
import { maxBigInt, minBigInt } from '@fillway/utils';

/**
 * Linear interpolation between two amounts over `[startBound, endBound]`.
 * Truncation always leaves the result on the start side, which is the
 * maker's side for both rising inputs and falling outputs.
 */
export function decay(
  startAmount: bigint,
  endAmount: bigint,
  startBound: bigint,
  endBound: bigint,
  current: bigint
): bigint {
  if (endBound < startBound) {
    throw new DecayEndBeforeStartError(startBound, endBound);
  }
  if (current >= endBound || startAmount === endAmount) {
    return endAmount;
  }
  if (current <= startBound) {
    return startAmount;
  }
  const elapsed = current - startBound;
  const duration = endBound - startBound;
  return startAmount - ((startAmount - endAmount) * elapsed) / duration;
}

export function decayInput(
  input: DutchInput,
  startBound: bigint,
  endBound: bigint,
  current: bigint
): InputToken {
  return {
    token: input.token,
    amount: decay(input.startAmount, input.endAmount, startBound, endBound, current),
    maxAmount: input.endAmount
  };
}

export function decayOutputs(
  outputs: readonly DutchOutput[],
  startBound: bigint,
  endBound: bigint,
  current: bigint
): OutputToken[] {
  return outputs.map((output) => ({
    token: output.token,
    amount: decay(output.startAmount, output.endAmount, startBound, endBound, current),
    recipient: output.recipient
  }));
}

export type CurveDirection = 'input' | 'output';

/**
 * Curves start at an implicit `(0, 0)` breakpoint. Blocks must strictly
 * increase; relative amounts move the way an auction does, downward (the
 * input grows) for inputs and upward (the output shrinks) for outputs.
 */
export function validateDecayCurve(
  curve: readonly DecayCurvePoint[],
  direction: CurveDirection,
  orderHash?: Hex
): void {
  let previous: DecayCurvePoint = { relativeBlock: 0n, relativeAmount: 0n };
  curve.forEach((point, index) => {
    if (point.relativeBlock <= previous.relativeBlock) {
      throw new InvalidDecayCurveError(`breakpoint ${index} block does not increase`, orderHash);
    }
    const reversed = direction === 'input'
      ? point.relativeAmount > previous.relativeAmount
      : point.relativeAmount < previous.relativeAmount;
    if (reversed) {
      throw new InvalidDecayCurveError(
        `breakpoint ${index} ${direction} amount decays in the wrong direction`,
        orderHash
      );
    }
    previous = point;
  });
}

/**
 * Amount at `current` for a piecewise-linear block curve anchored at
 * `startBound`, clamped to `[minAmount, maxAmount]`.
 */
export function decayCurve(
  curve: readonly DecayCurvePoint[],
  startAmount: bigint,
  startBound: bigint,
  current: bigint,
  minAmount: bigint,
  maxAmount: bigint
): bigint {
  let relativeAmount = 0n;

  if (curve.length > 0 && current > startBound) {
    const blockDelta = current - startBound;
    let previous: DecayCurvePoint = { relativeBlock: 0n, relativeAmount: 0n };
    relativeAmount = curve[curve.length - 1].relativeAmount;

    for (const point of curve) {
      if (blockDelta < point.relativeBlock) {
        relativeAmount = decay(
          previous.relativeAmount,
          point.relativeAmount,
          previous.relativeBlock,
          point.relativeBlock,
          blockDelta
        );
        break;
      }
      previous = point;
    }
  }

  return maxBigInt(minAmount, minBigInt(startAmount - relativeAmount, maxAmount));
}
