import { InvalidPriorityCurveError } from '@fillway/errors';
import { Hex, PriorityCurvePoint } from '@fillway/types';
import { MPS, maxBigInt, mulDivDown, mulDivUp } from '@fillway/utils';
import { CurveDirection } from './decay-lib';

interface Multiplier {
  numerator: bigint;
  denominator: bigint;
}

/** Priority fee the filler pays above the maker's baseline; never negative. */
export function priorityFeeAboveBaseline(priorityFee: bigint, baselinePriorityFee: bigint): bigint {
  return maxBigInt(0n, priorityFee - baselinePriorityFee);
}

export function validatePriorityCurve(
  curve: readonly PriorityCurvePoint[],
  direction: CurveDirection,
  orderHash?: Hex
): void {
  let previous: PriorityCurvePoint | undefined;
  let previousMultiplier = MPS;

  curve.forEach((point, index) => {
    if (point.threshold < 0n || (previous !== undefined && point.threshold <= previous.threshold)) {
      throw new InvalidPriorityCurveError(`threshold ${index} does not increase`, orderHash);
    }
    if (direction === 'input') {
      if (point.multiplier < 0n || point.multiplier > previousMultiplier) {
        throw new InvalidPriorityCurveError(`input multiplier ${index} must not increase or exceed ${MPS}`, orderHash);
      }
    } else if (point.multiplier < previousMultiplier) {
      throw new InvalidPriorityCurveError(`output multiplier ${index} must not decrease or fall below ${MPS}`, orderHash);
    }
    previous = point;
    previousMultiplier = point.multiplier;
  });
}

/**
 * Multiplier for `fee`, kept as an exact fraction so the amount is rounded
 * only once. Breakpoints are joined linearly from an implicit `(0, MPS)`;
 * past the last breakpoint its multiplier holds.
 */
function curveMultiplier(curve: readonly PriorityCurvePoint[], fee: bigint): Multiplier {
  let previous: PriorityCurvePoint = { threshold: 0n, multiplier: MPS };
  for (const point of curve) {
    if (fee < point.threshold) {
      const span = point.threshold - previous.threshold;
      const progressed = fee - previous.threshold;
      return {
        numerator: previous.multiplier * span + (point.multiplier - previous.multiplier) * progressed,
        denominator: span
      };
    }
    previous = point;
  }
  return { numerator: previous.multiplier, denominator: 1n };
}

/** Scales a maker input down as the fee grows; rounds down. */
export function scaleInput(amount: bigint, curve: readonly PriorityCurvePoint[], fee: bigint): bigint {
  const { numerator, denominator } = curveMultiplier(curve, fee);
  return mulDivDown(amount, numerator, MPS * denominator);
}

/** Scales a maker output up as the fee grows; rounds up. */
export function scaleOutput(amount: bigint, curve: readonly PriorityCurvePoint[], fee: bigint): bigint {
  const { numerator, denominator } = curveMultiplier(curve, fee);
  return mulDivUp(amount, numerator, MPS * denominator);
}
