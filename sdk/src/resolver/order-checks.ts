import {
  DeadlineBeforeEndTimeError,
  EndTimeBeforeStartTimeError,
  IncorrectAmountsError,
  InputAndOutputDecayError
} from '@fillway/errors';
import { DutchInput, Hex } from '@fillway/types';

export function checkDecayWindow(startTime: bigint, endTime: bigint, deadline: bigint, orderHash: Hex): void {
  if (endTime < startTime) {
    throw new EndTimeBeforeStartTimeError(startTime, endTime, orderHash);
  }
  if (deadline < endTime) {
    throw new DeadlineBeforeEndTimeError(deadline, endTime, orderHash);
  }
}

/**
 * Time-decayed inputs may only rise and outputs only fall, and at most one
 * side of the trade may move.
 */
export function checkDecayAmounts(input: DutchInput, outputs: readonly DutchInput[], orderHash: Hex): void {
  if (input.startAmount > input.endAmount) {
    throw new IncorrectAmountsError('input', 0, orderHash);
  }
  outputs.forEach((output, index) => {
    if (output.startAmount < output.endAmount) {
      throw new IncorrectAmountsError('output', index, orderHash);
    }
  });

  const inputDecays = input.startAmount !== input.endAmount;
  const outputDecays = outputs.some((output) => output.startAmount !== output.endAmount);
  checkSingleSidedDecay(inputDecays, outputDecays, orderHash);
}

export function checkSingleSidedDecay(inputDecays: boolean, outputDecays: boolean, orderHash: Hex): void {
  if (inputDecays && outputDecays) {
    throw new InputAndOutputDecayError(orderHash);
  }
}
