import { NoExclusiveOverrideError } from '@fillway/errors';
import { Address, Hex, OutputToken, isZeroAddress } from '@fillway/types';
import { BPS, mulDivUp, sameAddress } from '@fillway/utils';

export interface ExclusivityTerms {
  exclusiveFiller: Address;
  /** Last timestamp of the exclusive window */
  exclusivityEnd: bigint;
  overrideBps: bigint;
}

/**
 * Until `exclusivityEnd` only the exclusive filler fills at the quoted
 * price. Anyone else pays `overrideBps` more on every output, and cannot
 * fill at all when the override is zero.
 */
export function applyExclusivity(
  outputs: OutputToken[],
  terms: ExclusivityTerms,
  now: bigint,
  filler: Address | undefined,
  orderHash?: Hex
): OutputToken[] {
  if (isZeroAddress(terms.exclusiveFiller) || now > terms.exclusivityEnd) {
    return outputs;
  }
  if (filler !== undefined && sameAddress(filler, terms.exclusiveFiller)) {
    return outputs;
  }
  if (terms.overrideBps === 0n) {
    throw new NoExclusiveOverrideError(terms.exclusiveFiller, filler, orderHash);
  }
  return outputs.map((output) => ({
    ...output,
    amount: mulDivUp(output.amount, BPS + terms.overrideBps, BPS)
  }));
}
