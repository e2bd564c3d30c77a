import { concat, keccak256, recoverAddress } from 'ethers';
import {
  InvalidCosignatureError,
  InvalidInputOverrideError,
  InvalidOutputOverrideError
} from '@fillway/errors';
import { Address, EMPTY_BYTES, Hex, isZeroAddress } from '@fillway/types';
import { sameAddress } from '@fillway/utils';

/** Digest a cosigner signs: the order hash followed by the ABI-encoded cosigner data. */
export function cosignerDigest(orderHash: Hex, encodedCosignerData: Hex): Hex {
  return keccak256(concat([orderHash, encodedCosignerData]));
}

/**
 * Throws `InvalidCosignatureError` unless `cosignature` over `digest` was
 * produced by `cosigner`. A zero cosigner accepts anything.
 */
export function verifyCosignature(cosigner: Address, digest: Hex, cosignature: Hex, orderHash?: Hex): void {
  if (isZeroAddress(cosigner)) {
    return;
  }
  if (cosignature === EMPTY_BYTES) {
    throw new InvalidCosignatureError(cosigner, 'missing cosignature', orderHash);
  }

  let recovered: Address;
  try {
    recovered = recoverAddress(digest, cosignature);
  } catch (error) {
    throw new InvalidCosignatureError(
      cosigner,
      'malformed signature',
      orderHash,
      error instanceof Error ? error : undefined
    );
  }

  if (!sameAddress(recovered, cosigner)) {
    throw new InvalidCosignatureError(cosigner, `signed by ${recovered}`, orderHash);
  }
}

/** Cosigned input may only shrink; zero keeps the signed amount. */
export function applyInputOverride(signedAmount: bigint, override: bigint, orderHash?: Hex): bigint {
  if (override === 0n) {
    return signedAmount;
  }
  if (override > signedAmount) {
    throw new InvalidInputOverrideError(override, signedAmount, orderHash);
  }
  return override;
}

/** Cosigned outputs may only grow; zero entries keep the signed amount. */
export function applyOutputOverrides(
  signedAmounts: readonly bigint[],
  overrides: readonly bigint[],
  orderHash?: Hex
): bigint[] {
  if (overrides.length === 0) {
    return [...signedAmounts];
  }
  if (overrides.length !== signedAmounts.length) {
    throw new InvalidOutputOverrideError('length mismatch', orderHash, {
      outputs: signedAmounts.length,
      overrides: overrides.length
    });
  }
  return signedAmounts.map((signed, index) => {
    const override = overrides[index];
    if (override === 0n) {
      return signed;
    }
    if (override < signed) {
      throw new InvalidOutputOverrideError(`output ${index} override is below the signed amount`, orderHash, {
        index,
        override: override.toString(),
        signedAmount: signed.toString()
      });
    }
    return override;
  });
}
