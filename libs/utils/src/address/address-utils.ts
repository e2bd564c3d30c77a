import { getAddress } from 'ethers';
import { InvalidAddressError } from '@fillway/errors';
import { Address } from '@fillway/types';

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Returns the checksummed form, throwing `InvalidAddressError` on bad input. */
export function normalizeAddress(address: string): Address {
  try {
    return getAddress(address);
  } catch {
    throw new InvalidAddressError(address);
  }
}

/** Short form for log lines */
export function shortAddress(address: Address, visibleChars: number = 4): string {
  if (address.length <= 2 + visibleChars * 2) {
    return address;
  }
  return `${address.slice(0, 2 + visibleChars)}...${address.slice(-visibleChars)}`;
}
