import { TypedDataDomain, TypedDataEncoder, TypedDataField, verifyTypedData } from 'ethers';
import { Address, Hex } from '@fillway/types';

export const PERMIT_DOMAIN_NAME = 'FillwayPermit';

export const PERMIT_TYPES: Record<string, TypedDataField[]> = {
  PermitWitnessTransferFrom: [
    { name: 'permitted', type: 'TokenPermissions' },
    { name: 'spender', type: 'address' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint256' },
    { name: 'witness', type: 'bytes32' }
  ],
  TokenPermissions: [
    { name: 'token', type: 'address' },
    { name: 'amount', type: 'uint256' }
  ]
};

export interface PermitMessage {
  permitted: { token: Address; amount: bigint };
  spender: Address;
  nonce: bigint;
  deadline: bigint;
  /** Order hash the transfer is bound to */
  witness: Hex;
}

export interface SigningDomain {
  chainId: bigint;
  /** Verifying contract of the permit service */
  permitAddress: Address;
}

export function permitDomain(domain: SigningDomain): TypedDataDomain {
  return {
    name: PERMIT_DOMAIN_NAME,
    chainId: domain.chainId,
    verifyingContract: domain.permitAddress
  };
}

export function permitDigest(domain: SigningDomain, message: PermitMessage): Hex {
  return TypedDataEncoder.hash(permitDomain(domain), PERMIT_TYPES, message);
}

/** Address that produced `signature` over `message`; throws on malformed signatures. */
export function recoverPermitSigner(domain: SigningDomain, message: PermitMessage, signature: Hex): Address {
  return verifyTypedData(permitDomain(domain), PERMIT_TYPES, message, signature);
}
