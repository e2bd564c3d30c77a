import { Wallet, id } from 'ethers';

/** Deterministic signers; keys derive from fixed labels so runs are reproducible. */
export const TEST_WALLETS = {
  maker: new Wallet(id('test-maker')),
  otherMaker: new Wallet(id('test-other-maker')),
  cosigner: new Wallet(id('test-cosigner')),
  stranger: new Wallet(id('test-stranger'))
};

export const TEST_ADDRESSES = {
  // Matches the `test` environment configuration
  reactor: '0x1000000000000000000000000000000000000001',
  settler: '0x1000000000000000000000000000000000000002',
  permit: '0x1000000000000000000000000000000000000003',
  owner: '0x1000000000000000000000000000000000000004',
  oracle: '0x1000000000000000000000000000000000000005',
  relay: '0x1000000000000000000000000000000000000006',

  filler: '0x3000000000000000000000000000000000000001',
  otherFiller: '0x3000000000000000000000000000000000000002',
  challenger: '0x3000000000000000000000000000000000000003',
  recipient: '0x3000000000000000000000000000000000000004',
  feeRecipient: '0x3000000000000000000000000000000000000005',
  destinationFiller: '0x3000000000000000000000000000000000000006',

  validator: '0x4000000000000000000000000000000000000001',
  preHook: '0x4000000000000000000000000000000000000002',
  postHook: '0x4000000000000000000000000000000000000003'
};

export const TEST_TOKENS = {
  tokenIn: '0x2000000000000000000000000000000000000001',
  tokenOut: '0x2000000000000000000000000000000000000002',
  tokenOut2: '0x2000000000000000000000000000000000000003',
  collateral: '0x2000000000000000000000000000000000000004'
};

export const TEST_CHAIN_ID = 31337n;
export const TEST_DESTINATION_CHAIN_ID = 10n;

export function getTestWallet(name: keyof typeof TEST_WALLETS): Wallet {
  return TEST_WALLETS[name];
}
