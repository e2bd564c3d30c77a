import { MaxUint256, Wallet } from 'ethers';
import {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidNonceError,
  InvalidSignatureError,
  PermitAmountExceededError,
  SignatureExpiredError
} from '@fillway/errors';
import { PermitTransferRequest } from '@fillway/interfaces';
import { PermitMessage, permitDigest } from '@fillway/sdk';
import {
  ManualClock,
  TEST_ADDRESSES,
  TEST_CHAIN_ID,
  TEST_TOKENS,
  TEST_WALLETS,
  silentLogger
} from '@fillway/test-utils';
import { PermitLedger } from '../../src/ledger/permit-ledger';
import { StateJournal } from '../../src/state/state-journal';

describe('PermitLedger', () => {
  const ONE = 10n ** 18n;
  const domain = { chainId: TEST_CHAIN_ID, permitAddress: TEST_ADDRESSES.permit };
  const maker = TEST_WALLETS.maker;
  const { tokenIn } = TEST_TOKENS;
  const { reactor, filler, recipient } = TEST_ADDRESSES;
  const witness = `0x${'ab'.repeat(32)}`;

  let clock: ManualClock;
  let ledger: PermitLedger;

  function permitRequest(
    overrides: Partial<PermitTransferRequest> = {},
    signer: Wallet = maker
  ): PermitTransferRequest {
    const base: PermitTransferRequest = {
      owner: maker.address,
      spender: reactor,
      token: tokenIn,
      permittedAmount: ONE,
      requestedAmount: ONE,
      nonce: 7n,
      deadline: 2_000n,
      witness,
      signature: '0x',
      to: filler,
      ...overrides
    };
    const message: PermitMessage = {
      permitted: { token: base.token, amount: base.permittedAmount },
      spender: base.spender,
      nonce: base.nonce,
      deadline: base.deadline,
      witness: base.witness
    };
    return {
      ...base,
      signature: overrides.signature ?? signer.signingKey.sign(permitDigest(domain, message)).serialized
    };
  }

  beforeEach(() => {
    clock = new ManualClock();
    ledger = new PermitLedger({ domain, environment: clock, journal: new StateJournal(), logger: silentLogger() });
    ledger.mint(tokenIn, maker.address, 5n * ONE);
  });

  describe('balances', () => {
    it('should move tokens between accounts', () => {
      ledger.transfer(tokenIn, maker.address, recipient, 2n * ONE);
      expect(ledger.balanceOf(tokenIn, maker.address)).toBe(3n * ONE);
      expect(ledger.balanceOf(tokenIn, recipient)).toBe(2n * ONE);
    });

    it('should treat addresses case-insensitively', () => {
      expect(ledger.balanceOf(tokenIn, maker.address.toLowerCase())).toBe(5n * ONE);
    });

    it('should refuse to overdraw', () => {
      expect(() => ledger.transfer(tokenIn, maker.address, recipient, 6n * ONE)).toThrow(InsufficientBalanceError);
      expect(ledger.balanceOf(tokenIn, maker.address)).toBe(5n * ONE);
    });
  });

  describe('allowances', () => {
    it('should spend and reduce an allowance', () => {
      ledger.approve(maker.address, tokenIn, reactor, 3n * ONE);
      ledger.transferFrom(reactor, tokenIn, maker.address, recipient, ONE);

      expect(ledger.allowance(tokenIn, maker.address, reactor)).toBe(2n * ONE);
      expect(ledger.balanceOf(tokenIn, recipient)).toBe(ONE);
    });

    it('should keep an unlimited allowance unlimited', () => {
      ledger.approve(maker.address, tokenIn, reactor, MaxUint256);
      ledger.transferFrom(reactor, tokenIn, maker.address, recipient, ONE);
      expect(ledger.allowance(tokenIn, maker.address, reactor)).toBe(MaxUint256);
    });

    it('should require an allowance from other spenders', () => {
      expect(() => ledger.transferFrom(reactor, tokenIn, maker.address, recipient, ONE))
        .toThrow(InsufficientAllowanceError);
    });

    it('should let owners move their own tokens', () => {
      ledger.transferFrom(maker.address, tokenIn, maker.address, recipient, ONE);
      expect(ledger.balanceOf(tokenIn, recipient)).toBe(ONE);
    });
  });

  describe('permitWitnessTransferFrom', () => {
    it('should move the requested amount with the owner signature', () => {
      ledger.permitWitnessTransferFrom(permitRequest({ requestedAmount: ONE / 2n }));

      expect(ledger.balanceOf(tokenIn, filler)).toBe(ONE / 2n);
      expect(ledger.balanceOf(tokenIn, maker.address)).toBe(9n * ONE / 2n);
      expect(ledger.isNonceUsed(maker.address, 7n)).toBe(true);
    });

    it('should refuse a nonce twice', () => {
      ledger.permitWitnessTransferFrom(permitRequest());
      expect(() => ledger.permitWitnessTransferFrom(permitRequest())).toThrow(InvalidNonceError);
      expect(ledger.balanceOf(tokenIn, filler)).toBe(ONE);
    });

    it('should refuse an expired permit', () => {
      clock.setTime(2_001n);
      expect(() => ledger.permitWitnessTransferFrom(permitRequest())).toThrow(SignatureExpiredError);
    });

    it('should accept a permit at its deadline', () => {
      clock.setTime(2_000n);
      ledger.permitWitnessTransferFrom(permitRequest());
      expect(ledger.balanceOf(tokenIn, filler)).toBe(ONE);
    });

    it('should refuse to move more than the permit allows', () => {
      expect(() => ledger.permitWitnessTransferFrom(permitRequest({ requestedAmount: 2n * ONE })))
        .toThrow(PermitAmountExceededError);
    });

    it('should refuse signatures from anyone but the owner', () => {
      expect(() => ledger.permitWitnessTransferFrom(permitRequest({}, TEST_WALLETS.stranger)))
        .toThrow(InvalidSignatureError);
      expect(() => ledger.permitWitnessTransferFrom(permitRequest({ signature: '0x1234' })))
        .toThrow(InvalidSignatureError);
    });

    it('should bind the signature to the witness', () => {
      const request = permitRequest();
      expect(() => ledger.permitWitnessTransferFrom({ ...request, witness: `0x${'cd'.repeat(32)}` }))
        .toThrow(InvalidSignatureError);
    });

    it('should leave the nonce unused when the owner cannot pay', () => {
      const request = permitRequest({ permittedAmount: 6n * ONE, requestedAmount: 6n * ONE });
      expect(() => ledger.permitWitnessTransferFrom(request)).toThrow(InsufficientBalanceError);
      expect(ledger.isNonceUsed(maker.address, 7n)).toBe(false);
    });
  });

  describe('invalidateNonces', () => {
    it('should burn every nonce set in the mask', () => {
      ledger.invalidateNonces(maker.address, 0n, (1n << 7n) | (1n << 9n));

      expect(ledger.isNonceUsed(maker.address, 7n)).toBe(true);
      expect(ledger.isNonceUsed(maker.address, 9n)).toBe(true);
      expect(ledger.isNonceUsed(maker.address, 8n)).toBe(false);
      expect(() => ledger.permitWitnessTransferFrom(permitRequest())).toThrow(InvalidNonceError);
    });

    it('should address nonces by word', () => {
      ledger.invalidateNonces(maker.address, 1n, 1n << 3n);
      expect(ledger.isNonceUsed(maker.address, 259n)).toBe(true);
      expect(ledger.isNonceUsed(maker.address, 3n)).toBe(false);
    });
  });
});
