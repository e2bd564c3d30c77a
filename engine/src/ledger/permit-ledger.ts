import { Logger } from 'pino';
import { MaxUint256 } from 'ethers';
import {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidNonceError,
  InvalidSignatureError,
  PermitAmountExceededError,
  SignatureExpiredError
} from '@fillway/errors';
import { ExecutionEnvironment, PermitTransfer, PermitTransferRequest, TokenTransferer } from '@fillway/interfaces';
import { SigningDomain, recoverPermitSigner } from '@fillway/sdk';
import { Address } from '@fillway/types';
import { sameAddress } from '@fillway/utils';
import { JournaledMap } from '../state/journaled-map';
import { StateJournal } from '../state/state-journal';

export interface PermitLedgerOptions {
  domain: SigningDomain;
  environment: ExecutionEnvironment;
  journal: StateJournal;
  logger: Logger;
}

function key(...parts: string[]): string {
  return parts.map((part) => part.toLowerCase()).join(':');
}

/**
 * In-memory token balances with allowance transfers and signature
 * transfers. Nonces live in 256-bit words: `nonce >> 8` picks the word,
 * the low byte picks the bit.
 */
export class PermitLedger implements PermitTransfer, TokenTransferer {
  private readonly balances: JournaledMap<string, bigint>;
  private readonly allowances: JournaledMap<string, bigint>;
  private readonly nonceBitmap: JournaledMap<string, bigint>;
  private readonly domain: SigningDomain;
  private readonly environment: ExecutionEnvironment;
  private readonly journal: StateJournal;
  private readonly logger: Logger;

  constructor(options: PermitLedgerOptions) {
    this.domain = options.domain;
    this.environment = options.environment;
    this.journal = options.journal;
    this.logger = options.logger.child({ component: 'PermitLedger' });
    this.balances = new JournaledMap(options.journal);
    this.allowances = new JournaledMap(options.journal);
    this.nonceBitmap = new JournaledMap(options.journal);
  }

  get address(): Address {
    return this.domain.permitAddress;
  }

  mint(token: Address, to: Address, amount: bigint): void {
    this.credit(token, to, amount);
  }

  approve(owner: Address, token: Address, spender: Address, amount: bigint): void {
    this.allowances.set(key(token, owner, spender), amount);
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(key(token, owner, spender)) ?? 0n;
  }

  balanceOf(token: Address, account: Address): bigint {
    return this.balances.get(key(token, account)) ?? 0n;
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(token, from);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, token, balance, amount);
    }
    if (amount === 0n || sameAddress(from, to)) {
      return;
    }
    this.balances.set(key(token, from), balance - amount);
    this.credit(token, to, amount);
  }

  /** Moves `from`'s tokens on behalf of `spender`; owners need no allowance for their own funds. */
  transferFrom(spender: Address, token: Address, from: Address, to: Address, amount: bigint): void {
    if (!sameAddress(spender, from)) {
      const allowed = this.allowance(token, from, spender);
      if (allowed < amount) {
        throw new InsufficientAllowanceError(from, spender, token, allowed, amount);
      }
      if (allowed !== MaxUint256) {
        this.allowances.set(key(token, from, spender), allowed - amount);
      }
    }
    this.transfer(token, from, to, amount);
  }

  permitWitnessTransferFrom(request: PermitTransferRequest): void {
    const { now } = this.environment.currentContext();
    if (now > request.deadline) {
      throw new SignatureExpiredError(request.owner, request.deadline, now);
    }
    if (request.requestedAmount > request.permittedAmount) {
      throw new PermitAmountExceededError(request.owner, request.permittedAmount, request.requestedAmount);
    }

    const signer = this.recoverSigner(request);
    if (!sameAddress(signer, request.owner)) {
      throw new InvalidSignatureError(request.owner, signer);
    }

    this.journal.atomic(() => {
      this.useNonce(request.owner, request.nonce);
      this.transfer(request.token, request.owner, request.to, request.requestedAmount);
    });
    this.logger.debug({
      owner: request.owner,
      token: request.token,
      amount: request.requestedAmount.toString(),
      nonce: request.nonce.toString()
    }, 'Permit transfer');
  }

  isNonceUsed(owner: Address, nonce: bigint): boolean {
    const word = this.nonceBitmap.get(key(owner, (nonce >> 8n).toString())) ?? 0n;
    return (word & (1n << (nonce & 0xffn))) !== 0n;
  }

  /** Burns every nonce of `owner` whose bit is set in `mask` within word `wordPos`. */
  invalidateNonces(owner: Address, wordPos: bigint, mask: bigint): void {
    const slot = key(owner, wordPos.toString());
    this.nonceBitmap.set(slot, (this.nonceBitmap.get(slot) ?? 0n) | mask);
    this.logger.info({ owner, wordPos: wordPos.toString(), mask: mask.toString() }, 'Nonces invalidated');
  }

  private useNonce(owner: Address, nonce: bigint): void {
    if (this.isNonceUsed(owner, nonce)) {
      throw new InvalidNonceError(owner, nonce);
    }
    this.invalidateNonceBit(owner, nonce);
  }

  private invalidateNonceBit(owner: Address, nonce: bigint): void {
    const slot = key(owner, (nonce >> 8n).toString());
    this.nonceBitmap.set(slot, (this.nonceBitmap.get(slot) ?? 0n) | (1n << (nonce & 0xffn)));
  }

  private recoverSigner(request: PermitTransferRequest): Address {
    try {
      return recoverPermitSigner(this.domain, {
        permitted: { token: request.token, amount: request.permittedAmount },
        spender: request.spender,
        nonce: request.nonce,
        deadline: request.deadline,
        witness: request.witness
      }, request.signature);
    } catch {
      throw new InvalidSignatureError(request.owner);
    }
  }

  private credit(token: Address, to: Address, amount: bigint): void {
    this.balances.set(key(token, to), this.balanceOf(token, to) + amount);
  }
}
