import { MaxUint256, Wallet } from 'ethers';
import { Logger } from 'pino';
import { createAuctionResolver, signOrder } from '@fillway/sdk';
import { Address, AnyOrder, SignedOrder } from '@fillway/types';
import { ManualClock, TEST_ADDRESSES, TEST_CHAIN_ID, TEST_WALLETS, silentLogger } from '@fillway/test-utils';
import { PermitLedger } from '../../src/ledger/permit-ledger';
import { HookRegistry } from '../../src/reactor/hook-registry';
import { Reactor, ReactorOptions } from '../../src/reactor/reactor';
import { Settler } from '../../src/settlement/settler';
import { StateJournal } from '../../src/state/state-journal';

export const ONE = 10n ** 18n;

export const SIGNING_DOMAIN = { chainId: TEST_CHAIN_ID, permitAddress: TEST_ADDRESSES.permit };

export interface LedgerHarness {
  clock: ManualClock;
  journal: StateJournal;
  ledger: PermitLedger;
  logger: Logger;
}

export function createLedgerHarness(): LedgerHarness {
  const clock = new ManualClock();
  const journal = new StateJournal();
  const logger = silentLogger();
  const ledger = new PermitLedger({ domain: SIGNING_DOMAIN, environment: clock, journal, logger });
  return { clock, journal, ledger, logger };
}

export interface ReactorHarness extends LedgerHarness {
  hooks: HookRegistry;
  reactor: Reactor;
}

export function createReactorHarness(options: Partial<ReactorOptions> = {}): ReactorHarness {
  const harness = createLedgerHarness();
  const hooks = options.hooks ?? new HookRegistry();
  const reactor = new Reactor({
    address: TEST_ADDRESSES.reactor,
    owner: TEST_ADDRESSES.owner,
    permit: harness.ledger,
    tokens: harness.ledger,
    environment: harness.clock,
    journal: harness.journal,
    resolver: createAuctionResolver(harness.logger),
    logger: harness.logger,
    ...options,
    hooks
  });
  return { ...harness, hooks, reactor };
}

export interface SettlerHarness extends LedgerHarness {
  hooks: HookRegistry;
  settler: Settler;
}

export function createSettlerHarness(): SettlerHarness {
  const harness = createLedgerHarness();
  const hooks = new HookRegistry();
  const settler = new Settler({
    address: TEST_ADDRESSES.settler,
    permit: harness.ledger,
    tokens: harness.ledger,
    environment: harness.clock,
    journal: harness.journal,
    hooks,
    logger: harness.logger
  });
  return { ...harness, hooks, settler };
}

export function signAs(order: AnyOrder, maker: Wallet = TEST_WALLETS.maker): SignedOrder {
  return signOrder(maker.signingKey, order, SIGNING_DOMAIN);
}

/** Mints `amount` to `account` and lets `spender` pull all of it. */
export function fund(ledger: PermitLedger, token: Address, account: Address, amount: bigint, spender?: Address): void {
  ledger.mint(token, account, amount);
  if (spender) {
    ledger.approve(account, token, spender, MaxUint256);
  }
}
