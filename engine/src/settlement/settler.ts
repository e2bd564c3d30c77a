import { EventEmitter } from 'events';
import { Logger } from 'pino';
import {
  ChallengePeriodElapsedError,
  ChallengePeriodNotElapsedError,
  InitiateDeadlinePassedError,
  InvalidSettlementStatusError,
  InvalidSettlerError,
  OnlyOracleError,
  OptimisticPeriodNotElapsedError,
  OrderFillExceededDeadlineError,
  OrderValidationFailedError,
  SettlementAlreadyExistsError
} from '@fillway/errors';
import { ExecutionEnvironment, PermitTransfer, TokenTransferer } from '@fillway/interfaces';
import { SettlementOrderResolver } from '@fillway/sdk';
import {
  ActiveSettlement,
  Address,
  Hex,
  InitiateSettlementEvent,
  SettlementChallengedEvent,
  SettlementResolvedEvent,
  SettlementStatus,
  SignedOrder
} from '@fillway/types';
import { sameAddress } from '@fillway/utils';
import { EngineMetrics, SettlementTransition } from '../monitoring/metrics';
import { HookRegistry } from '../reactor/hook-registry';
import { StateJournal } from '../state/state-journal';
import { SettlementStore } from './settlement-store';

export const INITIATE_SETTLEMENT_EVENT = 'InitiateSettlement';
export const SETTLEMENT_CHALLENGED_EVENT = 'SettlementChallenged';
export const SETTLEMENT_FINALIZED_EVENT = 'SettlementFinalized';
export const SETTLEMENT_CANCELLED_EVENT = 'SettlementCancelled';

export interface SettlerOptions {
  address: Address;
  permit: PermitTransfer;
  tokens: TokenTransferer;
  environment: ExecutionEnvironment;
  journal: StateJournal;
  resolver?: SettlementOrderResolver;
  hooks?: HookRegistry;
  store?: SettlementStore;
  metrics?: EngineMetrics;
  logger: Logger;
}

/**
 * Origin-domain escrow for cross-chain orders. Every transition checks its
 * preconditions before moving funds, and all fund movement of a transition
 * runs in one journal frame.
 */
export class Settler extends EventEmitter {
  readonly address: Address;
  private readonly permit: PermitTransfer;
  private readonly tokens: TokenTransferer;
  private readonly environment: ExecutionEnvironment;
  private readonly journal: StateJournal;
  private readonly resolver: SettlementOrderResolver;
  private readonly hooks: HookRegistry;
  private readonly store: SettlementStore;
  private readonly metrics?: EngineMetrics;
  private readonly logger: Logger;

  constructor(options: SettlerOptions) {
    super();
    this.address = options.address;
    this.permit = options.permit;
    this.tokens = options.tokens;
    this.environment = options.environment;
    this.journal = options.journal;
    this.resolver = options.resolver ?? new SettlementOrderResolver();
    this.hooks = options.hooks ?? new HookRegistry();
    this.store = options.store ?? new SettlementStore(options.journal);
    this.metrics = options.metrics;
    this.logger = options.logger.child({ component: 'Settler' });
  }

  getSettlement(orderHash: Hex): ActiveSettlement {
    return this.store.get(orderHash);
  }

  /**
   * Escrows the maker's input (through the maker's permit) and the
   * caller's collateral, and opens the settlement windows.
   */
  initiate(signedOrder: SignedOrder, caller: Address, destinationFiller: Address): ActiveSettlement {
    return this.guarded('initiate', () => {
      const { now, blockNumber, priorityFee } = this.environment.currentContext();
      const order = this.resolver.resolve(signedOrder, { now, blockNumber, priorityFee, filler: caller });
      const { info, hash } = order;

      if (!sameAddress(info.reactor, this.address)) {
        throw new InvalidSettlerError(hash, this.address, info.reactor);
      }
      if (now > info.deadline) {
        throw new InitiateDeadlinePassedError(hash, info.deadline, now);
      }
      const validator = this.hooks.validatorAt(info.additionalValidationContract, hash);
      if (validator && !validator.validate(caller, order)) {
        throw new OrderValidationFailedError(hash, info.additionalValidationContract);
      }
      if (this.store.has(hash)) {
        throw new SettlementAlreadyExistsError(hash);
      }

      const settlement: ActiveSettlement = {
        orderHash: hash,
        status: SettlementStatus.PENDING,
        offerer: info.offerer,
        originFiller: caller,
        destinationFiller,
        settlementOracle: order.settlementOracle,
        fillDeadline: now + order.fillPeriod,
        optimisticDeadline: now + order.optimisticSettlementPeriod,
        challengeDeadline: now + order.challengePeriod,
        input: order.input,
        fillerCollateral: order.fillerCollateral,
        challengerCollateral: order.challengerCollateral,
        outputs: order.outputs,
        info
      };

      this.permit.permitWitnessTransferFrom({
        owner: info.offerer,
        spender: this.address,
        token: order.input.token,
        permittedAmount: order.input.maxAmount,
        requestedAmount: order.input.amount,
        nonce: info.nonce,
        deadline: info.deadline,
        witness: hash,
        signature: order.sig,
        to: this.address
      });
      const collateral = order.fillerCollateral;
      this.tokens.transferFrom(this.address, collateral.token, caller, this.address, collateral.amount);
      this.store.create(settlement);

      const event: InitiateSettlementEvent = {
        orderHash: hash,
        offerer: info.offerer,
        originFiller: caller,
        destinationFiller,
        fillDeadline: settlement.fillDeadline,
        optimisticDeadline: settlement.optimisticDeadline,
        challengeDeadline: settlement.challengeDeadline,
        outputs: settlement.outputs
      };
      this.journal.afterCommit(() => this.emit(INITIATE_SETTLEMENT_EVENT, event));
      this.logger.info({
        orderHash: hash,
        originFiller: caller,
        destinationFiller,
        challengeDeadline: settlement.challengeDeadline.toString()
      }, 'Settlement initiated');
      return settlement;
    });
  }

  /** Pays the origin filler once the optimistic window has passed without a challenge. */
  finalizeOptimistically(orderHash: Hex): ActiveSettlement {
    return this.guarded('finalize_optimistic', () => {
      const settlement = this.store.assertTransition(orderHash, SettlementStatus.SUCCESS);
      if (settlement.status !== SettlementStatus.PENDING) {
        throw new InvalidSettlementStatusError(orderHash, settlement.status, SettlementStatus.SUCCESS);
      }
      const { now } = this.environment.currentContext();
      if (now < settlement.optimisticDeadline) {
        throw new OptimisticPeriodNotElapsedError(orderHash, settlement.optimisticDeadline, now);
      }

      this.payFiller(settlement);
      const finalized = this.store.transition(orderHash, SettlementStatus.SUCCESS);
      this.emitResolved(SETTLEMENT_FINALIZED_EVENT, {
        orderHash,
        status: SettlementStatus.SUCCESS,
        optimistic: true
      });
      this.logger.info({ orderHash }, 'Settlement finalized optimistically');
      return finalized;
    });
  }

  /** Posts the challenger bond and freezes optimistic finalization. */
  challengeSettlement(orderHash: Hex, challenger: Address): ActiveSettlement {
    return this.guarded('challenge', () => {
      const settlement = this.store.assertTransition(orderHash, SettlementStatus.CHALLENGED);
      const { now } = this.environment.currentContext();
      if (now >= settlement.challengeDeadline) {
        throw new ChallengePeriodElapsedError(orderHash, settlement.challengeDeadline, now);
      }

      const bond = settlement.challengerCollateral;
      this.tokens.transferFrom(this.address, bond.token, challenger, this.address, bond.amount);
      const challenged = this.store.transition(orderHash, SettlementStatus.CHALLENGED, { challenger });

      const event: SettlementChallengedEvent = { orderHash, challenger };
      this.journal.afterCommit(() => this.emit(SETTLEMENT_CHALLENGED_EVENT, event));
      this.logger.info({ orderHash, challenger }, 'Settlement challenged');
      return challenged;
    });
  }

  /**
   * Oracle verdict that the outputs were delivered at `fillTimestamp`. A
   * challenger who lost forfeits the bond to the origin filler.
   */
  finalize(orderHash: Hex, fillTimestamp: bigint, caller: Address): ActiveSettlement {
    return this.guarded('finalize', () => {
      const settlement = this.store.assertTransition(orderHash, SettlementStatus.SUCCESS);
      if (!sameAddress(caller, settlement.settlementOracle)) {
        throw new OnlyOracleError(orderHash, settlement.settlementOracle, caller);
      }
      if (fillTimestamp > settlement.fillDeadline) {
        throw new OrderFillExceededDeadlineError(orderHash, settlement.fillDeadline, fillTimestamp);
      }

      if (settlement.challenger !== undefined) {
        const bond = settlement.challengerCollateral;
        this.tokens.transfer(bond.token, this.address, settlement.originFiller, bond.amount);
      }
      this.payFiller(settlement);
      const finalized = this.store.transition(orderHash, SettlementStatus.SUCCESS);
      this.emitResolved(SETTLEMENT_FINALIZED_EVENT, {
        orderHash,
        status: SettlementStatus.SUCCESS,
        fillTimestamp,
        optimistic: false
      });
      this.logger.info({ orderHash, fillTimestamp: fillTimestamp.toString() }, 'Settlement finalized by oracle');
      return finalized;
    });
  }

  /**
   * Refunds the maker once the challenge window closed without an oracle
   * verdict. A challenged filler loses its collateral: half (rounded down)
   * to the challenger, the rest to the maker.
   */
  cancelSettlement(orderHash: Hex): ActiveSettlement {
    return this.guarded('cancel', () => {
      const settlement = this.store.assertTransition(orderHash, SettlementStatus.CANCELLED);
      const { now } = this.environment.currentContext();
      if (now < settlement.challengeDeadline) {
        throw new ChallengePeriodNotElapsedError(orderHash, settlement.challengeDeadline, now);
      }

      const { input, fillerCollateral, challengerCollateral, challenger } = settlement;
      this.tokens.transfer(input.token, this.address, settlement.offerer, input.amount);
      if (challenger !== undefined) {
        const challengerShare = fillerCollateral.amount / 2n;
        this.tokens.transfer(fillerCollateral.token, this.address, challenger, challengerShare);
        this.tokens.transfer(
          fillerCollateral.token,
          this.address,
          settlement.offerer,
          fillerCollateral.amount - challengerShare
        );
        this.tokens.transfer(challengerCollateral.token, this.address, challenger, challengerCollateral.amount);
      } else {
        this.tokens.transfer(fillerCollateral.token, this.address, settlement.originFiller, fillerCollateral.amount);
      }

      const cancelled = this.store.transition(orderHash, SettlementStatus.CANCELLED);
      this.emitResolved(SETTLEMENT_CANCELLED_EVENT, {
        orderHash,
        status: SettlementStatus.CANCELLED,
        optimistic: false
      });
      this.logger.info({ orderHash, challenged: challenger !== undefined }, 'Settlement cancelled');
      return cancelled;
    });
  }

  private payFiller(settlement: ActiveSettlement): void {
    const { input, fillerCollateral } = settlement;
    this.tokens.transfer(input.token, this.address, settlement.originFiller, input.amount);
    this.tokens.transfer(fillerCollateral.token, this.address, settlement.originFiller, fillerCollateral.amount);
  }

  private emitResolved(eventName: string, event: SettlementResolvedEvent): void {
    this.journal.afterCommit(() => this.emit(eventName, event));
  }

  private guarded<T>(transition: SettlementTransition, operation: () => T): T {
    try {
      const result = this.journal.atomic(operation);
      this.metrics?.recordTransition(transition);
      return result;
    } catch (error) {
      this.metrics?.recordRejection('Settler', error);
      this.logger.warn({
        transition,
        error: error instanceof Error ? error.message : String(error)
      }, 'Settlement transition rejected');
      throw error;
    }
  }
}
