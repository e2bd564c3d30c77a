import { EventEmitter } from 'events';
import { Logger } from 'pino';
import {
  BatchTooLargeError,
  DeadlinePassedError,
  DuplicateFeeOutputError,
  FeeTooLargeError,
  InvalidFeeTokenError,
  InvalidReactorError,
  OrderValidationFailedError,
  UnauthorizedError
} from '@fillway/errors';
import {
  ExecutionEnvironment,
  FeeController,
  Filler,
  PermitTransfer,
  TokenTransferer
} from '@fillway/interfaces';
import { AuctionResolver, ResolutionContext } from '@fillway/sdk';
import { Address, EMPTY_BYTES, FillEvent, Hex, ResolvedOrder, SignedOrder } from '@fillway/types';
import { BPS, mulDivDown, sameAddress } from '@fillway/utils';
import { EngineMetrics } from '../monitoring/metrics';
import { StateJournal } from '../state/state-journal';
import { HookRegistry } from './hook-registry';

export const FILL_EVENT = 'Fill';

const DEFAULT_MAX_FEE_BPS = 5n;
const DEFAULT_MAX_BATCH_SIZE = 32;

export interface ReactorOptions {
  address: Address;
  /** Account allowed to change the fee controller */
  owner: Address;
  permit: PermitTransfer;
  tokens: TokenTransferer;
  environment: ExecutionEnvironment;
  journal: StateJournal;
  resolver: AuctionResolver;
  hooks?: HookRegistry;
  feeController?: FeeController;
  /** Cap on any fee output relative to the amount of that token the order trades */
  maxFeeBps?: bigint;
  maxBatchSize?: number;
  metrics?: EngineMetrics;
  logger: Logger;
}

/**
 * Fills signed orders. A batch resolves every order, checks it, collects
 * each maker's input with that maker's own permit, calls the filler once
 * and pulls every output from the filler. Any failure unwinds the whole
 * batch; `Fill` events are emitted only for committed batches.
 */
export class Reactor extends EventEmitter {
  readonly address: Address;
  private readonly owner: Address;
  private readonly permit: PermitTransfer;
  private readonly tokens: TokenTransferer;
  private readonly environment: ExecutionEnvironment;
  private readonly journal: StateJournal;
  private readonly resolver: AuctionResolver;
  private readonly hooks: HookRegistry;
  private readonly maxFeeBps: bigint;
  private readonly maxBatchSize: number;
  private readonly metrics?: EngineMetrics;
  private readonly logger: Logger;
  private feeController?: FeeController;

  constructor(options: ReactorOptions) {
    super();
    this.address = options.address;
    this.owner = options.owner;
    this.permit = options.permit;
    this.tokens = options.tokens;
    this.environment = options.environment;
    this.journal = options.journal;
    this.resolver = options.resolver;
    this.hooks = options.hooks ?? new HookRegistry();
    this.feeController = options.feeController;
    this.maxFeeBps = options.maxFeeBps ?? DEFAULT_MAX_FEE_BPS;
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
    this.metrics = options.metrics;
    this.logger = options.logger.child({ component: 'Reactor' });
  }

  execute(signedOrder: SignedOrder, filler: Filler, fillerData: Hex = EMPTY_BYTES): ResolvedOrder {
    const [resolved] = this.executeBatch([signedOrder], filler, fillerData);
    return resolved;
  }

  executeBatch(signedOrders: readonly SignedOrder[], filler: Filler, fillerData: Hex = EMPTY_BYTES): ResolvedOrder[] {
    try {
      if (signedOrders.length > this.maxBatchSize) {
        throw new BatchTooLargeError(signedOrders.length, this.maxBatchSize);
      }
      const orders = this.journal.atomic(() => this.fill(signedOrders, filler, fillerData));
      this.metrics?.recordBatch();
      return orders;
    } catch (error) {
      this.metrics?.recordRejection('Reactor', error);
      this.logger.warn({
        filler: filler.address,
        orders: signedOrders.length,
        error: error instanceof Error ? error.message : String(error)
      }, 'Batch rejected');
      throw error;
    }
  }

  setFeeController(caller: Address, controller: FeeController | undefined): void {
    if (!sameAddress(caller, this.owner)) {
      throw new UnauthorizedError(caller, 'set the fee controller');
    }
    this.feeController = controller;
    this.logger.info({ enabled: controller !== undefined }, 'Fee controller updated');
  }

  private fill(signedOrders: readonly SignedOrder[], filler: Filler, fillerData: Hex): ResolvedOrder[] {
    const context: ResolutionContext = { ...this.environment.currentContext(), filler: filler.address };

    const orders = signedOrders
      .map((signed) => this.resolver.resolve(signed, context))
      .map((order) => this.prepare(order, filler, context.now));

    for (const order of orders) {
      this.hooks.hookAt(order.info.preExecutionHook, order.hash)?.execute(filler.address, order);
      this.collectInput(order, filler);
    }

    filler.reactorCallback?.(orders, fillerData);

    for (const order of orders) {
      for (const output of order.outputs) {
        this.tokens.transferFrom(this.address, output.token, filler.address, output.recipient, output.amount);
      }
      this.hooks.hookAt(order.info.postExecutionHook, order.hash)?.execute(filler.address, order);

      const event: FillEvent = {
        orderHash: order.hash,
        filler: filler.address,
        offerer: order.info.offerer,
        nonce: order.info.nonce
      };
      this.journal.afterCommit(() => {
        this.metrics?.recordFill(order.type);
        this.logger.info({
          orderHash: order.hash,
          filler: filler.address,
          offerer: order.info.offerer,
          inputAmount: order.input.amount.toString()
        }, 'Order filled');
        this.emit(FILL_EVENT, event);
      });
    }
    return orders;
  }

  private prepare(order: ResolvedOrder, filler: Filler, now: bigint): ResolvedOrder {
    if (!sameAddress(order.info.reactor, this.address)) {
      throw new InvalidReactorError(order.hash, this.address, order.info.reactor);
    }
    if (now > order.info.deadline) {
      throw new DeadlinePassedError(order.hash, order.info.deadline, now);
    }
    const validator = this.hooks.validatorAt(order.info.additionalValidationContract, order.hash);
    if (validator && !validator.validate(filler.address, order)) {
      throw new OrderValidationFailedError(order.hash, order.info.additionalValidationContract);
    }
    return this.injectFees(order);
  }

  private injectFees(order: ResolvedOrder): ResolvedOrder {
    if (!this.feeController) {
      return order;
    }
    const fees = this.feeController.getFeeOutputs(order);

    fees.forEach((fee, index) => {
      const duplicate = fees
        .slice(0, index)
        .some((other) => sameAddress(other.token, fee.token) && sameAddress(other.recipient, fee.recipient));
      if (duplicate) {
        throw new DuplicateFeeOutputError(order.hash, fee.token, fee.recipient);
      }

      const isInputToken = sameAddress(order.input.token, fee.token);
      const matchingOutputs = order.outputs.filter((output) => sameAddress(output.token, fee.token));
      if (!isInputToken && matchingOutputs.length === 0) {
        throw new InvalidFeeTokenError(order.hash, fee.token);
      }
      const traded = matchingOutputs.reduce(
        (sum, output) => sum + output.amount,
        isInputToken ? order.input.amount : 0n
      );
      const maxAmount = mulDivDown(traded, this.maxFeeBps, BPS);
      if (fee.amount > maxAmount) {
        throw new FeeTooLargeError(order.hash, fee.token, fee.amount, maxAmount);
      }
    });

    return { ...order, outputs: [...order.outputs, ...fees] };
  }

  private collectInput(order: ResolvedOrder, filler: Filler): void {
    this.permit.permitWitnessTransferFrom({
      owner: order.info.offerer,
      spender: this.address,
      token: order.input.token,
      permittedAmount: order.input.maxAmount,
      requestedAmount: order.input.amount,
      nonce: order.info.nonce,
      deadline: order.info.deadline,
      witness: order.hash,
      signature: order.sig,
      to: filler.address
    });
  }
}
