import { Logger } from 'pino';
import { AlreadyFilledError, InvalidDestinationChainError } from '@fillway/errors';
import { AttestationChannel, ExecutionEnvironment, TokenTransferer } from '@fillway/interfaces';
import { Address, Hex, ResolvedSettlementOutput, SettlementFillInfo } from '@fillway/types';
import { JournaledMap } from '../state/journaled-map';
import { StateJournal } from '../state/state-journal';

export interface DestinationFillRecorderOptions {
  address: Address;
  chainId: bigint;
  tokens: TokenTransferer;
  environment: ExecutionEnvironment;
  journal: StateJournal;
  channel: AttestationChannel;
  logger: Logger;
}

/**
 * Destination-domain side of a settlement: the filler delivers outputs to
 * their recipients here, once per order, and the fill is attested back to
 * the origin domain.
 */
export class DestinationFillRecorder {
  readonly address: Address;
  private readonly chainId: bigint;
  private readonly tokens: TokenTransferer;
  private readonly environment: ExecutionEnvironment;
  private readonly journal: StateJournal;
  private readonly channel: AttestationChannel;
  private readonly fills: JournaledMap<string, bigint>;
  private readonly logger: Logger;

  constructor(options: DestinationFillRecorderOptions) {
    this.address = options.address;
    this.chainId = options.chainId;
    this.tokens = options.tokens;
    this.environment = options.environment;
    this.journal = options.journal;
    this.channel = options.channel;
    this.fills = new JournaledMap(options.journal);
    this.logger = options.logger.child({ component: 'DestinationFillRecorder' });
  }

  isFilled(orderId: Hex): boolean {
    return this.fills.has(orderId.toLowerCase());
  }

  fillTimestamp(orderId: Hex): bigint | undefined {
    return this.fills.get(orderId.toLowerCase());
  }

  fill(caller: Address, orderId: Hex, outputs: readonly ResolvedSettlementOutput[]): SettlementFillInfo {
    if (this.isFilled(orderId)) {
      throw new AlreadyFilledError(orderId);
    }
    for (const output of outputs) {
      if (output.chainId !== this.chainId) {
        throw new InvalidDestinationChainError(orderId, this.chainId, output.chainId);
      }
    }

    const { now } = this.environment.currentContext();
    const info: SettlementFillInfo = {
      orderId,
      filler: caller,
      outputs: outputs.map((output) => ({ ...output })),
      fillTimestamp: now
    };

    this.journal.atomic(() => {
      this.fills.set(orderId.toLowerCase(), now);
      for (const output of outputs) {
        this.tokens.transferFrom(this.address, output.token, caller, output.recipient, output.amount);
      }
      this.journal.afterCommit(() => this.channel.send(info));
    });

    this.logger.info({ orderId, filler: caller, outputs: outputs.length }, 'Destination fill recorded');
    return info;
  }
}
