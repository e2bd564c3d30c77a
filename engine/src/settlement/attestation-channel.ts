import { Logger } from 'pino';
import { ProtocolError, isProtocolError } from '@fillway/errors';
import { AttestationChannel, AttestationReceiver } from '@fillway/interfaces';
import { Address, SettlementFillInfo } from '@fillway/types';

export interface DeadLetter {
  info: SettlementFillInfo;
  error: ProtocolError;
}

/**
 * In-process stand-in for the cross-domain message bridge. Messages queue
 * on `send` and reach the receiver, authenticated as `relay`, on `relayAll`.
 */
export class QueuedAttestationChannel implements AttestationChannel {
  private readonly queue: SettlementFillInfo[] = [];
  private readonly rejected: DeadLetter[] = [];
  private readonly logger?: Logger;

  constructor(private readonly relay: Address, private receiver?: AttestationReceiver, logger?: Logger) {
    this.logger = logger?.child({ component: 'QueuedAttestationChannel' });
  }

  connect(receiver: AttestationReceiver): void {
    this.receiver = receiver;
  }

  send(info: SettlementFillInfo): void {
    this.queue.push(info);
  }

  pending(): readonly SettlementFillInfo[] {
    return [...this.queue];
  }

  deadLetters(): readonly DeadLetter[] {
    return [...this.rejected];
  }

  /**
   * Delivers queued messages in order and returns how many were accepted.
   * A message the receiver rejects with a protocol error is dead-lettered;
   * any other failure leaves it at the head of the queue and is rethrown.
   */
  relayAll(): number {
    const receiver = this.receiver;
    if (!receiver) {
      return 0;
    }
    let delivered = 0;
    while (this.queue.length > 0) {
      const info = this.queue[0];
      try {
        receiver.logSettlementFillInfo(this.relay, info);
        delivered++;
      } catch (error) {
        if (!isProtocolError(error)) {
          throw error;
        }
        this.rejected.push({ info, error });
        this.logger?.warn({ orderId: info.orderId, code: error.code, error: error.message }, 'Attestation dead-lettered');
      }
      this.queue.shift();
    }
    return delivered;
  }
}
