import { Logger } from 'pino';
import { FillInfoMismatchError, UnauthorizedRelayError } from '@fillway/errors';
import { AttestationReceiver } from '@fillway/interfaces';
import { ActiveSettlement, Address, SettlementFillInfo } from '@fillway/types';
import { sameAddress } from '@fillway/utils';
import { Settler } from './settler';

export interface SettlementOracleOptions {
  address: Address;
  /** Only attestations sent by this relay are accepted */
  trustedRelay: Address;
  settler: Settler;
  logger: Logger;
}

/**
 * Receives destination-domain fill attestations and finalizes the matching
 * settlement. Delivered outputs must cover every escrowed output in order.
 */
export class SettlementOracle implements AttestationReceiver {
  readonly address: Address;
  private readonly trustedRelay: Address;
  private readonly settler: Settler;
  private readonly logger: Logger;

  constructor(options: SettlementOracleOptions) {
    this.address = options.address;
    this.trustedRelay = options.trustedRelay;
    this.settler = options.settler;
    this.logger = options.logger.child({ component: 'SettlementOracle' });
  }

  logSettlementFillInfo(sender: Address, info: SettlementFillInfo): void {
    if (!sameAddress(sender, this.trustedRelay)) {
      this.logger.warn({ orderId: info.orderId, sender }, 'Attestation from untrusted sender');
      throw new UnauthorizedRelayError(info.orderId, this.trustedRelay, sender);
    }

    const settlement = this.settler.getSettlement(info.orderId);
    this.checkFillInfo(settlement, info);

    this.settler.finalize(info.orderId, info.fillTimestamp, this.address);
    this.logger.info({ orderId: info.orderId, filler: info.filler }, 'Fill attestation accepted');
  }

  private checkFillInfo(settlement: ActiveSettlement, info: SettlementFillInfo): void {
    if (!sameAddress(info.filler, settlement.destinationFiller)) {
      throw new FillInfoMismatchError(info.orderId, `filled by ${info.filler}, expected ${settlement.destinationFiller}`);
    }
    if (info.outputs.length !== settlement.outputs.length) {
      throw new FillInfoMismatchError(
        info.orderId,
        `${info.outputs.length} outputs delivered, ${settlement.outputs.length} expected`
      );
    }
    settlement.outputs.forEach((expected, index) => {
      const delivered = info.outputs[index];
      const matches = sameAddress(delivered.token, expected.token)
        && sameAddress(delivered.recipient, expected.recipient)
        && delivered.chainId === expected.chainId
        && delivered.amount >= expected.amount;
      if (!matches) {
        throw new FillInfoMismatchError(info.orderId, `output ${index} does not cover the escrowed output`);
      }
    });
  }
}
