import { Address, SettlementFillInfo } from '@fillway/types';

export interface AttestationReceiver {
  logSettlementFillInfo(sender: Address, info: SettlementFillInfo): void;
}

/** Authenticated cross-domain channel carrying delivery attestations. */
export interface AttestationChannel {
  send(info: SettlementFillInfo): void;
}
