import { Address, ZERO_ADDRESS } from '../common/common.types';
import { OrderType, ReactorOrderType } from '../order/order.types';
import { SettlementStatus } from '../settlement/settlement.types';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const HEX_PATTERN = /^0x([0-9a-fA-F]{2})*$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function isHex(value: unknown): value is string {
  return typeof value === 'string' && HEX_PATTERN.test(value);
}

export function isZeroAddress(address: Address): boolean {
  return address.toLowerCase() === ZERO_ADDRESS;
}

export function isOrderType(value: unknown): value is OrderType {
  return typeof value === 'string' && Object.values<string>(OrderType).includes(value);
}

export function isReactorOrderType(value: unknown): value is ReactorOrderType {
  return isOrderType(value) && value !== OrderType.SETTLEMENT;
}

export function isTerminalStatus(status: SettlementStatus): boolean {
  return status === SettlementStatus.CANCELLED || status === SettlementStatus.SUCCESS;
}
