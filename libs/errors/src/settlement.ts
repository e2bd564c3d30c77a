import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class SettlementError extends ProtocolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly orderHash: string,
    details?: ErrorDetails
  ) {
    super(code, message, { orderHash, ...details });
  }
}

export class InitiateDeadlinePassedError extends SettlementError {
  constructor(orderHash: string, deadline: bigint, now: bigint) {
    super(
      ErrorCode.INITIATE_DEADLINE_PASSED,
      `Settlement order ${orderHash} could be initiated until ${deadline} (now ${now})`,
      orderHash,
      { deadline: deadline.toString(), now: now.toString() }
    );
  }
}

export class InvalidSettlerError extends SettlementError {
  constructor(orderHash: string, expected: string, actual: string) {
    super(
      ErrorCode.INVALID_SETTLER,
      `Settlement order ${orderHash} names settler ${actual}, not ${expected}`,
      orderHash,
      { expected, actual }
    );
  }
}

export class SettlementNotFoundError extends SettlementError {
  constructor(orderHash: string) {
    super(ErrorCode.SETTLEMENT_NOT_FOUND, `No settlement for order ${orderHash}`, orderHash);
  }
}

export class SettlementAlreadyExistsError extends SettlementError {
  constructor(orderHash: string) {
    super(ErrorCode.SETTLEMENT_ALREADY_EXISTS, `Settlement for order ${orderHash} already initiated`, orderHash);
  }
}

export class SettlementTerminatedError extends SettlementError {
  constructor(orderHash: string, status: string) {
    super(
      ErrorCode.SETTLEMENT_TERMINATED,
      `Settlement ${orderHash} already reached terminal status ${status}`,
      orderHash,
      { status }
    );
  }
}

export class InvalidSettlementStatusError extends SettlementError {
  constructor(orderHash: string, from: string, to: string) {
    super(
      ErrorCode.INVALID_SETTLEMENT_STATUS,
      `Settlement ${orderHash} cannot move from ${from} to ${to}`,
      orderHash,
      { from, to }
    );
  }
}

export class OptimisticPeriodNotElapsedError extends SettlementError {
  constructor(orderHash: string, optimisticDeadline: bigint, now: bigint) {
    super(
      ErrorCode.OPTIMISTIC_PERIOD_NOT_ELAPSED,
      `Settlement ${orderHash} cannot finalize optimistically before ${optimisticDeadline}`,
      orderHash,
      { optimisticDeadline: optimisticDeadline.toString(), now: now.toString() }
    );
  }
}

export class ChallengePeriodElapsedError extends SettlementError {
  constructor(orderHash: string, challengeDeadline: bigint, now: bigint) {
    super(
      ErrorCode.CHALLENGE_PERIOD_ELAPSED,
      `Challenge window of settlement ${orderHash} closed at ${challengeDeadline}`,
      orderHash,
      { challengeDeadline: challengeDeadline.toString(), now: now.toString() }
    );
  }
}

export class ChallengePeriodNotElapsedError extends SettlementError {
  constructor(orderHash: string, challengeDeadline: bigint, now: bigint) {
    super(
      ErrorCode.CHALLENGE_PERIOD_NOT_ELAPSED,
      `Settlement ${orderHash} cannot be cancelled before ${challengeDeadline}`,
      orderHash,
      { challengeDeadline: challengeDeadline.toString(), now: now.toString() }
    );
  }
}

export class OnlyOracleError extends SettlementError {
  constructor(orderHash: string, oracle: string, caller: string) {
    super(
      ErrorCode.ONLY_ORACLE,
      `Only oracle ${oracle} can finalize settlement ${orderHash}`,
      orderHash,
      { oracle, caller }
    );
  }
}

export class OrderFillExceededDeadlineError extends SettlementError {
  constructor(orderHash: string, fillDeadline: bigint, fillTimestamp: bigint) {
    super(
      ErrorCode.ORDER_FILL_EXCEEDED_DEADLINE,
      `Order ${orderHash} was filled at ${fillTimestamp}, after its fill deadline ${fillDeadline}`,
      orderHash,
      { fillDeadline: fillDeadline.toString(), fillTimestamp: fillTimestamp.toString() }
    );
  }
}
