import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class ReactorError extends ProtocolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly orderHash?: string,
    details?: ErrorDetails
  ) {
    super(code, message, { orderHash, ...details });
  }
}

export class InvalidReactorError extends ReactorError {
  constructor(orderHash: string, expected: string, actual: string) {
    super(
      ErrorCode.INVALID_REACTOR,
      `Order ${orderHash} names reactor ${actual}, not ${expected}`,
      orderHash,
      { expected, actual }
    );
  }
}

export class DeadlinePassedError extends ReactorError {
  constructor(orderHash: string, deadline: bigint, now: bigint) {
    super(
      ErrorCode.DEADLINE_PASSED,
      `Order ${orderHash} deadline ${deadline} has passed (now ${now})`,
      orderHash,
      { deadline: deadline.toString(), now: now.toString() }
    );
  }
}

export class OrderValidationFailedError extends ReactorError {
  constructor(orderHash: string, validator: string) {
    super(
      ErrorCode.ORDER_VALIDATION_FAILED,
      `Custom validation ${validator} rejected order ${orderHash}`,
      orderHash,
      { validator }
    );
  }
}

export class DuplicateFeeOutputError extends ReactorError {
  constructor(orderHash: string, token: string, recipient: string) {
    super(
      ErrorCode.DUPLICATE_FEE_OUTPUT,
      `Fee output for token ${token} to ${recipient} appears more than once`,
      orderHash,
      { token, recipient }
    );
  }
}

export class InvalidFeeTokenError extends ReactorError {
  constructor(orderHash: string, token: string) {
    super(
      ErrorCode.INVALID_FEE_TOKEN,
      `Fee token ${token} is not traded by order ${orderHash}`,
      orderHash,
      { token }
    );
  }
}

export class FeeTooLargeError extends ReactorError {
  constructor(orderHash: string, token: string, amount: bigint, maxAmount: bigint) {
    super(
      ErrorCode.FEE_TOO_LARGE,
      `Fee of ${amount} ${token} exceeds the maximum ${maxAmount}`,
      orderHash,
      { token, amount: amount.toString(), maxAmount: maxAmount.toString() }
    );
  }
}

export class HookNotRegisteredError extends ReactorError {
  constructor(kind: string, address: string, orderHash?: string) {
    super(
      ErrorCode.HOOK_NOT_REGISTERED,
      `No ${kind} registered at ${address}`,
      orderHash,
      { kind, address }
    );
  }
}

export class UnauthorizedError extends ReactorError {
  constructor(caller: string, action: string) {
    super(ErrorCode.UNAUTHORIZED, `${caller} is not allowed to ${action}`, undefined, { caller, action });
  }
}

export class BatchTooLargeError extends ReactorError {
  constructor(size: number, maxSize: number) {
    super(ErrorCode.BATCH_TOO_LARGE, `Batch of ${size} orders exceeds limit ${maxSize}`, undefined, {
      size,
      maxSize
    });
  }
}
