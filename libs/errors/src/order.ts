import { ProtocolError, ErrorCode, ErrorDetails } from './base';

/**
 * Raised while decoding, validating or resolving a signed order.
 * No state has changed when one of these surfaces.
 */
export class OrderError extends ProtocolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly orderHash?: string,
    details?: ErrorDetails,
    cause?: Error
  ) {
    super(code, message, { orderHash, ...details }, cause);
  }
}

export class EndTimeBeforeStartTimeError extends OrderError {
  constructor(startBound: bigint, endBound: bigint, orderHash?: string) {
    super(
      ErrorCode.END_TIME_BEFORE_START_TIME,
      `Decay end ${endBound} is before decay start ${startBound}`,
      orderHash,
      { startBound: startBound.toString(), endBound: endBound.toString() }
    );
  }
}

export class DeadlineBeforeEndTimeError extends OrderError {
  constructor(deadline: bigint, endBound: bigint, orderHash?: string) {
    super(
      ErrorCode.DEADLINE_BEFORE_END_TIME,
      `Order deadline ${deadline} is before decay end ${endBound}`,
      orderHash,
      { deadline: deadline.toString(), endBound: endBound.toString() }
    );
  }
}

export class InputAndOutputDecayError extends OrderError {
  constructor(orderHash?: string) {
    super(
      ErrorCode.INPUT_AND_OUTPUT_DECAY,
      'Input and outputs cannot both decay',
      orderHash
    );
  }
}

export class InvalidCosignatureError extends OrderError {
  constructor(expectedSigner: string, reason: string, orderHash?: string, cause?: Error) {
    super(
      ErrorCode.INVALID_COSIGNATURE,
      `Invalid cosignature: ${reason}`,
      orderHash,
      { expectedSigner, reason },
      cause
    );
  }
}

export class InvalidInputOverrideError extends OrderError {
  constructor(override: bigint, signedAmount: bigint, orderHash?: string) {
    super(
      ErrorCode.INVALID_INPUT_OVERRIDE,
      `Input override ${override} exceeds signed amount ${signedAmount}`,
      orderHash,
      { override: override.toString(), signedAmount: signedAmount.toString() }
    );
  }
}

export class InvalidOutputOverrideError extends OrderError {
  constructor(reason: string, orderHash?: string, details?: ErrorDetails) {
    super(
      ErrorCode.INVALID_OUTPUT_OVERRIDE,
      `Invalid output override: ${reason}`,
      orderHash,
      details
    );
  }
}

export class OrderNotFillableError extends OrderError {
  constructor(auctionStartBlock: bigint, currentBlock: bigint, orderHash?: string) {
    super(
      ErrorCode.ORDER_NOT_FILLABLE,
      `Auction starts at block ${auctionStartBlock}, current block is ${currentBlock}`,
      orderHash,
      { auctionStartBlock: auctionStartBlock.toString(), currentBlock: currentBlock.toString() }
    );
  }
}

export class NoExclusiveOverrideError extends OrderError {
  constructor(exclusiveFiller: string, filler: string | undefined, orderHash?: string) {
    super(
      ErrorCode.NO_EXCLUSIVE_OVERRIDE,
      `Order is exclusive to ${exclusiveFiller} and has no override`,
      orderHash,
      { exclusiveFiller, filler }
    );
  }
}

export class IncorrectAmountsError extends OrderError {
  constructor(side: 'input' | 'output', index: number, orderHash?: string) {
    super(
      ErrorCode.INCORRECT_AMOUNTS,
      `Decay of ${side} ${index} runs against the maker`,
      orderHash,
      { side, index }
    );
  }
}

export class InvalidDecayCurveError extends OrderError {
  constructor(reason: string, orderHash?: string) {
    super(ErrorCode.INVALID_DECAY_CURVE, `Invalid decay curve: ${reason}`, orderHash, { reason });
  }
}

export class InvalidPriorityCurveError extends OrderError {
  constructor(reason: string, orderHash?: string) {
    super(ErrorCode.INVALID_PRIORITY_CURVE, `Invalid priority curve: ${reason}`, orderHash, { reason });
  }
}

export class UnknownOrderTypeError extends OrderError {
  constructor(orderType: string) {
    super(ErrorCode.UNKNOWN_ORDER_TYPE, `No resolver registered for order type ${orderType}`, undefined, {
      orderType
    });
  }
}

export class MalformedOrderError extends OrderError {
  constructor(orderType: string, reason: string, cause?: Error) {
    super(
      ErrorCode.MALFORMED_ORDER,
      `Malformed ${orderType} order: ${reason}`,
      undefined,
      { orderType, reason },
      cause
    );
  }
}

export class DecayEndBeforeStartError extends OrderError {
  constructor(startBound: bigint, endBound: bigint) {
    super(
      ErrorCode.DECAY_END_BEFORE_START,
      `End bound ${endBound} is before start bound ${startBound}`,
      undefined,
      { startBound: startBound.toString(), endBound: endBound.toString() }
    );
  }
}
