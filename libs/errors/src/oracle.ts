import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class OracleError extends ProtocolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly orderHash: string,
    details?: ErrorDetails
  ) {
    super(code, message, { orderHash, ...details });
  }
}

export class UnauthorizedRelayError extends OracleError {
  constructor(orderHash: string, trustedRelay: string, sender: string) {
    super(
      ErrorCode.UNAUTHORIZED_RELAY,
      `Fill info for ${orderHash} came from ${sender}, not the trusted relay`,
      orderHash,
      { trustedRelay, sender }
    );
  }
}

export class FillInfoMismatchError extends OracleError {
  constructor(orderHash: string, reason: string) {
    super(ErrorCode.FILL_INFO_MISMATCH, `Fill info for ${orderHash} does not match: ${reason}`, orderHash, {
      reason
    });
  }
}

export class AlreadyFilledError extends OracleError {
  constructor(orderHash: string) {
    super(ErrorCode.ALREADY_FILLED, `Order ${orderHash} was already filled on this domain`, orderHash);
  }
}

export class InvalidDestinationChainError extends OracleError {
  constructor(orderHash: string, expected: bigint, actual: bigint) {
    super(
      ErrorCode.INVALID_DESTINATION_CHAIN,
      `Output of ${orderHash} targets chain ${actual}, this domain is ${expected}`,
      orderHash,
      { expected: expected.toString(), actual: actual.toString() }
    );
  }
}
