import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class ValidationError extends ProtocolError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
    details?: ErrorDetails
  ) {
    super(ErrorCode.VALIDATION_FAILED, message, { field, value, ...details });
  }
}

export class InvalidAddressError extends ProtocolError {
  constructor(address: string, details?: ErrorDetails) {
    super(
      ErrorCode.INVALID_ADDRESS,
      `Invalid address: ${address}`,
      { address, ...details }
    );
  }
}
