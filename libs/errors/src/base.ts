export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_MISSING = 1002,
  CONFIG_TYPE_MISMATCH = 1003,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2001,
  INVALID_ADDRESS = 2002,

  // Order resolution errors (3xxx)
  END_TIME_BEFORE_START_TIME = 3001,
  DEADLINE_BEFORE_END_TIME = 3002,
  INPUT_AND_OUTPUT_DECAY = 3003,
  INVALID_COSIGNATURE = 3004,
  INVALID_INPUT_OVERRIDE = 3005,
  INVALID_OUTPUT_OVERRIDE = 3006,
  ORDER_NOT_FILLABLE = 3007,
  NO_EXCLUSIVE_OVERRIDE = 3008,
  INCORRECT_AMOUNTS = 3009,
  INVALID_DECAY_CURVE = 3010,
  INVALID_PRIORITY_CURVE = 3011,
  UNKNOWN_ORDER_TYPE = 3012,
  MALFORMED_ORDER = 3013,
  DECAY_END_BEFORE_START = 3014,

  // Reactor errors (4xxx)
  INVALID_REACTOR = 4001,
  DEADLINE_PASSED = 4002,
  ORDER_VALIDATION_FAILED = 4003,
  DUPLICATE_FEE_OUTPUT = 4004,
  INVALID_FEE_TOKEN = 4005,
  FEE_TOO_LARGE = 4006,
  HOOK_NOT_REGISTERED = 4007,
  UNAUTHORIZED = 4008,
  BATCH_TOO_LARGE = 4009,

  // Transfer errors (5xxx)
  INVALID_SIGNATURE = 5001,
  SIGNATURE_EXPIRED = 5002,
  INVALID_NONCE = 5003,
  INSUFFICIENT_BALANCE = 5004,
  INSUFFICIENT_ALLOWANCE = 5005,
  PERMIT_AMOUNT_EXCEEDED = 5006,

  // Settlement errors (6xxx)
  INITIATE_DEADLINE_PASSED = 6001,
  INVALID_SETTLER = 6002,
  SETTLEMENT_NOT_FOUND = 6003,
  SETTLEMENT_ALREADY_EXISTS = 6004,
  SETTLEMENT_TERMINATED = 6005,
  INVALID_SETTLEMENT_STATUS = 6006,
  OPTIMISTIC_PERIOD_NOT_ELAPSED = 6007,
  CHALLENGE_PERIOD_ELAPSED = 6008,
  CHALLENGE_PERIOD_NOT_ELAPSED = 6009,
  ONLY_ORACLE = 6010,
  ORDER_FILL_EXCEEDED_DEADLINE = 6011,

  // Oracle and destination errors (7xxx)
  UNAUTHORIZED_RELAY = 7001,
  FILL_INFO_MISMATCH = 7002,
  ALREADY_FILLED = 7003,
  INVALID_DESTINATION_CHAIN = 7004
}

export type ErrorDetails = Record<string, unknown>;

export abstract class ProtocolError extends Error {
  public readonly timestamp: Date;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack
    };
  }
}
