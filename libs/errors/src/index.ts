// Base error classes
import { ErrorCode, ProtocolError } from './base';
export { ErrorCode, ErrorDetails, ProtocolError } from './base';

// Configuration errors
export {
  ConfigurationError,
  ConfigMissingError,
  ConfigTypeMismatchError
} from './configuration';

// Validation errors
export {
  ValidationError,
  InvalidAddressError
} from './validation';

// Order resolution errors
export {
  OrderError,
  EndTimeBeforeStartTimeError,
  DeadlineBeforeEndTimeError,
  InputAndOutputDecayError,
  InvalidCosignatureError,
  InvalidInputOverrideError,
  InvalidOutputOverrideError,
  OrderNotFillableError,
  NoExclusiveOverrideError,
  IncorrectAmountsError,
  InvalidDecayCurveError,
  InvalidPriorityCurveError,
  UnknownOrderTypeError,
  MalformedOrderError,
  DecayEndBeforeStartError
} from './order';

// Reactor errors
export {
  ReactorError,
  InvalidReactorError,
  DeadlinePassedError,
  OrderValidationFailedError,
  DuplicateFeeOutputError,
  InvalidFeeTokenError,
  FeeTooLargeError,
  HookNotRegisteredError,
  UnauthorizedError,
  BatchTooLargeError
} from './reactor';

// Transfer errors
export {
  TransferError,
  InvalidSignatureError,
  SignatureExpiredError,
  InvalidNonceError,
  InsufficientBalanceError,
  InsufficientAllowanceError,
  PermitAmountExceededError
} from './transfer';

// Settlement errors
export {
  SettlementError,
  InitiateDeadlinePassedError,
  InvalidSettlerError,
  SettlementNotFoundError,
  SettlementAlreadyExistsError,
  SettlementTerminatedError,
  InvalidSettlementStatusError,
  OptimisticPeriodNotElapsedError,
  ChallengePeriodElapsedError,
  ChallengePeriodNotElapsedError,
  OnlyOracleError,
  OrderFillExceededDeadlineError
} from './settlement';

// Oracle and destination errors
export {
  OracleError,
  UnauthorizedRelayError,
  FillInfoMismatchError,
  AlreadyFilledError,
  InvalidDestinationChainError
} from './oracle';

// Utility function to check if an error is a ProtocolError
export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}

