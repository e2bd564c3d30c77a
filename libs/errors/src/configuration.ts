import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class ConfigurationError extends ProtocolError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.CONFIG_INVALID, message, details);
  }
}

export class ConfigMissingError extends ProtocolError {
  constructor(configKey: string, details?: ErrorDetails) {
    super(
      ErrorCode.CONFIG_MISSING,
      `Configuration key missing: ${configKey}`,
      { configKey, ...details }
    );
  }
}

export class ConfigTypeMismatchError extends ProtocolError {
  constructor(
    configKey: string,
    expectedType: string,
    actualType: string,
    details?: ErrorDetails
  ) {
    super(
      ErrorCode.CONFIG_TYPE_MISMATCH,
      `Configuration type mismatch for ${configKey}: expected ${expectedType}, got ${actualType}`,
      { configKey, expectedType, actualType, ...details }
    );
  }
}
