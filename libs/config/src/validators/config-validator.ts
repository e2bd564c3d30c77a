import { ValidationError } from '@fillway/errors';
import { ProtocolConfig } from '../schema/interfaces';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';
const ENVIRONMENTS = ['development', 'staging', 'production', 'test'];

export class ConfigValidator {
  validate(config: ProtocolConfig): ValidationResult {
    const errors: ValidationError[] = [];
    const warnings: ValidationError[] = [];

    this.validateEnvironment(config, errors, warnings);
    this.validateNetwork(config, errors, warnings);
    this.validateReactor(config, errors, warnings);
    this.validateOracle(config, errors);
    this.validateMetrics(config, errors);

    return {
      valid: errors.length === 0,
      errors,
      warnings
    };
  }

  private validateEnvironment(config: ProtocolConfig, errors: ValidationError[], warnings: ValidationError[]): void {
    const env = config.environment;

    if (!ENVIRONMENTS.includes(env.name)) {
      errors.push(new ValidationError(
        `Invalid environment: ${env.name}. Must be one of: ${ENVIRONMENTS.join(', ')}`,
        'environment.name',
        env.name
      ));
    }

    if (typeof env.debug !== 'boolean') {
      errors.push(new ValidationError('Environment debug must be a boolean', 'environment.debug', env.debug));
    }

    if (!Number.isInteger(env.logLevel) || env.logLevel < 0 || env.logLevel > 4) {
      errors.push(new ValidationError(
        `Invalid log level: ${env.logLevel}. Must be 0-4`,
        'environment.logLevel',
        env.logLevel
      ));
    }

    if (env.name === 'production' && env.debug) {
      warnings.push(new ValidationError('Debug mode is enabled in production', 'environment.debug', env.debug));
    }
  }

  private validateNetwork(config: ProtocolConfig, errors: ValidationError[], warnings: ValidationError[]): void {
    const network = config.network;

    if (!Number.isInteger(network.chainId) || network.chainId <= 0) {
      errors.push(new ValidationError('Chain ID must be a positive integer', 'network.chainId', network.chainId));
    }

    const addresses: Array<[string, string]> = [
      ['network.reactorAddress', network.reactorAddress],
      ['network.settlerAddress', network.settlerAddress],
      ['network.permitAddress', network.permitAddress]
    ];
    for (const [field, address] of addresses) {
      if (!this.isValidAddress(address)) {
        errors.push(new ValidationError('Invalid address format', field, address));
      } else if (address === ZERO_ADDRESS && config.environment.name === 'production') {
        warnings.push(new ValidationError('Address is not configured', field, address));
      }
    }

    if (this.isValidAddress(network.reactorAddress)
      && network.reactorAddress !== ZERO_ADDRESS
      && network.reactorAddress.toLowerCase() === network.settlerAddress.toLowerCase()) {
      errors.push(new ValidationError(
        'Reactor and settler must be distinct accounts',
        'network.settlerAddress',
        network.settlerAddress
      ));
    }
  }

  private validateReactor(config: ProtocolConfig, errors: ValidationError[], warnings: ValidationError[]): void {
    const reactor = config.reactor;

    if (!this.isValidAddress(reactor.owner)) {
      errors.push(new ValidationError('Invalid owner address', 'reactor.owner', reactor.owner));
    }

    if (!Number.isInteger(reactor.maxBatchSize) || reactor.maxBatchSize <= 0) {
      errors.push(new ValidationError(
        'Max batch size must be a positive integer',
        'reactor.maxBatchSize',
        reactor.maxBatchSize
      ));
    }

    const fees = reactor.fees;
    if (!Number.isInteger(fees.maxFeeBps) || fees.maxFeeBps < 0 || fees.maxFeeBps > 10_000) {
      errors.push(new ValidationError(
        'Max fee must be between 0 and 10000 bps',
        'reactor.fees.maxFeeBps',
        fees.maxFeeBps
      ));
    } else if (fees.maxFeeBps > 100) {
      warnings.push(new ValidationError(
        'Max fee above 100 bps is unusually high',
        'reactor.fees.maxFeeBps',
        fees.maxFeeBps
      ));
    }

    if (!this.isValidAddress(fees.recipient)) {
      errors.push(new ValidationError('Invalid fee recipient address', 'reactor.fees.recipient', fees.recipient));
    } else if (fees.enabled && fees.recipient === ZERO_ADDRESS) {
      errors.push(new ValidationError(
        'Fee recipient is required when fees are enabled',
        'reactor.fees.recipient',
        fees.recipient
      ));
    }
  }

  private validateOracle(config: ProtocolConfig, errors: ValidationError[]): void {
    if (!this.isValidAddress(config.oracle.address)) {
      errors.push(new ValidationError('Invalid oracle address', 'oracle.address', config.oracle.address));
    }
    if (!this.isValidAddress(config.oracle.trustedRelay)) {
      errors.push(new ValidationError(
        'Invalid trusted relay address',
        'oracle.trustedRelay',
        config.oracle.trustedRelay
      ));
    }
  }

  private validateMetrics(config: ProtocolConfig, errors: ValidationError[]): void {
    if (!/^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(config.metrics.prefix)) {
      errors.push(new ValidationError(
        'Metrics prefix must be a valid Prometheus metric name prefix',
        'metrics.prefix',
        config.metrics.prefix
      ));
    }
  }

  private isValidAddress(address: unknown): address is string {
    return typeof address === 'string' && /^0x[a-fA-F0-9]{40}$/.test(address);
  }
}
