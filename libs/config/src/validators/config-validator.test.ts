import { LogLevel } from '@fillway/interfaces';
import { ConfigValidator } from './config-validator';
import { ProtocolConfig } from '../schema/interfaces';
import { mergeConfig } from '../loader/config-loader';
import { defaultConfig } from '../defaults/config.default';
import { testConfig } from '../environments/test';

describe('ConfigValidator', () => {
  let validator: ConfigValidator;
  let validConfig: ProtocolConfig;

  beforeEach(() => {
    validator = new ConfigValidator();
    validConfig = mergeConfig(defaultConfig, testConfig);
  });

  describe('valid configuration', () => {
    it('should validate the test configuration', () => {
      const result = validator.validate(validConfig);
      expect(result.valid).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result.warnings).toHaveLength(0);
    });
  });

  describe('environment validation', () => {
    it('should error on out of range log level', () => {
      const outOfRange: number = 7;
      validConfig.environment.logLevel = outOfRange;
      const result = validator.validate(validConfig);
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.field)).toEqual(['environment.logLevel']);
    });

    it('should warn on debug in production', () => {
      validConfig.environment = { name: 'production', debug: true, logLevel: LogLevel.INFO };
      const result = validator.validate(validConfig);
      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['environment.debug']);
    });
  });

  describe('network validation', () => {
    it('should error on non-positive chain id', () => {
      validConfig.network.chainId = 0;
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['network.chainId']);
    });

    it('should error on malformed addresses', () => {
      validConfig.network.permitAddress = '0x1234';
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['network.permitAddress']);
    });

    it('should reject a settler that shares the reactor account', () => {
      validConfig.network.settlerAddress = validConfig.network.reactorAddress;
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['network.settlerAddress']);
    });
  });

  describe('reactor validation', () => {
    it('should error on zero batch size', () => {
      validConfig.reactor.maxBatchSize = 0;
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['reactor.maxBatchSize']);
    });

    it('should require a fee recipient when fees are enabled', () => {
      validConfig.reactor.fees.enabled = true;
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['reactor.fees.recipient']);
    });

    it('should error when max fee exceeds 10000 bps', () => {
      validConfig.reactor.fees.maxFeeBps = 10_001;
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['reactor.fees.maxFeeBps']);
    });

    it('should warn on a high max fee', () => {
      validConfig.reactor.fees.maxFeeBps = 250;
      const result = validator.validate(validConfig);
      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['reactor.fees.maxFeeBps']);
    });
  });

  describe('metrics validation', () => {
    it('should error on an invalid prefix', () => {
      validConfig.metrics.prefix = '1-bad';
      const result = validator.validate(validConfig);
      expect(result.errors.map((e) => e.field)).toEqual(['metrics.prefix']);
    });
  });
});
