import pino, { Logger } from 'pino';
import { defaultConfig, mergeConfig, PartialConfig, ProtocolConfig, testConfig } from '@fillway/config';

export function createTestConfig(overrides: PartialConfig = {}): ProtocolConfig {
  return mergeConfig(mergeConfig(defaultConfig, testConfig), overrides);
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
