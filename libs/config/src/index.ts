// Configuration interfaces
export * from './schema/interfaces';

// Configuration loader
import { ConfigLoader, LoadOptions } from './loader/config-loader';
import { ProtocolConfig } from './schema/interfaces';
export { ConfigLoader, LoadOptions, ConfigSource, mergeConfig } from './loader/config-loader';

// Configuration validation
export { ConfigValidator, ValidationResult } from './validators/config-validator';

// Default configurations
export { defaultConfig } from './defaults/config.default';

// Environment-specific configurations
export { developmentConfig } from './environments/development';
export { productionConfig } from './environments/production';
export { testConfig } from './environments/test';

// Convenience functions
export async function loadConfig(options?: LoadOptions): Promise<ProtocolConfig> {
  return ConfigLoader.getInstance().load(options);
}

export function getConfig(): ProtocolConfig {
  return ConfigLoader.getInstance().get();
}

export function clearConfig(): void {
  ConfigLoader.getInstance().clear();
}

// Re-export common types from errors for convenience
export { ConfigurationError, ConfigMissingError, ConfigTypeMismatchError } from '@fillway/errors';
