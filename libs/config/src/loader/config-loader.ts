import * as fs from 'fs';
import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { ConfigurationError, ConfigTypeMismatchError } from '@fillway/errors';
import { LogLevel } from '@fillway/interfaces';
import { ProtocolConfig, PartialConfig } from '../schema/interfaces';
import { ConfigValidator } from '../validators/config-validator';
import { defaultConfig } from '../defaults/config.default';
import { developmentConfig } from '../environments/development';
import { productionConfig } from '../environments/production';
import { testConfig } from '../environments/test';

export interface LoadOptions {
  environment?: string;
  localConfigPath?: string;
  overrides?: PartialConfig;
  allowEnvOverrides?: boolean;
  /** Defaults to `.env` in the working directory */
  envFile?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ConfigSource {
  type: 'defaults' | 'environment' | 'local' | 'runtime';
  priority: number;
  name?: string;
  path?: string;
  config?: PartialConfig;
}

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  fatal: LogLevel.FATAL
};

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: ProtocolConfig | null = null;
  private validators: ConfigValidator[] = [];
  private builtInValidator = new ConfigValidator();

  static getInstance(): ConfigLoader {
    if (!this.instance) {
      this.instance = new ConfigLoader();
    }
    return this.instance;
  }

  /**
   * Load configuration from multiple sources
   */
  async load(options: LoadOptions = {}): Promise<ProtocolConfig> {
    const env = options.env ?? process.env;
    if (options.allowEnvOverrides !== false && options.env === undefined) {
      loadDotenv({ path: options.envFile });
    }

    const sources = this.determineSources(options, env);
    let config = mergeConfig(defaultConfig, {});

    // Layer configurations in order of precedence
    for (const source of sources) {
      const sourceConfig = await this.loadFromSource(source);
      if (sourceConfig) {
        config = mergeConfig(config, sourceConfig);
      }
    }

    if (options.allowEnvOverrides !== false) {
      config = mergeConfig(config, this.envOverrides(env));
    }

    this.validate(config);

    this.config = config;
    return config;
  }

  /**
   * Get current configuration
   */
  get(): ProtocolConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  registerValidator(validator: ConfigValidator): void {
    this.validators.push(validator);
  }

  clear(): void {
    this.config = null;
  }

  private determineSources(options: LoadOptions, env: NodeJS.ProcessEnv): ConfigSource[] {
    const sources: ConfigSource[] = [];

    sources.push({ type: 'defaults', priority: 0 });

    const environment = options.environment || env.NODE_ENV || 'development';
    sources.push({ type: 'environment', name: environment, priority: 1 });

    const localPath = options.localConfigPath || this.findLocalConfig();
    if (localPath) {
      sources.push({ type: 'local', path: localPath, priority: 2 });
    }

    if (options.overrides) {
      sources.push({ type: 'runtime', config: options.overrides, priority: 3 });
    }

    return sources.sort((a, b) => a.priority - b.priority);
  }

  private async loadFromSource(source: ConfigSource): Promise<PartialConfig | null> {
    switch (source.type) {
      case 'defaults':
        return defaultConfig;

      case 'environment':
        return source.name ? this.loadEnvironmentConfig(source.name) : null;

      case 'local':
        return source.path ? await this.loadLocalConfig(source.path) : null;

      case 'runtime':
        return source.config || null;

      default:
        return null;
    }
  }

  private loadEnvironmentConfig(environment: string): PartialConfig | null {
    switch (environment) {
      case 'development':
        return developmentConfig;
      case 'production':
        return productionConfig;
      case 'test':
        return testConfig;
      default:
        return null;
    }
  }

  private async loadLocalConfig(configPath: string): Promise<PartialConfig> {
    let content: string;
    try {
      content = await fs.promises.readFile(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read local configuration ${configPath}`, {
        path: configPath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    try {
      // Shape is checked by the validator once every layer is merged
      return JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Local configuration ${configPath} is not valid JSON`, {
        path: configPath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private findLocalConfig(): string | null {
    const possiblePaths = [
      path.join(process.cwd(), 'config.local.json'),
      path.join(process.cwd(), 'config', 'local.json')
    ];

    return possiblePaths.find((configPath) => fs.existsSync(configPath)) ?? null;
  }

  private envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
    const overrides: PartialConfig = {};

    if (env.LOG_LEVEL !== undefined) {
      const logLevel = LOG_LEVELS[env.LOG_LEVEL.toLowerCase()];
      if (logLevel === undefined) {
        throw new ConfigurationError(`Unknown LOG_LEVEL ${env.LOG_LEVEL}`, { value: env.LOG_LEVEL });
      }
      overrides.environment = { logLevel };
    }
    if (env.DEBUG !== undefined) {
      overrides.environment = { ...overrides.environment, debug: env.DEBUG.toLowerCase() === 'true' };
    }

    const network: PartialConfig['network'] = {};
    if (env.CHAIN_ID !== undefined) network.chainId = parseInteger('CHAIN_ID', env.CHAIN_ID);
    if (env.REACTOR_ADDRESS !== undefined) network.reactorAddress = env.REACTOR_ADDRESS;
    if (env.SETTLER_ADDRESS !== undefined) network.settlerAddress = env.SETTLER_ADDRESS;
    if (env.PERMIT_ADDRESS !== undefined) network.permitAddress = env.PERMIT_ADDRESS;
    overrides.network = network;

    const reactor: PartialConfig['reactor'] = {};
    if (env.MAX_BATCH_SIZE !== undefined) reactor.maxBatchSize = parseInteger('MAX_BATCH_SIZE', env.MAX_BATCH_SIZE);
    const fees: Partial<ProtocolConfig['reactor']['fees']> = {};
    if (env.FEE_RECIPIENT !== undefined) fees.recipient = env.FEE_RECIPIENT;
    if (env.MAX_FEE_BPS !== undefined) fees.maxFeeBps = parseInteger('MAX_FEE_BPS', env.MAX_FEE_BPS);
    overrides.reactor = { ...reactor, fees };

    if (env.ORACLE_TRUSTED_RELAY !== undefined) {
      overrides.oracle = { trustedRelay: env.ORACLE_TRUSTED_RELAY };
    }
    if (env.METRICS_ENABLED !== undefined) {
      overrides.metrics = { enabled: env.METRICS_ENABLED.toLowerCase() === 'true' };
    }

    return overrides;
  }

  private validate(config: ProtocolConfig): void {
    const result = this.builtInValidator.validate(config);

    for (const validator of this.validators) {
      const customResult = validator.validate(config);
      result.errors.push(...customResult.errors);
      result.warnings.push(...customResult.warnings);
    }

    if (result.warnings.length > 0) {
      console.warn('Configuration warnings:');
      result.warnings.forEach((warning) => {
        console.warn(`  - ${warning.message} (${warning.field})`);
      });
    }

    if (result.errors.length > 0) {
      const errorMessages = result.errors.map((e) => `${e.field}: ${e.message}`);
      throw new ConfigurationError(`Configuration validation failed:\n${errorMessages.join('\n')}`, {
        errors: result.errors.map((e) => e.toJSON()),
        warnings: result.warnings.map((w) => w.toJSON())
      });
    }
  }
}

function parseInteger(key: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigTypeMismatchError(key, 'integer', JSON.stringify(raw));
  }
  return value;
}

export function mergeConfig(base: ProtocolConfig, override: PartialConfig): ProtocolConfig {
  return {
    environment: { ...base.environment, ...override.environment },
    network: { ...base.network, ...override.network },
    reactor: {
      ...base.reactor,
      ...override.reactor,
      fees: { ...base.reactor.fees, ...override.reactor?.fees }
    },
    oracle: { ...base.oracle, ...override.oracle },
    metrics: { ...base.metrics, ...override.metrics }
  };
}
