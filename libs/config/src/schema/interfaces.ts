import { LogLevel } from '@fillway/interfaces';

export interface ProtocolConfig {
  environment: EnvironmentConfig;
  network: NetworkConfig;
  reactor: ReactorConfig;
  oracle: OracleConfig;
  metrics: MetricsConfig;
}

export type EnvironmentName = 'development' | 'staging' | 'production' | 'test';

export interface EnvironmentConfig {
  name: EnvironmentName;
  debug: boolean;
  logLevel: LogLevel;
}

export interface NetworkConfig {
  chainId: number;
  reactorAddress: string;
  settlerAddress: string;
  /** Verifying contract of the permit domain */
  permitAddress: string;
}

export interface ReactorConfig {
  /** Account allowed to change the fee controller */
  owner: string;
  maxBatchSize: number;
  fees: FeeConfig;
}

export interface FeeConfig {
  enabled: boolean;
  recipient: string;
  /** Upper bound on any fee output relative to the traded amount */
  maxFeeBps: number;
}

export interface OracleConfig {
  address: string;
  /** Sender the oracle accepts fill attestations from */
  trustedRelay: string;
}

export interface MetricsConfig {
  enabled: boolean;
  prefix: string;
}

export type PartialConfig = {
  [K in keyof ProtocolConfig]?: K extends 'reactor'
    ? Partial<Omit<ReactorConfig, 'fees'>> & { fees?: Partial<FeeConfig> }
    : Partial<ProtocolConfig[K]>;
};
