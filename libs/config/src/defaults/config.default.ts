import { LogLevel } from '@fillway/interfaces';
import { ProtocolConfig } from '../schema/interfaces';

export const defaultConfig: ProtocolConfig = {
  environment: {
    name: 'development',
    debug: true,
    logLevel: LogLevel.INFO
  },

  network: {
    chainId: 1,
    reactorAddress: '0x0000000000000000000000000000000000000000',
    settlerAddress: '0x0000000000000000000000000000000000000000',
    permitAddress: '0x0000000000000000000000000000000000000000'
  },

  reactor: {
    owner: '0x0000000000000000000000000000000000000000',
    maxBatchSize: 32,
    fees: {
      enabled: false,
      recipient: '0x0000000000000000000000000000000000000000',
      maxFeeBps: 5
    }
  },

  oracle: {
    address: '0x0000000000000000000000000000000000000000',
    trustedRelay: '0x0000000000000000000000000000000000000000'
  },

  metrics: {
    enabled: false,
    prefix: 'fillway_'
  }
};
