import { LogLevel } from '@fillway/interfaces';
import { PartialConfig } from '../schema/interfaces';

export const testConfig: PartialConfig = {
  environment: {
    name: 'test',
    debug: false,
    logLevel: LogLevel.ERROR // Reduce noise in tests
  },

  network: {
    chainId: 31337,
    reactorAddress: '0x1000000000000000000000000000000000000001',
    settlerAddress: '0x1000000000000000000000000000000000000002',
    permitAddress: '0x1000000000000000000000000000000000000003'
  },

  reactor: {
    owner: '0x1000000000000000000000000000000000000004',
    maxBatchSize: 8
  },

  oracle: {
    address: '0x1000000000000000000000000000000000000005',
    trustedRelay: '0x1000000000000000000000000000000000000006'
  },

  metrics: {
    enabled: false
  }
};
