import { LogLevel } from '@fillway/interfaces';
import { PartialConfig } from '../schema/interfaces';

export const productionConfig: PartialConfig = {
  environment: {
    name: 'production',
    debug: false,
    logLevel: LogLevel.INFO
  },

  reactor: {
    maxBatchSize: 16,
    fees: {
      enabled: true
    }
  },

  metrics: {
    enabled: true
  }
};
