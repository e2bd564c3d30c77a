import { LogLevel } from '@fillway/interfaces';
import { PartialConfig } from '../schema/interfaces';

export const developmentConfig: PartialConfig = {
  environment: {
    name: 'development',
    debug: true,
    logLevel: LogLevel.DEBUG
  },

  network: {
    chainId: 31337,
    reactorAddress: '0x5FbDB2315678afecb367f032d93F642f64180aa3',
    settlerAddress: '0xe7f1725E7734CE288F8367e1Bb143E90bb3F0512',
    permitAddress: '0x9fE46736679d2D9a65F0992F2272dE9f3c7fa6e0'
  },

  metrics: {
    enabled: true
  }
};
