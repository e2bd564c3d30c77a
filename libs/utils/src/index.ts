// Logger utilities
export { LoggerFactory, createLogger, toPinoLevel } from './logger/logger-factory';

// Integer math
export * from './math/math-utils';

// Address helpers
export * from './address/address-utils';
