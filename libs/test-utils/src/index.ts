// Test fixtures
export * from './fixtures/accounts';

// Stand-ins
export * from './mocks/manual-clock';

// Test builders
export * from './builders/order-info.builder';
export * from './builders/order.builders';

// Test configuration
export * from './config/test-config';
