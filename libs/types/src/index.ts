// Common types
export * from './common/common.types';

// Order types
export * from './order/order.types';
export * from './order/variants.types';

// Settlement types
export * from './settlement/settlement.types';

// Event types
export * from './events/events.types';

// Type guards
export * from './guards/type-guards';
