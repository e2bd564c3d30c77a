// Amount math
export * from './decay/decay-lib';
export * from './decay/priority-fee-lib';
export * from './decay/exclusivity-lib';

// Cosigner checks
export * from './cosigner/cosigner-verifier';

// Hashing and wire codec
export * from './encoding/eip712';
export * from './encoding/order-codec';

// Maker and cosigner signatures
export * from './signing/permit';
export * from './signing/order-signer';

// Order resolution
export * from './resolver';
