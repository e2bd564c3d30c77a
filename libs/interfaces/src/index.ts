// Logger interfaces
export { LogLevel, LoggerConfig } from './logger';

// Token movement collaborators
export { PermitTransferRequest, PermitTransfer, TokenTransferer } from './transfer';

// Fill-time extension points
export { OrderValidator, ExecutionHook, FeeController, Filler } from './hooks';

// Host chain
export { ExecutionEnvironment } from './environment';

// Cross-domain attestation
export { AttestationReceiver, AttestationChannel } from './attestation';
