// Rollback log
export { StateJournal, UndoAction, CommitEffect } from './state/state-journal';
export { JournaledMap } from './state/journaled-map';

// Token custody
export { PermitLedger, PermitLedgerOptions } from './ledger/permit-ledger';

// Fill engine
export { Reactor, ReactorOptions, FILL_EVENT } from './reactor/reactor';
export { HookRegistry } from './reactor/hook-registry';
export { BpsFeeController, FeeRule } from './reactor/fee-controller';

// Cross-chain settlement
export {
  Settler,
  SettlerOptions,
  INITIATE_SETTLEMENT_EVENT,
  SETTLEMENT_CHALLENGED_EVENT,
  SETTLEMENT_FINALIZED_EVENT,
  SETTLEMENT_CANCELLED_EVENT
} from './settlement/settler';
export { SettlementStore, TransitionPatch } from './settlement/settlement-store';
export { SettlementOracle, SettlementOracleOptions } from './settlement/settlement-oracle';
export { DestinationFillRecorder, DestinationFillRecorderOptions } from './settlement/destination-fill-recorder';
export { QueuedAttestationChannel, DeadLetter } from './settlement/attestation-channel';

// Metrics
export { EngineMetrics, SettlementTransition } from './monitoring/metrics';

// Wiring
export {
  createOriginDomain,
  createDestinationDomain,
  effectiveLogLevel,
  DomainOptions,
  OriginDomain,
  DestinationDomain,
  DestinationDomainOptions
} from './bootstrap';
