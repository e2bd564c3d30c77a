import { Logger } from 'pino';
import { ProtocolConfig } from '@fillway/config';
import { AttestationReceiver, ExecutionEnvironment, LogLevel } from '@fillway/interfaces';
import { createAuctionResolver } from '@fillway/sdk';
import { Address, ZERO_ADDRESS } from '@fillway/types';
import { createLogger } from '@fillway/utils';
import { PermitLedger } from './ledger/permit-ledger';
import { EngineMetrics } from './monitoring/metrics';
import { BpsFeeController } from './reactor/fee-controller';
import { HookRegistry } from './reactor/hook-registry';
import { Reactor } from './reactor/reactor';
import { QueuedAttestationChannel } from './settlement/attestation-channel';
import { DestinationFillRecorder } from './settlement/destination-fill-recorder';
import { SettlementOracle } from './settlement/settlement-oracle';
import { Settler } from './settlement/settler';
import { StateJournal } from './state/state-journal';

export interface DomainOptions {
  environment: ExecutionEnvironment;
  /** Defaults to a pino logger at the configured level */
  logger?: Logger;
  hooks?: HookRegistry;
}

export interface OriginDomain {
  config: ProtocolConfig;
  journal: StateJournal;
  ledger: PermitLedger;
  hooks: HookRegistry;
  feeController?: BpsFeeController;
  reactor: Reactor;
  settler: Settler;
  oracle: SettlementOracle;
  metrics?: EngineMetrics;
  logger: Logger;
}

/** Debug mode forces debug logging regardless of the configured level. */
export function effectiveLogLevel(config: ProtocolConfig): LogLevel {
  return config.environment.debug ? LogLevel.DEBUG : config.environment.logLevel;
}

/** Wires the reactor, settler and oracle of one chain from configuration. */
export function createOriginDomain(config: ProtocolConfig, options: DomainOptions): OriginDomain {
  const logger = options.logger ?? createLogger('fillway-engine', { level: effectiveLogLevel(config) });
  const { environment } = options;
  const journal = new StateJournal();
  const hooks = options.hooks ?? new HookRegistry();
  const metrics = config.metrics.enabled ? new EngineMetrics(config.metrics) : undefined;
  const feeController = config.reactor.fees.enabled
    ? new BpsFeeController(config.reactor.fees.recipient)
    : undefined;

  const ledger = new PermitLedger({
    domain: { chainId: BigInt(config.network.chainId), permitAddress: config.network.permitAddress },
    environment,
    journal,
    logger
  });

  const reactor = new Reactor({
    address: config.network.reactorAddress,
    owner: config.reactor.owner,
    permit: ledger,
    tokens: ledger,
    environment,
    journal,
    resolver: createAuctionResolver(logger),
    hooks,
    feeController,
    maxFeeBps: BigInt(config.reactor.fees.maxFeeBps),
    maxBatchSize: config.reactor.maxBatchSize,
    metrics,
    logger
  });

  const settler = new Settler({
    address: config.network.settlerAddress,
    permit: ledger,
    tokens: ledger,
    environment,
    journal,
    hooks,
    metrics,
    logger
  });

  const oracle = new SettlementOracle({
    address: config.oracle.address,
    trustedRelay: config.oracle.trustedRelay,
    settler,
    logger
  });

  logger.info({
    environment: config.environment.name,
    chainId: config.network.chainId,
    reactor: reactor.address,
    settler: settler.address,
    fees: feeController !== undefined,
    metrics: metrics !== undefined
  }, 'Origin domain ready');

  return { config, journal, ledger, hooks, feeController, reactor, settler, oracle, metrics, logger };
}

export interface DestinationDomainOptions extends DomainOptions {
  chainId: bigint;
  /** Address of the fill recorder */
  address: Address;
  /** Sender the attestation channel authenticates messages as */
  relay: Address;
  receiver?: AttestationReceiver;
  permitAddress?: Address;
}

export interface DestinationDomain {
  journal: StateJournal;
  ledger: PermitLedger;
  channel: QueuedAttestationChannel;
  recorder: DestinationFillRecorder;
}

export function createDestinationDomain(options: DestinationDomainOptions): DestinationDomain {
  const logger = options.logger ?? createLogger('fillway-destination');
  const journal = new StateJournal();
  const ledger = new PermitLedger({
    domain: { chainId: options.chainId, permitAddress: options.permitAddress ?? ZERO_ADDRESS },
    environment: options.environment,
    journal,
    logger
  });
  const channel = new QueuedAttestationChannel(options.relay, options.receiver, logger);
  const recorder = new DestinationFillRecorder({
    address: options.address,
    chainId: options.chainId,
    tokens: ledger,
    environment: options.environment,
    journal,
    channel,
    logger
  });
  return { journal, ledger, channel, recorder };
}
