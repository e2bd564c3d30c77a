import { Counter, Registry } from 'prom-client';
import { MetricsConfig } from '@fillway/config';

export type SettlementTransition = 'initiate' | 'challenge' | 'finalize' | 'finalize_optimistic' | 'cancel';

/**
 * Prometheus counters for the fill engine. Each instance owns its registry
 * so several engines (or tests) never collide on metric names.
 */
export class EngineMetrics {
  readonly registry: Registry;

  /** Orders filled through the reactor, by order type */
  readonly ordersFilled: Counter<'type'>;

  /** Reactor batches that completed */
  readonly batchesExecuted: Counter<string>;

  /** Settlement state transitions, by transition */
  readonly settlementTransitions: Counter<'transition'>;

  /** Rejected operations, by component and error name */
  readonly rejections: Counter<'component' | 'error'>;

  constructor(config: MetricsConfig = { enabled: true, prefix: 'fillway_' }) {
    this.registry = new Registry();
    const prefix = config.prefix;

    this.ordersFilled = new Counter({
      name: `${prefix}orders_filled_total`,
      help: 'Orders filled through the reactor',
      labelNames: ['type'],
      registers: [this.registry]
    });
    this.batchesExecuted = new Counter({
      name: `${prefix}batches_executed_total`,
      help: 'Reactor batches executed',
      registers: [this.registry]
    });
    this.settlementTransitions = new Counter({
      name: `${prefix}settlement_transitions_total`,
      help: 'Settlement state transitions',
      labelNames: ['transition'],
      registers: [this.registry]
    });
    this.rejections = new Counter({
      name: `${prefix}rejections_total`,
      help: 'Operations rejected with a protocol error',
      labelNames: ['component', 'error'],
      registers: [this.registry]
    });
  }

  recordFill(type: string): void {
    this.ordersFilled.inc({ type });
  }

  recordBatch(): void {
    this.batchesExecuted.inc();
  }

  recordTransition(transition: SettlementTransition): void {
    this.settlementTransitions.inc({ transition });
  }

  recordRejection(component: string, error: unknown): void {
    this.rejections.inc({ component, error: error instanceof Error ? error.name : 'unknown' });
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
