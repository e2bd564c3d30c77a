import { BatchTooLargeError } from '@fillway/errors';
import { EngineMetrics } from '../../src/monitoring/metrics';

describe('EngineMetrics', () => {
  it('should expose counters under the configured prefix', async () => {
    const metrics = new EngineMetrics({ enabled: true, prefix: 'fw_' });
    metrics.recordFill('limit');
    metrics.recordFill('limit');
    metrics.recordBatch();
    metrics.recordTransition('challenge');

    const output = await metrics.render();

    expect(output).toContain('fw_orders_filled_total{type="limit"} 2');
    expect(output).toContain('fw_batches_executed_total 1');
    expect(output).toContain('fw_settlement_transitions_total{transition="challenge"} 1');
  });

  it('should label rejections by error class', async () => {
    const metrics = new EngineMetrics();
    metrics.recordRejection('Reactor', new BatchTooLargeError(40, 32));
    metrics.recordRejection('Settler', 'not an error');

    const output = await metrics.render();

    expect(output).toContain('fillway_rejections_total{component="Reactor",error="BatchTooLargeError"} 1');
    expect(output).toContain('fillway_rejections_total{component="Settler",error="unknown"} 1');
  });

  it('should keep instances isolated', async () => {
    const first = new EngineMetrics();
    const second = new EngineMetrics();
    first.recordBatch();

    expect(await second.render()).toContain('fillway_batches_executed_total 0');
  });
});
