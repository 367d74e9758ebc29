import { ErrorClassificationService } from '../core/error-classification';
import { ProviderCallError } from '../core/errors';
import type { CompletionResult } from '../application/types';
import { HealthMonitorService } from '../domain/services/monitoring';
import { createDispatchHarness, type DispatchHarness } from './support/fakes';

function createMonitor(harness: DispatchHarness): HealthMonitorService {
  return new HealthMonitorService(
    harness.logger,
    harness.registry,
    harness.adapters,
    harness.settings,
    new ErrorClassificationService(),
    harness.requestLog,
    harness.metrics
  );
}

describe('HealthMonitorService', () => {
  it('probes every active provider and records the outcome on the registry', async () => {
    const harness = await createDispatchHarness();
    const healthy = await harness.addProvider('healthy');
    const broken = await harness.addProvider('broken');
    const disabled = await harness.addProvider('disabled', { isActive: false });
    healthy.adapter.probe.mockResolvedValue({ content: 'ok' });
    broken.adapter.probe.mockRejectedValue(new ProviderCallError('server', 'API returned error: 503 - down', { statusCode: 503 }));
    const monitor = createMonitor(harness);

    const report = await monitor.runNow();
    await harness.requestLog.flush();

    expect(report).toMatchObject({ successCount: 1, failureCount: 1 });
    expect(disabled.adapter.probe).not.toHaveBeenCalled();
    expect(harness.registry.get(healthy.provider.id)?.health).toMatchObject({ status: 'available', checkCount: 1, failureCount: 0 });
    expect(harness.registry.get(broken.provider.id)?.health).toMatchObject({
      status: 'unavailable',
      checkCount: 1,
      failureCount: 1,
      lastError: 'API returned error: 503 - down'
    });
    expect(harness.providerRepository.records.get(broken.provider.id)?.health.status).toBe('unavailable');
    expect(monitor.getLastResults().map(result => [result.providerName, result.isSuccess])).toEqual([
      ['broken', false],
      ['healthy', true]
    ]);
    expect(harness.requestLogRepository.entries.every(entry => entry.requestType === 'health_check')).toBe(true);
    expect(harness.requestLogRepository.entries).toHaveLength(2);
  });

  it('joins a cycle that is already running', async () => {
    const harness = await createDispatchHarness();
    const { adapter } = await harness.addProvider('slow');
    let release: (value: CompletionResult) => void = () => undefined;
    adapter.probe.mockReturnValue(new Promise<CompletionResult>(resolve => { release = resolve; }));
    const monitor = createMonitor(harness);

    const first = monitor.runNow();
    const second = monitor.runNow();
    expect(monitor.getStatus().running).toBe(true);

    release({ content: 'ok' });

    expect(await second).toBe(await first);
    expect(adapter.probe).toHaveBeenCalledTimes(1);
    expect(monitor.getStatus()).toMatchObject({ running: false, healthCheckCount: 1 });
  });

  it('marks a provider unavailable when its probe outlives the probe timeout', async () => {
    const harness = await createDispatchHarness({ probeTimeoutMs: 20 });
    const { provider, adapter } = await harness.addProvider('hanging');
    adapter.probe.mockReturnValue(new Promise<CompletionResult>(() => undefined));

    const report = await createMonitor(harness).runNow();

    expect(report.results[0]).toMatchObject({ providerId: provider.id, isSuccess: false });
    expect(harness.registry.get(provider.id)?.health.status).toBe('unavailable');
  });

  it('keeps going when a provider is deleted mid-cycle', async () => {
    const harness = await createDispatchHarness();
    const { provider, adapter } = await harness.addProvider('leaving');
    adapter.probe.mockImplementation(async () => {
      await harness.registry.delete(provider.id);
      return { content: 'ok' };
    });
    const monitor = createMonitor(harness);

    const report = await monitor.runNow();

    expect(report.successCount).toBe(1);
    expect(monitor.getLastResults()).toEqual([]);
  });
});
