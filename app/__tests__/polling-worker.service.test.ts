import type { IBatchQueueService } from '../domain/services/batch';
import type { IHealthMonitorService } from '../domain/services/monitoring';
import { PollingWorkerService } from '../domain/services/monitoring';
import type { Settings } from '../domain/config/settings.config';
import { createSettingsService, createTestLogger } from './support/fakes';

async function createWorker(patch: Partial<Settings> = {}) {
  const settings = await createSettingsService({ healthCheckIntervalSeconds: 30, ...patch });
  const healthMonitor: jest.Mocked<IHealthMonitorService> = {
    runNow: jest.fn().mockResolvedValue({ startedAt: 0, completedAt: 0, results: [], successCount: 0, failureCount: 0 }),
    getLastResults: jest.fn().mockReturnValue([]),
    getStatus: jest.fn()
  };
  const batchQueue: jest.Mocked<IBatchQueueService> = {
    enqueue: jest.fn(),
    get: jest.fn(),
    list: jest.fn(),
    processPending: jest.fn().mockResolvedValue(0),
    getStatus: jest.fn()
  };
  const worker = new PollingWorkerService(createTestLogger(), healthMonitor, batchQueue, settings);
  return { settings, healthMonitor, batchQueue, worker };
}

describe('PollingWorkerService', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('runs a cycle at start and then once per interval', async () => {
    const { worker, healthMonitor, batchQueue } = await createWorker();

    worker.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(healthMonitor.runNow).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(29_999);
    expect(healthMonitor.runNow).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(healthMonitor.runNow).toHaveBeenCalledTimes(2);
    expect(batchQueue.processPending).not.toHaveBeenCalled();
    expect(worker.getStatus()).toMatchObject({ running: true, scheduled: true, cycleCount: 2 });

    worker.stop();
  });

  it('drains the batch queue when batching is on and skips probes when auto checks are off', async () => {
    const { worker, healthMonitor, batchQueue } = await createWorker({ batchEnabled: true, autoHealthCheckEnabled: false });

    worker.start();
    await jest.advanceTimersByTimeAsync(0);

    expect(healthMonitor.runNow).not.toHaveBeenCalled();
    expect(batchQueue.processPending).toHaveBeenCalledTimes(1);

    worker.stop();
  });

  it('reschedules from the new interval when it changes', async () => {
    const { worker, healthMonitor, settings } = await createWorker();
    worker.start();
    await jest.advanceTimersByTimeAsync(0);

    await settings.update({ healthCheckIntervalSeconds: 5 });
    await jest.advanceTimersByTimeAsync(4_999);
    expect(healthMonitor.runNow).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(healthMonitor.runNow).toHaveBeenCalledTimes(2);
    expect(worker.getStatus().intervalSeconds).toBe(5);

    worker.stop();
  });

  it('pauses while polling is disabled', async () => {
    const { worker, healthMonitor, settings } = await createWorker();
    worker.start();
    await jest.advanceTimersByTimeAsync(0);

    await settings.update({ pollingEnabled: false });
    await jest.advanceTimersByTimeAsync(120_000);

    expect(healthMonitor.runNow).toHaveBeenCalledTimes(1);
    expect(worker.getStatus()).toMatchObject({ running: true, scheduled: false });

    worker.stop();
  });

  it('survives a failing cycle', async () => {
    const { worker, healthMonitor } = await createWorker();
    healthMonitor.runNow.mockRejectedValueOnce(new Error('registry offline'));

    worker.start();
    await jest.advanceTimersByTimeAsync(0);
    await jest.advanceTimersByTimeAsync(30_000);

    expect(healthMonitor.runNow).toHaveBeenCalledTimes(2);
    worker.stop();
  });

  it('stops scheduling after stop', async () => {
    const { worker, healthMonitor } = await createWorker();
    worker.start();
    await jest.advanceTimersByTimeAsync(0);

    worker.stop();
    await jest.advanceTimersByTimeAsync(60_000);

    expect(healthMonitor.runNow).toHaveBeenCalledTimes(1);
    expect(worker.getStatus()).toMatchObject({ running: false, scheduled: false });
  });
});
