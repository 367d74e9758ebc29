import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import { toError, type ILogger } from '../../../core/logging';
import type { Settings } from '../../config/settings.config';
import type { IBatchQueueService } from '../batch';
import type { ISettingsService } from '../settings';
import type { IHealthMonitorService } from './health-monitor.service';

export interface PollingWorkerStatus {
  readonly running: boolean;
  readonly scheduled: boolean;
  readonly intervalSeconds: number;
  readonly cycleCount: number;
  readonly lastCycleAt?: number;
  readonly nextCycleAt?: number;
}

export interface IPollingWorkerService {
  start(): void;
  stop(): void;
  getStatus(): PollingWorkerStatus;
}

/**
 * Owns the periodic timer. Each cycle runs the health checks and drains the
 * batch queue, as the current settings allow, then schedules the next cycle
 * from the interval in force at that moment.
 */
@injectable()
export class PollingWorkerService implements IPollingWorkerService {
  private readonly logger: ILogger;
  private timer: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private running = false;
  private cycleCount = 0;
  private lastCycleAt?: number;
  private nextCycleAt?: number;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.HealthMonitorService) private readonly healthMonitor: IHealthMonitorService,
    @inject(TYPES.BatchQueueService) private readonly batchQueue: IBatchQueueService,
    @inject(TYPES.SettingsService) private readonly settingsService: ISettingsService
  ) {
    this.logger = logger.createChild('PollingWorkerService');
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.unsubscribe = this.settingsService.onChange((current, previous) => this.onSettingsChanged(current, previous));
    this.schedule(0);

    this.logger.info('Polling worker started', {
      metadata: { intervalSeconds: this.settingsService.get().healthCheckIntervalSeconds }
    });
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    this.clearTimer();
    this.unsubscribe?.();
    this.unsubscribe = null;

    this.logger.info('Polling worker stopped');
  }

  getStatus(): PollingWorkerStatus {
    return {
      running: this.running,
      scheduled: this.timer !== null,
      intervalSeconds: this.settingsService.get().healthCheckIntervalSeconds,
      cycleCount: this.cycleCount,
      lastCycleAt: this.lastCycleAt,
      nextCycleAt: this.nextCycleAt
    };
  }

  private onSettingsChanged(current: Readonly<Settings>, previous: Readonly<Settings>): void {
    if (
      current.healthCheckIntervalSeconds === previous.healthCheckIntervalSeconds &&
      current.pollingEnabled === previous.pollingEnabled
    ) {
      return;
    }

    this.logger.info('Polling schedule changed', {
      metadata: {
        intervalSeconds: current.healthCheckIntervalSeconds,
        pollingEnabled: current.pollingEnabled
      }
    });
    this.schedule(current.healthCheckIntervalSeconds * 1000);
  }

  private schedule(delayMs: number): void {
    this.clearTimer();

    if (!this.running || !this.settingsService.get().pollingEnabled) {
      return;
    }

    this.nextCycleAt = Date.now() + delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      this.logger.error('Polling cycle failed', toError(error));
    } finally {
      this.schedule(this.settingsService.get().healthCheckIntervalSeconds * 1000);
    }
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextCycleAt = undefined;
  }

  private async runCycle(): Promise<void> {
    const settings = this.settingsService.get();
    this.cycleCount++;
    this.lastCycleAt = Date.now();

    if (settings.autoHealthCheckEnabled) {
      await this.healthMonitor.runNow();
    }

    if (settings.batchEnabled) {
      await this.batchQueue.processPending();
    }
  }
}
