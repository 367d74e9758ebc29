import { injectable, inject } from 'inversify';
import crypto from 'crypto';
import cron, { type ScheduledTask } from 'node-cron';
import { TYPES } from '../../../core/container/types';
import { toError, type ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { RequestLogEntry } from '../../entities';
import type { RequestLogQuery, RequestLogRepository } from '../../repositories';

export type RequestLogInput = Omit<RequestLogEntry, 'id' | 'createdAt'>;

export interface IRequestLogService {
  record(input: RequestLogInput): void;
  flush(): Promise<void>;
  recent(query: RequestLogQuery): Promise<RequestLogEntry[]>;
  purgeOlderThan(days: number): Promise<number>;
  startRetentionSchedule(): void;
  stopRetentionSchedule(): void;
}

const RETENTION_SCHEDULE = '0 3 * * *';
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Request logs are written in the background: a slow or failing log store
 * never delays or fails the request being logged.
 */
@injectable()
export class RequestLogService implements IRequestLogService {
  private readonly logger: ILogger;
  private readonly pendingWrites = new Set<Promise<void>>();
  private readonly retentionDays: number;
  private retentionTask: ScheduledTask | null = null;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.RequestLogRepository) private readonly requestLogRepository: RequestLogRepository,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('RequestLogService');
    this.retentionDays = Number.parseInt(process.env.REQUEST_LOG_RETENTION_DAYS || '30', 10) || 30;
  }

  record(input: RequestLogInput): void {
    const entry: RequestLogEntry = {
      ...input,
      id: crypto.randomUUID(),
      createdAt: Date.now()
    };

    const write: Promise<void> = this.requestLogRepository
      .save(entry)
      .catch((error: unknown) => {
        this.metricsService.recordError('request_log_write_failed', 'request_log');
        this.logger.error('Failed to write request log', toError(error), {
          providerId: entry.providerId,
          metadata: { requestType: entry.requestType }
        });
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });

    this.pendingWrites.add(write);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  async recent(query: RequestLogQuery): Promise<RequestLogEntry[]> {
    return this.requestLogRepository.findRecent(query);
  }

  async purgeOlderThan(days: number): Promise<number> {
    const removed = await this.requestLogRepository.deleteOlderThan(Date.now() - days * DAY_MS);
    this.logger.info('Old request logs purged', { metadata: { days, removed } });
    return removed;
  }

  startRetentionSchedule(): void {
    if (this.retentionTask) {
      return;
    }

    this.retentionTask = cron.schedule(RETENTION_SCHEDULE, () => {
      this.purgeOlderThan(this.retentionDays).catch(error => {
        this.logger.error('Scheduled request log purge failed', toError(error));
      });
    });
  }

  stopRetentionSchedule(): void {
    this.retentionTask?.stop();
    this.retentionTask = null;
  }
}
