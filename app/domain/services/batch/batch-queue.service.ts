import { injectable, inject } from 'inversify';
import crypto from 'crypto';
import { TYPES } from '../../../core/container/types';
import { BatchDisabledError } from '../../../core/errors';
import { toError, type ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { AnalysisRequest, BatchItem, BatchItemStatus, BatchQueueStatus } from '../../../application/types';
import { MEDIA_TYPES } from '../../entities';
import type { IDispatcherService } from '../dispatch';
import type { ISettingsService } from '../settings';

export interface IBatchQueueService {
  enqueue(request: AnalysisRequest): BatchItem;
  get(id: string): BatchItem | undefined;
  list(status?: BatchItemStatus): BatchItem[];
  processPending(): Promise<number>;
  getStatus(): BatchQueueStatus;
}

export const BATCH_RETENTION_MS = 60 * 60 * 1000;

/**
 * Deferred analysis requests, drained by the polling cycle. Items are processed
 * one at a time, grouped by media type.
 */
@injectable()
export class BatchQueueService implements IBatchQueueService {
  private readonly logger: ILogger;
  private readonly items = new Map<string, BatchItem>();
  private draining: Promise<number> | null = null;
  private processedCount = 0;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DispatcherService) private readonly dispatcher: IDispatcherService,
    @inject(TYPES.SettingsService) private readonly settingsService: ISettingsService,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('BatchQueueService');
  }

  enqueue(request: AnalysisRequest): BatchItem {
    if (!this.settingsService.get().batchEnabled) {
      throw new BatchDisabledError();
    }

    const item: BatchItem = Object.freeze({
      id: crypto.randomUUID(),
      request,
      status: 'pending',
      enqueuedAt: Date.now()
    });

    this.items.set(item.id, item);
    this.metricsService.updateBatchQueueSize(this.countByStatus('pending'));
    this.logger.debug('Batch item enqueued', { requestId: request.requestId, metadata: { id: item.id, mediaType: request.mediaType } });
    return item;
  }

  get(id: string): BatchItem | undefined {
    return this.items.get(id);
  }

  list(status?: BatchItemStatus): BatchItem[] {
    const items = [...this.items.values()];
    return status ? items.filter(item => item.status === status) : items;
  }

  /**
   * Drains every pending item. A call made while a drain is running joins it.
   */
  processPending(): Promise<number> {
    if (!this.draining) {
      this.draining = this.drain().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  getStatus(): BatchQueueStatus {
    const groups: Record<string, number> = {};
    for (const item of this.list('pending')) {
      groups[item.request.mediaType] = (groups[item.request.mediaType] ?? 0) + 1;
    }

    return {
      enabled: this.settingsService.get().batchEnabled,
      pending: this.countByStatus('pending'),
      processing: this.countByStatus('processing'),
      completed: this.countByStatus('completed'),
      failed: this.countByStatus('failed'),
      processedCount: this.processedCount,
      groups
    };
  }

  private async drain(): Promise<number> {
    this.pruneFinished(Date.now());

    const pending = this.list('pending');
    let processed = 0;

    for (const mediaType of MEDIA_TYPES) {
      for (const item of pending.filter(candidate => candidate.request.mediaType === mediaType)) {
        await this.processItem(item);
        processed++;
      }
    }

    if (processed > 0) {
      this.logger.info('Batch queue drained', { metadata: { processed, status: this.getStatus() } });
    }
    return processed;
  }

  private async processItem(item: BatchItem): Promise<void> {
    this.replace({ ...item, status: 'processing' });

    try {
      const outcome = await this.dispatcher.analyze(item.request);
      this.replace({ ...item, status: 'completed', completedAt: Date.now(), outcome });
    } catch (error) {
      const failure = toError(error);
      this.replace({ ...item, status: 'failed', completedAt: Date.now(), error: failure.message });
      this.logger.warn('Batch item failed', {
        requestId: item.request.requestId,
        metadata: { id: item.id, error: failure.message }
      });
    }

    this.processedCount++;
    this.metricsService.updateBatchQueueSize(this.countByStatus('pending'));
  }

  private replace(item: BatchItem): void {
    this.items.set(item.id, Object.freeze(item));
  }

  private pruneFinished(now: number): void {
    for (const [id, item] of this.items) {
      if (item.completedAt !== undefined && now - item.completedAt >= BATCH_RETENTION_MS) {
        this.items.delete(id);
      }
    }
  }

  private countByStatus(status: BatchItemStatus): number {
    let count = 0;
    for (const item of this.items.values()) {
      if (item.status === status) count++;
    }
    return count;
  }
}
