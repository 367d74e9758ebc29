import { injectable, inject } from 'inversify';
import cron, { type ScheduledTask } from 'node-cron';
import { TYPES } from '../../../core/container/types';
import { toError, type ILogger } from '../../../core/logging';
import type { IMetricsService } from '../../../core/metrics';
import type { AnalysisResult } from '../../../application/types';
import { isCacheEntryExpired, type CacheEntry } from '../../entities';
import type { CacheStore } from '../../repositories';
import type { ISettingsService } from '../settings';

export type CacheLookupResult =
  | { readonly hit: true; readonly entry: CacheEntry }
  | { readonly hit: false };

export interface CacheStats {
  readonly cacheItems: number;
  readonly cacheSizeBytes: number;
  readonly hitCount: number;
  readonly missCount: number;
  readonly hitRate: number;
  readonly enabled: boolean;
  readonly ttlSeconds: number;
  readonly backend: CacheStore['kind'];
}

export interface IRequestCacheService {
  lookup(fingerprint: string): Promise<CacheLookupResult>;
  store(fingerprint: string, result: AnalysisResult, ttlSeconds: number, providerId: string): Promise<boolean>;
  invalidate(fingerprint: string): Promise<boolean>;
  clear(): Promise<number>;
  stats(): Promise<CacheStats>;
  purgeExpired(): Promise<number>;
  startPurgeSchedule(): void;
  stopPurgeSchedule(): void;
}

const PURGE_SCHEDULE = '* * * * *';

@injectable()
export class RequestCacheService implements IRequestCacheService {
  private readonly logger: ILogger;
  private hitCount = 0;
  private missCount = 0;
  private purgeTask: ScheduledTask | null = null;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.CacheStore) private readonly cacheStore: CacheStore,
    @inject(TYPES.SettingsService) private readonly settingsService: ISettingsService,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('RequestCacheService');
  }

  async lookup(fingerprint: string): Promise<CacheLookupResult> {
    if (!this.settingsService.get().cacheEnabled) {
      return { hit: false };
    }

    const entry = await this.cacheStore.get(fingerprint);
    const now = Date.now();

    if (entry && !isCacheEntryExpired(entry, now)) {
      this.hitCount++;
      this.metricsService.recordCacheLookup(true);
      return { hit: true, entry };
    }

    this.missCount++;
    this.metricsService.recordCacheLookup(false);

    if (entry) {
      await this.cacheStore.delete(fingerprint, entry.createdAt);
      this.logger.debug('Evicted expired cache entry', { metadata: { fingerprint } });
    }

    return { hit: false };
  }

  async store(fingerprint: string, result: AnalysisResult, ttlSeconds: number, providerId: string): Promise<boolean> {
    if (!this.settingsService.get().cacheEnabled) {
      return false;
    }

    await this.cacheStore.set({
      fingerprint,
      result,
      providerId,
      createdAt: Date.now(),
      ttlSeconds
    });
    return true;
  }

  async invalidate(fingerprint: string): Promise<boolean> {
    const removed = await this.cacheStore.delete(fingerprint);
    if (removed) {
      this.logger.info('Cache entry invalidated', { metadata: { fingerprint } });
    }
    return removed;
  }

  async clear(): Promise<number> {
    const removed = await this.cacheStore.clear();
    this.metricsService.updateCacheSize(0);
    this.logger.info('Cache cleared', { metadata: { removed } });
    return removed;
  }

  async stats(): Promise<CacheStats> {
    const [cacheItems, cacheSizeBytes] = await Promise.all([
      this.cacheStore.count(),
      this.cacheStore.approximateSizeBytes()
    ]);
    const settings = this.settingsService.get();
    const lookups = this.hitCount + this.missCount;

    this.metricsService.updateCacheSize(cacheItems);

    return {
      cacheItems,
      cacheSizeBytes,
      hitCount: this.hitCount,
      missCount: this.missCount,
      hitRate: lookups === 0 ? 0 : Math.round((this.hitCount / lookups) * 10000) / 100,
      enabled: settings.cacheEnabled,
      ttlSeconds: settings.cacheTtlSeconds,
      backend: this.cacheStore.kind
    };
  }

  async purgeExpired(): Promise<number> {
    const removed = await this.cacheStore.purgeExpired(Date.now());
    if (removed > 0) {
      this.logger.debug('Purged expired cache entries', { metadata: { removed } });
    }
    return removed;
  }

  startPurgeSchedule(): void {
    if (this.purgeTask) {
      return;
    }

    this.purgeTask = cron.schedule(PURGE_SCHEDULE, () => {
      this.purgeExpired().catch(error => {
        this.logger.error('Scheduled cache purge failed', toError(error));
      });
    });

    this.logger.info('Cache purge scheduled', { metadata: { schedule: PURGE_SCHEDULE, backend: this.cacheStore.kind } });
  }

  stopPurgeSchedule(): void {
    this.purgeTask?.stop();
    this.purgeTask = null;
  }
}
