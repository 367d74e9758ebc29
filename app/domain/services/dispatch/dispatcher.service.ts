import { injectable, inject } from 'inversify';
import { TYPES } from '../../../core/container/types';
import {
  DispatchError,
  ProviderCallError,
  type AttemptRecord
} from '../../../core/errors';
import type { ErrorClassificationService } from '../../../core/error-classification';
import { toError, type ILogger } from '../../../core/logging';
import { abortable } from '../../../core/utils';
import type { IMetricsService } from '../../../core/metrics';
import type { AnalysisOutcome, AnalysisRequest, AnalysisResult, CompletionRequest } from '../../../application/types';
import type { ProviderSnapshot } from '../../entities';
import { ANALYSIS_SYSTEM_PROMPT, renderPrompt } from '../analysis/prompt';
import { parseAnalysisResponse } from '../analysis/response-parser';
import { computeFingerprint, type CacheLookupResult, type IRequestCacheService } from '../cache';
import type { IAdapterFactoryService } from '../provider/adapter-factory.service';
import type { IProviderRegistryService } from '../provider/provider-registry.service';
import type { IProviderSelectorService } from '../provider/provider-selector.service';
import type { IStatsTrackerService } from '../provider/stats-tracker.service';
import type { IRequestLogService } from '../request';
import type { ISettingsService } from '../settings';

export interface IDispatcherService {
  analyze(request: AnalysisRequest): Promise<AnalysisOutcome>;
}

type AttemptOutcome =
  | { readonly ok: true; readonly result: AnalysisResult; readonly record: AttemptRecord }
  | { readonly ok: false; readonly error: ProviderCallError; readonly record: AttemptRecord };

interface DispatchBudget {
  readonly maxAttempts: number;
  readonly attemptTimeoutMs: number;
  readonly deadline: AbortSignal;
}

@injectable()
export class DispatcherService implements IDispatcherService {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.RequestCacheService) private readonly requestCache: IRequestCacheService,
    @inject(TYPES.ProviderRegistryService) private readonly providerRegistry: IProviderRegistryService,
    @inject(TYPES.ProviderSelectorService) private readonly selector: IProviderSelectorService,
    @inject(TYPES.StatsTrackerService) private readonly statsTracker: IStatsTrackerService,
    @inject(TYPES.AdapterFactoryService) private readonly adapterFactory: IAdapterFactoryService,
    @inject(TYPES.SettingsService) private readonly settingsService: ISettingsService,
    @inject(TYPES.ErrorClassificationService) private readonly errorClassification: ErrorClassificationService,
    @inject(TYPES.RequestLogService) private readonly requestLog: IRequestLogService,
    @inject(TYPES.MetricsService) private readonly metricsService: IMetricsService
  ) {
    this.logger = logger.createChild('DispatcherService');
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const startedAt = Date.now();
    const fingerprint = computeFingerprint(request);

    const cached = await this.lookupCached(fingerprint, request);
    if (cached.hit) {
      this.metricsService.recordAnalysisOutcome('cache_hit');
      this.logger.debug('Analysis served from cache', {
        requestId: request.requestId,
        providerId: cached.entry.providerId,
        metadata: { fingerprint }
      });

      return {
        result: cached.entry.result,
        fingerprint,
        providerId: cached.entry.providerId,
        cached: true,
        attempts: 0,
        elapsedMs: Date.now() - startedAt
      };
    }

    // One settings snapshot per request: a concurrent update applies to the next one.
    const settings = this.settingsService.get();
    const candidates = this.selector.select(this.providerRegistry.list(true), request.mediaType);

    if (candidates.length === 0) {
      this.metricsService.recordAnalysisOutcome('no_eligible_provider');
      this.logger.warn('No eligible provider', {
        requestId: request.requestId,
        metadata: { mediaType: request.mediaType }
      });
      throw new DispatchError('no_eligible_provider', `No eligible provider for media type "${request.mediaType}"`);
    }

    const budget: DispatchBudget = {
      maxAttempts: settings.maxAttempts,
      attemptTimeoutMs: settings.attemptTimeoutMs,
      deadline: AbortSignal.timeout(settings.requestDeadlineMs)
    };
    const completion = this.buildCompletionRequest(request);
    const attempts: AttemptRecord[] = [];
    let lastError: ProviderCallError | undefined;

    for (const provider of candidates) {
      // A parse failure earns the same provider exactly one more try.
      for (let parseRetries = 0; parseRetries < 2; parseRetries++) {
        if (attempts.length >= budget.maxAttempts || budget.deadline.aborted) {
          return this.exhausted(request, attempts, lastError, budget);
        }

        const outcome = await this.attempt(provider, completion, fingerprint, budget);
        attempts.push(outcome.record);

        if (outcome.ok) {
          await this.storeResult(fingerprint, outcome.result, settings.cacheTtlSeconds, provider.id, request);
          this.metricsService.recordAnalysisOutcome('success');
          this.logger.info('Analysis completed', {
            requestId: request.requestId,
            providerId: provider.id,
            duration: Date.now() - startedAt,
            metadata: { attempts: attempts.length }
          });

          return {
            result: outcome.result,
            fingerprint,
            providerId: provider.id,
            cached: false,
            attempts: attempts.length,
            elapsedMs: Date.now() - startedAt
          };
        }

        lastError = outcome.error;
        if (outcome.error.category !== 'parse') {
          break;
        }
      }

      this.metricsService.recordFailover(provider.id, lastError?.category ?? 'unknown');
      this.logger.warn('Failing over to next provider', {
        requestId: request.requestId,
        providerId: provider.id,
        metadata: { category: lastError?.category, message: lastError?.message }
      });
    }

    return this.exhausted(request, attempts, lastError, budget);
  }

  // A cache backend failure never fails the request: a broken read is a miss.
  private async lookupCached(fingerprint: string, request: AnalysisRequest): Promise<CacheLookupResult> {
    try {
      return await this.requestCache.lookup(fingerprint);
    } catch (error) {
      this.reportCacheFailure('cache_read_failed', error, fingerprint, request);
      return { hit: false };
    }
  }

  private async storeResult(
    fingerprint: string,
    result: AnalysisResult,
    ttlSeconds: number,
    providerId: string,
    request: AnalysisRequest
  ): Promise<void> {
    try {
      await this.requestCache.store(fingerprint, result, ttlSeconds, providerId);
    } catch (error) {
      this.reportCacheFailure('cache_write_failed', error, fingerprint, request);
    }
  }

  private reportCacheFailure(type: string, error: unknown, fingerprint: string, request: AnalysisRequest): void {
    this.metricsService.recordError(type, 'dispatcher');
    this.logger.error('Request cache unavailable', toError(error), {
      requestId: request.requestId,
      metadata: { fingerprint, type }
    });
  }

  private async attempt(
    provider: ProviderSnapshot,
    completion: CompletionRequest,
    fingerprint: string,
    budget: DispatchBudget
  ): Promise<AttemptOutcome> {
    const startedAt = Date.now();
    const signal = AbortSignal.any([budget.deadline, AbortSignal.timeout(budget.attemptTimeoutMs)]);

    let result: AnalysisResult;
    let tokensUsed: number | undefined;
    try {
      const adapter = this.adapterFactory.getAdapter(provider);
      const response = await abortable(adapter.complete(completion, signal), signal);
      tokensUsed = response.tokensUsed;
      result = parseAnalysisResponse(response.content);
    } catch (error) {
      const failure = this.errorClassification.toProviderCallError(error, provider.id, { aborted: signal.aborted });
      const elapsedMs = Date.now() - startedAt;

      await this.statsTracker.recordError(provider.id, failure, elapsedMs);
      this.requestLog.record({
        providerId: provider.id,
        requestType: 'content_analysis',
        isSuccess: false,
        errorMessage: failure.message,
        errorCategory: failure.category,
        responseTimeMs: elapsedMs,
        isCached: false,
        cacheKey: fingerprint
      });

      return {
        ok: false,
        error: failure,
        record: { providerId: provider.id, providerName: provider.name, category: failure.category, message: failure.message, elapsedMs }
      };
    }

    const elapsedMs = Date.now() - startedAt;
    await this.statsTracker.recordSuccess(provider.id, elapsedMs);
    this.requestLog.record({
      providerId: provider.id,
      requestType: 'content_analysis',
      isSuccess: true,
      responseTimeMs: elapsedMs,
      tokenCount: tokensUsed,
      isCached: false,
      cacheKey: fingerprint
    });

    return {
      ok: true,
      result,
      record: { providerId: provider.id, providerName: provider.name, elapsedMs }
    };
  }

  private exhausted(
    request: AnalysisRequest,
    attempts: readonly AttemptRecord[],
    lastError: ProviderCallError | undefined,
    budget: DispatchBudget
  ): never {
    this.metricsService.recordAnalysisOutcome('all_providers_exhausted');

    const reason = budget.deadline.aborted
      ? 'request deadline exceeded'
      : attempts.length >= budget.maxAttempts
        ? `attempt budget of ${budget.maxAttempts} used`
        : 'every eligible provider failed';

    this.logger.error('All providers exhausted', lastError, {
      requestId: request.requestId,
      metadata: {
        reason,
        attempts: attempts.map(attempt => `${attempt.providerName}:${attempt.category ?? 'ok'}`)
      }
    });

    throw new DispatchError(
      'all_providers_exhausted',
      `All providers exhausted after ${attempts.length} attempt(s): ${reason}`,
      lastError,
      attempts
    );
  }

  private buildCompletionRequest(request: AnalysisRequest): CompletionRequest {
    const imageUrls = request.mediaType === 'text' ? [] : request.mediaUrls ?? [];

    return {
      systemPrompt: ANALYSIS_SYSTEM_PROMPT,
      prompt: renderPrompt(request.promptTemplate, request.content),
      ...(imageUrls.length > 0 && { imageUrls })
    };
  }
}
