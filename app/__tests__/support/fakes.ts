import { ProviderNotFoundError } from '../../core/errors';
import { ErrorClassificationService } from '../../core/error-classification';
import type { ILogger } from '../../core/logging';
import type { IMetricsService } from '../../core/metrics';
import { CryptoService } from '../../core/security';
import type { CompletionRequest, CompletionResult } from '../../application/types';
import type { Settings } from '../../domain/config/settings.config';
import {
  createInitialStats,
  nextResponseTimeAverage,
  type HealthCheckResult,
  type ProviderCapabilities,
  type ProviderConfiguration,
  type ProviderRecord,
  type ProviderSnapshot,
  type RequestLogEntry
} from '../../domain/entities';
import type {
  ProviderRepository,
  RequestLogQuery,
  RequestLogRepository,
  SettingsRepository
} from '../../domain/repositories';
import { MemoryCacheStore } from '../../infrastructure/cache';
import type { ProviderAdapter } from '../../infrastructure/providers/base';
import { RequestCacheService } from '../../domain/services/cache';
import { DispatcherService } from '../../domain/services/dispatch';
import {
  ProviderRegistryService,
  ProviderSelectorService,
  StatsTrackerService,
  type CreateProviderInput,
  type IAdapterFactoryService
} from '../../domain/services/provider';
import { RequestLogService } from '../../domain/services/request';
import { SettingsService } from '../../domain/services/settings';

export function createTestLogger(): ILogger {
  const logger: ILogger = {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
    createChild: () => logger
  };
  return logger;
}

export function createMetricsStub(): jest.Mocked<IMetricsService> {
  return {
    recordHttpRequest: jest.fn(),
    recordError: jest.fn(),
    recordProviderRequest: jest.fn(),
    recordFailover: jest.fn(),
    recordAnalysisOutcome: jest.fn(),
    recordCacheLookup: jest.fn(),
    updateCacheSize: jest.fn(),
    recordHealthCheck: jest.fn(),
    updateProviderHealth: jest.fn(),
    updateBatchQueueSize: jest.fn(),
    getMetricsEndpoint: jest.fn().mockResolvedValue(''),
    getContentType: jest.fn().mockReturnValue('text/plain')
  };
}

export function createCryptoService(logger: ILogger = createTestLogger()): CryptoService {
  process.env.SECRETS_MASTER_KEY = 'test-secret';
  return new CryptoService(logger);
}

export class InMemoryProviderRepository implements ProviderRepository {
  readonly records = new Map<string, ProviderRecord>();
  failWrites = false;

  async findAll(): Promise<ProviderRecord[]> {
    return [...this.records.values()];
  }

  async findById(id: string): Promise<ProviderRecord | null> {
    return this.records.get(id) ?? null;
  }

  async findByName(name: string): Promise<ProviderRecord | null> {
    return [...this.records.values()].find(record => record.configuration.name === name) ?? null;
  }

  async save(record: ProviderRecord): Promise<void> {
    this.assertWritable();
    this.records.set(record.identity.id, record);
  }

  async updateConfiguration(
    id: string,
    configuration: ProviderConfiguration,
    capabilities: ProviderCapabilities,
    updatedAt: number
  ): Promise<void> {
    this.assertWritable();
    this.modify(id, record => ({ ...record, configuration, capabilities, updatedAt }));
  }

  async delete(id: string): Promise<boolean> {
    this.assertWritable();
    return this.records.delete(id);
  }

  async recordHealthCheck(id: string, result: HealthCheckResult): Promise<void> {
    this.assertWritable();
    this.modify(id, record => ({
      ...record,
      health: {
        status: result.isSuccess ? 'available' : 'unavailable',
        lastCheckedAt: result.checkedAt,
        checkCount: record.health.checkCount + 1,
        failureCount: record.health.failureCount + (result.isSuccess ? 0 : 1),
        lastResponseTimeMs: result.responseTimeMs,
        lastError: result.isSuccess ? undefined : result.errorMessage
      }
    }));
  }

  async recordSuccess(id: string, elapsedMs: number, at: number): Promise<void> {
    this.assertWritable();
    this.modify(id, record => ({
      ...record,
      stats: {
        ...record.stats,
        usageCount: record.stats.usageCount + 1,
        successCount: record.stats.successCount + 1,
        avgResponseTimeMs: nextResponseTimeAverage(record.stats.avgResponseTimeMs, record.stats.successCount, elapsedMs),
        lastUsedAt: at
      }
    }));
  }

  async recordError(id: string, message: string | undefined, at: number): Promise<void> {
    this.assertWritable();
    this.modify(id, record => ({
      ...record,
      stats: {
        ...record.stats,
        usageCount: record.stats.usageCount + 1,
        errorCount: record.stats.errorCount + 1,
        lastUsedAt: at,
        lastError: message ?? 'Unknown error',
        lastErrorAt: at
      }
    }));
  }

  async resetStats(id?: string): Promise<number> {
    this.assertWritable();
    const ids = id !== undefined ? [id].filter(candidate => this.records.has(candidate)) : [...this.records.keys()];
    for (const target of ids) {
      this.modify(target, record => ({ ...record, stats: createInitialStats() }));
    }
    return ids.length;
  }

  private modify(id: string, change: (record: ProviderRecord) => ProviderRecord): void {
    const record = this.records.get(id);
    if (!record) {
      throw new ProviderNotFoundError(id);
    }
    this.records.set(id, change(record));
  }

  private assertWritable(): void {
    if (this.failWrites) {
      throw new Error('database unavailable');
    }
  }
}

export class InMemorySettingsRepository implements SettingsRepository {
  stored: unknown = null;
  readonly saved: Settings[] = [];

  async load(): Promise<unknown> {
    return this.stored;
  }

  async save(settings: Settings): Promise<void> {
    this.saved.push(settings);
    this.stored = settings;
  }
}

export class InMemoryRequestLogRepository implements RequestLogRepository {
  readonly entries: RequestLogEntry[] = [];

  async save(entry: RequestLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async findRecent(query: RequestLogQuery): Promise<RequestLogEntry[]> {
    return this.entries
      .filter(entry => query.providerId === undefined || entry.providerId === query.providerId)
      .filter(entry => query.requestType === undefined || entry.requestType === query.requestType)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, query.limit);
  }

  async deleteOlderThan(timestamp: number): Promise<number> {
    const before = this.entries.length;
    const kept = this.entries.filter(entry => entry.createdAt >= timestamp);
    this.entries.splice(0, this.entries.length, ...kept);
    return before - kept.length;
  }
}

export interface FakeAdapter extends ProviderAdapter {
  complete: jest.Mock<Promise<CompletionResult>, [CompletionRequest, AbortSignal]>;
  probe: jest.Mock<Promise<CompletionResult>, [AbortSignal]>;
}

export function createFakeAdapter(provider: ProviderSnapshot): FakeAdapter {
  return {
    configuration: {
      providerId: provider.id,
      name: provider.name,
      apiBase: provider.apiBase,
      apiKey: 'test-secret',
      model: provider.model,
      apiFormat: provider.apiFormat
    },
    complete: jest.fn<Promise<CompletionResult>, [CompletionRequest, AbortSignal]>(),
    probe: jest.fn<Promise<CompletionResult>, [AbortSignal]>()
  };
}

export class FakeAdapterFactory implements IAdapterFactoryService {
  private readonly adapters = new Map<string, FakeAdapter>();

  register(provider: ProviderSnapshot): FakeAdapter {
    const adapter = createFakeAdapter(provider);
    this.adapters.set(provider.id, adapter);
    return adapter;
  }

  getAdapter(provider: ProviderSnapshot): ProviderAdapter {
    const adapter = this.adapters.get(provider.id);
    if (!adapter) {
      throw new Error(`No fake adapter for ${provider.name}`);
    }
    return adapter;
  }

  releaseAdapter(providerId: string): boolean {
    return this.adapters.delete(providerId);
  }
}

export function analysisReply(overrides: Record<string, unknown> = {}): CompletionResult {
  return {
    content: JSON.stringify({
      is_relevant: true,
      analytical_briefing: 'New chip export rules announced.',
      confidence: 80,
      ...overrides
    }),
    tokensUsed: 42
  };
}

export function providerInput(name: string, overrides: Partial<CreateProviderInput> = {}): CreateProviderInput {
  return {
    name,
    apiBase: 'https://llm.example.test/v1',
    apiKey: 'test-secret',
    model: 'test-model',
    ...overrides
  };
}

export async function createSettingsService(
  patch: Partial<Settings> = {},
  logger: ILogger = createTestLogger()
): Promise<SettingsService> {
  const settings = new SettingsService(logger, new InMemorySettingsRepository());
  await settings.update(patch);
  return settings;
}

export interface DispatchHarness {
  readonly logger: ILogger;
  readonly metrics: jest.Mocked<IMetricsService>;
  readonly settings: SettingsService;
  readonly providerRepository: InMemoryProviderRepository;
  readonly registry: ProviderRegistryService;
  readonly cacheStore: MemoryCacheStore;
  readonly cache: RequestCacheService;
  readonly statsTracker: StatsTrackerService;
  readonly adapters: FakeAdapterFactory;
  readonly requestLogRepository: InMemoryRequestLogRepository;
  readonly requestLog: RequestLogService;
  readonly dispatcher: DispatcherService;
  addProvider(name: string, overrides?: Partial<CreateProviderInput>): Promise<{ provider: ProviderSnapshot; adapter: FakeAdapter }>;
}

export async function createDispatchHarness(patch: Partial<Settings> = {}): Promise<DispatchHarness> {
  const logger = createTestLogger();
  const metrics = createMetricsStub();
  const settings = await createSettingsService(patch, logger);
  const providerRepository = new InMemoryProviderRepository();
  const registry = new ProviderRegistryService(logger, providerRepository, createCryptoService(logger));
  const cacheStore = new MemoryCacheStore();
  const cache = new RequestCacheService(logger, cacheStore, settings, metrics);
  const statsTracker = new StatsTrackerService(logger, registry, metrics);
  const adapters = new FakeAdapterFactory();
  const requestLogRepository = new InMemoryRequestLogRepository();
  const requestLog = new RequestLogService(logger, requestLogRepository, metrics);
  const dispatcher = new DispatcherService(
    logger,
    cache,
    registry,
    new ProviderSelectorService(),
    statsTracker,
    adapters,
    settings,
    new ErrorClassificationService(),
    requestLog,
    metrics
  );

  return {
    logger,
    metrics,
    settings,
    providerRepository,
    registry,
    cacheStore,
    cache,
    statsTracker,
    adapters,
    requestLogRepository,
    requestLog,
    dispatcher,
    async addProvider(name, overrides = {}) {
      const provider = await registry.create(providerInput(name, overrides));
      return { provider, adapter: adapters.register(provider) };
    }
  };
}

export function healthResult(provider: ProviderSnapshot, isSuccess: boolean, checkedAt: number = Date.now()): HealthCheckResult {
  return {
    providerId: provider.id,
    providerName: provider.name,
    isSuccess,
    responseTimeMs: 12,
    ...(isSuccess ? {} : { errorMessage: 'API returned error: 503 - unavailable' }),
    checkedAt
  };
}
