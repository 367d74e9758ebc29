import { injectable, inject } from 'inversify';
import crypto from 'crypto';
import { TYPES } from '../../../core/container/types';
import {
  ProviderConflictError,
  ProviderNotFoundError,
  ProviderValidationError
} from '../../../core/errors';
import type { ILogger } from '../../../core/logging';
import type { ICryptoService } from '../../../core/security';
import {
  API_FORMATS,
  DEFAULT_CAPABILITIES,
  Provider,
  createInitialHealth,
  createInitialStats,
  type ApiFormat,
  type HealthCheckResult,
  type ProviderCapabilities,
  type ProviderConfigurationPatch,
  type ProviderSnapshot
} from '../../entities';
import type { ProviderRepository } from '../../repositories';

export interface CreateProviderInput {
  readonly name: string;
  readonly apiBase: string;
  readonly apiKey: string;
  readonly model: string;
  readonly apiFormat?: ApiFormat;
  readonly priority?: number;
  readonly isActive?: boolean;
  readonly supportsText?: boolean;
  readonly supportsImage?: boolean;
  readonly supportsVideo?: boolean;
  readonly supportsGif?: boolean;
}

export type UpdateProviderInput = Partial<CreateProviderInput>;

export interface UsageRecord {
  readonly success: boolean;
  readonly elapsedMs: number;
  readonly error?: string;
}

export interface IProviderRegistryService {
  initialize(): Promise<number>;
  reload(): Promise<number>;
  list(activeOnly?: boolean): ProviderSnapshot[];
  get(id: string): ProviderSnapshot | undefined;
  require(id: string): ProviderSnapshot;
  revealApiKey(id: string): string;
  create(input: CreateProviderInput): Promise<ProviderSnapshot>;
  update(id: string, input: UpdateProviderInput): Promise<ProviderSnapshot>;
  delete(id: string): Promise<void>;
  setActive(id: string, isActive: boolean): Promise<ProviderSnapshot>;
  toggle(id: string): Promise<ProviderSnapshot>;
  updateHealth(id: string, result: HealthCheckResult): Promise<ProviderSnapshot>;
  recordUsage(id: string, usage: UsageRecord): Promise<void>;
  resetStats(id?: string): Promise<number>;
}

const DEFAULT_PRIORITY = 100;

/**
 * In-memory view of the provider table. Every mutation changes the live entity
 * synchronously and then persists with an atomic update, so concurrent callers
 * never interleave inside a read-modify-write.
 */
@injectable()
export class ProviderRegistryService implements IProviderRegistryService {
  private readonly logger: ILogger;
  private readonly providers = new Map<string, Provider>();

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.ProviderRepository) private readonly providerRepository: ProviderRepository,
    @inject(TYPES.CryptoService) private readonly cryptoService: ICryptoService
  ) {
    this.logger = logger.createChild('ProviderRegistryService');
  }

  async initialize(): Promise<number> {
    const records = await this.providerRepository.findAll();

    this.providers.clear();
    for (const record of records) {
      this.providers.set(record.identity.id, new Provider(record));
    }

    this.logger.info('Provider registry loaded', {
      metadata: {
        total: this.providers.size,
        active: this.list(true).length
      }
    });
    return this.providers.size;
  }

  async reload(): Promise<number> {
    this.logger.info('Reloading provider registry');
    return this.initialize();
  }

  list(activeOnly: boolean = false): ProviderSnapshot[] {
    const snapshots: ProviderSnapshot[] = [];
    for (const provider of this.providers.values()) {
      if (!activeOnly || provider.isActive()) {
        snapshots.push(provider.snapshot());
      }
    }
    return snapshots.sort((a, b) => a.priority - b.priority || a.name.localeCompare(b.name));
  }

  get(id: string): ProviderSnapshot | undefined {
    return this.providers.get(id)?.snapshot();
  }

  require(id: string): ProviderSnapshot {
    return this.getEntity(id).snapshot();
  }

  revealApiKey(id: string): string {
    return this.cryptoService.decryptSecret(this.getEntity(id).getCredentials());
  }

  async create(input: CreateProviderInput): Promise<ProviderSnapshot> {
    const issues = this.validate(input, true);
    if (issues.length > 0) {
      throw new ProviderValidationError(issues);
    }

    const name = input.name.trim();
    this.assertNameAvailable(name);

    const now = Date.now();
    const provider = new Provider({
      identity: { id: crypto.randomUUID(), createdAt: now },
      configuration: {
        name,
        apiBase: input.apiBase.trim(),
        model: input.model.trim(),
        apiFormat: input.apiFormat ?? 'openai',
        priority: input.priority ?? DEFAULT_PRIORITY,
        isActive: input.isActive ?? true,
        credentials: this.cryptoService.encryptSecret(input.apiKey)
      },
      capabilities: { ...DEFAULT_CAPABILITIES, ...this.capabilitiesFrom(input) },
      health: createInitialHealth(),
      stats: createInitialStats(),
      updatedAt: now
    });

    // Registered before the write so a concurrent create with the same name is refused.
    this.providers.set(provider.getId(), provider);
    try {
      await this.providerRepository.save(provider.toRecord());
    } catch (error) {
      this.providers.delete(provider.getId());
      throw error;
    }

    this.logger.info('Provider created', { providerId: provider.getId(), metadata: { name } });
    return provider.snapshot();
  }

  async update(id: string, input: UpdateProviderInput): Promise<ProviderSnapshot> {
    const provider = this.getEntity(id);
    const issues = this.validate(input, false);
    if (issues.length > 0) {
      throw new ProviderValidationError(issues);
    }

    const name = input.name?.trim();
    if (name !== undefined && name !== provider.getName()) {
      this.assertNameAvailable(name);
    }

    const patch: ProviderConfigurationPatch = {
      ...(name !== undefined && { name }),
      ...(input.apiBase !== undefined && { apiBase: input.apiBase.trim() }),
      ...(input.model !== undefined && { model: input.model.trim() }),
      ...(input.apiFormat !== undefined && { apiFormat: input.apiFormat }),
      ...(input.priority !== undefined && { priority: input.priority }),
      ...(input.isActive !== undefined && { isActive: input.isActive }),
      ...(input.apiKey !== undefined && { credentials: this.cryptoService.encryptSecret(input.apiKey) })
    };

    const capabilities = this.capabilitiesFrom(input);
    const at = Date.now();
    await this.applyConfiguration(provider, target => target.reconfigure(patch, capabilities, at));

    this.logger.info('Provider updated', {
      providerId: id,
      metadata: { fields: Object.keys(input).filter(key => key !== 'apiKey') }
    });
    return provider.snapshot();
  }

  async delete(id: string): Promise<void> {
    this.getEntity(id);
    await this.providerRepository.delete(id);
    this.providers.delete(id);
    this.logger.info('Provider deleted', { providerId: id });
  }

  async setActive(id: string, isActive: boolean): Promise<ProviderSnapshot> {
    const provider = this.getEntity(id);
    const at = Date.now();
    await this.applyConfiguration(provider, target => target.setActive(isActive, at));

    this.logger.info(isActive ? 'Provider activated' : 'Provider deactivated', { providerId: id });
    return provider.snapshot();
  }

  async toggle(id: string): Promise<ProviderSnapshot> {
    return this.setActive(id, !this.getEntity(id).isActive());
  }

  async updateHealth(id: string, result: HealthCheckResult): Promise<ProviderSnapshot> {
    const provider = this.getEntity(id);
    provider.applyHealthCheck(result);
    await this.providerRepository.recordHealthCheck(id, result);
    return provider.snapshot();
  }

  async recordUsage(id: string, usage: UsageRecord): Promise<void> {
    const provider = this.getEntity(id);
    const at = Date.now();

    if (usage.success) {
      provider.recordSuccess(usage.elapsedMs, at);
      await this.providerRepository.recordSuccess(id, usage.elapsedMs, at);
    } else {
      provider.recordError(usage.error, at);
      await this.providerRepository.recordError(id, usage.error, at);
    }
  }

  async resetStats(id?: string): Promise<number> {
    if (id !== undefined) {
      this.getEntity(id).resetStats();
    } else {
      for (const provider of this.providers.values()) {
        provider.resetStats();
      }
    }

    const reset = await this.providerRepository.resetStats(id);
    this.logger.info('Provider stats reset', { providerId: id, metadata: { reset } });
    return reset;
  }

  private getEntity(id: string): Provider {
    const provider = this.providers.get(id);
    if (!provider) {
      throw new ProviderNotFoundError(id);
    }
    return provider;
  }

  private assertNameAvailable(name: string): void {
    for (const provider of this.providers.values()) {
      if (provider.getName() === name) {
        throw new ProviderConflictError(`A provider named "${name}" already exists`);
      }
    }
  }

  /**
   * Persists the change on a draft first; the live entity only changes once
   * the write has succeeded.
   */
  private async applyConfiguration(provider: Provider, change: (target: Provider) => void): Promise<void> {
    const draft = new Provider(provider.toRecord());
    change(draft);
    await this.persistConfiguration(draft);
    change(provider);
  }

  private async persistConfiguration(provider: Provider): Promise<void> {
    const record = provider.toRecord();
    await this.providerRepository.updateConfiguration(
      record.identity.id,
      record.configuration,
      record.capabilities,
      record.updatedAt
    );
  }

  private capabilitiesFrom(input: UpdateProviderInput): Partial<ProviderCapabilities> {
    return {
      ...(input.supportsText !== undefined && { supportsText: input.supportsText }),
      ...(input.supportsImage !== undefined && { supportsImage: input.supportsImage }),
      ...(input.supportsVideo !== undefined && { supportsVideo: input.supportsVideo }),
      ...(input.supportsGif !== undefined && { supportsGif: input.supportsGif })
    };
  }

  private validate(input: UpdateProviderInput, creating: boolean): string[] {
    const issues: string[] = [];
    const requireText = (field: 'name' | 'apiKey' | 'model' | 'apiBase', value: string | undefined): void => {
      if (value === undefined ? creating : value.trim() === '') {
        issues.push(`${field} is required`);
      }
    };

    requireText('name', input.name);
    requireText('apiBase', input.apiBase);
    requireText('apiKey', input.apiKey);
    requireText('model', input.model);

    if (input.apiBase !== undefined && input.apiBase.trim() !== '' && !isHttpUrl(input.apiBase.trim())) {
      issues.push('apiBase must be an http(s) URL');
    }
    if (input.priority !== undefined && (!Number.isInteger(input.priority) || input.priority < 0)) {
      issues.push('priority must be a non-negative integer');
    }
    if (input.apiFormat !== undefined && !API_FORMATS.includes(input.apiFormat)) {
      issues.push(`apiFormat must be one of ${API_FORMATS.join(', ')}`);
    }

    return issues;
  }
}

function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return false;
  }
  const { protocol } = new URL(value);
  return protocol === 'http:' || protocol === 'https:';
}
