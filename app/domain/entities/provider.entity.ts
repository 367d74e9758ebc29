import type { EncryptedSecret } from '../../core/security';

export const MEDIA_TYPES = ['text', 'image', 'video', 'gif'] as const;
export type MediaType = typeof MEDIA_TYPES[number];

export const HEALTH_STATUSES = ['unknown', 'available', 'unavailable'] as const;
export type HealthStatus = typeof HEALTH_STATUSES[number];

export const API_FORMATS = ['openai', 'anthropic'] as const;
export type ApiFormat = typeof API_FORMATS[number];

/** Weight of the newest sample in the response-time moving average. */
export const RESPONSE_TIME_EMA_ALPHA = 0.2;

export interface ProviderIdentity {
  readonly id: string;
  readonly createdAt: number;
}

export interface ProviderConfiguration {
  readonly name: string;
  readonly apiBase: string;
  readonly model: string;
  readonly apiFormat: ApiFormat;
  readonly priority: number;
  readonly isActive: boolean;
  readonly credentials: EncryptedSecret;
}

export interface ProviderCapabilities {
  readonly supportsText: boolean;
  readonly supportsImage: boolean;
  readonly supportsVideo: boolean;
  readonly supportsGif: boolean;
}

export interface ProviderHealth {
  status: HealthStatus;
  lastCheckedAt?: number;
  checkCount: number;
  failureCount: number;
  lastResponseTimeMs?: number;
  lastError?: string;
}

export interface ProviderStats {
  usageCount: number;
  successCount: number;
  errorCount: number;
  avgResponseTimeMs: number;
  lastUsedAt?: number;
  lastError?: string;
  lastErrorAt?: number;
}

export interface HealthCheckResult {
  readonly providerId: string;
  readonly providerName: string;
  readonly isSuccess: boolean;
  readonly responseTimeMs: number;
  readonly errorMessage?: string;
  readonly checkedAt: number;
}

/**
 * Immutable read model handed out by the registry. Carries no credentials.
 */
export interface ProviderSnapshot {
  readonly id: string;
  readonly name: string;
  readonly apiBase: string;
  readonly model: string;
  readonly apiFormat: ApiFormat;
  readonly priority: number;
  readonly isActive: boolean;
  readonly capabilities: Readonly<ProviderCapabilities>;
  readonly health: Readonly<ProviderHealth>;
  readonly stats: Readonly<ProviderStats>;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface ProviderRecord {
  readonly identity: ProviderIdentity;
  readonly configuration: ProviderConfiguration;
  readonly capabilities: ProviderCapabilities;
  readonly health: ProviderHealth;
  readonly stats: ProviderStats;
  readonly updatedAt: number;
}

export type ProviderConfigurationPatch = Partial<Omit<ProviderConfiguration, 'credentials'>> & {
  readonly credentials?: EncryptedSecret;
};

export const DEFAULT_CAPABILITIES: Readonly<ProviderCapabilities> = Object.freeze({
  supportsText: true,
  supportsImage: false,
  supportsVideo: false,
  supportsGif: false
});

export function createInitialHealth(): ProviderHealth {
  return { status: 'unknown', checkCount: 0, failureCount: 0 };
}

export function createInitialStats(): ProviderStats {
  return { usageCount: 0, successCount: 0, errorCount: 0, avgResponseTimeMs: 0 };
}

export function nextResponseTimeAverage(previousAverage: number, previousSamples: number, elapsedMs: number): number {
  if (previousSamples === 0) {
    return elapsedMs;
  }
  return previousAverage + RESPONSE_TIME_EMA_ALPHA * (elapsedMs - previousAverage);
}

export class Provider {
  private readonly identity: ProviderIdentity;
  private configuration: ProviderConfiguration;
  private capabilities: ProviderCapabilities;
  private health: ProviderHealth;
  private stats: ProviderStats;
  private updatedAt: number;

  constructor(record: ProviderRecord) {
    this.identity = record.identity;
    this.configuration = record.configuration;
    this.capabilities = record.capabilities;
    this.health = { ...record.health };
    this.stats = { ...record.stats };
    this.updatedAt = record.updatedAt;
  }

  getId(): string {
    return this.identity.id;
  }

  getName(): string {
    return this.configuration.name;
  }

  getCredentials(): EncryptedSecret {
    return this.configuration.credentials;
  }

  getUpdatedAt(): number {
    return this.updatedAt;
  }

  isActive(): boolean {
    return this.configuration.isActive;
  }

  supports(mediaType: MediaType): boolean {
    return supportsMediaType(this.capabilities, mediaType);
  }

  reconfigure(configuration: ProviderConfigurationPatch, capabilities: Partial<ProviderCapabilities>, at: number): void {
    this.configuration = { ...this.configuration, ...configuration };
    this.capabilities = { ...this.capabilities, ...capabilities };
    this.updatedAt = at;
  }

  setActive(isActive: boolean, at: number): void {
    this.configuration = { ...this.configuration, isActive };
    this.updatedAt = at;
  }

  applyHealthCheck(result: HealthCheckResult): void {
    this.health = {
      status: result.isSuccess ? 'available' : 'unavailable',
      lastCheckedAt: result.checkedAt,
      checkCount: this.health.checkCount + 1,
      failureCount: this.health.failureCount + (result.isSuccess ? 0 : 1),
      lastResponseTimeMs: result.responseTimeMs,
      lastError: result.isSuccess ? undefined : result.errorMessage
    };
  }

  recordSuccess(elapsedMs: number, at: number): void {
    this.stats = {
      ...this.stats,
      usageCount: this.stats.usageCount + 1,
      successCount: this.stats.successCount + 1,
      avgResponseTimeMs: nextResponseTimeAverage(this.stats.avgResponseTimeMs, this.stats.successCount, elapsedMs),
      lastUsedAt: at
    };
  }

  recordError(message: string | undefined, at: number): void {
    this.stats = {
      ...this.stats,
      usageCount: this.stats.usageCount + 1,
      errorCount: this.stats.errorCount + 1,
      lastUsedAt: at,
      lastError: message ?? 'Unknown error',
      lastErrorAt: at
    };
  }

  resetStats(): void {
    this.stats = createInitialStats();
  }

  snapshot(): ProviderSnapshot {
    return Object.freeze({
      id: this.identity.id,
      name: this.configuration.name,
      apiBase: this.configuration.apiBase,
      model: this.configuration.model,
      apiFormat: this.configuration.apiFormat,
      priority: this.configuration.priority,
      isActive: this.configuration.isActive,
      capabilities: Object.freeze({ ...this.capabilities }),
      health: Object.freeze({ ...this.health }),
      stats: Object.freeze({ ...this.stats }),
      createdAt: this.identity.createdAt,
      updatedAt: this.updatedAt
    });
  }

  toRecord(): ProviderRecord {
    return {
      identity: this.identity,
      configuration: this.configuration,
      capabilities: { ...this.capabilities },
      health: { ...this.health },
      stats: { ...this.stats },
      updatedAt: this.updatedAt
    };
  }
}

export function supportsMediaType(capabilities: Readonly<ProviderCapabilities>, mediaType: MediaType): boolean {
  switch (mediaType) {
    case 'text':
      return capabilities.supportsText;
    case 'image':
      return capabilities.supportsImage;
    case 'video':
      return capabilities.supportsVideo;
    case 'gif':
      return capabilities.supportsGif;
  }
}
