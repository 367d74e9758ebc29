import type {
  HealthCheckResult,
  ProviderCapabilities,
  ProviderConfiguration,
  ProviderRecord
} from '../entities';

/**
 * Durable provider table. Health and usage writes are single atomic updates so
 * concurrent writers never lose increments.
 */
export interface ProviderRepository {
  findAll(): Promise<ProviderRecord[]>;
  findById(id: string): Promise<ProviderRecord | null>;
  findByName(name: string): Promise<ProviderRecord | null>;
  save(record: ProviderRecord): Promise<void>;
  updateConfiguration(
    id: string,
    configuration: ProviderConfiguration,
    capabilities: ProviderCapabilities,
    updatedAt: number
  ): Promise<void>;
  delete(id: string): Promise<boolean>;
  recordHealthCheck(id: string, result: HealthCheckResult): Promise<void>;
  recordSuccess(id: string, elapsedMs: number, at: number): Promise<void>;
  recordError(id: string, message: string | undefined, at: number): Promise<void>;
  resetStats(id?: string): Promise<number>;
}
