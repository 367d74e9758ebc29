import { injectable, inject } from 'inversify';
import type { Collection, Db, WithId } from 'mongodb';
import {
  RESPONSE_TIME_EMA_ALPHA,
  createInitialStats,
  type HealthCheckResult,
  type ProviderCapabilities,
  type ProviderConfiguration,
  type ProviderRecord
} from '../../domain/entities';
import type { ProviderRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import { type ProviderDocument, ProviderCollectionName } from '../database/schemas';
import { toError, type ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';

@injectable()
export class MongoProviderRepository implements ProviderRepository {
  private readonly logger: ILogger;
  private readonly databaseService: IDatabaseService;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoProviderRepository');
    this.databaseService = databaseService;
  }

  private getCollection(): Collection<ProviderDocument> {
    const db: Db = this.databaseService.getDatabase();
    return db.collection<ProviderDocument>(ProviderCollectionName);
  }

  private documentToRecord(doc: WithId<ProviderDocument>): ProviderRecord {
    const { _id, ...record } = doc;
    return record;
  }

  async findAll(): Promise<ProviderRecord[]> {
    try {
      const docs = await this.getCollection().find({}).sort({ 'configuration.priority': 1 }).toArray();
      return docs.map(doc => this.documentToRecord(doc));
    } catch (error) {
      this.logger.error('Failed to find all providers', toError(error));
      throw error;
    }
  }

  async findById(id: string): Promise<ProviderRecord | null> {
    try {
      const doc = await this.getCollection().findOne({ 'identity.id': id });
      return doc ? this.documentToRecord(doc) : null;
    } catch (error) {
      this.logger.error('Failed to find provider by ID', toError(error), { providerId: id });
      throw error;
    }
  }

  async findByName(name: string): Promise<ProviderRecord | null> {
    try {
      const doc = await this.getCollection().findOne({ 'configuration.name': name });
      return doc ? this.documentToRecord(doc) : null;
    } catch (error) {
      this.logger.error('Failed to find provider by name', toError(error), { metadata: { name } });
      throw error;
    }
  }

  async save(record: ProviderRecord): Promise<void> {
    try {
      await this.getCollection().replaceOne(
        { 'identity.id': record.identity.id },
        record,
        { upsert: true }
      );
    } catch (error) {
      this.logger.error('Failed to save provider', toError(error), { providerId: record.identity.id });
      throw error;
    }
  }

  async updateConfiguration(
    id: string,
    configuration: ProviderConfiguration,
    capabilities: ProviderCapabilities,
    updatedAt: number
  ): Promise<void> {
    try {
      await this.getCollection().updateOne(
        { 'identity.id': id },
        { $set: { configuration, capabilities, updatedAt } }
      );
    } catch (error) {
      this.logger.error('Failed to update provider configuration', toError(error), { providerId: id });
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    try {
      const result = await this.getCollection().deleteOne({ 'identity.id': id });
      return result.deletedCount > 0;
    } catch (error) {
      this.logger.error('Failed to delete provider', toError(error), { providerId: id });
      throw error;
    }
  }

  async recordHealthCheck(id: string, result: HealthCheckResult): Promise<void> {
    try {
      const base = {
        'health.status': result.isSuccess ? 'available' as const : 'unavailable' as const,
        'health.lastCheckedAt': result.checkedAt,
        'health.lastResponseTimeMs': result.responseTimeMs
      };
      const increments = {
        'health.checkCount': 1,
        'health.failureCount': result.isSuccess ? 0 : 1
      };

      await this.getCollection().updateOne(
        { 'identity.id': id },
        result.isSuccess || result.errorMessage === undefined
          ? { $set: base, $inc: increments, $unset: { 'health.lastError': '' } }
          : { $set: { ...base, 'health.lastError': result.errorMessage }, $inc: increments }
      );
    } catch (error) {
      this.logger.error('Failed to record provider health check', toError(error), { providerId: id });
      throw error;
    }
  }

  async recordSuccess(id: string, elapsedMs: number, at: number): Promise<void> {
    try {
      // Two pipeline stages: the average must read the success count before it is incremented.
      await this.getCollection().updateOne({ 'identity.id': id }, [
        {
          $set: {
            'stats.avgResponseTimeMs': {
              $cond: [
                { $eq: ['$stats.successCount', 0] },
                elapsedMs,
                {
                  $add: [
                    '$stats.avgResponseTimeMs',
                    { $multiply: [RESPONSE_TIME_EMA_ALPHA, { $subtract: [elapsedMs, '$stats.avgResponseTimeMs'] }] }
                  ]
                }
              ]
            }
          }
        },
        {
          $set: {
            'stats.usageCount': { $add: ['$stats.usageCount', 1] },
            'stats.successCount': { $add: ['$stats.successCount', 1] },
            'stats.lastUsedAt': at
          }
        }
      ]);
    } catch (error) {
      this.logger.error('Failed to record provider success', toError(error), { providerId: id });
      throw error;
    }
  }

  async recordError(id: string, message: string | undefined, at: number): Promise<void> {
    try {
      await this.getCollection().updateOne(
        { 'identity.id': id },
        {
          $inc: { 'stats.usageCount': 1, 'stats.errorCount': 1 },
          $set: { 'stats.lastUsedAt': at, 'stats.lastErrorAt': at, 'stats.lastError': message ?? 'Unknown error' }
        }
      );
    } catch (error) {
      this.logger.error('Failed to record provider error', toError(error), { providerId: id });
      throw error;
    }
  }

  async resetStats(id?: string): Promise<number> {
    try {
      const filter = id ? { 'identity.id': id } : {};
      const result = await this.getCollection().updateMany(filter, { $set: { stats: createInitialStats() } });
      return result.matchedCount;
    } catch (error) {
      this.logger.error('Failed to reset provider stats', toError(error), { providerId: id });
      throw error;
    }
  }
}
