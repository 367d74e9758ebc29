import { injectable, inject } from 'inversify';
import type { Collection, Filter } from 'mongodb';
import type { RequestLogEntry } from '../../domain/entities';
import type { RequestLogQuery, RequestLogRepository } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import { type RequestLogDocument, RequestLogCollectionName } from '../database/schemas';
import { toError, type ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';

@injectable()
export class MongoRequestLogRepository implements RequestLogRepository {
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) private readonly databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoRequestLogRepository');
  }

  private getCollection(): Collection<RequestLogDocument> {
    return this.databaseService.getDatabase().collection<RequestLogDocument>(RequestLogCollectionName);
  }

  async save(entry: RequestLogEntry): Promise<void> {
    try {
      await this.getCollection().insertOne({ ...entry, loggedAt: new Date(entry.createdAt) });
    } catch (error) {
      this.logger.error('Failed to save request log', toError(error), {
        providerId: entry.providerId,
        metadata: { requestType: entry.requestType }
      });
      throw error;
    }
  }

  async findRecent(query: RequestLogQuery): Promise<RequestLogEntry[]> {
    const filter: Filter<RequestLogDocument> = {
      ...(query.providerId ? { providerId: query.providerId } : {}),
      ...(query.requestType ? { requestType: query.requestType } : {})
    };

    try {
      const docs = await this.getCollection()
        .find(filter)
        .sort({ createdAt: -1 })
        .limit(query.limit)
        .toArray();

      return docs.map(({ _id, loggedAt, ...entry }) => entry);
    } catch (error) {
      this.logger.error('Failed to query request logs', toError(error), { metadata: { ...query } });
      throw error;
    }
  }

  async deleteOlderThan(timestamp: number): Promise<number> {
    try {
      const result = await this.getCollection().deleteMany({ createdAt: { $lt: timestamp } });
      return result.deletedCount;
    } catch (error) {
      this.logger.error('Failed to purge request logs', toError(error), { metadata: { timestamp } });
      throw error;
    }
  }
}
