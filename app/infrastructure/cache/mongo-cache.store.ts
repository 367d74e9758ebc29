import { injectable, inject } from 'inversify';
import type { Collection } from 'mongodb';
import { cacheEntryExpiresAt, type CacheEntry } from '../../domain/entities';
import type { CacheStore } from '../../domain/repositories';
import type { IDatabaseService } from '../database';
import { type CacheEntryDocument, CacheEntryCollectionName } from '../database/schemas';
import { toError, type ILogger } from '../../core/logging';
import { TYPES } from '../../core/container/types';

/**
 * MongoDB-backed store. The TTL index on `expireAt` removes entries in the
 * background, roughly once a minute, so reads still check freshness.
 */
@injectable()
export class MongoCacheStore implements CacheStore {
  readonly kind = 'mongodb' as const;
  private readonly logger: ILogger;

  constructor(
    @inject(TYPES.Logger) logger: ILogger,
    @inject(TYPES.DatabaseService) private readonly databaseService: IDatabaseService
  ) {
    this.logger = logger.createChild('MongoCacheStore');
  }

  private getCollection(): Collection<CacheEntryDocument> {
    return this.databaseService.getDatabase().collection<CacheEntryDocument>(CacheEntryCollectionName);
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    try {
      const doc = await this.getCollection().findOne({ fingerprint });
      if (!doc) {
        return null;
      }
      const { _id, expireAt, ...entry } = doc;
      return entry;
    } catch (error) {
      this.logger.error('Failed to read cache entry', toError(error), { metadata: { fingerprint } });
      throw error;
    }
  }

  async set(entry: CacheEntry): Promise<void> {
    try {
      await this.getCollection().replaceOne(
        { fingerprint: entry.fingerprint },
        { ...entry, expireAt: new Date(cacheEntryExpiresAt(entry)) },
        { upsert: true }
      );
    } catch (error) {
      this.logger.error('Failed to write cache entry', toError(error), { metadata: { fingerprint: entry.fingerprint } });
      throw error;
    }
  }

  async delete(fingerprint: string, onlyIfCreatedAt?: number): Promise<boolean> {
    const filter = onlyIfCreatedAt === undefined ? { fingerprint } : { fingerprint, createdAt: onlyIfCreatedAt };
    const result = await this.getCollection().deleteOne(filter);
    return result.deletedCount > 0;
  }

  async clear(): Promise<number> {
    const result = await this.getCollection().deleteMany({});
    return result.deletedCount;
  }

  async count(): Promise<number> {
    return this.getCollection().countDocuments();
  }

  async approximateSizeBytes(): Promise<number> {
    const [row] = await this.getCollection()
      .aggregate<{ size: number }>([
        { $group: { _id: null, size: { $sum: { $bsonSize: '$$ROOT' } } } }
      ])
      .toArray();
    return row ? row.size : 0;
  }

  async purgeExpired(now: number): Promise<number> {
    const result = await this.getCollection().deleteMany({ expireAt: { $lte: new Date(now) } });
    return result.deletedCount;
  }
}
