import type { IndexDescription } from 'mongodb';
import type { CacheEntry } from '../../../domain/entities';

export interface CacheEntryDocument extends CacheEntry {
  expireAt: Date;
}

export const CacheEntryCollectionName = 'cacheEntries';

export const CacheEntryIndexes: IndexDescription[] = [
  { key: { fingerprint: 1 }, unique: true },
  { key: { expireAt: 1 }, expireAfterSeconds: 0 }
];
