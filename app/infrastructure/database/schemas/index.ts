import type { IndexDescription } from 'mongodb';
import { ProviderCollectionName, ProviderIndexes } from './provider.schema';
import { RequestLogCollectionName, RequestLogIndexes } from './request-log.schema';
import { CacheEntryCollectionName, CacheEntryIndexes } from './cache-entry.schema';
import { SettingsCollectionName, SettingsIndexes } from './settings.schema';

export * from './provider.schema';
export * from './request-log.schema';
export * from './cache-entry.schema';
export * from './settings.schema';

export const CollectionIndexes: ReadonlyArray<{ collection: string; indexes: IndexDescription[] }> = [
  { collection: ProviderCollectionName, indexes: ProviderIndexes },
  { collection: RequestLogCollectionName, indexes: RequestLogIndexes },
  { collection: CacheEntryCollectionName, indexes: CacheEntryIndexes },
  { collection: SettingsCollectionName, indexes: SettingsIndexes }
];
