import type { AnalysisResult } from '../../application/types';

export interface CacheEntry {
  readonly fingerprint: string;
  readonly result: AnalysisResult;
  readonly providerId: string;
  readonly createdAt: number;
  readonly ttlSeconds: number;
}

export function cacheEntryExpiresAt(entry: Pick<CacheEntry, 'createdAt' | 'ttlSeconds'>): number {
  return entry.createdAt + entry.ttlSeconds * 1000;
}

/** An entry stops being served at exactly `createdAt + ttl`. */
export function isCacheEntryExpired(entry: Pick<CacheEntry, 'createdAt' | 'ttlSeconds'>, now: number): boolean {
  return now >= cacheEntryExpiresAt(entry);
}
