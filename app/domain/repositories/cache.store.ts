import type { CacheEntry } from '../entities';

/**
 * Backing store for the request cache. Stores may keep expired entries around;
 * the cache service decides freshness on every read.
 */
export interface CacheStore {
  readonly kind: 'memory' | 'mongodb';
  get(fingerprint: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  /** With `onlyIfCreatedAt`, removes the entry only if it is still that exact write. */
  delete(fingerprint: string, onlyIfCreatedAt?: number): Promise<boolean>;
  clear(): Promise<number>;
  count(): Promise<number>;
  approximateSizeBytes(): Promise<number>;
  purgeExpired(now: number): Promise<number>;
}
