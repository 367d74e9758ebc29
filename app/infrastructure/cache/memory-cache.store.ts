import { injectable } from 'inversify';
import { isCacheEntryExpired, type CacheEntry } from '../../domain/entities';
import type { CacheStore } from '../../domain/repositories';

/**
 * Process-local store. Holds its own TTL bookkeeping since a plain Map has none.
 */
@injectable()
export class MemoryCacheStore implements CacheStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, CacheEntry>();

  async get(fingerprint: string): Promise<CacheEntry | null> {
    return this.entries.get(fingerprint) ?? null;
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.fingerprint, Object.freeze({ ...entry }));
  }

  async delete(fingerprint: string, onlyIfCreatedAt?: number): Promise<boolean> {
    const entry = this.entries.get(fingerprint);
    if (!entry || (onlyIfCreatedAt !== undefined && entry.createdAt !== onlyIfCreatedAt)) {
      return false;
    }
    return this.entries.delete(fingerprint);
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async approximateSizeBytes(): Promise<number> {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += Buffer.byteLength(JSON.stringify(entry), 'utf8');
    }
    return total;
  }

  async purgeExpired(now: number): Promise<number> {
    let purged = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (isCacheEntryExpired(entry, now)) {
        this.entries.delete(fingerprint);
        purged++;
      }
    }
    return purged;
  }
}
