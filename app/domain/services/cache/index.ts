export { computeFingerprint, normalizeContent, type FingerprintInput } from './fingerprint';
export {
  RequestCacheService,
  type IRequestCacheService,
  type CacheLookupResult,
  type CacheStats
} from './request-cache.service';
