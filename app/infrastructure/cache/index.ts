export { MemoryCacheStore } from './memory-cache.store';
export { MongoCacheStore } from './mongo-cache.store';
