export {
  LruCache,
  PartitionedCache,
  DEFAULT_CACHE_CAPACITY,
  type CacheStats,
  type LruCacheOptions,
  type PartitionCapacities,
  type PartitionedCacheOptions,
} from './cache.js';
