export { QuoteCastDatabase, type DeliveryRecordQuery, type EnsureDefaultResult } from './db.js';
export {
  CachedStore,
  type CachedStoreOptions,
  type EntityCache,
  type EntityCacheMap,
} from './cached-store.js';
