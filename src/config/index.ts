export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type StorageConfig,
  type SchedulingConfig,
  type CacheConfig,
  type LoggingConfig,
} from './config.js';
