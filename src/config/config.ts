import { z } from 'zod';
import dotenv from 'dotenv';
import { isValidTimezone, systemTimezone } from '../utils/calendar.js';
import { DEFAULT_CACHE_CAPACITY } from '../cache/index.js';
import { HISTORY_RETENTION_DAYS } from '../schedules/types.js';

// Load environment variables from .env file
dotenv.config();

// Storage configuration schema
const storageSchema = z.object({
  dbPath: z.string().min(1, 'Database path is required'),
});

// Scheduling configuration schema
const schedulingSchema = z.object({
  timezone: z.string().refine(isValidTimezone, (tz) => ({ message: `Unknown time zone: ${tz}` })),
  triggerIntervalMs: z.number().int().positive().default(60 * 60 * 1000),
  historyRetentionDays: z.number().int().positive().default(HISTORY_RETENTION_DAYS),
});

// Cache configuration schema
const cacheSchema = z.object({
  capacity: z.number().int().positive().default(DEFAULT_CACHE_CAPACITY),
});

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Main configuration schema
export const configSchema = z.object({
  storage: storageSchema,
  scheduling: schedulingSchema,
  cache: cacheSchema.default({ capacity: DEFAULT_CACHE_CAPACITY }),
  logging: loggingSchema.default({ level: 'info' }),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type StorageConfig = z.infer<typeof storageSchema>;
export type SchedulingConfig = z.infer<typeof schedulingSchema>;
export type CacheConfig = z.infer<typeof cacheSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

/**
 * Load configuration from environment variables
 * @returns Validated configuration object
 * @throws Error if configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    storage: {
      dbPath: env.QUOTECAST_DB_PATH || './data/quotecast.db',
    },
    scheduling: {
      timezone: env.QUOTECAST_TIMEZONE || systemTimezone(),
      triggerIntervalMs: env.QUOTECAST_TRIGGER_INTERVAL_MS
        ? Number(env.QUOTECAST_TRIGGER_INTERVAL_MS)
        : 60 * 60 * 1000,
      historyRetentionDays: HISTORY_RETENTION_DAYS,
    },
    cache: {
      capacity: env.QUOTECAST_CACHE_CAPACITY
        ? Number(env.QUOTECAST_CACHE_CAPACITY)
        : DEFAULT_CACHE_CAPACITY,
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

// Export a singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
