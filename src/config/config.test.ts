import { describe, it, expect, afterEach, vi } from 'vitest';
import { getConfig, loadConfig, resetConfig } from './config.js';
import { systemTimezone } from '../utils/calendar.js';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({ QUOTECAST_TIMEZONE: 'UTC' })).toEqual({
      storage: { dbPath: './data/quotecast.db' },
      scheduling: { timezone: 'UTC', triggerIntervalMs: 3_600_000, historyRetentionDays: 30 },
      cache: { capacity: 50 },
      logging: { level: 'info' },
    });
  });

  it('defaults the time zone to the host zone', () => {
    expect(loadConfig({}).scheduling.timezone).toBe(systemTimezone());
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      QUOTECAST_DB_PATH: '/tmp/quotes.db',
      QUOTECAST_TIMEZONE: 'Europe/Berlin',
      QUOTECAST_TRIGGER_INTERVAL_MS: '900000',
      QUOTECAST_CACHE_CAPACITY: '200',
      LOG_LEVEL: 'debug',
    });

    expect(config.storage.dbPath).toBe('/tmp/quotes.db');
    expect(config.scheduling.timezone).toBe('Europe/Berlin');
    expect(config.scheduling.triggerIntervalMs).toBe(900_000);
    expect(config.cache.capacity).toBe(200);
    expect(config.logging.level).toBe('debug');
  });

  it('lists every invalid setting', () => {
    expect(() =>
      loadConfig({ QUOTECAST_TIMEZONE: 'Mars/Olympus', QUOTECAST_CACHE_CAPACITY: '0' })
    ).toThrow(
      'Configuration validation failed:\n' +
        'scheduling.timezone: Unknown time zone: Mars/Olympus\n' +
        'cache.capacity: Number must be greater than 0'
    );
  });

  it('rejects a non-numeric interval', () => {
    expect(() => loadConfig({ QUOTECAST_TIMEZONE: 'UTC', QUOTECAST_TRIGGER_INTERVAL_MS: 'hourly' })).toThrow(
      /scheduling\.triggerIntervalMs/
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ QUOTECAST_TIMEZONE: 'UTC', LOG_LEVEL: 'verbose' })).toThrow(/logging\.level/);
  });
});

describe('getConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('caches until reset', () => {
    vi.stubEnv('QUOTECAST_TIMEZONE', 'UTC');
    vi.stubEnv('QUOTECAST_CACHE_CAPACITY', '10');
    vi.stubEnv('QUOTECAST_TRIGGER_INTERVAL_MS', '');
    vi.stubEnv('LOG_LEVEL', 'warn');

    const first = getConfig();
    expect(getConfig()).toBe(first);
    expect(first.cache.capacity).toBe(10);

    resetConfig();
    vi.stubEnv('QUOTECAST_CACHE_CAPACITY', '20');
    expect(getConfig().cache.capacity).toBe(20);
  });
});
