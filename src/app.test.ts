import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import pino from 'pino';
import { createApp } from './app.js';
import type { Config } from './config/index.js';
import type { DeliveryChannels } from './delivery/index.js';

const logger = pino({ level: 'silent' });

const config: Config = {
  storage: { dbPath: ':memory:' },
  scheduling: { timezone: 'UTC', triggerIntervalMs: 60 * 60 * 1000, historyRetentionDays: 30 },
  cache: { capacity: 50 },
  logging: { level: 'silent' },
};

describe('App', () => {
  let channels: {
    notify: Mock<DeliveryChannels['notify']>;
    updateWidgets: Mock<DeliveryChannels['updateWidgets']>;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-06T09:30:00Z'));
    channels = {
      notify: vi.fn<DeliveryChannels['notify']>().mockResolvedValue(undefined),
      updateWidgets: vi.fn<DeliveryChannels['updateWidgets']>().mockResolvedValue(undefined),
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates the default schedule and delivers through it on start', async () => {
    const app = createApp({ config, logger, channels, random: () => 0 });
    app.getStore().addQuote({ id: 'q1', text: 'Begin.', author: 'A', categories: [], isFavorite: false });

    app.start();
    await app.stop();

    expect(channels.notify).toHaveBeenCalledTimes(1);
    expect(channels.updateWidgets).toHaveBeenCalledTimes(1);
    expect(channels.notify.mock.calls[0][0]).toMatchObject({ quote: { id: 'q1' }, deliveryMethod: 'both' });
  });

  it('runs the next batch after the configured interval', async () => {
    const app = createApp({ config, logger, channels, random: () => 0 });
    app.getStore().addQuote({ id: 'q1', text: 'Begin.', author: 'A', categories: [], isFavorite: false });
    app.getStore().addQuote({ id: 'q2', text: 'Again.', author: 'B', categories: [], isFavorite: false });

    app.start();
    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    await app.stop();

    // One delivery on the first day and one on the second
    expect(channels.notify).toHaveBeenCalledTimes(2);
  });

  it('stops only once', async () => {
    const app = createApp({ config, logger, channels });

    app.start();
    await app.stop();
    await expect(app.stop()).resolves.toBeUndefined();
  });
});
