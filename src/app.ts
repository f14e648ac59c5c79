/**
 * App
 * Wires the store, schedule service, delivery surface and trigger together
 */

import type { Logger } from 'pino';
import type { Config } from './config/index.js';
import { errorMessage } from './errors/index.js';
import { QuoteCastDatabase, CachedStore } from './storage/index.js';
import { ScheduleService } from './schedules/index.js';
import {
  DeliveryTrigger,
  createDeliverySurface,
  createLoggingChannels,
  type DeliveryChannels,
} from './delivery/index.js';

export interface AppOptions {
  config: Config;
  logger: Logger;
  /** Defaults to channels that write delivered quotes to the log */
  channels?: DeliveryChannels;
  random?: () => number;
}

export class App {
  private logger: Logger;
  private store: CachedStore;
  private service: ScheduleService;
  private trigger: DeliveryTrigger;
  private isRunning = false;
  private closed = false;

  constructor(options: AppOptions) {
    const { config } = options;
    this.logger = options.logger;

    this.store = new CachedStore(new QuoteCastDatabase(config.storage.dbPath), {
      capacity: config.cache.capacity,
    });
    this.service = new ScheduleService({
      store: this.store,
      surface: createDeliverySurface(options.channels ?? createLoggingChannels(options.logger)),
      logger: options.logger,
      timezone: config.scheduling.timezone,
      retentionDays: config.scheduling.historyRetentionDays,
      random: options.random,
    });
    this.trigger = new DeliveryTrigger({
      run: (now) => this.service.deliverDueQuotes(now),
      logger: options.logger,
      intervalMs: config.scheduling.triggerIntervalMs,
    });
  }

  getService(): ScheduleService {
    return this.service;
  }

  getStore(): CachedStore {
    return this.store;
  }

  getTrigger(): DeliveryTrigger {
    return this.trigger;
  }

  /**
   * Make sure a default schedule exists and start the periodic trigger
   */
  start(): void {
    if (this.isRunning) return;

    const ensured = this.service.ensureDefaultSchedule();
    if (!ensured.ok) {
      throw ensured.error;
    }

    this.trigger.start();
    this.isRunning = true;
    this.logger.info({ dbPath: this.store.getDatabase().getPath() }, 'quotecast started');
  }

  /**
   * Stop the trigger (letting an in-flight batch finish) and close the database
   */
  async stop(): Promise<void> {
    if (this.closed) return;

    if (this.isRunning) {
      await this.trigger.stop();
      this.isRunning = false;
    }
    this.store.close();
    this.closed = true;
    this.logger.info('quotecast stopped');
  }
}

export function createApp(options: AppOptions): App {
  return new App(options);
}

/**
 * Stop the app on SIGINT/SIGTERM and exit
 */
export function setupGracefulShutdown(app: App, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await app.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
