/**
 * Delivery Trigger
 * Runs a delivery batch on an interval; ticks never overlap
 */

import type { Logger } from 'pino';
import { errorMessage } from '../errors/errors.js';
import type { Result } from '../errors/result.js';
import type { DeliveryBatch } from '../schedules/schedule-service.js';

export type DeliveryRunner = (now?: number) => Promise<Result<DeliveryBatch>>;

export interface DeliveryTriggerOptions {
  run: DeliveryRunner;
  logger: Logger;
  /** Default 1 hour */
  intervalMs?: number;
}

export class DeliveryTrigger {
  private run: DeliveryRunner;
  private logger: Logger;
  private intervalMs: number;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private stopped = false;
  private ticking = false;
  private pendingTick = false;
  private currentTick: Promise<void> | null = null;

  constructor(options: DeliveryTriggerOptions) {
    this.run = options.run;
    this.logger = options.logger.child({ component: 'delivery-trigger' });
    this.intervalMs = options.intervalMs ?? 60 * 60 * 1000;
  }

  /**
   * Start the trigger: one run now, then one per interval
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('Delivery trigger already running');
      return;
    }

    this.isRunning = true;
    this.stopped = false;
    this.logger.info({ intervalMs: this.intervalMs }, 'Starting delivery trigger');

    this.schedule();
    this.intervalHandle = setInterval(() => this.schedule(), this.intervalMs);
  }

  /**
   * Stop the trigger. A batch already in flight finishes; deliveries it has
   * recorded stay recorded. Resolves once that batch is done.
   */
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    this.isRunning = false;
    this.stopped = true;
    this.pendingTick = false;
    if (this.currentTick) {
      await this.currentTick;
    }
    this.logger.info('Delivery trigger stopped');
  }

  running(): boolean {
    return this.isRunning;
  }

  /**
   * Run one batch. A call arriving while a batch runs is deferred until that
   * batch finishes; several such calls collapse into one.
   */
  async tick(): Promise<void> {
    if (this.ticking) {
      this.pendingTick = true;
      this.logger.debug('Deferring delivery tick, previous batch still running');
      return;
    }
    this.ticking = true;

    const current = this.execute();
    this.currentTick = current;
    try {
      await current;
    } finally {
      this.ticking = false;
      this.currentTick = null;

      if (this.pendingTick) {
        this.pendingTick = false;
        this.logger.debug('Running deferred delivery tick');
        setImmediate(() => {
          // stop() may have landed since the tick was queued
          if (!this.stopped) this.schedule();
        });
      }
    }
  }

  private schedule(): void {
    this.tick().catch((error: unknown) => {
      this.logger.error({ error: errorMessage(error) }, 'Delivery tick failed');
    });
  }

  private async execute(): Promise<void> {
    const result = await this.run();
    if (!result.ok) {
      this.logger.error({ error: result.error.message, kind: result.error.kind }, 'Delivery batch failed');
      return;
    }

    const { outcomes } = result.value;
    if (outcomes.length === 0) {
      this.logger.debug('No schedules due');
      return;
    }

    const counts: Record<string, number> = {};
    for (const outcome of outcomes) {
      counts[outcome.status] = (counts[outcome.status] ?? 0) + 1;
    }
    this.logger.info({ counts }, 'Delivery batch complete');
  }
}
