/**
 * Schedule Store Facade
 *
 * Every fallible operation returns a Result. deliverDueQuotes runs the
 * readiness -> selection -> history -> surface chain for each due schedule
 * and reports one outcome per schedule without stopping at the first failure.
 */

import type { Logger } from 'pino';
import type { ZodError } from 'zod';
import { errorMessage, notFound, validationFailure } from '../errors/errors.js';
import { err, ok, tryCatch, type Result } from '../errors/result.js';
import { summarizeStreaks, type StreakSummary } from '../streaks/index.js';
import type { CachedStore } from '../storage/cached-store.js';
import type { DeliverySurface } from '../delivery/surface.js';
import { DeliveryHistoryTracker } from './delivery-history.js';
import { selectNextQuote } from './quote-selector.js';
import { nextDeliveryTime, readySchedules } from './readiness.js';
import {
  scheduleInputSchema,
  scheduleUpdateSchema,
  type DeliveryMethod,
  type Quote,
  type Schedule,
  type ScheduleInput,
  type ScheduleUpdateInput,
} from './types.js';

export interface ScheduleServiceOptions {
  store: CachedStore;
  surface: DeliverySurface;
  logger: Logger;
  /** IANA zone that anchors "today" and the scheduled wall-clock times */
  timezone: string;
  retentionDays?: number;
  /** Random source for quote selection, defaults to Math.random */
  random?: () => number;
}

export type DeliveryStatus =
  | 'delivered'
  | 'no_eligible_quote'
  | 'already_delivered'
  | 'not_found'
  | 'failed';

export type DeliveryOutcome =
  | {
      scheduleId: string;
      status: 'delivered';
      quoteId: string;
      /** Set when the delivery was recorded but the surface rejected it */
      surfaceError?: string;
    }
  | { scheduleId: string; status: 'no_eligible_quote' | 'already_delivered' | 'not_found' }
  | { scheduleId: string; status: 'failed'; error: string };

export interface DeliveryBatch {
  /** epoch ms the batch was evaluated at */
  now: number;
  outcomes: DeliveryOutcome[];
}

export interface ScheduleStats {
  scheduleCount: number;
  enabledCount: number;
  /** epoch ms */
  lastDeliveryDate: number | null;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class ScheduleService {
  private store: CachedStore;
  private surface: DeliverySurface;
  private logger: Logger;
  private timezone: string;
  private random: () => number;
  private history: DeliveryHistoryTracker;

  constructor(options: ScheduleServiceOptions) {
    this.store = options.store;
    this.surface = options.surface;
    this.logger = options.logger.child({ component: 'schedule-service' });
    this.timezone = options.timezone;
    this.random = options.random ?? Math.random;
    this.history = new DeliveryHistoryTracker({
      store: options.store,
      logger: options.logger,
      timezone: options.timezone,
      retentionDays: options.retentionDays,
    });
  }

  // ============ CRUD ============

  createSchedule(input: ScheduleInput, now: number = Date.now()): Result<Schedule> {
    const parsed = scheduleInputSchema.safeParse(input);
    if (!parsed.success) {
      return err(validationFailure(`Invalid schedule: ${describeIssues(parsed.error)}`));
    }

    const created = tryCatch(() => this.store.addSchedule(parsed.data, now), 'Failed to create schedule');
    if (created.ok) {
      this.logger.info(
        { scheduleId: created.value.id, isDefault: created.value.isDefault },
        'Schedule created'
      );
    }
    return created;
  }

  updateSchedule(id: string, updates: ScheduleUpdateInput, now: number = Date.now()): Result<Schedule> {
    const parsed = scheduleUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      return err(validationFailure(`Invalid schedule update: ${describeIssues(parsed.error)}`));
    }

    const updated = tryCatch(
      () => this.store.updateSchedule(id, parsed.data, now),
      'Failed to update schedule'
    );
    if (!updated.ok) return updated;
    if (!updated.value) return err(notFound('Schedule', id));

    this.logger.debug({ scheduleId: id, fields: Object.keys(parsed.data) }, 'Schedule updated');
    return ok(updated.value);
  }

  deleteSchedule(id: string): Result<void> {
    const deleted = tryCatch(() => this.store.deleteSchedule(id), 'Failed to delete schedule');
    if (!deleted.ok) return deleted;
    if (!deleted.value) return err(notFound('Schedule', id));

    this.logger.info({ scheduleId: id }, 'Schedule deleted');
    return ok(undefined);
  }

  setEnabled(id: string, isEnabled: boolean, now?: number): Result<Schedule> {
    return this.updateSchedule(id, { isEnabled }, now);
  }

  setScheduledTime(id: string, hour: number, minute: number, now?: number): Result<Schedule> {
    return this.updateSchedule(id, { scheduledHour: hour, scheduledMinute: minute }, now);
  }

  setDeliveryMethod(id: string, deliveryMethod: DeliveryMethod, now?: number): Result<Schedule> {
    return this.updateSchedule(id, { deliveryMethod }, now);
  }

  // ============ Queries ============

  getSchedule(id: string): Result<Schedule> {
    const found = tryCatch(() => this.store.getSchedule(id), 'Failed to load schedule');
    if (!found.ok) return found;
    return found.value ? ok(found.value) : err(notFound('Schedule', id));
  }

  /**
   * The default schedule, created with safe defaults on first access
   */
  getDefaultSchedule(now?: number): Result<Schedule> {
    return this.ensureDefaultSchedule(now);
  }

  ensureDefaultSchedule(now: number = Date.now()): Result<Schedule> {
    const ensured = tryCatch(
      () => this.store.ensureDefaultSchedule(now),
      'Failed to ensure default schedule'
    );
    if (!ensured.ok) return ensured;

    if (ensured.value.created) {
      this.logger.info({ scheduleId: ensured.value.schedule.id }, 'Default schedule created');
    }
    return ok(ensured.value.schedule);
  }

  getAllSchedules(): Result<Schedule[]> {
    return tryCatch(() => this.store.getAllSchedules(), 'Failed to list schedules');
  }

  getEnabledSchedules(): Result<Schedule[]> {
    return tryCatch(() => this.store.getEnabledSchedules(), 'Failed to list enabled schedules');
  }

  getNotificationSchedules(): Result<Schedule[]> {
    return tryCatch(
      () => this.store.getSchedulesByChannel('notification'),
      'Failed to list notification schedules'
    );
  }

  getWidgetSchedules(): Result<Schedule[]> {
    return tryCatch(() => this.store.getSchedulesByChannel('widget'), 'Failed to list widget schedules');
  }

  /**
   * Preview of what the schedule would deliver next. Null when nothing is
   * eligible. Does not record anything.
   */
  getNextQuoteForSchedule(id: string, now: number = Date.now()): Result<Quote | null> {
    const schedule = this.getSchedule(id);
    if (!schedule.ok) return schedule;

    const history = this.history.recentHistory(schedule.value, now);
    if (!history.ok) return history;

    const catalog = tryCatch(() => this.store.getAllQuotes(), 'Failed to load quotes');
    if (!catalog.ok) return catalog;

    const quoteId = selectNextQuote(schedule.value, catalog.value, history.value, {
      now,
      random: this.random,
    });
    return ok(catalog.value.find((quote) => quote.id === quoteId) ?? null);
  }

  getNextDeliveryTime(id: string, now: number = Date.now()): Result<number | null> {
    const schedule = this.getSchedule(id);
    if (!schedule.ok) return schedule;
    return ok(nextDeliveryTime(schedule.value, now, this.timezone));
  }

  getStats(): Result<ScheduleStats> {
    return tryCatch(
      () => ({
        scheduleCount: this.store.getScheduleCount(),
        enabledCount: this.store.getEnabledScheduleCount(),
        lastDeliveryDate: this.store.getMostRecentDeliveryDate(),
      }),
      'Failed to read schedule stats'
    );
  }

  /**
   * Streaks of days with at least one delivery, over retained history
   */
  getDeliveryStreaks(now: number = Date.now()): Result<StreakSummary> {
    const records = this.history.allHistory();
    if (!records.ok) return records;
    return ok(
      summarizeStreaks(
        records.value.map((record) => record.deliveredAt),
        this.timezone,
        now
      )
    );
  }

  // ============ Delivery ============

  /**
   * Deliver a quote for every schedule that is due at `now`.
   * Safe to call more often than needed: a schedule delivers at most once per
   * calendar day.
   */
  async deliverDueQuotes(now: number = Date.now()): Promise<Result<DeliveryBatch>> {
    const schedules = this.getEnabledSchedules();
    if (!schedules.ok) return schedules;

    const readyIds = readySchedules(schedules.value, now, this.timezone);
    if (readyIds.length === 0) {
      return ok({ now, outcomes: [] });
    }

    const catalog = tryCatch(() => this.store.getAllQuotes(), 'Failed to load quotes');
    if (!catalog.ok) return catalog;

    this.logger.info({ count: readyIds.length }, 'Delivering due quotes');

    const byId = new Map(schedules.value.map((schedule) => [schedule.id, schedule]));
    const outcomes: DeliveryOutcome[] = [];

    for (const scheduleId of readyIds) {
      const schedule = byId.get(scheduleId);
      if (!schedule) {
        outcomes.push({ scheduleId, status: 'not_found' });
        continue;
      }
      outcomes.push(await this.deliverForSchedule(schedule, catalog.value, now));
    }

    return ok({ now, outcomes });
  }

  private async deliverForSchedule(
    schedule: Schedule,
    catalog: Quote[],
    now: number
  ): Promise<DeliveryOutcome> {
    const scheduleId = schedule.id;

    const history = this.history.recentHistory(schedule, now);
    if (!history.ok) {
      this.logger.error({ scheduleId, error: history.error.message }, 'Failed to read delivery history');
      return { scheduleId, status: 'failed', error: history.error.message };
    }

    const quoteId = selectNextQuote(schedule, catalog, history.value, { now, random: this.random });
    const quote = catalog.find((q) => q.id === quoteId);
    if (!quote) {
      this.logger.info({ scheduleId }, 'No eligible quote for schedule');
      return { scheduleId, status: 'no_eligible_quote' };
    }

    const receipt = this.history.recordDelivery(scheduleId, quote.id, now);
    if (!receipt.ok) {
      switch (receipt.error.kind) {
        case 'already_delivered':
          return { scheduleId, status: 'already_delivered' };
        case 'not_found':
          return { scheduleId, status: 'not_found' };
        default:
          this.logger.error({ scheduleId, error: receipt.error.message }, 'Failed to record delivery');
          return { scheduleId, status: 'failed', error: receipt.error.message };
      }
    }

    try {
      await this.surface.deliver({ quote, scheduleId, deliveryMethod: schedule.deliveryMethod });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ scheduleId, quoteId: quote.id, error: message }, 'Delivery surface failed');
      return { scheduleId, status: 'delivered', quoteId: quote.id, surfaceError: message };
    }

    this.logger.info(
      { scheduleId, quoteId: quote.id, deliveryMethod: schedule.deliveryMethod },
      'Quote delivered'
    );
    return { scheduleId, status: 'delivered', quoteId: quote.id };
  }
}
