/**
 * Delivery History Tracker
 *
 * Appends a record per delivery, trims history past the retention window and
 * moves the schedule's last-delivery pointer. The pointer update is a
 * compare-and-swap against the start of the current calendar day, which makes
 * "at most one delivery per schedule per day" hold at the store even when two
 * trigger runs race.
 */

import type { Logger } from 'pino';
import { DAY_MS, startOfDayInZone } from '../utils/calendar.js';
import { alreadyDelivered, errorMessage, notFound } from '../errors/errors.js';
import { err, ok, tryCatch, type Result } from '../errors/result.js';
import { HISTORY_RETENTION_DAYS, type DeliveryRecord, type Schedule } from './types.js';
import type { DeliveryRecordQuery } from '../storage/db.js';

/** Store operations the tracker needs; CachedStore and QuoteCastDatabase both fit */
export interface DeliveryHistoryStore {
  getSchedule(id: string): Schedule | null;
  insertDeliveryRecord(scheduleId: string, quoteId: string, deliveredAt: number): DeliveryRecord;
  deleteDeliveryRecord(id: number): boolean;
  pruneDeliveryRecords(cutoff: number): number;
  getDeliveryRecords(query?: DeliveryRecordQuery): DeliveryRecord[];
  claimDelivery(scheduleId: string, quoteId: string, deliveredAt: number, dayStart: number): boolean;
}

export interface DeliveryHistoryOptions {
  store: DeliveryHistoryStore;
  logger: Logger;
  timezone: string;
  /** Default 30 */
  retentionDays?: number;
}

export interface DeliveryReceipt {
  record: DeliveryRecord;
  /** Records removed by the retention sweep (0 when the sweep failed) */
  prunedCount: number;
}

export class DeliveryHistoryTracker {
  private store: DeliveryHistoryStore;
  private logger: Logger;
  private timezone: string;
  private retentionDays: number;

  constructor(options: DeliveryHistoryOptions) {
    this.store = options.store;
    this.logger = options.logger.child({ component: 'delivery-history' });
    this.timezone = options.timezone;
    this.retentionDays = options.retentionDays ?? HISTORY_RETENTION_DAYS;
  }

  /**
   * Record that `quoteId` was delivered for `scheduleId` at `now`.
   */
  recordDelivery(scheduleId: string, quoteId: string, now: number = Date.now()): Result<DeliveryReceipt> {
    const existing = tryCatch(() => this.store.getSchedule(scheduleId), 'Failed to load schedule');
    if (!existing.ok) return existing;
    if (!existing.value) return err(notFound('Schedule', scheduleId));

    const inserted = tryCatch(
      () => this.store.insertDeliveryRecord(scheduleId, quoteId, now),
      'Failed to insert delivery record'
    );
    if (!inserted.ok) return inserted;
    const record = inserted.value;

    const prunedCount = this.prune(now);

    const claimed = tryCatch(
      () => this.store.claimDelivery(scheduleId, quoteId, now, startOfDayInZone(now, this.timezone)),
      'Failed to update last delivery'
    );
    if (!claimed.ok || !claimed.value) {
      this.discard(record);
    }
    if (!claimed.ok) return claimed;

    if (!claimed.value) {
      // Either another run delivered today or the schedule went away meanwhile
      const current = tryCatch(() => this.store.getSchedule(scheduleId), 'Failed to load schedule');
      if (current.ok && !current.value) return err(notFound('Schedule', scheduleId));
      this.logger.info({ scheduleId, quoteId }, 'Delivery already recorded today, discarding duplicate');
      return err(alreadyDelivered(scheduleId));
    }

    this.logger.debug({ scheduleId, quoteId, recordId: record.id, prunedCount }, 'Delivery recorded');
    return ok({ record, prunedCount });
  }

  /**
   * Remove history older than the retention window. Failures are logged and
   * reported as 0 removed.
   */
  prune(now: number = Date.now()): number {
    const cutoff = now - this.retentionDays * DAY_MS;
    try {
      const removed = this.store.pruneDeliveryRecords(cutoff);
      if (removed > 0) {
        this.logger.debug({ removed, cutoff }, 'Pruned delivery history');
      }
      return removed;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error), cutoff }, 'Delivery history pruning failed');
      return 0;
    }
  }

  /** Records of one schedule inside its recency window */
  recentHistory(schedule: Pick<Schedule, 'id' | 'excludeRecentDays'>, now: number = Date.now()): Result<DeliveryRecord[]> {
    if (schedule.excludeRecentDays <= 0) return ok([]);
    return tryCatch(
      () =>
        this.store.getDeliveryRecords({
          scheduleId: schedule.id,
          since: now - schedule.excludeRecentDays * DAY_MS,
        }),
      'Failed to read delivery history'
    );
  }

  /** Every retained record, oldest first */
  allHistory(): Result<DeliveryRecord[]> {
    return tryCatch(() => this.store.getDeliveryRecords(), 'Failed to read delivery history');
  }

  private discard(record: DeliveryRecord): void {
    try {
      this.store.deleteDeliveryRecord(record.id);
    } catch (error) {
      this.logger.error(
        { error: errorMessage(error), recordId: record.id, scheduleId: record.scheduleId },
        'Failed to remove duplicate delivery record'
      );
    }
  }
}
