/**
 * Read-through / write-invalidate composition of the SQLite store and the
 * partitioned LRU cache. Only single-entity lookups are cached; list queries
 * always go to the database.
 */

import { PartitionedCache, type PartitionCapacities } from '../cache/index.js';
import type {
  DeliveryMethod,
  DeliveryRecord,
  NewQuote,
  NewSchedule,
  Quote,
  Schedule,
  ScheduleUpdate,
} from '../schedules/types.js';
import type { DeliveryRecordQuery, EnsureDefaultResult, QuoteCastDatabase } from './db.js';

export interface EntityCacheMap {
  schedule: Schedule;
  quote: Quote;
}

export type EntityCache = PartitionedCache<EntityCacheMap>;

export interface CachedStoreOptions {
  /** Capacity of each partition (default 50) */
  capacity?: number;
  capacities?: PartitionCapacities<EntityCacheMap>;
}

// Cached entities are copied on the way in and out so callers never hold the
// cache's own objects
function copySchedule(schedule: Schedule): Schedule {
  return {
    ...schedule,
    categories: [...schedule.categories],
    activeDays: schedule.activeDays && [...schedule.activeDays],
  };
}

function copyQuote(quote: Quote): Quote {
  return { ...quote, categories: [...quote.categories] };
}

export class CachedStore {
  private db: QuoteCastDatabase;
  private cache: EntityCache;

  constructor(db: QuoteCastDatabase, options: CachedStoreOptions = {}) {
    this.db = db;
    this.cache = new PartitionedCache<EntityCacheMap>({
      defaultCapacity: options.capacity,
      capacities: options.capacities,
    });
  }

  getDatabase(): QuoteCastDatabase {
    return this.db;
  }

  getCache(): EntityCache {
    return this.cache;
  }

  // ============ Schedules ============

  getSchedule(id: string): Schedule | null {
    const cached = this.cache.get('schedule', id);
    if (cached) return copySchedule(cached);

    const schedule = this.db.getSchedule(id);
    if (schedule) {
      this.cache.put('schedule', id, copySchedule(schedule));
    }
    return schedule;
  }

  getAllSchedules(): Schedule[] {
    return this.db.getAllSchedules();
  }

  getEnabledSchedules(): Schedule[] {
    return this.db.getEnabledSchedules();
  }

  getSchedulesByChannel(channel: Exclude<DeliveryMethod, 'both'>): Schedule[] {
    return this.db.getSchedulesByChannel(channel);
  }

  getDefaultSchedule(): Schedule | null {
    return this.db.getDefaultSchedule();
  }

  addSchedule(schedule: NewSchedule, now?: number): Schedule {
    const created = this.db.addSchedule(schedule, now);
    if (created.isDefault) {
      // Other schedules lost their default flag
      this.cache.clear('schedule');
    }
    return created;
  }

  ensureDefaultSchedule(now?: number): EnsureDefaultResult {
    return this.db.ensureDefaultSchedule(now);
  }

  updateSchedule(id: string, updates: ScheduleUpdate, now?: number): Schedule | null {
    const updated = this.db.updateSchedule(id, updates, now);
    if (updates.isDefault === true) {
      this.cache.clear('schedule');
    } else {
      this.cache.remove('schedule', id);
    }
    return updated;
  }

  deleteSchedule(id: string): boolean {
    const deleted = this.db.deleteSchedule(id);
    this.cache.remove('schedule', id);
    return deleted;
  }

  claimDelivery(scheduleId: string, quoteId: string, deliveredAt: number, dayStart: number): boolean {
    const claimed = this.db.claimDelivery(scheduleId, quoteId, deliveredAt, dayStart);
    this.cache.remove('schedule', scheduleId);
    return claimed;
  }

  getScheduleCount(): number {
    return this.db.getScheduleCount();
  }

  getEnabledScheduleCount(): number {
    return this.db.getEnabledScheduleCount();
  }

  getMostRecentDeliveryDate(): number | null {
    return this.db.getMostRecentDeliveryDate();
  }

  // ============ Delivery history ============

  insertDeliveryRecord(scheduleId: string, quoteId: string, deliveredAt: number): DeliveryRecord {
    return this.db.insertDeliveryRecord(scheduleId, quoteId, deliveredAt);
  }

  deleteDeliveryRecord(id: number): boolean {
    return this.db.deleteDeliveryRecord(id);
  }

  pruneDeliveryRecords(cutoff: number): number {
    return this.db.pruneDeliveryRecords(cutoff);
  }

  getDeliveryRecords(query?: DeliveryRecordQuery): DeliveryRecord[] {
    return this.db.getDeliveryRecords(query);
  }

  // ============ Quotes ============

  getQuote(id: string): Quote | null {
    const cached = this.cache.get('quote', id);
    if (cached) return copyQuote(cached);

    const quote = this.db.getQuote(id);
    if (quote) {
      this.cache.put('quote', id, copyQuote(quote));
    }
    return quote;
  }

  getAllQuotes(): Quote[] {
    return this.db.getAllQuotes();
  }

  addQuote(quote: NewQuote, now?: number): Quote {
    const created = this.db.addQuote(quote, now);
    this.cache.remove('quote', created.id);
    return created;
  }

  setQuoteFavorite(id: string, isFavorite: boolean): boolean {
    const changed = this.db.setQuoteFavorite(id, isFavorite);
    this.cache.remove('quote', id);
    return changed;
  }

  deleteQuote(id: string): boolean {
    const deleted = this.db.deleteQuote(id);
    this.cache.remove('quote', id);
    return deleted;
  }

  close(): void {
    this.cache.clearAll();
    this.db.close();
  }
}
