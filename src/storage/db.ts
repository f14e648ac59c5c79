/**
 * SQLite Database Layer for quotecast
 *
 * Provides persistent storage with:
 * - Delivery schedules (time of day, filters, last-delivery pointer)
 * - Append-only delivery history used for exclusion windows
 * - The quote catalog the selector reads from
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  DEFAULT_SCHEDULE,
  DELIVERY_METHODS,
  type DeliveryMethod,
  type DeliveryRecord,
  type NewQuote,
  type NewSchedule,
  type Quote,
  type Schedule,
  type ScheduleUpdate,
} from '../schedules/types.js';

// ============ Row shapes ============

interface ScheduleRow {
  id: string;
  is_enabled: number;
  scheduled_hour: number;
  scheduled_minute: number;
  delivery_method: string;
  favorites_only: number;
  categories: string;
  exclude_recent_days: number;
  active_days: string | null;
  last_delivered_quote_id: string | null;
  last_delivery_date: number | null;
  is_default: number;
  created_at: number;
  updated_at: number;
}

interface DeliveryRecordRow {
  id: number;
  quote_id: string;
  schedule_id: string;
  delivered_at: number;
}

interface QuoteRow {
  id: string;
  text: string;
  author: string;
  categories: string;
  is_favorite: number;
  created_at: number;
}

interface CountRow {
  count: number;
}

const deliveryMethodColumn = z.enum(DELIVERY_METHODS).catch('both');

/** Parse a JSON array column, keeping only entries of the expected type */
function parseStringList(text: string | null): string[] {
  if (!text) return [];
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}

function parseNumberList(text: string | null): number[] | null {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : null;
  } catch {
    return null;
  }
}

function applyScheduleUpdate(current: Schedule, updates: ScheduleUpdate, now: number): Schedule {
  return {
    ...current,
    isEnabled: updates.isEnabled ?? current.isEnabled,
    scheduledHour: updates.scheduledHour ?? current.scheduledHour,
    scheduledMinute: updates.scheduledMinute ?? current.scheduledMinute,
    deliveryMethod: updates.deliveryMethod ?? current.deliveryMethod,
    favoritesOnly: updates.favoritesOnly ?? current.favoritesOnly,
    categories: updates.categories ?? current.categories,
    excludeRecentDays: updates.excludeRecentDays ?? current.excludeRecentDays,
    // null is a real value here (every day)
    activeDays: updates.activeDays === undefined ? current.activeDays : updates.activeDays,
    isDefault: updates.isDefault ?? current.isDefault,
    updatedAt: now,
  };
}

export interface DeliveryRecordQuery {
  scheduleId?: string;
  /** Only records delivered at or after this instant (epoch ms) */
  since?: number;
}

export interface EnsureDefaultResult {
  schedule: Schedule;
  created: boolean;
}

/**
 * SQLite Database Manager
 */
export class QuoteCastDatabase {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    // Enable WAL mode so the trigger and foreground edits can share the file
    this.db.pragma('journal_mode = WAL');

    this.initializeSchema();
  }

  /**
   * Initialize database schema
   */
  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schedules (
        id TEXT PRIMARY KEY,
        is_enabled INTEGER NOT NULL DEFAULT 1,
        scheduled_hour INTEGER NOT NULL,
        scheduled_minute INTEGER NOT NULL,
        delivery_method TEXT NOT NULL DEFAULT 'both',   -- notification|widget|both
        favorites_only INTEGER NOT NULL DEFAULT 0,
        categories TEXT NOT NULL DEFAULT '[]',          -- JSON array of strings
        exclude_recent_days INTEGER NOT NULL DEFAULT 7,
        active_days TEXT,                               -- JSON array of ISO weekdays, NULL = every day
        last_delivered_quote_id TEXT,
        last_delivery_date INTEGER,                     -- epoch ms
        is_default INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_schedules_enabled ON schedules(is_enabled);

      CREATE TABLE IF NOT EXISTS delivery_records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        quote_id TEXT NOT NULL,
        schedule_id TEXT NOT NULL,
        delivered_at INTEGER NOT NULL                   -- epoch ms
      );

      CREATE INDEX IF NOT EXISTS idx_delivery_records_schedule
        ON delivery_records(schedule_id, delivered_at);
      CREATE INDEX IF NOT EXISTS idx_delivery_records_delivered_at
        ON delivery_records(delivered_at);

      CREATE TABLE IF NOT EXISTS quotes (
        id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        author TEXT NOT NULL,
        categories TEXT NOT NULL DEFAULT '[]',          -- JSON array of strings
        is_favorite INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_quotes_favorite ON quotes(is_favorite);
    `);
  }

  getPath(): string {
    return this.dbPath;
  }

  // ============ Schedules ============

  /**
   * Insert a schedule. Marking it default clears the flag on every other
   * schedule in the same transaction.
   */
  addSchedule(schedule: NewSchedule, now: number = Date.now()): Schedule {
    const created: Schedule = {
      ...schedule,
      id: nanoid(),
      lastDeliveredQuoteId: null,
      lastDeliveryDate: null,
      createdAt: now,
      updatedAt: now,
    };

    const insert = this.db.transaction(() => {
      if (created.isDefault) {
        this.clearDefaultFlag(now);
      }
      this.insertScheduleRow(created);
    });
    insert.immediate();

    return created;
  }

  getSchedule(id: string): Schedule | null {
    const row = this.db
      .prepare<[string], ScheduleRow>('SELECT * FROM schedules WHERE id = ?')
      .get(id);
    return row ? this.rowToSchedule(row) : null;
  }

  getAllSchedules(): Schedule[] {
    return this.db
      .prepare<[], ScheduleRow>(
        'SELECT * FROM schedules ORDER BY scheduled_hour ASC, scheduled_minute ASC, created_at ASC'
      )
      .all()
      .map((row) => this.rowToSchedule(row));
  }

  getEnabledSchedules(): Schedule[] {
    return this.db
      .prepare<[], ScheduleRow>(`
        SELECT * FROM schedules
        WHERE is_enabled = 1
        ORDER BY scheduled_hour ASC, scheduled_minute ASC, created_at ASC
      `)
      .all()
      .map((row) => this.rowToSchedule(row));
  }

  /**
   * Enabled schedules delivering through the given channel ('both' matches either)
   */
  getSchedulesByChannel(channel: Exclude<DeliveryMethod, 'both'>): Schedule[] {
    return this.db
      .prepare<[string], ScheduleRow>(`
        SELECT * FROM schedules
        WHERE is_enabled = 1 AND (delivery_method = ? OR delivery_method = 'both')
        ORDER BY scheduled_hour ASC, scheduled_minute ASC, created_at ASC
      `)
      .all(channel)
      .map((row) => this.rowToSchedule(row));
  }

  getDefaultSchedule(): Schedule | null {
    const row = this.db
      .prepare<[], ScheduleRow>(
        'SELECT * FROM schedules WHERE is_default = 1 ORDER BY created_at ASC LIMIT 1'
      )
      .get();
    return row ? this.rowToSchedule(row) : null;
  }

  /**
   * Insert-if-absent for the default schedule. The lookup and the insert run
   * in one IMMEDIATE transaction, so two callers cannot both create one.
   */
  ensureDefaultSchedule(now: number = Date.now()): EnsureDefaultResult {
    const ensure = this.db.transaction((): EnsureDefaultResult => {
      const existing = this.getDefaultSchedule();
      if (existing) {
        return { schedule: existing, created: false };
      }
      const schedule: Schedule = {
        ...DEFAULT_SCHEDULE,
        categories: [...DEFAULT_SCHEDULE.categories],
        id: nanoid(),
        lastDeliveredQuoteId: null,
        lastDeliveryDate: null,
        createdAt: now,
        updatedAt: now,
      };
      this.insertScheduleRow(schedule);
      return { schedule, created: true };
    });
    return ensure.immediate();
  }

  /**
   * Apply a partial update. Returns null when the schedule does not exist.
   */
  updateSchedule(id: string, updates: ScheduleUpdate, now: number = Date.now()): Schedule | null {
    const update = this.db.transaction((): Schedule | null => {
      const current = this.getSchedule(id);
      if (!current) return null;

      const next = applyScheduleUpdate(current, updates, now);

      if (updates.isDefault === true) {
        this.clearDefaultFlag(now);
      }

      this.db
        .prepare(`
          UPDATE schedules SET
            is_enabled = ?,
            scheduled_hour = ?,
            scheduled_minute = ?,
            delivery_method = ?,
            favorites_only = ?,
            categories = ?,
            exclude_recent_days = ?,
            active_days = ?,
            is_default = ?,
            updated_at = ?
          WHERE id = ?
        `)
        .run(
          next.isEnabled ? 1 : 0,
          next.scheduledHour,
          next.scheduledMinute,
          next.deliveryMethod,
          next.favoritesOnly ? 1 : 0,
          JSON.stringify(next.categories),
          next.excludeRecentDays,
          next.activeDays ? JSON.stringify(next.activeDays) : null,
          next.isDefault ? 1 : 0,
          now,
          id
        );

      return next;
    });
    return update.immediate();
  }

  /**
   * Delete a schedule together with its delivery history
   */
  deleteSchedule(id: string): boolean {
    const remove = this.db.transaction((): boolean => {
      this.db.prepare('DELETE FROM delivery_records WHERE schedule_id = ?').run(id);
      const result = this.db.prepare('DELETE FROM schedules WHERE id = ?').run(id);
      return result.changes > 0;
    });
    return remove.immediate();
  }

  /**
   * Move the last-delivery pointer, but only if the schedule has not already
   * delivered on or after `dayStart`. Returns false when another run got there
   * first or the schedule is gone.
   */
  claimDelivery(scheduleId: string, quoteId: string, deliveredAt: number, dayStart: number): boolean {
    const result = this.db
      .prepare(`
        UPDATE schedules
        SET last_delivered_quote_id = ?, last_delivery_date = ?, updated_at = ?
        WHERE id = ? AND (last_delivery_date IS NULL OR last_delivery_date < ?)
      `)
      .run(quoteId, deliveredAt, deliveredAt, scheduleId, dayStart);
    return result.changes > 0;
  }

  getScheduleCount(): number {
    return this.count('SELECT COUNT(*) AS count FROM schedules');
  }

  getEnabledScheduleCount(): number {
    return this.count('SELECT COUNT(*) AS count FROM schedules WHERE is_enabled = 1');
  }

  getMostRecentDeliveryDate(): number | null {
    const row = this.db
      .prepare<[], { latest: number | null }>(
        'SELECT MAX(last_delivery_date) AS latest FROM schedules WHERE last_delivery_date IS NOT NULL'
      )
      .get();
    return row?.latest ?? null;
  }

  private clearDefaultFlag(now: number): void {
    this.db
      .prepare('UPDATE schedules SET is_default = 0, updated_at = ? WHERE is_default = 1')
      .run(now);
  }

  private insertScheduleRow(schedule: Schedule): void {
    this.db
      .prepare(`
        INSERT INTO schedules (
          id, is_enabled, scheduled_hour, scheduled_minute, delivery_method,
          favorites_only, categories, exclude_recent_days, active_days,
          last_delivered_quote_id, last_delivery_date, is_default,
          created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        schedule.id,
        schedule.isEnabled ? 1 : 0,
        schedule.scheduledHour,
        schedule.scheduledMinute,
        schedule.deliveryMethod,
        schedule.favoritesOnly ? 1 : 0,
        JSON.stringify(schedule.categories),
        schedule.excludeRecentDays,
        schedule.activeDays ? JSON.stringify(schedule.activeDays) : null,
        schedule.lastDeliveredQuoteId,
        schedule.lastDeliveryDate,
        schedule.isDefault ? 1 : 0,
        schedule.createdAt,
        schedule.updatedAt
      );
  }

  // ============ Delivery history ============

  insertDeliveryRecord(scheduleId: string, quoteId: string, deliveredAt: number): DeliveryRecord {
    const result = this.db
      .prepare('INSERT INTO delivery_records (quote_id, schedule_id, delivered_at) VALUES (?, ?, ?)')
      .run(quoteId, scheduleId, deliveredAt);
    return { id: Number(result.lastInsertRowid), quoteId, scheduleId, deliveredAt };
  }

  deleteDeliveryRecord(id: number): boolean {
    return this.db.prepare('DELETE FROM delivery_records WHERE id = ?').run(id).changes > 0;
  }

  /**
   * Bulk delete of history older than `cutoff` (epoch ms). Returns rows removed.
   */
  pruneDeliveryRecords(cutoff: number): number {
    return this.db.prepare('DELETE FROM delivery_records WHERE delivered_at < ?').run(cutoff).changes;
  }

  getDeliveryRecords(query: DeliveryRecordQuery = {}): DeliveryRecord[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.scheduleId !== undefined) {
      conditions.push('schedule_id = ?');
      params.push(query.scheduleId);
    }
    if (query.since !== undefined) {
      conditions.push('delivered_at >= ?');
      params.push(query.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.db
      .prepare<Array<string | number>, DeliveryRecordRow>(
        `SELECT * FROM delivery_records ${where} ORDER BY delivered_at ASC, id ASC`
      )
      .all(...params)
      .map((row) => ({
        id: row.id,
        quoteId: row.quote_id,
        scheduleId: row.schedule_id,
        deliveredAt: row.delivered_at,
      }));
  }

  // ============ Quotes ============

  addQuote(quote: NewQuote, now: number = Date.now()): Quote {
    const created: Quote = {
      id: quote.id ?? nanoid(),
      text: quote.text,
      author: quote.author,
      categories: [...quote.categories],
      isFavorite: quote.isFavorite,
      createdAt: now,
    };
    this.db
      .prepare(`
        INSERT INTO quotes (id, text, author, categories, is_favorite, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(
        created.id,
        created.text,
        created.author,
        JSON.stringify(created.categories),
        created.isFavorite ? 1 : 0,
        created.createdAt
      );
    return created;
  }

  getQuote(id: string): Quote | null {
    const row = this.db.prepare<[string], QuoteRow>('SELECT * FROM quotes WHERE id = ?').get(id);
    return row ? this.rowToQuote(row) : null;
  }

  getAllQuotes(): Quote[] {
    return this.db
      .prepare<[], QuoteRow>('SELECT * FROM quotes ORDER BY created_at DESC, id ASC')
      .all()
      .map((row) => this.rowToQuote(row));
  }

  getFavoriteQuotes(): Quote[] {
    return this.db
      .prepare<[], QuoteRow>('SELECT * FROM quotes WHERE is_favorite = 1 ORDER BY created_at DESC, id ASC')
      .all()
      .map((row) => this.rowToQuote(row));
  }

  setQuoteFavorite(id: string, isFavorite: boolean): boolean {
    return (
      this.db.prepare('UPDATE quotes SET is_favorite = ? WHERE id = ?').run(isFavorite ? 1 : 0, id)
        .changes > 0
    );
  }

  deleteQuote(id: string): boolean {
    return this.db.prepare('DELETE FROM quotes WHERE id = ?').run(id).changes > 0;
  }

  getQuoteCount(): number {
    return this.count('SELECT COUNT(*) AS count FROM quotes');
  }

  // ============ Row mapping ============

  private rowToSchedule(row: ScheduleRow): Schedule {
    return {
      id: row.id,
      isEnabled: row.is_enabled === 1,
      scheduledHour: row.scheduled_hour,
      scheduledMinute: row.scheduled_minute,
      deliveryMethod: deliveryMethodColumn.parse(row.delivery_method),
      favoritesOnly: row.favorites_only === 1,
      categories: parseStringList(row.categories),
      excludeRecentDays: row.exclude_recent_days,
      activeDays: parseNumberList(row.active_days),
      lastDeliveredQuoteId: row.last_delivered_quote_id,
      lastDeliveryDate: row.last_delivery_date,
      isDefault: row.is_default === 1,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private rowToQuote(row: QuoteRow): Quote {
    return {
      id: row.id,
      text: row.text,
      author: row.author,
      categories: parseStringList(row.categories),
      isFavorite: row.is_favorite === 1,
      createdAt: row.created_at,
    };
  }

  private count(sql: string): number {
    const row = this.db.prepare<[], CountRow>(sql).get();
    return row?.count ?? 0;
  }

  // ============ Lifecycle ============

  close(): void {
    this.db.close();
  }
}
