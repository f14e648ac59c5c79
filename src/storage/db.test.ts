import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { QuoteCastDatabase } from './db.js';
import { scheduleInputSchema, type NewQuote } from '../schedules/types.js';

const T0 = Date.UTC(2024, 2, 1, 12, 0);

function quote(id: string, overrides: Partial<NewQuote> = {}): NewQuote {
  return {
    id,
    text: `Quote ${id}`,
    author: 'Anonymous',
    categories: [],
    isFavorite: false,
    ...overrides,
  };
}

describe('QuoteCastDatabase', () => {
  let db: QuoteCastDatabase;

  beforeEach(() => {
    db = new QuoteCastDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  describe('schedules', () => {
    it('round-trips every column', () => {
      const created = db.addSchedule(
        scheduleInputSchema.parse({
          scheduledHour: 7,
          scheduledMinute: 45,
          deliveryMethod: 'widget',
          favoritesOnly: true,
          categories: ['stoic', 'focus'],
          excludeRecentDays: 3,
          activeDays: [5, 1, 1],
        }),
        T0
      );

      expect(db.getSchedule(created.id)).toEqual({
        id: created.id,
        isEnabled: true,
        scheduledHour: 7,
        scheduledMinute: 45,
        deliveryMethod: 'widget',
        favoritesOnly: true,
        categories: ['stoic', 'focus'],
        excludeRecentDays: 3,
        activeDays: [1, 5],
        lastDeliveredQuoteId: null,
        lastDeliveryDate: null,
        isDefault: false,
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('returns null for an unknown id', () => {
      expect(db.getSchedule('missing')).toBeNull();
    });

    it('orders schedules by time of day', () => {
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 20 }), T0);
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 6, scheduledMinute: 30 }), T0);
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 6 }), T0);

      expect(db.getAllSchedules().map((s) => [s.scheduledHour, s.scheduledMinute])).toEqual([
        [6, 0],
        [6, 30],
        [20, 0],
      ]);
    });

    it('lists only enabled schedules', () => {
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8 }), T0);
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 9, isEnabled: false }), T0);

      expect(db.getEnabledSchedules().map((s) => s.scheduledHour)).toEqual([8]);
      expect(db.getScheduleCount()).toBe(2);
      expect(db.getEnabledScheduleCount()).toBe(1);
    });

    it('filters by delivery channel, counting both for either', () => {
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 1, deliveryMethod: 'notification' }), T0);
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 2, deliveryMethod: 'widget' }), T0);
      db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 3, deliveryMethod: 'both' }), T0);

      expect(db.getSchedulesByChannel('notification').map((s) => s.scheduledHour)).toEqual([1, 3]);
      expect(db.getSchedulesByChannel('widget').map((s) => s.scheduledHour)).toEqual([2, 3]);
    });

    it('keeps a single default when a new default is added', () => {
      const first = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8, isDefault: true }), T0);
      const second = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 9, isDefault: true }), T0 + 1);

      expect(db.getSchedule(first.id)?.isDefault).toBe(false);
      expect(db.getDefaultSchedule()?.id).toBe(second.id);
    });

    it('applies partial updates and leaves other fields alone', () => {
      const created = db.addSchedule(
        scheduleInputSchema.parse({ scheduledHour: 8, categories: ['calm'], activeDays: [1] }),
        T0
      );

      const updated = db.updateSchedule(created.id, { scheduledMinute: 15, activeDays: null }, T0 + 1000);

      expect(updated).toMatchObject({
        scheduledHour: 8,
        scheduledMinute: 15,
        categories: ['calm'],
        activeDays: null,
        updatedAt: T0 + 1000,
      });
      expect(db.getSchedule(created.id)).toEqual(updated);
    });

    it('moves the default flag on update', () => {
      const first = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8, isDefault: true }), T0);
      const second = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 9 }), T0);

      db.updateSchedule(second.id, { isDefault: true }, T0 + 1);

      expect(db.getSchedule(first.id)?.isDefault).toBe(false);
      expect(db.getSchedule(second.id)?.isDefault).toBe(true);
    });

    it('returns null when updating a missing schedule', () => {
      expect(db.updateSchedule('missing', { isEnabled: false })).toBeNull();
    });

    it('deletes a schedule and its history', () => {
      const created = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8 }), T0);
      db.insertDeliveryRecord(created.id, 'q1', T0);

      expect(db.deleteSchedule(created.id)).toBe(true);
      expect(db.getSchedule(created.id)).toBeNull();
      expect(db.getDeliveryRecords()).toEqual([]);
      expect(db.deleteSchedule(created.id)).toBe(false);
    });
  });

  describe('ensureDefaultSchedule', () => {
    it('creates the default once', () => {
      const first = db.ensureDefaultSchedule(T0);
      const second = db.ensureDefaultSchedule(T0 + 1);

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.schedule.id).toBe(first.schedule.id);
      expect(first.schedule).toMatchObject({
        isEnabled: true,
        scheduledHour: 9,
        scheduledMinute: 0,
        deliveryMethod: 'both',
        favoritesOnly: false,
        categories: [],
        excludeRecentDays: 7,
        activeDays: null,
        isDefault: true,
      });
      expect(db.getScheduleCount()).toBe(1);
    });

    it('returns an existing default instead of inserting', () => {
      const existing = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 6, isDefault: true }), T0);

      const result = db.ensureDefaultSchedule(T0);

      expect(result).toEqual({ schedule: existing, created: false });
    });
  });

  describe('claimDelivery', () => {
    it('claims once per day boundary', () => {
      const schedule = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8 }), T0);
      const dayStart = Date.UTC(2024, 2, 1);

      expect(db.claimDelivery(schedule.id, 'q1', T0, dayStart)).toBe(true);
      expect(db.claimDelivery(schedule.id, 'q2', T0 + 60_000, dayStart)).toBe(false);

      expect(db.getSchedule(schedule.id)).toMatchObject({
        lastDeliveredQuoteId: 'q1',
        lastDeliveryDate: T0,
      });
    });

    it('claims again on the next day', () => {
      const schedule = db.addSchedule(scheduleInputSchema.parse({ scheduledHour: 8 }), T0);
      db.claimDelivery(schedule.id, 'q1', T0, Date.UTC(2024, 2, 1));

      const nextDay = T0 + 24 * 60 * 60 * 1000;
      expect(db.claimDelivery(schedule.id, 'q2', nextDay, Date.UTC(2024, 2, 2))).toBe(true);
      expect(db.getMostRecentDeliveryDate()).toBe(nextDay);
    });

    it('fails for a missing schedule', () => {
      expect(db.claimDelivery('missing', 'q1', T0, 0)).toBe(false);
    });
  });

  describe('delivery records', () => {
    it('assigns increasing ids and filters by schedule and time', () => {
      const a = db.insertDeliveryRecord('s1', 'q1', T0);
      const b = db.insertDeliveryRecord('s1', 'q2', T0 + 1000);
      db.insertDeliveryRecord('s2', 'q3', T0 + 2000);

      expect(b.id).toBeGreaterThan(a.id);
      expect(db.getDeliveryRecords({ scheduleId: 's1', since: T0 + 500 })).toEqual([b]);
      expect(db.getDeliveryRecords().map((r) => r.quoteId)).toEqual(['q1', 'q2', 'q3']);
    });

    it('prunes records older than the cutoff', () => {
      db.insertDeliveryRecord('s1', 'old', T0 - 1);
      const kept = db.insertDeliveryRecord('s1', 'kept', T0);

      expect(db.pruneDeliveryRecords(T0)).toBe(1);
      expect(db.getDeliveryRecords()).toEqual([kept]);
    });

    it('deletes a single record', () => {
      const record = db.insertDeliveryRecord('s1', 'q1', T0);
      expect(db.deleteDeliveryRecord(record.id)).toBe(true);
      expect(db.deleteDeliveryRecord(record.id)).toBe(false);
    });
  });

  describe('quotes', () => {
    it('stores and reads quotes', () => {
      const created = db.addQuote(quote('q1', { categories: ['focus'], isFavorite: true }), T0);

      expect(db.getQuote('q1')).toEqual(created);
      expect(created).toEqual({
        id: 'q1',
        text: 'Quote q1',
        author: 'Anonymous',
        categories: ['focus'],
        isFavorite: true,
        createdAt: T0,
      });
    });

    it('generates an id when none is given', () => {
      const created = db.addQuote({ text: 'Hello', author: 'A', categories: [], isFavorite: false });
      expect(created.id.length).toBeGreaterThan(0);
      expect(db.getQuoteCount()).toBe(1);
    });

    it('toggles favorites and filters by them', () => {
      db.addQuote(quote('q1'), T0);
      db.addQuote(quote('q2'), T0);

      expect(db.setQuoteFavorite('q2', true)).toBe(true);
      expect(db.setQuoteFavorite('missing', true)).toBe(false);
      expect(db.getFavoriteQuotes().map((q) => q.id)).toEqual(['q2']);
    });

    it('deletes quotes', () => {
      db.addQuote(quote('q1'), T0);
      expect(db.deleteQuote('q1')).toBe(true);
      expect(db.getQuote('q1')).toBeNull();
      expect(db.getAllQuotes()).toEqual([]);
    });
  });
});
