/**
 * Streak Calculator
 *
 * Pure functions turning activity timestamps (or YYYY-MM-DD strings) into
 * consecutive-day streak counts. A day counts once however many events fall
 * on it, and days are taken in the caller's time zone.
 */

import {
  calendarDateInZone,
  parseCalendarDate,
  toEpochDay,
  type CalendarDate,
} from '../utils/calendar.js';

export interface StreakSummary {
  current: number;
  longest: number;
  activeDays: number;
}

/** Calendar day an activity timestamp falls on in `timeZone` */
export function toActivityDate(timestamp: number, timeZone: string): CalendarDate {
  return calendarDateInZone(timestamp, timeZone);
}

function distinctEpochDays(timestamps: readonly number[], timeZone: string): number[] {
  const days = new Set<number>();
  for (const ts of timestamps) {
    if (!Number.isFinite(ts)) continue;
    days.add(toEpochDay(calendarDateInZone(ts, timeZone)));
  }
  return Array.from(days);
}

function parsedEpochDays(dates: readonly string[]): number[] {
  const days = new Set<number>();
  for (const value of dates) {
    const date = parseCalendarDate(value);
    if (date) days.add(toEpochDay(date));
  }
  return Array.from(days);
}

/**
 * Streak ending on the most recent day, as long as that day is today or
 * yesterday. A gap of two days or more since the last activity means 0.
 */
function currentFromEpochDays(days: number[], today: number): number {
  if (days.length === 0) return 0;

  const descending = [...days].sort((a, b) => b - a);
  const mostRecent = descending[0];
  if (today - mostRecent > 1) return 0;

  let streak = 1;
  let expected = mostRecent - 1;
  for (let i = 1; i < descending.length; i++) {
    if (descending[i] !== expected) break;
    streak++;
    expected--;
  }
  return streak;
}

function longestFromEpochDays(days: number[]): number {
  if (days.length === 0) return 0;

  const ascending = [...days].sort((a, b) => a - b);
  let longest = 1;
  let running = 1;
  for (let i = 1; i < ascending.length; i++) {
    if (ascending[i] - ascending[i - 1] === 1) {
      running++;
      longest = Math.max(longest, running);
    } else {
      running = 1;
    }
  }
  return longest;
}

export function currentStreak(
  timestamps: readonly number[],
  timeZone: string,
  now: number = Date.now()
): number {
  const today = toEpochDay(calendarDateInZone(now, timeZone));
  return currentFromEpochDays(distinctEpochDays(timestamps, timeZone), today);
}

export function longestStreak(timestamps: readonly number[], timeZone: string): number {
  return longestFromEpochDays(distinctEpochDays(timestamps, timeZone));
}

/**
 * Current streak over YYYY-MM-DD strings. Entries that do not parse are
 * dropped; `timeZone` only decides which day is "today".
 */
export function currentStreakFromDateStrings(
  dates: readonly string[],
  timeZone: string,
  now: number = Date.now()
): number {
  const today = toEpochDay(calendarDateInZone(now, timeZone));
  return currentFromEpochDays(parsedEpochDays(dates), today);
}

export function longestStreakFromDateStrings(dates: readonly string[]): number {
  return longestFromEpochDays(parsedEpochDays(dates));
}

/** Number of distinct calendar days with at least one activity */
export function uniqueDaysCount(timestamps: readonly number[], timeZone: string): number {
  return distinctEpochDays(timestamps, timeZone).length;
}

export function summarizeStreaks(
  timestamps: readonly number[],
  timeZone: string,
  now: number = Date.now()
): StreakSummary {
  const days = distinctEpochDays(timestamps, timeZone);
  const today = toEpochDay(calendarDateInZone(now, timeZone));
  return {
    current: currentFromEpochDays(days, today),
    longest: longestFromEpochDays(days),
    activeDays: days.length,
  };
}
