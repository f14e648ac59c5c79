/**
 * Time-zone anchored calendar dates.
 *
 * Day arithmetic goes through epoch days (days since 1970-01-01 on the
 * proleptic Gregorian calendar), so month ends, year ends and leap days need
 * no special casing. Instants are only ever mapped to a calendar date through
 * Intl in the target zone.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function zoneFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

interface ZonedParts extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

function zonedParts(timestamp: number, timeZone: string): ZonedParts {
  const parts = zoneFormatter(timeZone).formatToParts(new Date(timestamp));
  const getPart = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find(p => p.type === type)?.value ?? '', 10);

  const result: ZonedParts = {
    year: getPart('year'),
    month: getPart('month'),
    day: getPart('day'),
    // Some ICU builds still print '24' for midnight
    hour: getPart('hour') % 24,
    minute: getPart('minute'),
    second: getPart('second'),
  };
  if (Object.values(result).some(Number.isNaN)) {
    throw new Error(`Unable to resolve date parts for ${timestamp} in ${timeZone}`);
  }
  return result;
}

/** IANA zone of the host process */
export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** True when the runtime knows the given IANA zone */
export function isValidTimezone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function calendarDateInZone(timestamp: number, timeZone: string): CalendarDate {
  const { year, month, day } = zonedParts(timestamp, timeZone);
  return { year, month, day };
}

function utcMidnight(date: CalendarDate): number {
  const d = new Date(0);
  // setUTCFullYear keeps years below 100 literal, Date.UTC would map them to 19xx
  d.setUTCFullYear(date.year, date.month - 1, date.day);
  return d.getTime();
}

export function toEpochDay(date: CalendarDate): number {
  return Math.round(utcMidnight(date) / DAY_MS);
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const d = new Date(epochDay * DAY_MS);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** ISO weekday, 1 = Monday through 7 = Sunday */
export function isoWeekday(date: CalendarDate): number {
  const weekday = new Date(utcMidnight(date)).getUTCDay();
  return weekday === 0 ? 7 : weekday;
}

export function formatCalendarDate(date: CalendarDate): string {
  const y = String(date.year).padStart(4, '0');
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Parse a YYYY-MM-DD string. Returns null for anything malformed or for a
 * date the calendar does not have (2023-02-29, 2024-13-01).
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = /^(\d{1,4})-(\d{1,2})-(\d{1,2})$/.exec(value.trim());
  if (!match) return null;

  const date: CalendarDate = {
    year: parseInt(match[1], 10),
    month: parseInt(match[2], 10),
    day: parseInt(match[3], 10),
  };
  if (date.month < 1 || date.month > 12 || date.day < 1) return null;

  const roundTrip = fromEpochDay(toEpochDay(date));
  if (roundTrip.month !== date.month || roundTrip.day !== date.day) return null;
  return date;
}

/** Offset of the zone from UTC at the given instant, in ms */
function zoneOffsetMs(timestamp: number, timeZone: string): number {
  const p = zonedParts(timestamp, timeZone);
  const asUtc = utcMidnight(p) + p.hour * 3_600_000 + p.minute * 60_000 + p.second * 1000;
  const truncated = timestamp - (((timestamp % 1000) + 1000) % 1000);
  return asUtc - truncated;
}

/**
 * Instant at which the wall clock in `timeZone` shows `hour:minute` on `date`.
 * A wall time repeated by a DST fall-back resolves to its first occurrence;
 * one skipped by a spring-forward resolves to the same distance past the jump.
 */
export function zonedTimeToEpochMs(
  date: CalendarDate,
  hour: number,
  minute: number,
  timeZone: string
): number {
  const wallAsUtc = utcMidnight(date) + hour * 3_600_000 + minute * 60_000;
  const offsetBefore = zoneOffsetMs(wallAsUtc - DAY_MS, timeZone);
  const offsetAfter = zoneOffsetMs(wallAsUtc + DAY_MS, timeZone);
  if (offsetBefore === offsetAfter) {
    return wallAsUtc - offsetBefore;
  }

  const early = wallAsUtc - offsetBefore;
  const late = wallAsUtc - offsetAfter;
  const earlyValid = zoneOffsetMs(early, timeZone) === offsetBefore;
  const lateValid = zoneOffsetMs(late, timeZone) === offsetAfter;

  if (earlyValid && lateValid) return Math.min(early, late);
  if (earlyValid) return early;
  if (lateValid) return late;
  // Skipped wall time
  return early;
}

/** First instant of the calendar day containing `timestamp` in `timeZone` */
export function startOfDayInZone(timestamp: number, timeZone: string): number {
  return zonedTimeToEpochMs(calendarDateInZone(timestamp, timeZone), 0, 0, timeZone);
}

export function isSameCalendarDay(a: number, b: number, timeZone: string): boolean {
  return (
    toEpochDay(calendarDateInZone(a, timeZone)) === toEpochDay(calendarDateInZone(b, timeZone))
  );
}
