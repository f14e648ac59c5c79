/**
 * Delivery Readiness Evaluator
 *
 * A schedule is ready when it is enabled, today is one of its active days,
 * its wall-clock time has passed in the configured zone and it has not
 * delivered yet on today's calendar date.
 */

import {
  addDays,
  calendarDateInZone,
  isSameCalendarDay,
  isoWeekday,
  zonedTimeToEpochMs,
  type CalendarDate,
} from '../utils/calendar.js';
import type { Schedule } from './types.js';

export type ReadinessSchedule = Pick<
  Schedule,
  'id' | 'isEnabled' | 'scheduledHour' | 'scheduledMinute' | 'lastDeliveryDate' | 'activeDays'
>;

export type NotReadyReason = 'disabled' | 'inactive_day' | 'not_yet_due' | 'delivered_today';

export type Readiness = { ready: true } | { ready: false; reason: NotReadyReason };

function isActiveOn(schedule: ReadinessSchedule, date: CalendarDate): boolean {
  return schedule.activeDays === null || schedule.activeDays.includes(isoWeekday(date));
}

/** Instant of the schedule's time of day on `date` in `timeZone` */
export function scheduledInstant(
  schedule: Pick<Schedule, 'scheduledHour' | 'scheduledMinute'>,
  date: CalendarDate,
  timeZone: string
): number {
  return zonedTimeToEpochMs(date, schedule.scheduledHour, schedule.scheduledMinute, timeZone);
}

export function evaluateReadiness(schedule: ReadinessSchedule, now: number, timeZone: string): Readiness {
  if (!schedule.isEnabled) {
    return { ready: false, reason: 'disabled' };
  }

  const today = calendarDateInZone(now, timeZone);
  if (!isActiveOn(schedule, today)) {
    return { ready: false, reason: 'inactive_day' };
  }

  if (now < scheduledInstant(schedule, today, timeZone)) {
    return { ready: false, reason: 'not_yet_due' };
  }

  if (schedule.lastDeliveryDate !== null && isSameCalendarDay(schedule.lastDeliveryDate, now, timeZone)) {
    return { ready: false, reason: 'delivered_today' };
  }

  return { ready: true };
}

/**
 * Ids of the schedules due at `now`, in input order
 */
export function readySchedules(
  schedules: readonly ReadinessSchedule[],
  now: number,
  timeZone: string
): string[] {
  return schedules
    .filter((schedule) => evaluateReadiness(schedule, now, timeZone).ready)
    .map((schedule) => schedule.id);
}

/**
 * Next instant at which the schedule will fire. Today's slot counts while
 * nothing was delivered today; an overdue slot yields `now`. Null for
 * disabled schedules or when no active day falls within the coming week.
 */
export function nextDeliveryTime(schedule: ReadinessSchedule, now: number, timeZone: string): number | null {
  if (!schedule.isEnabled) return null;

  const today = calendarDateInZone(now, timeZone);
  const deliveredToday =
    schedule.lastDeliveryDate !== null && isSameCalendarDay(schedule.lastDeliveryDate, now, timeZone);

  for (let offset = 0; offset <= 7; offset++) {
    const date = addDays(today, offset);
    if (!isActiveOn(schedule, date)) continue;

    const instant = scheduledInstant(schedule, date, timeZone);
    if (offset === 0) {
      if (deliveredToday) continue;
      return Math.max(instant, now);
    }
    return instant;
  }

  return null;
}
