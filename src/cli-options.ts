/**
 * Parsers for command line option values. Each throws commander's
 * InvalidArgumentError so the message is reported against the option.
 */

import { InvalidArgumentError } from 'commander';
import { DELIVERY_METHODS, type DeliveryMethod } from './schedules/types.js';

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** HH:mm, 24-hour clock */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Expected a time as HH:mm.');
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw new InvalidArgumentError('Hour must be 0-23 and minute 0-59.');
  }
  return { hour, minute };
}

export function parseDeliveryMethod(value: string): DeliveryMethod {
  const method = DELIVERY_METHODS.find((m) => m === value);
  if (!method) {
    throw new InvalidArgumentError(`Expected one of: ${DELIVERY_METHODS.join(', ')}.`);
  }
  return method;
}

/** Comma-separated list, blanks dropped */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const WEEKDAY_NAMES = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun'];

/**
 * Weekdays as ISO numbers (1 = Monday) or three-letter names, e.g. "mon,wed,5"
 */
export function parseWeekdays(value: string): number[] {
  return parseList(value).map((item) => {
    const byName = WEEKDAY_NAMES.indexOf(item.toLowerCase());
    if (byName >= 0) return byName + 1;

    const day = Number(item);
    if (!Number.isInteger(day) || day < 1 || day > 7) {
      throw new InvalidArgumentError(`Unknown weekday: ${item}`);
    }
    return day;
  });
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** ISO-8601 instant to epoch ms */
export function parseInstant(value: string): number {
  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected an ISO-8601 date and time.');
  }
  return parsed;
}
