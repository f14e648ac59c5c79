export { createLogger } from './logger.js';
export {
  DAY_MS,
  addDays,
  calendarDateInZone,
  formatCalendarDate,
  fromEpochDay,
  isSameCalendarDay,
  isValidTimezone,
  isoWeekday,
  parseCalendarDate,
  startOfDayInZone,
  systemTimezone,
  toEpochDay,
  zonedTimeToEpochMs,
  type CalendarDate,
} from './calendar.js';
