/**
 * Quote Eligibility Selector
 *
 * Candidates come from the schedule's filters (favorites, categories). With a
 * recency window set, the exclusion set is the last delivered quote plus
 * whatever this schedule delivered inside the window; a window of 0 excludes
 * nothing. One eligible quote is picked uniformly.
 */

import { DAY_MS } from '../utils/calendar.js';
import type { DeliveryRecord, Quote, Schedule } from './types.js';

export type SelectorSchedule = Pick<
  Schedule,
  'id' | 'favoritesOnly' | 'categories' | 'excludeRecentDays' | 'lastDeliveredQuoteId'
>;

export interface SelectionOptions {
  /** epoch ms, defaults to Date.now() */
  now?: number;
  /** Returns a float in [0, 1), defaults to Math.random */
  random?: () => number;
}

export function candidateQuotes(schedule: SelectorSchedule, catalog: readonly Quote[]): Quote[] {
  const wanted = new Set(schedule.categories);
  return catalog.filter((quote) => {
    if (schedule.favoritesOnly && !quote.isFavorite) return false;
    if (wanted.size > 0 && !quote.categories.some((c) => wanted.has(c))) return false;
    return true;
  });
}

export function excludedQuoteIds(
  schedule: SelectorSchedule,
  history: readonly DeliveryRecord[],
  now: number
): Set<string> {
  const excluded = new Set<string>();
  if (schedule.excludeRecentDays > 0) {
    if (schedule.lastDeliveredQuoteId) {
      excluded.add(schedule.lastDeliveredQuoteId);
    }

    const windowStart = now - schedule.excludeRecentDays * DAY_MS;
    for (const record of history) {
      if (record.scheduleId === schedule.id && record.deliveredAt >= windowStart) {
        excluded.add(record.quoteId);
      }
    }
  }

  return excluded;
}

/** Candidates minus exclusions, in catalog order */
export function eligibleQuotes(
  schedule: SelectorSchedule,
  catalog: readonly Quote[],
  history: readonly DeliveryRecord[],
  now: number = Date.now()
): Quote[] {
  const excluded = excludedQuoteIds(schedule, history, now);
  return candidateQuotes(schedule, catalog).filter((quote) => !excluded.has(quote.id));
}

/**
 * Pick the next quote for a schedule, or null when nothing is eligible.
 */
export function selectNextQuote(
  schedule: SelectorSchedule,
  catalog: readonly Quote[],
  history: readonly DeliveryRecord[],
  options: SelectionOptions = {}
): string | null {
  const eligible = eligibleQuotes(schedule, catalog, history, options.now ?? Date.now());
  if (eligible.length === 0) return null;

  const random = options.random ?? Math.random;
  const index = Math.min(Math.floor(random() * eligible.length), eligible.length - 1);
  return eligible[index].id;
}
