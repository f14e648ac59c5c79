import { describe, it, expect } from 'vitest';
import {
  currentStreak,
  longestStreak,
  currentStreakFromDateStrings,
  longestStreakFromDateStrings,
  uniqueDaysCount,
  summarizeStreaks,
  toActivityDate,
} from './streak-calculator.js';

// ============ Test Helpers ============

/** Epoch ms for a UTC date at the given hour */
function at(date: string, hour = 12): number {
  return Date.parse(`${date}T${String(hour).padStart(2, '0')}:00:00Z`);
}

/** Fixed "now": 2024-03-01 (the day after a leap day) */
const NOW = at('2024-03-01');
const UTC = 'UTC';

// ============ currentStreak ============

describe('currentStreak', () => {
  it('returns 0 for no activity', () => {
    expect(currentStreak([], UTC, NOW)).toBe(0);
  });

  it('counts today, yesterday and the day before', () => {
    const stamps = [at('2024-03-01'), at('2024-02-29'), at('2024-02-28')];
    expect(currentStreak(stamps, UTC, NOW)).toBe(3);
  });

  it('is broken when the last activity is three days old', () => {
    expect(currentStreak([at('2024-02-27')], UTC, NOW)).toBe(0);
  });

  it('is broken when the last activity is two days old', () => {
    expect(currentStreak([at('2024-02-28')], UTC, NOW)).toBe(0);
  });

  it('survives while yesterday was the last active day', () => {
    expect(currentStreak([at('2024-02-29')], UTC, NOW)).toBe(1);
  });

  it('stops counting at the first gap', () => {
    const stamps = [at('2024-03-01'), at('2024-02-29'), at('2024-02-27'), at('2024-02-26')];
    expect(currentStreak(stamps, UTC, NOW)).toBe(2);
  });

  it('counts several events on one day once', () => {
    const stamps = [at('2024-03-01', 8), at('2024-03-01', 20), at('2024-03-01', 23), at('2024-02-29')];
    expect(currentStreak(stamps, UTC, NOW)).toBe(2);
  });

  it('does not depend on input order', () => {
    const ordered = [at('2024-02-27'), at('2024-02-28'), at('2024-02-29'), at('2024-03-01')];
    const shuffled = [ordered[2], ordered[0], ordered[3], ordered[1]];
    expect(currentStreak(shuffled, UTC, NOW)).toBe(currentStreak(ordered, UTC, NOW));
    expect(currentStreak(shuffled, UTC, NOW)).toBe(4);
  });

  it('continues across a year boundary', () => {
    const now = at('2025-01-01');
    const stamps = [at('2024-12-30'), at('2024-12-31'), at('2025-01-01')];
    expect(currentStreak(stamps, UTC, now)).toBe(3);
  });

  it('anchors days in the requested time zone', () => {
    // 02:00 UTC on March 1st is still February 29th in New York
    const stamps = [at('2024-03-01', 2)];
    const now = at('2024-03-02');

    expect(currentStreak(stamps, UTC, now)).toBe(1);
    expect(currentStreak(stamps, 'America/New_York', now)).toBe(0);
  });

  it('ignores non-finite timestamps', () => {
    expect(currentStreak([Number.NaN, at('2024-03-01')], UTC, NOW)).toBe(1);
  });
});

// ============ longestStreak ============

describe('longestStreak', () => {
  it('returns 0 for no activity', () => {
    expect(longestStreak([], UTC)).toBe(0);
  });

  it('returns 1 for a single day', () => {
    expect(longestStreak([at('2024-05-05')], UTC)).toBe(1);
  });

  it('finds the longest run among several', () => {
    const stamps = [
      at('2023-12-30'),
      at('2023-12-31'),
      at('2024-01-01'),
      at('2024-01-03'),
      at('2024-01-04'),
    ];
    expect(longestStreak(stamps, UTC)).toBe(3);
  });

  it('includes February 29th in a leap year', () => {
    const stamps = [at('2024-02-27'), at('2024-02-28'), at('2024-02-29'), at('2024-03-01')];
    expect(longestStreak(stamps, UTC)).toBe(4);
  });

  it('treats February 28th and March 1st as consecutive outside leap years', () => {
    const stamps = [at('2023-02-27'), at('2023-02-28'), at('2023-03-01')];
    expect(longestStreak(stamps, UTC)).toBe(3);
  });

  it('is invariant under same-day duplicates and reordering', () => {
    const base = [at('2024-06-01'), at('2024-06-02'), at('2024-06-04')];
    const noisy = [at('2024-06-04', 1), at('2024-06-02', 9), at('2024-06-01', 5), at('2024-06-02', 22)];
    expect(longestStreak(noisy, UTC)).toBe(longestStreak(base, UTC));
    expect(longestStreak(noisy, UTC)).toBe(2);
  });
});

// ============ Date string variants ============

describe('currentStreakFromDateStrings', () => {
  it('drops entries that do not parse', () => {
    const dates = ['2024-03-01', 'garbage', '2024-02-29', '2023-02-29', '', '2024-13-01'];
    expect(currentStreakFromDateStrings(dates, UTC, NOW)).toBe(2);
  });

  it('returns 0 when nothing parses', () => {
    expect(currentStreakFromDateStrings(['nope', '2024/03/01'], UTC, NOW)).toBe(0);
  });

  it('accepts unpadded month and day', () => {
    expect(currentStreakFromDateStrings(['2024-3-1', '2024-2-29'], UTC, NOW)).toBe(2);
  });
});

describe('longestStreakFromDateStrings', () => {
  it('computes the longest run over parsed dates', () => {
    const dates = ['2024-01-01', '2024-01-02', 'not-a-date', '2024-01-04'];
    expect(longestStreakFromDateStrings(dates)).toBe(2);
  });

  it('counts duplicate strings once', () => {
    expect(longestStreakFromDateStrings(['2024-01-01', '2024-01-01', '2024-01-02'])).toBe(2);
  });
});

// ============ Helpers ============

describe('uniqueDaysCount', () => {
  it('counts distinct calendar days', () => {
    const stamps = [at('2024-01-01', 1), at('2024-01-01', 23), at('2024-01-05')];
    expect(uniqueDaysCount(stamps, UTC)).toBe(2);
  });

  it('returns 0 for no activity', () => {
    expect(uniqueDaysCount([], UTC)).toBe(0);
  });
});

describe('toActivityDate', () => {
  it('maps an instant to its local calendar day', () => {
    expect(toActivityDate(at('2024-03-01', 2), 'America/New_York')).toEqual({
      year: 2024,
      month: 2,
      day: 29,
    });
  });
});

describe('summarizeStreaks', () => {
  it('reports current, longest and active days together', () => {
    const stamps = [
      at('2024-02-20'),
      at('2024-02-21'),
      at('2024-02-22'),
      at('2024-02-29'),
      at('2024-03-01'),
    ];
    expect(summarizeStreaks(stamps, UTC, NOW)).toEqual({ current: 2, longest: 3, activeDays: 5 });
  });
});
