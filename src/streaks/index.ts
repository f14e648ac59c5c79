export {
  currentStreak,
  longestStreak,
  currentStreakFromDateStrings,
  longestStreakFromDateStrings,
  uniqueDaysCount,
  summarizeStreaks,
  toActivityDate,
  type StreakSummary,
} from './streak-calculator.js';
