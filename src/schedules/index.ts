export * from './types.js';
export {
  candidateQuotes,
  eligibleQuotes,
  excludedQuoteIds,
  selectNextQuote,
  type SelectionOptions,
  type SelectorSchedule,
} from './quote-selector.js';
export {
  evaluateReadiness,
  nextDeliveryTime,
  readySchedules,
  scheduledInstant,
  type NotReadyReason,
  type Readiness,
  type ReadinessSchedule,
} from './readiness.js';
export {
  DeliveryHistoryTracker,
  type DeliveryHistoryOptions,
  type DeliveryHistoryStore,
  type DeliveryReceipt,
} from './delivery-history.js';
export {
  ScheduleService,
  type DeliveryBatch,
  type DeliveryOutcome,
  type DeliveryStatus,
  type ScheduleServiceOptions,
  type ScheduleStats,
} from './schedule-service.js';
