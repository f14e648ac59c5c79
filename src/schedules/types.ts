/**
 * Schedule, delivery record and quote types
 */

import { z } from 'zod';

export const DELIVERY_METHODS = ['notification', 'widget', 'both'] as const;

export type DeliveryMethod = (typeof DELIVERY_METHODS)[number];

/** How many days of delivery history are kept */
export const HISTORY_RETENTION_DAYS = 30;

/**
 * A user-configured delivery policy
 */
export interface Schedule {
  id: string;
  isEnabled: boolean;
  /** Local wall-clock hour, 0-23 */
  scheduledHour: number;
  /** Local wall-clock minute, 0-59 */
  scheduledMinute: number;
  deliveryMethod: DeliveryMethod;
  favoritesOnly: boolean;
  /** Empty means no category filter */
  categories: string[];
  /** 0 disables recency exclusion */
  excludeRecentDays: number;
  /** ISO weekdays (1 = Monday, 7 = Sunday); null means every day */
  activeDays: number[] | null;
  lastDeliveredQuoteId: string | null;
  /** epoch ms */
  lastDeliveryDate: number | null;
  isDefault: boolean;
  createdAt: number;
  updatedAt: number;
}

/**
 * One fulfilled delivery
 */
export interface DeliveryRecord {
  id: number;
  quoteId: string;
  scheduleId: string;
  /** epoch ms */
  deliveredAt: number;
}

/**
 * Quote as seen by the delivery engine (read-only)
 */
export interface Quote {
  id: string;
  text: string;
  author: string;
  categories: string[];
  isFavorite: boolean;
  createdAt: number;
}

export type NewQuote = Omit<Quote, 'id' | 'createdAt'> & { id?: string };

// ============ Input validation ============

const activeDaysSchema = z
  .array(z.number().int().min(1).max(7))
  .transform((days) => Array.from(new Set(days)).sort((a, b) => a - b))
  .nullable();

const categoriesSchema = z
  .array(z.string().trim().min(1))
  .transform((categories) => Array.from(new Set(categories)));

export const scheduleInputSchema = z.object({
  isEnabled: z.boolean().default(true),
  scheduledHour: z.number().int().min(0).max(23),
  scheduledMinute: z.number().int().min(0).max(59).default(0),
  deliveryMethod: z.enum(DELIVERY_METHODS).default('both'),
  favoritesOnly: z.boolean().default(false),
  categories: categoriesSchema.default([]),
  excludeRecentDays: z.number().int().min(0).default(7),
  activeDays: activeDaysSchema.default(null),
  isDefault: z.boolean().default(false),
});

export const scheduleUpdateSchema = z
  .object({
    isEnabled: z.boolean(),
    scheduledHour: z.number().int().min(0).max(23),
    scheduledMinute: z.number().int().min(0).max(59),
    deliveryMethod: z.enum(DELIVERY_METHODS),
    favoritesOnly: z.boolean(),
    categories: categoriesSchema,
    excludeRecentDays: z.number().int().min(0),
    activeDays: activeDaysSchema,
    isDefault: z.boolean(),
  })
  .partial()
  .strict();

export type ScheduleInput = z.input<typeof scheduleInputSchema>;
export type NewSchedule = z.output<typeof scheduleInputSchema>;
export type ScheduleUpdateInput = z.input<typeof scheduleUpdateSchema>;
export type ScheduleUpdate = z.output<typeof scheduleUpdateSchema>;

/** Settings of the schedule created when none is marked default */
export const DEFAULT_SCHEDULE: NewSchedule = {
  isEnabled: true,
  scheduledHour: 9,
  scheduledMinute: 0,
  deliveryMethod: 'both',
  favoritesOnly: false,
  categories: [],
  excludeRecentDays: 7,
  activeDays: null,
  isDefault: true,
};

// ============ Helpers ============

export function deliversByNotification(method: DeliveryMethod): boolean {
  return method === 'notification' || method === 'both';
}

export function deliversByWidget(method: DeliveryMethod): boolean {
  return method === 'widget' || method === 'both';
}

/** HH:mm */
export function formatScheduleTime(schedule: Pick<Schedule, 'scheduledHour' | 'scheduledMinute'>): string {
  const h = String(schedule.scheduledHour).padStart(2, '0');
  const m = String(schedule.scheduledMinute).padStart(2, '0');
  return `${h}:${m}`;
}
