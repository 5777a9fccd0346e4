import type { UnsupportedRecurrenceError } from '../../utils/errors.js';

export const WEEKDAY_TOKENS = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'] as const;

export type WeekdayToken = (typeof WEEKDAY_TOKENS)[number];

export interface DailyRecurrence {
  frequency: 'DAILY';
  interval: number;
}

export interface WeeklyRecurrence {
  frequency: 'WEEKLY';
  interval: number;
  /** Empty means the weekday of the event's start. */
  byDay: ReadonlySet<WeekdayToken>;
}

export type Recurrence = DailyRecurrence | WeeklyRecurrence;

export type TranslationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: UnsupportedRecurrenceError };

/** Microsoft Graph day names, in the same Monday-first order as WEEKDAY_TOKENS. */
export const GRAPH_DAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
] as const;

export type GraphDay = (typeof GRAPH_DAYS)[number];

export interface PatternPayload {
  pattern: {
    type: 'daily' | 'weekly';
    interval: number;
    daysOfWeek?: GraphDay[];
  };
  range: {
    type: 'noEnd';
    startDate?: string;
  };
}
