import type { DateTime } from 'luxon';

/** A zone-bound absolute instant. */
export type Instant = DateTime<true>;

/** Calendar date in ISO form, `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface TimezoneContext {
  readonly system: string;
  readonly configured?: string;
  readonly override?: string;
}
