import type { CalendarDate, Instant } from '../time/types.js';
import type { PatternPayload, Recurrence } from '../recurrence/types.js';

export interface EventFields {
  readonly id?: string;
  subject: string;
  location?: string;
  body?: string;
  attendees: ReadonlySet<string>;
  /** Minutes before start. */
  reminder?: number;
  recurrence?: Recurrence;
}

export interface TimedEvent extends EventFields {
  allDay: false;
  start: Instant;
  end: Instant;
}

/** Dates only: `start` inclusive, `end` exclusive. */
export interface AllDayEvent extends EventFields {
  allDay: true;
  start: CalendarDate;
  end: CalendarDate;
}

export type CalendarEvent = TimedEvent | AllDayEvent;

export type EventTiming =
  | Pick<TimedEvent, 'allDay' | 'start' | 'end'>
  | Pick<AllDayEvent, 'allDay' | 'start' | 'end'>;

export interface WireDateTime {
  dateTime: string;
  timeZone: string;
}

/** Microsoft Graph event resource, restricted to the fields the model carries. */
export interface WireEvent {
  id?: string;
  subject: string;
  body?: { contentType: 'text'; content: string };
  location?: { displayName: string };
  start: WireDateTime;
  end: WireDateTime;
  isAllDay: boolean;
  attendees: Array<{ emailAddress: { address: string }; type: 'required' }>;
  isReminderOn: boolean;
  reminderMinutesBeforeStart?: number;
  recurrence?: PatternPayload;
}

/**
 * Body of a PATCH. Optional fields the event no longer has are sent as `null`,
 * since a missing key leaves the stored value unchanged.
 */
export type WirePatch = Omit<WireEvent, 'id' | 'body' | 'location' | 'recurrence'> & {
  body: WireEvent['body'] | null;
  location: WireEvent['location'] | null;
  recurrence: WireEvent['recurrence'] | null;
};
