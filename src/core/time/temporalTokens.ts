import { DateTime } from 'luxon';
import type { CalendarDate, TimeOfDay } from './types.js';
import { addDays, isCalendarDate } from './timezone.js';
import {
  AmbiguousTimeError,
  UnknownTimezoneError,
  UnrecognizedDateError,
  UnrecognizedTimeError,
} from '../../utils/errors.js';

// Luxon weekday numbers: Monday = 1 ... Sunday = 7
const WEEKDAYS: Record<string, number> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thur: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
};

const MERIDIEM_TIME = /^(\d{1,2})(?::(\d{2}))?\s*([ap])\.?m\.?$/i;
const CLOCK_TIME = /^(\d{1,2}):(\d{2})$/;
const BARE_HOUR = /^\d{1,2}$/;

/**
 * Resolves a relative date word against `now` as seen in `zone`.
 *
 * A bare weekday is the next occurrence strictly after today, so naming
 * today's weekday means a week from today. `this <weekday>` may be today.
 * `next <weekday>` is the bare result pushed one more week out.
 */
export function resolveRelativeDate(token: string, now: Date, zone: string): CalendarDate {
  const words = token.trim().toLowerCase().split(/\s+/);
  const today = DateTime.fromJSDate(now, { zone });
  if (!today.isValid) {
    throw new UnknownTimezoneError(zone);
  }
  const todayDate = today.toISODate();

  const [first, second, ...rest] = words;
  if (first === undefined || rest.length > 0) {
    throw new UnrecognizedDateError(token);
  }

  if (second === undefined) {
    switch (first) {
      case 'today':
        return todayDate;
      case 'tomorrow':
        return addDays(todayDate, 1);
      case 'yesterday':
        return addDays(todayDate, -1);
    }
    if (isCalendarDate(first)) {
      return first;
    }
    const weekday = WEEKDAYS[first];
    if (weekday !== undefined) {
      return addDays(todayDate, daysUntil(today.weekday, weekday) || 7);
    }
    throw new UnrecognizedDateError(token);
  }

  const weekday = WEEKDAYS[second];
  if (weekday === undefined) {
    throw new UnrecognizedDateError(token);
  }
  if (first === 'this') {
    return addDays(todayDate, daysUntil(today.weekday, weekday));
  }
  if (first === 'next') {
    return addDays(todayDate, (daysUntil(today.weekday, weekday) || 7) + 7);
  }
  throw new UnrecognizedDateError(token);
}

/** Parses `4pm`, `9:30am`, `16:00`, `noon`, `midnight`. A bare hour is ambiguous. */
export function resolveTimeOfDay(token: string): TimeOfDay {
  const text = token.trim().toLowerCase();

  if (text === 'noon') return { hour: 12, minute: 0 };
  if (text === 'midnight') return { hour: 0, minute: 0 };

  if (BARE_HOUR.test(text)) {
    throw new AmbiguousTimeError(token);
  }

  const meridiem = text.match(MERIDIEM_TIME);
  if (meridiem?.[1] && meridiem[3]) {
    const hour12 = parseInt(meridiem[1], 10);
    const minute = parseInt(meridiem[2] ?? '0', 10);
    if (hour12 < 1 || hour12 > 12 || minute > 59) {
      throw new UnrecognizedTimeError(token);
    }
    const isPm = meridiem[3] === 'p';
    return { hour: (hour12 % 12) + (isPm ? 12 : 0), minute };
  }

  const clock = text.match(CLOCK_TIME);
  if (clock?.[1] && clock[2]) {
    const hour = parseInt(clock[1], 10);
    const minute = parseInt(clock[2], 10);
    if (hour > 23 || minute > 59) {
      throw new UnrecognizedTimeError(token);
    }
    return { hour, minute };
  }

  throw new UnrecognizedTimeError(token);
}

export function looksLikeTime(token: string): boolean {
  const text = token.trim().toLowerCase();
  return (
    text === 'noon' ||
    text === 'midnight' ||
    BARE_HOUR.test(text) ||
    MERIDIEM_TIME.test(text) ||
    CLOCK_TIME.test(text)
  );
}

function daysUntil(from: number, to: number): number {
  return (to - from + 7) % 7;
}
