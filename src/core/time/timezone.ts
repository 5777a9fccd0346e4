import { DateTime, Info } from 'luxon';
import type { CalendarDate, Instant, TimeOfDay, TimezoneContext } from './types.js';
import {
  AmbiguousLocalizationError,
  InvalidEventError,
  InvalidLocalTimeError,
  UnknownTimezoneError,
  UnrecognizedDateError,
} from '../../utils/errors.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const EXPLICIT_OFFSET = /T.*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0 };

export function createTimezoneContext(zones: {
  system: string;
  configured?: string;
  override?: string;
}): TimezoneContext {
  for (const zone of [zones.system, zones.configured, zones.override]) {
    if (zone !== undefined && !Info.isValidIANAZone(zone)) {
      throw new UnknownTimezoneError(zone);
    }
  }
  return Object.freeze({ ...zones });
}

/** Host timezone as reported by Intl; UTC when the host reports nothing usable. */
export function detectSystemTimezone(): string {
  const zone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  return zone && Info.isValidIANAZone(zone) ? zone : 'UTC';
}

export function resolveZone(ctx: TimezoneContext): string {
  return ctx.override ?? ctx.configured ?? ctx.system;
}

export function isCalendarDate(value: string): value is CalendarDate {
  return ISO_DATE.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const parsed = DateTime.fromISO(date, { zone: 'utc' });
  if (!ISO_DATE.test(date) || !parsed.isValid) {
    throw new UnrecognizedDateError(date);
  }
  return parsed.plus({ days }).toISODate();
}

/** Re-expresses an instant in another zone; the instant itself is unchanged. */
export function inZone(instant: Instant, zone: string): Instant {
  const moved = DateTime.fromMillis(instant.toMillis(), { zone });
  if (!moved.isValid) {
    throw new UnknownTimezoneError(zone);
  }
  return moved;
}

/**
 * Promotes a wall-clock date and time to an instant in the resolved zone.
 * Uses the zone's offset for that specific date; wall times skipped by a DST
 * transition are rejected.
 */
export function localizeDateTime(
  date: CalendarDate,
  time: TimeOfDay,
  ctx: TimezoneContext,
  second = 0,
  millisecond = 0
): Instant {
  if (!isCalendarDate(date)) {
    throw new UnrecognizedDateError(date);
  }
  const zone = resolveZone(ctx);
  const [year, month, day] = date.split('-').map(Number);
  const fragment = `${date}T${pad(time.hour)}:${pad(time.minute)}`;
  const local = DateTime.fromObject(
    { year, month, day, hour: time.hour, minute: time.minute, second, millisecond },
    { zone }
  );
  if (!local.isValid) {
    throw new UnrecognizedDateError(fragment);
  }
  if (local.toISODate() !== date || local.hour !== time.hour || local.minute !== time.minute) {
    throw new InvalidLocalTimeError(fragment, zone);
  }
  return local;
}

/**
 * Parses ISO text into an instant. Text with an explicit offset keeps that
 * offset; naive date-times are localized; bare dates become local midnight.
 */
export function localize(text: string, ctx: TimezoneContext): Instant {
  const trimmed = text.trim().replace(' ', 'T');
  if (ISO_DATE.test(trimmed)) {
    return localizeDateTime(trimmed, MIDNIGHT, ctx);
  }
  if (hasExplicitOffset(trimmed)) {
    const parsed = DateTime.fromISO(trimmed, { setZone: true });
    if (!parsed.isValid) {
      throw new UnrecognizedDateError(text);
    }
    return parsed;
  }
  const wall = DateTime.fromISO(trimmed, { zone: 'utc' });
  if (!wall.isValid) {
    throw new UnrecognizedDateError(text);
  }
  return localizeDateTime(
    wall.toISODate(),
    { hour: wall.hour, minute: wall.minute },
    ctx,
    wall.second,
    wall.millisecond
  );
}

/**
 * All-day span covering `first` through `last` inclusive: local midnight of
 * `first` up to local midnight of the day after `last`.
 */
export function allDayBounds(
  first: CalendarDate,
  last: CalendarDate = first,
  ctx: TimezoneContext
): { start: Instant; end: Instant } {
  if (isCalendarDate(first) && isCalendarDate(last) && last < first) {
    throw new InvalidEventError('last day is before first day', `${first}..${last}`);
  }
  return {
    start: localizeDateTime(first, MIDNIGHT, ctx),
    end: localizeDateTime(addDays(last, 1), MIDNIGHT, ctx),
  };
}

/**
 * Localizes the start and end supplied to one edit. Two explicit offsets that
 * disagree are only accepted when the context carries an override zone.
 */
export function localizeEdit(
  values: { start?: string; end?: string },
  ctx: TimezoneContext
): { start?: Instant; end?: Instant } {
  const start = values.start === undefined ? undefined : localize(values.start, ctx);
  const end = values.end === undefined ? undefined : localize(values.end, ctx);

  if (
    start &&
    end &&
    values.start !== undefined &&
    values.end !== undefined &&
    hasExplicitOffset(values.start) &&
    hasExplicitOffset(values.end) &&
    start.offset !== end.offset
  ) {
    if (ctx.override === undefined) {
      throw new AmbiguousLocalizationError(`${values.start} / ${values.end}`);
    }
    return { start: inZone(start, ctx.override), end: inZone(end, ctx.override) };
  }
  return { start, end };
}

function hasExplicitOffset(text: string): boolean {
  return EXPLICIT_OFFSET.test(text.trim().replace(' ', 'T'));
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
