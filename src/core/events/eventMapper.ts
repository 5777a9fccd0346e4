import { DateTime } from 'luxon';
import { z } from 'zod';
import type { Instant } from '../time/types.js';
import type {
  CalendarEvent,
  EventFields,
  EventTiming,
  WireDateTime,
  WireEvent,
  WirePatch,
} from './types.js';
import { isCalendarDate } from '../time/timezone.js';
import { splitTiming } from './timing.js';
import { fromWirePattern, toWirePattern } from '../recurrence/recurrenceTranslator.js';
import { MalformedPayloadError } from '../../utils/errors.js';

const wireDateTimeSchema = z.object({
  dateTime: z.string().min(1),
  timeZone: z.string().min(1),
});

// Graph sends many more properties than these; zod strips the rest.
const wireEventSchema = z.object({
  id: z.string().min(1).optional(),
  subject: z.string().refine((subject) => subject.trim().length > 0, { message: 'subject is empty' }),
  body: z.object({ contentType: z.string().optional(), content: z.string() }).nullish(),
  location: z.object({ displayName: z.string().nullish() }).nullish(),
  start: wireDateTimeSchema,
  end: wireDateTimeSchema,
  isAllDay: z.boolean().optional(),
  attendees: z
    .array(z.object({ emailAddress: z.object({ address: z.string().min(1) }) }))
    .nullish(),
  isReminderOn: z.boolean().optional(),
  reminderMinutesBeforeStart: z.number().int().nonnegative().nullish(),
  recurrence: z.unknown().optional(),
});

const WIRE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";
const ALL_DAY_ZONE = 'UTC';

type NothingLeft<T> = keyof T extends never ? true : false;

// Stops compiling when the model or wire schema gains a field the mapper skips.
function assertFullyMapped<T>(_unmapped: T, _check: NothingLeft<T>): void {}

export function toWire(event: CalendarEvent): WireEvent {
  const { timing, fields } = splitTiming(event);
  const { id, subject, location, body, attendees, reminder, recurrence, ...unmapped } = fields;
  assertFullyMapped(unmapped, true);

  const wire: WireEvent = {
    subject,
    ...encodeTiming(timing),
    isAllDay: timing.allDay,
    attendees: [...attendees].sort().map((address) => ({
      emailAddress: { address },
      type: 'required' as const,
    })),
    isReminderOn: reminder !== undefined,
  };
  if (id !== undefined) wire.id = id;
  if (body !== undefined) wire.body = { contentType: 'text', content: body };
  if (location !== undefined) wire.location = { displayName: location };
  if (reminder !== undefined) wire.reminderMinutesBeforeStart = reminder;
  if (recurrence !== undefined) {
    const startDate = timing.allDay ? timing.start : timing.start.toISODate();
    wire.recurrence = toWirePattern(recurrence, startDate);
  }
  return wire;
}

export function toWirePatch(event: CalendarEvent): WirePatch {
  const { id: _id, body, location, recurrence, ...rest } = toWire(event);
  return { ...rest, body: body ?? null, location: location ?? null, recurrence: recurrence ?? null };
}

export function fromWire(payload: unknown): CalendarEvent {
  const parsed = wireEventSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new MalformedPayloadError(`${path || 'payload'}: ${issue?.message ?? 'invalid'}`, path, {
      cause: parsed.error,
    });
  }

  const {
    id,
    subject,
    body,
    location,
    start,
    end,
    isAllDay,
    attendees,
    isReminderOn,
    reminderMinutesBeforeStart,
    recurrence,
    ...unmapped
  } = parsed.data;
  assertFullyMapped(unmapped, true);

  const reminder = isReminderOn === false ? undefined : (reminderMinutesBeforeStart ?? undefined);
  if (isReminderOn === true && reminder === undefined) {
    throw new MalformedPayloadError('reminder is on without reminderMinutesBeforeStart', 'reminderMinutesBeforeStart');
  }

  const fields: EventFields = {
    ...(id !== undefined ? { id } : {}),
    subject,
    attendees: new Set((attendees ?? []).map((attendee) => attendee.emailAddress.address)),
  };
  const content = body?.content;
  if (content?.trim()) fields.body = content;
  const displayName = location?.displayName;
  if (displayName?.trim()) fields.location = displayName;
  if (reminder !== undefined) fields.reminder = reminder;
  if (recurrence !== undefined && recurrence !== null) fields.recurrence = fromWirePattern(recurrence);

  return { ...fields, ...decodeTiming(isAllDay === true, start, end) };
}

function encodeTiming(timing: EventTiming): { start: WireDateTime; end: WireDateTime } {
  if (timing.allDay) {
    return {
      start: { dateTime: `${timing.start}T00:00:00.000`, timeZone: ALL_DAY_ZONE },
      end: { dateTime: `${timing.end}T00:00:00.000`, timeZone: ALL_DAY_ZONE },
    };
  }
  return { start: encodeInstant(timing.start), end: encodeInstant(timing.end) };
}

function encodeInstant(instant: Instant): WireDateTime {
  return { dateTime: instant.toFormat(WIRE_FORMAT), timeZone: instant.zoneName };
}

function decodeTiming(allDay: boolean, start: WireDateTime, end: WireDateTime): EventTiming {
  if (allDay) {
    const startDate = start.dateTime.slice(0, 10);
    const endDate = end.dateTime.slice(0, 10);
    if (!isCalendarDate(startDate)) {
      throw new MalformedPayloadError('start is not a date', start.dateTime);
    }
    if (!isCalendarDate(endDate)) {
      throw new MalformedPayloadError('end is not a date', end.dateTime);
    }
    if (startDate >= endDate) {
      throw new MalformedPayloadError('start is not before end', `${startDate}..${endDate}`);
    }
    return { allDay: true, start: startDate, end: endDate };
  }

  const startInstant = decodeInstant(start, 'start');
  const endInstant = decodeInstant(end, 'end');
  if (startInstant.toMillis() >= endInstant.toMillis()) {
    throw new MalformedPayloadError('start is not before end', `${start.dateTime}..${end.dateTime}`);
  }
  return { allDay: false, start: startInstant, end: endInstant };
}

function decodeInstant(value: WireDateTime, field: 'start' | 'end'): Instant {
  const instant = DateTime.fromISO(value.dateTime, { zone: value.timeZone });
  if (!instant.isValid) {
    throw new MalformedPayloadError(
      `${field} is not a valid date-time (${instant.invalidReason ?? 'unknown reason'})`,
      `${value.dateTime} ${value.timeZone}`
    );
  }
  return instant;
}
