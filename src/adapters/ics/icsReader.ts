import ICAL from 'ical.js';
import type { CalendarDate, Instant, TimezoneContext } from '../../core/time/types.js';
import type { CalendarEvent, EventFields, EventTiming } from '../../core/events/types.js';
import { validateEvent } from '../../core/events/validation.js';
import { fromRRuleText } from '../../core/recurrence/recurrenceTranslator.js';
import { addDays, createTimezoneContext, inZone, localize, resolveZone } from '../../core/time/timezone.js';
import { IcsImportError, InputError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

// Structural views of the ical.js component API used here
interface IcsProperty {
  getParameter(name: string): unknown;
  getFirstValue(): unknown;
}

interface IcsComponent {
  name: string;
  getFirstPropertyValue(name: string): unknown;
  getFirstProperty(name: string): IcsProperty | null;
  getAllProperties(name: string): IcsProperty[];
  getFirstSubcomponent(name: string): IcsComponent | null;
  getAllSubcomponents(name: string): IcsComponent[];
}

type IcsMoment = { allDay: true; date: CalendarDate } | { allDay: false; instant: Instant };

export interface SkippedIcsEvent {
  uid?: string;
  subject?: string;
  reason: string;
}

export interface IcsReadResult {
  events: CalendarEvent[];
  skipped: SkippedIcsEvent[];
}

const logger = createLogger({ adapter: 'IcsReader' });

/**
 * Reads every VEVENT of an iCalendar document. Events the model cannot carry
 * (unsupported RRULE, unknown TZID, missing SUMMARY) are reported in `skipped`
 * with the reason instead of being dropped.
 */
export function readIcsEvents(text: string, ctx: TimezoneContext): IcsReadResult {
  const root: IcsComponent = parseCalendar(text);
  const vevents = root.name === 'vevent' ? [root] : root.getAllSubcomponents('vevent');

  const events: CalendarEvent[] = [];
  const skipped: SkippedIcsEvent[] = [];
  for (const vevent of vevents) {
    const uid = textProperty(vevent, 'uid');
    const subject = textProperty(vevent, 'summary');
    try {
      events.push(toEvent(vevent, ctx));
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      logger.warn({ uid, reason: error.message }, 'Skipping calendar entry');
      skipped.push({ uid, subject, reason: error.message });
    }
  }

  logger.debug({ events: events.length, skipped: skipped.length }, 'Read iCalendar document');
  return { events, skipped };
}

function parseCalendar(text: string) {
  try {
    return ICAL.Component.fromString(text);
  } catch (error) {
    throw new IcsImportError('not an iCalendar document', text.slice(0, 40), { cause: error });
  }
}

function toEvent(vevent: IcsComponent, ctx: TimezoneContext): CalendarEvent {
  const uid = textProperty(vevent, 'uid') ?? '(no UID)';
  const subject = textProperty(vevent, 'summary');
  if (subject === undefined) {
    throw new IcsImportError('missing SUMMARY', uid);
  }

  const fields: EventFields = { subject, attendees: new Set(attendeesOf(vevent)) };
  const location = textProperty(vevent, 'location');
  if (location !== undefined) fields.location = location;
  const body = textProperty(vevent, 'description');
  if (body !== undefined) fields.body = body;
  const reminder = reminderOf(vevent);
  if (reminder !== undefined) fields.reminder = reminder;
  const rrule = vevent.getFirstPropertyValue('rrule');
  if (rrule !== null && rrule !== undefined) fields.recurrence = fromRRuleText(String(rrule));

  const event: CalendarEvent = { ...fields, ...timingOf(vevent, uid, ctx) };
  validateEvent(event);
  return event;
}

function timingOf(vevent: IcsComponent, uid: string, ctx: TimezoneContext): EventTiming {
  const start = readMoment(vevent, 'dtstart', ctx);
  if (start === undefined) {
    throw new IcsImportError('missing DTSTART', uid);
  }
  const end = readMoment(vevent, 'dtend', ctx);
  const duration = vevent.getFirstPropertyValue('duration');
  const seconds = duration instanceof ICAL.Duration ? duration.toSeconds() : undefined;

  if (start.allDay) {
    if (end && !end.allDay) {
      throw new IcsImportError('DTEND is a date-time but DTSTART is a date', uid);
    }
    const days = seconds === undefined ? 1 : Math.round(seconds / 86400);
    return { allDay: true, start: start.date, end: end ? end.date : addDays(start.date, days) };
  }

  if (end) {
    if (end.allDay) {
      throw new IcsImportError('DTEND is a date but DTSTART is a date-time', uid);
    }
    return { allDay: false, start: start.instant, end: end.instant };
  }
  if (seconds === undefined) {
    throw new IcsImportError('missing DTEND and DURATION', uid);
  }
  return { allDay: false, start: start.instant, end: start.instant.plus({ seconds }) };
}

// Timed values are localized in their TZID (or as floating wall time) and
// then expressed in the resolved zone.
function readMoment(vevent: IcsComponent, name: 'dtstart' | 'dtend', ctx: TimezoneContext): IcsMoment | undefined {
  const property = vevent.getFirstProperty(name);
  if (!property) {
    return undefined;
  }
  const value = property.getFirstValue();
  if (!(value instanceof ICAL.Time)) {
    throw new IcsImportError(`${name.toUpperCase()} is not a date`, String(value));
  }
  const text = value.toString();
  if (value.isDate) {
    return { allDay: true, date: text };
  }
  const tzid = property.getParameter('tzid');
  const valueCtx = typeof tzid === 'string' ? createTimezoneContext({ ...ctx, override: tzid }) : ctx;
  return { allDay: false, instant: inZone(localize(text, valueCtx), resolveZone(ctx)) };
}

function textProperty(component: IcsComponent, name: string): string | undefined {
  const value = component.getFirstPropertyValue(name);
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function attendeesOf(vevent: IcsComponent): string[] {
  const attendees: string[] = [];
  for (const property of vevent.getAllProperties('attendee')) {
    const value = property.getFirstValue();
    if (typeof value === 'string') {
      attendees.push(value.replace(/^mailto:/i, ''));
    }
  }
  return attendees;
}

// Only the first VALARM with a relative trigger before the start
function reminderOf(vevent: IcsComponent): number | undefined {
  const trigger = vevent.getFirstSubcomponent('valarm')?.getFirstPropertyValue('trigger');
  if (!(trigger instanceof ICAL.Duration)) {
    return undefined;
  }
  const seconds = trigger.toSeconds();
  return seconds <= 0 ? Math.round(-seconds / 60) : undefined;
}
