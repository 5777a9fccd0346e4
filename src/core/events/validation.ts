import { z } from 'zod';
import type { CalendarEvent } from './types.js';
import { isCalendarDate } from '../time/timezone.js';
import { encodeRRule } from '../recurrence/recurrenceTranslator.js';
import { InvalidEventError } from '../../utils/errors.js';

const emailSchema = z.string().email();

/** Checks the model invariants, throwing on the first one that fails. */
export function validateEvent(event: CalendarEvent): void {
  if (!event.subject.trim()) {
    throw new InvalidEventError('subject is empty', event.subject);
  }
  if (event.location !== undefined && !event.location.trim()) {
    throw new InvalidEventError('location is empty', event.location);
  }
  if (event.body !== undefined && !event.body.trim()) {
    throw new InvalidEventError('body is empty', event.body);
  }
  if (event.reminder !== undefined && (!Number.isInteger(event.reminder) || event.reminder < 0)) {
    throw new InvalidEventError('reminder must be a non-negative whole number of minutes', String(event.reminder));
  }
  for (const attendee of event.attendees) {
    if (!emailSchema.safeParse(attendee).success) {
      throw new InvalidEventError('attendee is not an email address', attendee);
    }
  }

  if (event.allDay) {
    if (!isCalendarDate(event.start) || !isCalendarDate(event.end)) {
      throw new InvalidEventError('all-day bounds must be YYYY-MM-DD dates', `${event.start}..${event.end}`);
    }
    if (event.start >= event.end) {
      throw new InvalidEventError('start must be before end', `${event.start}..${event.end}`);
    }
  } else if (event.start.toMillis() >= event.end.toMillis()) {
    throw new InvalidEventError('start must be before end', `${event.start.toISO()}..${event.end.toISO()}`);
  }

  if (event.recurrence) {
    const encoded = encodeRRule(event.recurrence);
    if (!encoded.ok) {
      throw encoded.error;
    }
  }
}
