import type { Recurrence } from '../recurrence/types.js';
import type { CalendarEvent, EventTiming } from './types.js';
import { splitTiming } from './timing.js';
import { validateEvent } from './validation.js';

/**
 * Replacement values for an existing event. Each present field replaces the
 * current one outright; `null` clears an optional field. Timing is replaced as
 * a whole so start, end and allDay always agree.
 */
export interface EventEdit {
  subject?: string;
  location?: string | null;
  body?: string | null;
  attendees?: Iterable<string>;
  reminder?: number | null;
  recurrence?: Recurrence | null;
  timing?: EventTiming;
}

export function applyEventEdit(event: CalendarEvent, edit: EventEdit): CalendarEvent {
  const { timing: currentTiming, fields } = splitTiming(event);
  const next = { ...fields };

  if (edit.subject !== undefined) next.subject = edit.subject;
  if (edit.attendees !== undefined) next.attendees = new Set(edit.attendees);

  if (edit.location === null) delete next.location;
  else if (edit.location !== undefined) next.location = edit.location;

  if (edit.body === null) delete next.body;
  else if (edit.body !== undefined) next.body = edit.body;

  if (edit.reminder === null) delete next.reminder;
  else if (edit.reminder !== undefined) next.reminder = edit.reminder;

  if (edit.recurrence === null) delete next.recurrence;
  else if (edit.recurrence !== undefined) next.recurrence = edit.recurrence;

  const timing: EventTiming = edit.timing ?? currentTiming;
  const updated: CalendarEvent = { ...next, ...timing };
  validateEvent(updated);
  return updated;
}

