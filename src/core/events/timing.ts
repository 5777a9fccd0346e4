import type { CalendarEvent, EventFields, EventTiming } from './types.js';

/** Separates the start/end/allDay triple from the rest of an event. */
export function splitTiming(event: CalendarEvent): { timing: EventTiming; fields: EventFields } {
  if (event.allDay) {
    const { allDay, start, end, ...fields } = event;
    return { timing: { allDay, start, end }, fields };
  }
  const { allDay, start, end, ...fields } = event;
  return { timing: { allDay, start, end }, fields };
}
