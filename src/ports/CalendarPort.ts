import type { CalendarEvent } from '../core/events/types.js';
import type { Instant } from '../core/time/types.js';

export interface CalendarPort {
  agenda(start: Instant, end: Instant, query?: string): Promise<CalendarEvent[]>;
  get(eventId: string): Promise<CalendarEvent>;
  add(event: CalendarEvent): Promise<CalendarEvent>;
  update(eventId: string, event: CalendarEvent): Promise<CalendarEvent>;
  delete(eventId: string): Promise<void>;
  search(query: string, start?: Instant, end?: Instant): Promise<CalendarEvent[]>;
}
