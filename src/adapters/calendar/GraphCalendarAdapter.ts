import { DateTime } from 'luxon';
import { z } from 'zod';
import type { CalendarPort } from '../../ports/CalendarPort.js';
import type { CalendarEvent } from '../../core/events/types.js';
import type { Instant } from '../../core/time/types.js';
import type { Config } from '../../config/index.js';
import { fromWire, toWire, toWirePatch } from '../../core/events/eventMapper.js';
import { createLogger } from '../../utils/logger.js';
import {
  AuthenticationError,
  CalendarApiError,
  EventNotFoundError,
  MalformedPayloadError,
  UnsupportedRecurrenceError,
} from '../../utils/errors.js';

const eventListSchema = z.object({
  value: z.array(z.unknown()).default([]),
  '@odata.nextLink': z.string().url().optional(),
});

const errorBodySchema = z.object({
  error: z.object({ code: z.string().optional(), message: z.string() }),
});

const SEARCH_WINDOW_DAYS = 30;

export class GraphCalendarAdapter implements CalendarPort {
  private readonly logger = createLogger({ adapter: 'GraphCalendarAdapter' });
  private readonly accessToken?: string;
  private readonly baseUrl: string;
  private readonly calendarId: string;
  private readonly timezone: string;
  private readonly timeoutMs: number;

  constructor(config: Config, timezone: string) {
    this.accessToken = config.accessToken;
    this.baseUrl = config.graphBaseUrl.replace(/\/+$/, '');
    this.calendarId = config.calendarId;
    this.timezone = timezone;
    this.timeoutMs = config.requestTimeoutMs;
  }

  async agenda(start: Instant, end: Instant, query?: string): Promise<CalendarEvent[]> {
    const logger = this.logger.child({ method: 'agenda' });
    const url = new URL(this.calendarPath('calendarView'));
    url.searchParams.set('startDateTime', start.toISO());
    url.searchParams.set('endDateTime', end.toISO());
    url.searchParams.set('$orderby', 'start/dateTime');
    if (query) {
      url.searchParams.set('$filter', `contains(subject,'${query.replace(/'/g, "''")}')`);
    }

    const events: CalendarEvent[] = [];
    let next: string | undefined = url.toString();
    while (next) {
      const page = eventListSchema.safeParse(await this.request('GET', next));
      if (!page.success) {
        throw new CalendarApiError('Calendar API returned an unexpected event list', undefined, {
          cause: page.error,
        });
      }
      for (const item of page.data.value) {
        const event = this.decodeListItem(item);
        if (event) events.push(event);
      }
      next = page.data['@odata.nextLink'];
    }

    logger.debug({ count: events.length }, 'Fetched agenda');
    return events;
  }

  async get(eventId: string): Promise<CalendarEvent> {
    return fromWire(await this.request('GET', this.eventPath(eventId), undefined, eventId));
  }

  async add(event: CalendarEvent): Promise<CalendarEvent> {
    const payload = toWire(event);
    delete payload.id;
    const created = fromWire(await this.request('POST', this.calendarPath('events'), payload));
    this.logger.info({ eventId: created.id }, 'Created event');
    return created;
  }

  async update(eventId: string, event: CalendarEvent): Promise<CalendarEvent> {
    const payload = toWirePatch(event);
    const updated = fromWire(await this.request('PATCH', this.eventPath(eventId), payload, eventId));
    this.logger.info({ eventId }, 'Updated event');
    return updated;
  }

  async delete(eventId: string): Promise<void> {
    await this.request('DELETE', this.eventPath(eventId), undefined, eventId);
    this.logger.info({ eventId }, 'Deleted event');
  }

  async search(query: string, start?: Instant, end?: Instant): Promise<CalendarEvent[]> {
    const from = start ?? DateTime.now();
    const to = end ?? from.plus({ days: SEARCH_WINDOW_DAYS });
    return this.agenda(from, to, query);
  }

  private decodeListItem(item: unknown): CalendarEvent | null {
    try {
      return fromWire(item);
    } catch (error) {
      if (error instanceof MalformedPayloadError || error instanceof UnsupportedRecurrenceError) {
        this.logger.warn({ error, fragment: error.fragment }, 'Skipping event that cannot be represented');
        return null;
      }
      throw error;
    }
  }

  private calendarPath(resource: string): string {
    const calendar =
      this.calendarId === 'primary'
        ? '/me/calendar'
        : `/me/calendars/${encodeURIComponent(this.calendarId)}`;
    return `${this.baseUrl}${calendar}/${resource}`;
  }

  private eventPath(eventId: string): string {
    return this.calendarPath(`events/${encodeURIComponent(eventId)}`);
  }

  private async request(
    method: 'GET' | 'POST' | 'PATCH' | 'DELETE',
    url: string,
    body?: unknown,
    eventId?: string
  ): Promise<unknown> {
    const logger = this.logger.child({ method, url });
    if (!this.accessToken) {
      throw new AuthenticationError('No access token configured; set QUICKCAL_ACCESS_TOKEN');
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
          Prefer: `outlook.timezone="${this.timezone}", outlook.body-content-type="text"`,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      logger.error({ error }, 'Calendar API request failed');
      throw new CalendarApiError(`Network error: ${method} ${url}`, undefined, { cause: error });
    }

    if (response.status === 401) {
      throw new AuthenticationError('Calendar API rejected the access token');
    }
    if (response.status === 404 && eventId !== undefined) {
      throw new EventNotFoundError(eventId);
    }
    if (!response.ok) {
      const text = await response.text();
      const detail = parseErrorMessage(text);
      logger.error({ status: response.status, detail }, 'Calendar API request failed');
      throw new CalendarApiError(`Calendar API error: ${response.status} ${detail}`, response.status);
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new CalendarApiError('Calendar API returned invalid JSON', response.status, { cause: error });
    }
  }
}

function parseErrorMessage(text: string): string {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.error.message : text;
  } catch {
    return text;
  }
}
