import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GraphCalendarAdapter } from '../../adapters/calendar/GraphCalendarAdapter.js';
import type { Config } from '../../config/index.js';
import type { TimedEvent } from '../../core/events/types.js';
import { createTimezoneContext, localizeDateTime } from '../../core/time/timezone.js';
import {
  AuthenticationError,
  CalendarApiError,
  EventNotFoundError,
} from '../../utils/errors.js';

const dublin = createTimezoneContext({ system: 'Europe/Dublin' });

function wireEvent(id: string, subject: string, hour: number) {
  const at = (h: number) => `2025-01-15T${String(h).padStart(2, '0')}:00:00.0000000`;
  return {
    id,
    subject,
    start: { dateTime: at(hour), timeZone: 'Europe/Dublin' },
    end: { dateTime: at(hour + 1), timeZone: 'Europe/Dublin' },
    isAllDay: false,
    attendees: [],
    isReminderOn: false,
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('GraphCalendarAdapter', () => {
  const baseConfig: Config = {
    accessToken: 'test-token',
    graphBaseUrl: 'https://graph.test/v1.0/',
    calendarId: 'primary',
    requestTimeoutMs: 1000,
  };
  const start = localizeDateTime('2025-01-15', { hour: 0, minute: 0 }, dublin);
  const end = start.plus({ days: 1 });

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fails without an access token and never calls the API', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const adapter = new GraphCalendarAdapter({ ...baseConfig, accessToken: undefined }, 'Europe/Dublin');

    await expect(adapter.get('evt-1')).rejects.toThrow(AuthenticationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('pages through the calendar view and skips events it cannot represent', async () => {
    const monthly = {
      ...wireEvent('evt-2', 'Rent', 9),
      recurrence: { pattern: { type: 'absoluteMonthly', interval: 1, dayOfMonth: 1 } },
    };
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        json({
          value: [wireEvent('evt-1', 'Standup', 9), monthly],
          '@odata.nextLink': 'https://graph.test/v1.0/me/calendar/calendarView?$skip=2',
        })
      )
      .mockResolvedValueOnce(json({ value: [wireEvent('evt-3', 'Review', 14)] }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new GraphCalendarAdapter(baseConfig, 'Europe/Dublin');
    const events = await adapter.agenda(start, end);

    expect(events.map((event) => event.id)).toEqual(['evt-1', 'evt-3']);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const firstUrl = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(firstUrl.pathname).toBe('/v1.0/me/calendar/calendarView');
    expect(firstUrl.searchParams.get('startDateTime')).toBe('2025-01-15T00:00:00.000+00:00');
    expect(firstUrl.searchParams.get('endDateTime')).toBe('2025-01-16T00:00:00.000+00:00');
    expect(firstUrl.searchParams.get('$orderby')).toBe('start/dateTime');
    expect(fetchMock.mock.calls[1]?.[0]).toBe('https://graph.test/v1.0/me/calendar/calendarView?$skip=2');

    expect(fetchMock).toHaveBeenCalledWith(
      expect.any(String),
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({
          Authorization: 'Bearer test-token',
          Prefer: 'outlook.timezone="Europe/Dublin", outlook.body-content-type="text"',
        }),
      })
    );
  });

  it('filters searches by subject', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(json({ value: [] }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new GraphCalendarAdapter(baseConfig, 'Europe/Dublin');
    await adapter.search("Ali's", start, end);

    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get('$filter')).toBe("contains(subject,'Ali''s')");
  });

  it('creates events without sending an id', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(json(wireEvent('evt-9', 'Coffee', 16), 201));
    vi.stubGlobal('fetch', fetchMock);

    const event: TimedEvent = {
      id: 'local-id',
      subject: 'Coffee',
      allDay: false,
      start: localizeDateTime('2025-01-15', { hour: 16, minute: 0 }, dublin),
      end: localizeDateTime('2025-01-15', { hour: 17, minute: 0 }, dublin),
      attendees: new Set(),
    };
    const adapter = new GraphCalendarAdapter(baseConfig, 'Europe/Dublin');
    const created = await adapter.add(event);

    expect(created.id).toBe('evt-9');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://graph.test/v1.0/me/calendar/events');
    const init: RequestInit | undefined = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      subject: 'Coffee',
      start: { dateTime: '2025-01-15T16:00:00.000', timeZone: 'Europe/Dublin' },
      end: { dateTime: '2025-01-15T17:00:00.000', timeZone: 'Europe/Dublin' },
      isAllDay: false,
      attendees: [],
      isReminderOn: false,
    });
  });

  it('sends null for fields an update removes', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(json(wireEvent('evt-1', 'Coffee', 16)));
    vi.stubGlobal('fetch', fetchMock);

    const event: TimedEvent = {
      id: 'evt-1',
      subject: 'Coffee',
      allDay: false,
      start: localizeDateTime('2025-01-15', { hour: 16, minute: 0 }, dublin),
      end: localizeDateTime('2025-01-15', { hour: 17, minute: 0 }, dublin),
      attendees: new Set(),
    };
    const adapter = new GraphCalendarAdapter(baseConfig, 'Europe/Dublin');
    await adapter.update('evt-1', event);

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://graph.test/v1.0/me/calendar/events/evt-1');
    const init: RequestInit | undefined = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('PATCH');
    expect(JSON.parse(String(init?.body))).toEqual({
      subject: 'Coffee',
      body: null,
      location: null,
      start: { dateTime: '2025-01-15T16:00:00.000', timeZone: 'Europe/Dublin' },
      end: { dateTime: '2025-01-15T17:00:00.000', timeZone: 'Europe/Dublin' },
      isAllDay: false,
      attendees: [],
      isReminderOn: false,
      recurrence: null,
    });
  });

  it('addresses a named calendar', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce(new Response(null, { status: 204 }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new GraphCalendarAdapter({ ...baseConfig, calendarId: 'work cal' }, 'UTC');
    await adapter.delete('evt-1');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://graph.test/v1.0/me/calendars/work%20cal/events/evt-1');
    expect(fetchMock.mock.calls[0]?.[1]).toEqual(expect.objectContaining({ method: 'DELETE' }));
  });

  it('maps error responses', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(json({ error: { code: 'ErrorItemNotFound', message: 'Not found' } }, 404))
      .mockResolvedValueOnce(json({ error: { message: 'Token expired' } }, 401))
      .mockResolvedValueOnce(json({ error: { code: 'Boom', message: 'Something broke' } }, 500))
      .mockRejectedValueOnce(new TypeError('fetch failed'));
    vi.stubGlobal('fetch', fetchMock);
    const adapter = new GraphCalendarAdapter(baseConfig, 'UTC');

    await expect(adapter.get('evt-1')).rejects.toThrow(EventNotFoundError);
    await expect(adapter.get('evt-1')).rejects.toThrow(AuthenticationError);
    await expect(adapter.get('evt-1')).rejects.toMatchObject({
      message: 'Calendar API error: 500 Something broke',
      status: 500,
    });
    await expect(adapter.get('evt-1')).rejects.toThrow(
      new CalendarApiError('Network error: GET https://graph.test/v1.0/me/calendar/events/evt-1')
    );
  });
});
