import { describe, it, expect } from 'vitest';
import { fromWire, toWire, toWirePatch } from '../../core/events/eventMapper.js';
import type { AllDayEvent, CalendarEvent, TimedEvent } from '../../core/events/types.js';
import { createTimezoneContext, localizeDateTime } from '../../core/time/timezone.js';
import { MalformedPayloadError, UnsupportedRecurrenceError } from '../../utils/errors.js';

const dublin = createTimezoneContext({ system: 'Europe/Dublin' });

function comparable(event: CalendarEvent) {
  if (event.allDay) {
    return event;
  }
  return {
    ...event,
    start: { iso: event.start.toISO(), zone: event.start.zoneName },
    end: { iso: event.end.toISO(), zone: event.end.zoneName },
  };
}

const timed: TimedEvent = {
  id: 'evt-1',
  subject: 'Coffee',
  allDay: false,
  start: localizeDateTime('2025-01-15', { hour: 16, minute: 0 }, dublin),
  end: localizeDateTime('2025-01-15', { hour: 17, minute: 0 }, dublin),
  location: 'Cafe',
  body: 'Bring notes',
  attendees: new Set(['zoe@example.com', 'ali@example.com']),
  reminder: 10,
  recurrence: { frequency: 'WEEKLY', interval: 1, byDay: new Set(['WE']) },
};

const allDay: AllDayEvent = {
  subject: 'Offsite',
  allDay: true,
  start: '2025-01-15',
  end: '2025-01-17',
  attendees: new Set(),
};

describe('toWire', () => {
  it('encodes a timed event in its own zone', () => {
    expect(toWire(timed)).toEqual({
      id: 'evt-1',
      subject: 'Coffee',
      body: { contentType: 'text', content: 'Bring notes' },
      location: { displayName: 'Cafe' },
      start: { dateTime: '2025-01-15T16:00:00.000', timeZone: 'Europe/Dublin' },
      end: { dateTime: '2025-01-15T17:00:00.000', timeZone: 'Europe/Dublin' },
      isAllDay: false,
      attendees: [
        { emailAddress: { address: 'ali@example.com' }, type: 'required' },
        { emailAddress: { address: 'zoe@example.com' }, type: 'required' },
      ],
      isReminderOn: true,
      reminderMinutesBeforeStart: 10,
      recurrence: {
        pattern: { type: 'weekly', interval: 1, daysOfWeek: ['wednesday'] },
        range: { type: 'noEnd', startDate: '2025-01-15' },
      },
    });
  });

  it('encodes all-day events as midnight dates', () => {
    expect(toWire(allDay)).toEqual({
      subject: 'Offsite',
      start: { dateTime: '2025-01-15T00:00:00.000', timeZone: 'UTC' },
      end: { dateTime: '2025-01-17T00:00:00.000', timeZone: 'UTC' },
      isAllDay: true,
      attendees: [],
      isReminderOn: false,
    });
  });
});

describe('toWirePatch', () => {
  it('sends null for optional fields the event lacks', () => {
    expect(toWirePatch(allDay)).toEqual({
      subject: 'Offsite',
      body: null,
      location: null,
      recurrence: null,
      start: { dateTime: '2025-01-15T00:00:00.000', timeZone: 'UTC' },
      end: { dateTime: '2025-01-17T00:00:00.000', timeZone: 'UTC' },
      isAllDay: true,
      attendees: [],
      isReminderOn: false,
    });
  });

  it('leaves the id out and keeps present fields', () => {
    const patch = toWirePatch(timed);
    expect(patch).not.toHaveProperty('id');
    expect(patch.location).toEqual({ displayName: 'Cafe' });
    expect(patch.body).toEqual({ contentType: 'text', content: 'Bring notes' });
  });
});

describe('fromWire', () => {
  it('decodes what toWire produces', () => {
    expect(comparable(fromWire(toWire(timed)))).toEqual(comparable(timed));
    expect(fromWire(toWire(allDay))).toEqual(allDay);
  });

  it('decodes a service payload and drops what the model does not carry', () => {
    const event = fromWire({
      '@odata.etag': 'W/"abc"',
      id: 'AAMkAD-1',
      subject: 'Standup',
      webLink: 'https://example.com/evt',
      body: { contentType: 'text', content: '' },
      location: { displayName: '', locationType: 'default' },
      start: { dateTime: '2025-01-15T09:30:00.0000000', timeZone: 'America/New_York' },
      end: { dateTime: '2025-01-15T09:45:00.0000000', timeZone: 'America/New_York' },
      isAllDay: false,
      attendees: [{ emailAddress: { address: 'ali@example.com', name: 'Ali' }, type: 'required' }],
      isReminderOn: false,
      reminderMinutesBeforeStart: 15,
      recurrence: null,
    });

    expect(comparable(event)).toEqual({
      id: 'AAMkAD-1',
      subject: 'Standup',
      allDay: false,
      start: { iso: '2025-01-15T09:30:00.000-05:00', zone: 'America/New_York' },
      end: { iso: '2025-01-15T09:45:00.000-05:00', zone: 'America/New_York' },
      attendees: new Set(['ali@example.com']),
    });
    expect(event).not.toHaveProperty('reminder');
    expect(event).not.toHaveProperty('location');
    expect(event).not.toHaveProperty('body');
  });

  it('rejects payloads missing required fields', () => {
    const { subject: _subject, ...withoutSubject } = toWire(timed);
    expect(() => fromWire(withoutSubject)).toThrow(MalformedPayloadError);
    expect(() => fromWire(null)).toThrow(MalformedPayloadError);
  });

  it('rejects inverted or unreadable timing', () => {
    const wire = toWire(timed);
    expect(() => fromWire({ ...wire, start: wire.end, end: wire.start })).toThrow(MalformedPayloadError);
    expect(() =>
      fromWire({ ...wire, start: { dateTime: '2025-01-15T16:00:00.000', timeZone: 'Mars/Olympus' } })
    ).toThrow(MalformedPayloadError);
    expect(() =>
      fromWire({ ...toWire(allDay), end: { dateTime: '2025-01-15T00:00:00.000', timeZone: 'UTC' } })
    ).toThrow('Malformed event payload (start is not before end)');
  });

  it('rejects a reminder flag without minutes', () => {
    const { reminderMinutesBeforeStart: _minutes, ...wire } = toWire(timed);
    expect(() => fromWire(wire)).toThrow(
      'Malformed event payload (reminder is on without reminderMinutesBeforeStart)'
    );
  });

  it('rejects recurrences outside the subset', () => {
    expect(() =>
      fromWire({
        ...toWire(allDay),
        recurrence: { pattern: { type: 'absoluteYearly', interval: 1, dayOfMonth: 15, month: 1 } },
      })
    ).toThrow(UnsupportedRecurrenceError);
  });
});
