import { describe, it, expect } from 'vitest';
import { looksLikeTime, resolveRelativeDate, resolveTimeOfDay } from '../../core/time/temporalTokens.js';
import {
  AmbiguousTimeError,
  UnknownTimezoneError,
  UnrecognizedDateError,
  UnrecognizedTimeError,
} from '../../utils/errors.js';

// 2025-01-15 is a Wednesday
const WEDNESDAY_NOON = new Date('2025-01-15T12:00:00Z');

describe('resolveRelativeDate', () => {
  it('resolves today, tomorrow and yesterday', () => {
    expect(resolveRelativeDate('today', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-15');
    expect(resolveRelativeDate('Tomorrow', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-16');
    expect(resolveRelativeDate('yesterday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-14');
  });

  it('treats a bare weekday as the next occurrence after today', () => {
    expect(resolveRelativeDate('friday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-17');
    expect(resolveRelativeDate('mon', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-20');
    expect(resolveRelativeDate('wednesday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-22');
  });

  it('lets "this" land on today and pushes "next" one week past the bare weekday', () => {
    expect(resolveRelativeDate('this wednesday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-15');
    expect(resolveRelativeDate('this friday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-17');
    expect(resolveRelativeDate('next wednesday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-29');
    expect(resolveRelativeDate('next friday', WEDNESDAY_NOON, 'UTC')).toBe('2025-01-24');
  });

  it('takes "today" from the wall clock of the given zone', () => {
    expect(resolveRelativeDate('today', new Date('2025-01-15T23:30:00Z'), 'Asia/Tokyo')).toBe('2025-01-16');
    expect(resolveRelativeDate('today', new Date('2025-01-15T05:00:00Z'), 'America/Los_Angeles')).toBe(
      '2025-01-14'
    );
  });

  it('passes ISO dates through', () => {
    expect(resolveRelativeDate('2025-03-01', WEDNESDAY_NOON, 'UTC')).toBe('2025-03-01');
  });

  it('rejects words it does not know', () => {
    expect(() => resolveRelativeDate('someday', WEDNESDAY_NOON, 'UTC')).toThrow(UnrecognizedDateError);
    expect(() => resolveRelativeDate('last friday', WEDNESDAY_NOON, 'UTC')).toThrow(UnrecognizedDateError);
    expect(() => resolveRelativeDate('next', WEDNESDAY_NOON, 'UTC')).toThrow(UnrecognizedDateError);
    expect(() => resolveRelativeDate('2025-02-30', WEDNESDAY_NOON, 'UTC')).toThrow(UnrecognizedDateError);
  });

  it('rejects an unknown zone', () => {
    expect(() => resolveRelativeDate('today', WEDNESDAY_NOON, 'Mars/Olympus')).toThrow(UnknownTimezoneError);
  });
});

describe('resolveTimeOfDay', () => {
  it('reads 12-hour times', () => {
    expect(resolveTimeOfDay('4pm')).toEqual({ hour: 16, minute: 0 });
    expect(resolveTimeOfDay('9:30am')).toEqual({ hour: 9, minute: 30 });
    expect(resolveTimeOfDay('4 PM')).toEqual({ hour: 16, minute: 0 });
    expect(resolveTimeOfDay('4p.m.')).toEqual({ hour: 16, minute: 0 });
  });

  it('maps 12am to midnight and 12pm to noon', () => {
    expect(resolveTimeOfDay('12am')).toEqual({ hour: 0, minute: 0 });
    expect(resolveTimeOfDay('12pm')).toEqual({ hour: 12, minute: 0 });
    expect(resolveTimeOfDay('noon')).toEqual({ hour: 12, minute: 0 });
    expect(resolveTimeOfDay('midnight')).toEqual({ hour: 0, minute: 0 });
  });

  it('reads 24-hour clock times', () => {
    expect(resolveTimeOfDay('16:00')).toEqual({ hour: 16, minute: 0 });
    expect(resolveTimeOfDay('7:05')).toEqual({ hour: 7, minute: 5 });
  });

  it('refuses to guess a bare hour', () => {
    expect(() => resolveTimeOfDay('4')).toThrow(AmbiguousTimeError);
    expect(() => resolveTimeOfDay('4')).toThrow('Ambiguous time "4": add am/pm or use HH:MM');
  });

  it('rejects out-of-range and unknown times', () => {
    expect(() => resolveTimeOfDay('13pm')).toThrow(UnrecognizedTimeError);
    expect(() => resolveTimeOfDay('4:75pm')).toThrow(UnrecognizedTimeError);
    expect(() => resolveTimeOfDay('24:00')).toThrow(UnrecognizedTimeError);
    expect(() => resolveTimeOfDay('teatime')).toThrow(UnrecognizedTimeError);
  });
});

describe('looksLikeTime', () => {
  it('recognizes time-shaped tokens without validating them', () => {
    expect(looksLikeTime('4pm')).toBe(true);
    expect(looksLikeTime('4')).toBe(true);
    expect(looksLikeTime('16:00')).toBe(true);
    expect(looksLikeTime('tomorrow')).toBe(false);
  });
});
