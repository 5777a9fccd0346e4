import { z } from 'zod';
import {
  GRAPH_DAYS,
  WEEKDAY_TOKENS,
  type GraphDay,
  type PatternPayload,
  type Recurrence,
  type TranslationResult,
  type WeekdayToken,
} from './types.js';
import { UnsupportedRecurrenceError } from '../../utils/errors.js';

const RRULE_KEYS = new Set(['FREQ', 'INTERVAL', 'BYDAY']);
const POSITIVE_INTEGER = /^[1-9]\d*$/;

// Graph fills unused pattern fields with zero values; only the shape is checked here.
const patternPayloadSchema = z.object({
  pattern: z.object({
    type: z.string(),
    interval: z.number(),
    daysOfWeek: z.array(z.string()).optional(),
    dayOfMonth: z.number().optional(),
    month: z.number().optional(),
    index: z.string().optional(),
    firstDayOfWeek: z.string().optional(),
  }),
  range: z
    .object({
      type: z.string(),
      startDate: z.string().optional(),
      endDate: z.string().nullable().optional(),
      numberOfOccurrences: z.number().optional(),
      recurrenceTimeZone: z.string().optional(),
    })
    .optional(),
});

// Graph's placeholder end date on a noEnd range
const NO_END_DATE = '0001-01-01';

export function encodeRRule(recurrence: Recurrence): TranslationResult<string> {
  const invalid = checkInterval(recurrence);
  if (invalid) return invalid;

  const parts = [`FREQ=${recurrence.frequency}`];
  if (recurrence.interval !== 1) {
    parts.push(`INTERVAL=${recurrence.interval}`);
  }
  if (recurrence.frequency === 'WEEKLY' && recurrence.byDay.size > 0) {
    parts.push(`BYDAY=${canonicalDays(recurrence.byDay).join(',')}`);
  }
  return ok(parts.join(';'));
}

/**
 * Strict decoder for the DAILY/WEEKLY RRULE subset. Any clause outside the
 * subset rejects the whole rule.
 */
export function decodeRRule(text: string): TranslationResult<Recurrence> {
  const body = text.trim().replace(/^RRULE:/i, '');
  if (!body) {
    return fail('empty rule', text);
  }

  const fields = new Map<string, string>();
  for (const part of body.split(';')) {
    const eq = part.indexOf('=');
    if (eq <= 0) {
      return fail('malformed clause', part);
    }
    const key = part.slice(0, eq).trim().toUpperCase();
    const value = part.slice(eq + 1).trim().toUpperCase();
    if (!RRULE_KEYS.has(key)) {
      return fail(`unsupported key ${key}`, part);
    }
    if (fields.has(key)) {
      return fail(`duplicate key ${key}`, part);
    }
    if (!value) {
      return fail(`empty ${key}`, part);
    }
    fields.set(key, value);
  }

  const frequency = fields.get('FREQ');
  if (frequency === undefined) {
    return fail('missing FREQ', text);
  }

  const intervalText = fields.get('INTERVAL') ?? '1';
  if (!POSITIVE_INTEGER.test(intervalText)) {
    return fail('INTERVAL must be a positive integer', `INTERVAL=${intervalText}`);
  }
  const interval = parseInt(intervalText, 10);
  if (!Number.isSafeInteger(interval)) {
    return fail('INTERVAL is too large', `INTERVAL=${intervalText}`);
  }

  const byDayText = fields.get('BYDAY');
  if (frequency === 'DAILY') {
    if (byDayText !== undefined) {
      return fail('BYDAY with FREQ=DAILY', text);
    }
    return ok<Recurrence>({ frequency: 'DAILY', interval });
  }
  if (frequency !== 'WEEKLY') {
    return fail(`unsupported frequency ${frequency}`, `FREQ=${frequency}`);
  }

  const byDay = new Set<WeekdayToken>();
  for (const token of byDayText?.split(',') ?? []) {
    const day = WEEKDAY_TOKENS.find((candidate) => candidate === token.trim());
    if (day === undefined) {
      return fail(`unsupported BYDAY value ${token}`, `BYDAY=${byDayText ?? ''}`);
    }
    byDay.add(day);
  }
  return ok<Recurrence>({ frequency: 'WEEKLY', interval, byDay });
}

export function encodeWirePattern(
  recurrence: Recurrence,
  startDate?: string
): TranslationResult<PatternPayload> {
  const invalid = checkInterval(recurrence);
  if (invalid) return invalid;

  const pattern: PatternPayload['pattern'] = {
    type: recurrence.frequency === 'DAILY' ? 'daily' : 'weekly',
    interval: recurrence.interval,
  };
  if (recurrence.frequency === 'WEEKLY' && recurrence.byDay.size > 0) {
    pattern.daysOfWeek = canonicalDays(recurrence.byDay).map(toGraphDay);
  }
  const range: PatternPayload['range'] = startDate ? { type: 'noEnd', startDate } : { type: 'noEnd' };
  return ok<PatternPayload>({ pattern, range });
}

export function decodeWirePattern(payload: unknown): TranslationResult<Recurrence> {
  const parsed = patternPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return fail('malformed pattern', JSON.stringify(payload) ?? String(payload));
  }
  const { pattern, range } = parsed.data;

  if (pattern.dayOfMonth || pattern.month) {
    return fail('day-of-month or month pattern', JSON.stringify(pattern));
  }
  if (range && (range.type !== 'noEnd' || range.numberOfOccurrences)) {
    return fail(`range type ${range.type}`, JSON.stringify(range));
  }
  if (range?.endDate && range.endDate !== NO_END_DATE) {
    return fail('range end date', range.endDate);
  }
  if (!Number.isSafeInteger(pattern.interval) || pattern.interval < 1) {
    return fail('interval must be a positive integer', String(pattern.interval));
  }

  const days = pattern.daysOfWeek ?? [];
  if (pattern.type === 'daily') {
    if (days.length > 0) {
      return fail('daysOfWeek on a daily pattern', days.join(','));
    }
    return ok<Recurrence>({ frequency: 'DAILY', interval: pattern.interval });
  }
  if (pattern.type !== 'weekly') {
    return fail(`pattern type ${pattern.type}`, pattern.type);
  }

  const byDay = new Set<WeekdayToken>();
  for (const name of days) {
    const index = GRAPH_DAYS.findIndex((day) => day === name.toLowerCase());
    const token = WEEKDAY_TOKENS[index];
    if (token === undefined) {
      return fail(`unknown day ${name}`, name);
    }
    byDay.add(token);
  }
  return ok<Recurrence>({ frequency: 'WEEKLY', interval: pattern.interval, byDay });
}

export function toRRuleText(recurrence: Recurrence): string {
  return unwrap(encodeRRule(recurrence));
}

export function fromRRuleText(text: string): Recurrence {
  return unwrap(decodeRRule(text));
}

export function toWirePattern(recurrence: Recurrence, startDate?: string): PatternPayload {
  return unwrap(encodeWirePattern(recurrence, startDate));
}

export function fromWirePattern(payload: unknown): Recurrence {
  return unwrap(decodeWirePattern(payload));
}

function canonicalDays(days: ReadonlySet<WeekdayToken>): WeekdayToken[] {
  return WEEKDAY_TOKENS.filter((token) => days.has(token));
}

function toGraphDay(token: WeekdayToken): GraphDay {
  return GRAPH_DAYS[WEEKDAY_TOKENS.indexOf(token)] ?? 'monday';
}

function checkInterval(recurrence: Recurrence): TranslationResult<never> | undefined {
  if (!Number.isSafeInteger(recurrence.interval) || recurrence.interval < 1) {
    return fail('interval must be a positive integer', String(recurrence.interval));
  }
  return undefined;
}

function ok<T>(value: T): TranslationResult<T> {
  return { ok: true, value };
}

function fail(reason: string, fragment: string): { ok: false; error: UnsupportedRecurrenceError } {
  return { ok: false, error: new UnsupportedRecurrenceError(reason, fragment) };
}

function unwrap<T>(result: TranslationResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
