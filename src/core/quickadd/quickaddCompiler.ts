import type { Instant, TimezoneContext } from '../time/types.js';
import type { Recurrence } from '../recurrence/types.js';
import type { TimedEvent } from '../events/types.js';
import { localizeDateTime, resolveZone } from '../time/timezone.js';
import { looksLikeTime, resolveRelativeDate, resolveTimeOfDay } from '../time/temporalTokens.js';
import { validateEvent } from '../events/validation.js';
import { QuickaddParseError } from '../../utils/errors.js';

export interface QuickaddDraft {
  subject: string;
  start: Instant;
  end: Instant;
  location?: string;
}

export interface DraftExtras {
  body?: string;
  attendees?: Iterable<string>;
  reminder?: number;
  recurrence?: Recurrence;
}

interface TimeClause {
  dateToken?: string;
  startTime: string;
  endTime?: string;
  durationMinutes?: number;
}

export const DEFAULT_DURATION_MINUTES = 60;
const DURATION = /^(?:(\d+)h(?:(\d+)m(?:ins?)?)?|(\d+)m(?:ins?)?)$/;
const MERIDIEM_SUFFIX = /^[ap]\.?m\.?$/;
const HOUR_OR_CLOCK = /^\d{1,2}(?::\d{2})?$/;
const RANGE = /^(.+?)-(.+)$/;

/**
 * Parse quickadd text into an event draft.
 * Shape: "<date>? <time>[ <duration>]: <subject>[ @ <location>]", e.g.
 * "Tomorrow 4pm: Coffee with Ali @ Cafe Nero", "fri 9:30am for 45m: Standup",
 * "next monday 2pm-3:30pm: Planning".
 */
export function compileQuickadd(text: string, now: Date, ctx: TimezoneContext): QuickaddDraft {
  const separator = findSeparator(text);
  const timeClause = separator === -1 ? '' : text.slice(0, separator).trim();
  if (!timeClause) {
    throw new QuickaddParseError('missing time clause', text);
  }

  const { subject, location } = splitContent(text.slice(separator + 1));
  if (!subject) {
    throw new QuickaddParseError('empty subject', text);
  }

  const clause = parseTimeClause(timeClause);
  const date = resolveRelativeDate(clause.dateToken ?? 'today', now, resolveZone(ctx));
  const start = localizeDateTime(date, resolveTimeOfDay(clause.startTime), ctx);

  let end: Instant;
  if (clause.endTime !== undefined) {
    end = localizeDateTime(date, resolveTimeOfDay(clause.endTime), ctx);
    if (end.toMillis() <= start.toMillis()) {
      throw new QuickaddParseError('end before start', timeClause);
    }
  } else {
    end = start.plus({ minutes: clause.durationMinutes ?? DEFAULT_DURATION_MINUTES });
  }

  return location ? { subject, start, end, location } : { subject, start, end };
}

export function draftToEvent(draft: QuickaddDraft, extras: DraftExtras = {}): TimedEvent {
  const event: TimedEvent = {
    subject: draft.subject,
    allDay: false,
    start: draft.start,
    end: draft.end,
    attendees: new Set(extras.attendees ?? []),
  };
  if (draft.location !== undefined) event.location = draft.location;
  if (extras.body !== undefined) event.body = extras.body;
  if (extras.reminder !== undefined) event.reminder = extras.reminder;
  if (extras.recurrence !== undefined) event.recurrence = extras.recurrence;
  validateEvent(event);
  return event;
}

function parseTimeClause(clause: string): TimeClause {
  const tokens = mergeMeridiem(clause.toLowerCase().split(/\s+/));

  let durationMinutes: number | undefined;
  const remaining: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? '';
    const isFor = token === 'for';
    const candidate = isFor ? tokens[i + 1] : token;
    const minutes = candidate === undefined ? undefined : parseDuration(candidate);
    if (minutes === undefined) {
      if (isFor) throw new QuickaddParseError('invalid duration', clause);
      remaining.push(token);
      continue;
    }
    if (durationMinutes !== undefined || minutes <= 0) {
      throw new QuickaddParseError('invalid duration', clause);
    }
    durationMinutes = minutes;
    if (isFor) i++;
  }

  const last = remaining[remaining.length - 1];
  const first = remaining[0];
  let timeToken: string;
  let dateWords: string[];
  if (last !== undefined && isTimeOrRange(last)) {
    timeToken = last;
    dateWords = remaining.slice(0, -1);
  } else if (first !== undefined && isTimeOrRange(first)) {
    timeToken = first;
    dateWords = remaining.slice(1);
  } else {
    throw new QuickaddParseError('missing time', clause);
  }

  const dateToken = dateWords.length > 0 ? dateWords.join(' ') : undefined;
  const range = splitRange(timeToken);
  if (range) {
    if (durationMinutes !== undefined) {
      throw new QuickaddParseError('invalid duration', clause);
    }
    return { dateToken, startTime: range[0], endTime: range[1] };
  }
  return { dateToken, startTime: timeToken, durationMinutes };
}

// "4 pm" -> "4pm", "4pm - 5pm" -> "4pm-5pm"
function mergeMeridiem(tokens: string[]): string[] {
  const merged: string[] = [];
  for (const token of tokens) {
    const previous = merged[merged.length - 1];
    if (previous !== undefined && MERIDIEM_SUFFIX.test(token) && HOUR_OR_CLOCK.test(previous.split('-').pop() ?? '')) {
      merged[merged.length - 1] = previous + token;
    } else if (previous !== undefined && (token === '-' || previous.endsWith('-') || token.startsWith('-'))) {
      merged[merged.length - 1] = previous + token;
    } else {
      merged.push(token);
    }
  }
  return merged;
}

function parseDuration(token: string): number | undefined {
  const match = token.match(DURATION);
  if (!match) return undefined;
  if (match[3] !== undefined) return parseInt(match[3], 10);
  return parseInt(match[1] ?? '0', 10) * 60 + parseInt(match[2] ?? '0', 10);
}

function splitRange(token: string): [string, string] | undefined {
  const match = token.match(RANGE);
  if (match?.[1] && match[2] && looksLikeTime(match[1]) && looksLikeTime(match[2])) {
    return [match[1], match[2]];
  }
  return undefined;
}

function isTimeOrRange(token: string): boolean {
  return looksLikeTime(token) || splitRange(token) !== undefined;
}

// First unescaped ':' that is not inside a clock time such as 9:30.
function findSeparator(text: string): number {
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === ':' && !(/\d/.test(text[i - 1] ?? '') && /^\d{2}/.test(text.slice(i + 1)))) {
      return i;
    }
  }
  return -1;
}

// Location starts at the last unescaped '@' with whitespace on both sides, so
// addresses such as bob@example.com stay in the subject.
function splitContent(content: string): { subject: string; location?: string } {
  let at = -1;
  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '@' && /\s/.test(content[i - 1] ?? '') && /\s/.test(content[i + 1] ?? '')) {
      at = i;
    }
  }
  if (at === -1) {
    return { subject: unescape(content).trim() };
  }
  const subject = unescape(content.slice(0, at)).trim();
  const location = unescape(content.slice(at + 1)).trim();
  return location ? { subject, location } : { subject };
}

function unescape(text: string): string {
  return text.replace(/\\(.)/g, '$1');
}
