import { readFile } from 'node:fs/promises';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { CalendarPort } from '../ports/CalendarPort.js';
import type { CalendarEvent, EventFields, EventTiming, WireEvent } from '../core/events/types.js';
import type { TimezoneContext } from '../core/time/types.js';
import { compileQuickadd, draftToEvent, DEFAULT_DURATION_MINUTES } from '../core/quickadd/quickaddCompiler.js';
import { toWire } from '../core/events/eventMapper.js';
import { validateEvent } from '../core/events/validation.js';
import { applyEventEdit, type EventEdit } from '../core/events/eventEdit.js';
import { fromRRuleText, toRRuleText, toWirePattern } from '../core/recurrence/recurrenceTranslator.js';
import { resolveRelativeDate } from '../core/time/temporalTokens.js';
import {
  addDays,
  allDayBounds,
  createTimezoneContext,
  inZone,
  isCalendarDate,
  localizeEdit,
  resolveZone,
} from '../core/time/timezone.js';
import { readIcsEvents, type SkippedIcsEvent } from '../adapters/ics/icsReader.js';
import { AuthenticationError, CalendarCliError, IcsImportError, InvalidEventError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export interface CliDependencies {
  /** Builds the calendar client for the zone a command resolved to. */
  calendar: (timezone: string) => CalendarPort;
  timezones: TimezoneContext;
  now: () => Date;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface ZoneOption {
  tz?: string;
}

const logger = createLogger({ component: 'cli' });

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseMinutes(value: string): number {
  const minutes = Number(value);
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvalidArgumentError('Expected a non-negative whole number of minutes.');
  }
  return minutes;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new InvalidArgumentError('Expected a positive whole number of days.');
  }
  return days;
}

export function buildProgram(deps: CliDependencies): Command {
  const print = (value: unknown): void => deps.stdout(JSON.stringify(value, null, 2));
  const zones = (options: ZoneOption): TimezoneContext =>
    options.tz === undefined
      ? deps.timezones
      : createTimezoneContext({ ...deps.timezones, override: options.tz });
  const printEvents = (events: CalendarEvent[]): void => print(events.map(toWire));

  const program = new Command('quickcal')
    .description('Calendar client with natural-language quickadd')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text.trimEnd()),
      writeErr: (text) => deps.stderr(text.trimEnd()),
    });

  program
    .command('quickadd <text...>')
    .description('Create an event from text, e.g. "Tomorrow 4pm: Coffee with Ali @ Cafe Nero"')
    .option('--tz <zone>', 'Timezone override for this command')
    .option('--attendee <email>', 'Invite an attendee (repeatable)', collect, [])
    .option('--reminder <minutes>', 'Reminder before start', parseMinutes)
    .option('--repeat <rrule>', 'Recurrence, e.g. FREQ=WEEKLY;BYDAY=MO,WE')
    .option('--body <text>', 'Event description')
    .option('--dry-run', 'Print the event without creating it')
    .action(
      async (
        words: string[],
        options: ZoneOption & {
          attendee: string[];
          reminder?: number;
          repeat?: string;
          body?: string;
          dryRun?: boolean;
        }
      ) => {
        const ctx = zones(options);
        const draft = compileQuickadd(words.join(' '), deps.now(), ctx);
        const event = draftToEvent(draft, {
          attendees: options.attendee,
          reminder: options.reminder,
          recurrence: options.repeat === undefined ? undefined : fromRRuleText(options.repeat),
          body: options.body,
        });
        logger.debug({ subject: event.subject, start: event.start.toISO() }, 'Compiled quickadd');
        if (options.dryRun) {
          print(toWire(event));
          return;
        }
        print(toWire(await deps.calendar(resolveZone(ctx)).add(event)));
      }
    );

  program
    .command('add <subject>')
    .description('Create an event from explicit fields')
    .option('--tz <zone>', 'Timezone override for this command')
    .requiredOption('--start <when>', 'Start: ISO date-time, or a day (today, fri, YYYY-MM-DD) with --all-day')
    .option('--end <when>', 'End: ISO date-time (default one hour after start), or the last day with --all-day')
    .option('--all-day', 'Create an all-day event')
    .option('--location <text>', 'Event location')
    .option('--body <text>', 'Event description')
    .option('--attendee <email>', 'Invite an attendee (repeatable)', collect, [])
    .option('--reminder <minutes>', 'Reminder before start', parseMinutes)
    .option('--repeat <rrule>', 'Recurrence, e.g. FREQ=WEEKLY;BYDAY=MO,WE')
    .option('--dry-run', 'Print the event without creating it')
    .action(
      async (
        subject: string,
        options: ZoneOption & {
          start: string;
          end?: string;
          allDay?: boolean;
          location?: string;
          body?: string;
          attendee: string[];
          reminder?: number;
          repeat?: string;
          dryRun?: boolean;
        }
      ) => {
        const ctx = zones(options);
        const fields: EventFields = { subject: subject.trim(), attendees: new Set(options.attendee) };
        if (options.location !== undefined) fields.location = options.location;
        if (options.body !== undefined) fields.body = options.body;
        if (options.reminder !== undefined) fields.reminder = options.reminder;
        if (options.repeat !== undefined) fields.recurrence = fromRRuleText(options.repeat);

        const timing = options.allDay
          ? allDayTiming(options.start, options.end, deps.now(), ctx)
          : timedTiming(options.start, options.end, ctx);
        const event: CalendarEvent = { ...fields, ...timing };
        validateEvent(event);

        if (options.dryRun) {
          print(toWire(event));
          return;
        }
        print(toWire(await deps.calendar(resolveZone(ctx)).add(event)));
      }
    );

  program
    .command('import <file>')
    .description('Create the events of an iCalendar (.ics) file')
    .option('--tz <zone>', 'Zone for floating times and for the created events')
    .option('--dry-run', 'Print the events without creating them')
    .action(async (file: string, options: ZoneOption & { dryRun?: boolean }) => {
      const ctx = zones(options);
      let text: string;
      try {
        text = await readFile(file, 'utf8');
      } catch (error) {
        throw new IcsImportError('cannot read file', file, { cause: error });
      }

      const { events, skipped } = readIcsEvents(text, ctx);
      const calendar = options.dryRun ? undefined : deps.calendar(resolveZone(ctx));
      const imported: WireEvent[] = [];
      const failed: SkippedIcsEvent[] = [...skipped];
      for (const event of events) {
        if (!calendar) {
          imported.push(toWire(event));
          continue;
        }
        try {
          imported.push(toWire(await calendar.add(event)));
        } catch (error) {
          if (error instanceof AuthenticationError || !(error instanceof CalendarCliError)) {
            throw error;
          }
          failed.push({ subject: event.subject, reason: error.message });
        }
      }

      for (const entry of failed) {
        deps.stderr(`skipped ${entry.uid ?? entry.subject ?? 'event'}: ${entry.reason}`);
      }
      print({ imported, skipped: failed });
    });

  program
    .command('agenda')
    .description('List events from a start date')
    .option('--tz <zone>', 'Timezone override for this command')
    .option('--from <date>', 'First day: today, tomorrow, a weekday or YYYY-MM-DD', 'today')
    .option('--days <n>', 'Number of days', parseDays, 7)
    .action(async (options: ZoneOption & { from: string; days: number }) => {
      const ctx = zones(options);
      const first = resolveRelativeDate(options.from, deps.now(), resolveZone(ctx));
      const { start, end } = allDayBounds(first, addDays(first, options.days - 1), ctx);
      printEvents(await deps.calendar(resolveZone(ctx)).agenda(start, end));
    });

  program
    .command('show <id>')
    .description('Show one event')
    .option('--tz <zone>', 'Timezone override for this command')
    .action(async (id: string, options: ZoneOption) => {
      print(toWire(await deps.calendar(resolveZone(zones(options))).get(id)));
    });

  program
    .command('search <query>')
    .description('Search event subjects from today onwards')
    .option('--tz <zone>', 'Timezone override for this command')
    .option('--days <n>', 'Number of days to search', parseDays, 30)
    .action(async (query: string, options: ZoneOption & { days: number }) => {
      const ctx = zones(options);
      const first = resolveRelativeDate('today', deps.now(), resolveZone(ctx));
      const { start, end } = allDayBounds(first, addDays(first, options.days - 1), ctx);
      printEvents(await deps.calendar(resolveZone(ctx)).search(query, start, end));
    });

  program
    .command('edit <id>')
    .description('Replace fields of an existing event')
    .option('--tz <zone>', 'Timezone override for this command')
    .option('--subject <text>', 'New subject')
    .option('--location <text>', 'New location')
    .option('--no-location', 'Remove the location')
    .option('--body <text>', 'New description')
    .option('--no-body', 'Remove the description')
    .option('--start <datetime>', 'New start (ISO; a date for all-day events)')
    .option('--end <datetime>', 'New end (ISO; exclusive date for all-day events)')
    .option('--attendee <email>', 'Replace attendees (repeatable)', collect, [])
    .option('--no-attendees', 'Remove all attendees')
    .option('--reminder <minutes>', 'New reminder', parseMinutes)
    .option('--no-reminder', 'Remove the reminder')
    .option('--repeat <rrule>', 'New recurrence')
    .option('--no-repeat', 'Remove the recurrence')
    .action(
      async (
        id: string,
        options: ZoneOption & {
          subject?: string;
          location?: string | boolean;
          body?: string | boolean;
          start?: string;
          end?: string;
          attendee: string[];
          attendees?: boolean;
          reminder?: number | boolean;
          repeat?: string | boolean;
        }
      ) => {
        const ctx = zones(options);
        const calendar = deps.calendar(resolveZone(ctx));
        const existing = await calendar.get(id);

        const edit: EventEdit = {
          subject: options.subject,
          location: replacement(options.location),
          body: replacement(options.body),
          reminder: replacement(options.reminder),
          recurrence: mapReplacement(replacement(options.repeat), fromRRuleText),
          timing: editTiming(existing, options.start, options.end, ctx),
        };
        if (options.attendees === false) {
          if (options.attendee.length > 0) {
            throw new InvalidEventError('--attendee and --no-attendees conflict', options.attendee.join(', '));
          }
          edit.attendees = [];
        } else if (options.attendee.length > 0) {
          edit.attendees = options.attendee;
        }

        const updated = applyEventEdit(existing, edit);
        print(toWire(await calendar.update(id, updated)));
      }
    );

  program
    .command('delete <id>')
    .description('Delete an event')
    .action(async (id: string) => {
      await deps.calendar(resolveZone(deps.timezones)).delete(id);
      print({ deleted: id });
    });

  program
    .command('rrule <rule>')
    .description('Validate a recurrence rule and show its calendar-service pattern')
    .action((rule: string) => {
      const recurrence = fromRRuleText(rule);
      print({ rrule: toRRuleText(recurrence), pattern: toWirePattern(recurrence) });
    });

  return program;
}

/** Runs one command line and returns the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CalendarCliError) {
      logger.debug({ error }, 'Command failed');
      deps.stderr(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

// Commander gives `false` for a --no-* flag, the value for the positive flag, undefined when absent.
function replacement<T>(value: T | boolean | undefined): T | null | undefined {
  if (value === false) return null;
  if (value === true) return undefined;
  return value;
}

function mapReplacement<T, U>(value: T | null | undefined, map: (input: T) => U): U | null | undefined {
  if (value === null) return null;
  if (value === undefined) return undefined;
  return map(value);
}

function editTiming(
  existing: CalendarEvent,
  start: string | undefined,
  end: string | undefined,
  ctx: TimezoneContext
): EventTiming | undefined {
  if (start === undefined && end === undefined) {
    return undefined;
  }

  if (existing.allDay) {
    const startDate = start ?? existing.start;
    const endDate = end ?? existing.end;
    if (!isCalendarDate(startDate) || !isCalendarDate(endDate)) {
      throw new InvalidEventError('all-day events take YYYY-MM-DD dates', `${startDate}..${endDate}`);
    }
    return { allDay: true, start: startDate, end: endDate };
  }

  // Instants given with their own offset are re-expressed in the resolved zone.
  const zone = resolveZone(ctx);
  const localized = localizeEdit({ start, end }, ctx);
  const newStart = localized.start ? inZone(localized.start, zone) : existing.start;
  const duration = existing.end.diff(existing.start);
  const newEnd = localized.end
    ? inZone(localized.end, zone)
    : localized.start
      ? newStart.plus(duration)
      : existing.end;
  return { allDay: false, start: newStart, end: newEnd };
}

function timedTiming(start: string, end: string | undefined, ctx: TimezoneContext): EventTiming {
  const zone = resolveZone(ctx);
  const localized = localizeEdit({ start, end }, ctx);
  if (!localized.start) {
    throw new InvalidEventError('missing start', start);
  }
  const newStart = inZone(localized.start, zone);
  const newEnd = localized.end
    ? inZone(localized.end, zone)
    : newStart.plus({ minutes: DEFAULT_DURATION_MINUTES });
  return { allDay: false, start: newStart, end: newEnd };
}

// `last` is the final day of the event, inclusive.
function allDayTiming(
  first: string,
  last: string | undefined,
  now: Date,
  ctx: TimezoneContext
): EventTiming {
  const zone = resolveZone(ctx);
  const start = resolveRelativeDate(first, now, zone);
  const lastDay = last === undefined ? start : resolveRelativeDate(last, now, zone);
  if (lastDay < start) {
    throw new InvalidEventError('last day is before first day', `${start}..${lastDay}`);
  }
  return { allDay: true, start, end: addDays(lastDay, 1) };
}
