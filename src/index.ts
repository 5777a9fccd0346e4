#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { CalendarCliError } from './utils/errors.js';
import { createTimezoneContext, detectSystemTimezone } from './core/time/timezone.js';
import { GraphCalendarAdapter } from './adapters/calendar/GraphCalendarAdapter.js';
import { runCli } from './cli/program.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<number> {
  try {
    const config = loadConfig();
    const timezones = createTimezoneContext({
      system: detectSystemTimezone(),
      configured: config.timezone,
    });

    return await runCli(process.argv.slice(2), {
      calendar: (timezone) => new GraphCalendarAdapter(config, timezone),
      timezones,
      now: () => new Date(),
      stdout: (text) => process.stdout.write(`${text}\n`),
      stderr: (text) => process.stderr.write(`${text}\n`),
    });
  } catch (error) {
    if (error instanceof CalendarCliError) {
      process.stderr.write(`error: ${error.message}\n`);
      return 1;
    }
    logger.fatal({ error }, 'Unexpected failure');
    return 2;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ error }, 'Unexpected failure');
    process.exitCode = 2;
  }
);
