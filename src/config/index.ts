import { Info } from 'luxon';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Microsoft Graph
  accessToken: z.string().min(1).optional(),
  graphBaseUrl: z.string().url().default('https://graph.microsoft.com/v1.0'),
  calendarId: z.string().min(1).default('primary'),

  // App
  timezone: z
    .string()
    .refine((zone) => Info.isValidIANAZone(zone), { message: 'not a valid IANA timezone' })
    .optional(), // Optional: falls back to the system zone
  requestTimeoutMs: z.coerce.number().int().positive().default(15000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    accessToken: env('QUICKCAL_ACCESS_TOKEN'),
    graphBaseUrl: env('QUICKCAL_GRAPH_URL'),
    calendarId: env('QUICKCAL_CALENDAR_ID'),
    timezone: env('QUICKCAL_TIMEZONE'),
    requestTimeoutMs: env('QUICKCAL_TIMEOUT_MS'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
