import pino from 'pino';

let correlationId: string | undefined;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// Logs go to stderr: stdout carries the command's JSON output.
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const level = process.env.LOG_LEVEL || 'warn';
  const baseLogger =
    process.env.NODE_ENV === 'development'
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              destination: 2,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino({ level }, pino.destination(2));

  if (!correlationId) {
    correlationId = generateCorrelationId();
  }

  return baseLogger.child({
    correlationId,
    ...context,
  });
}
