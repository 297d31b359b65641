import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const level = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? fallback;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Root logger. Components take `logger.child({ component })` so every line
 * carries where it came from.
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      base: { service: 'research-workflow' },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: ['openaiApiKey', 'firecrawlApiKey', '*.openaiApiKey', '*.firecrawlApiKey', 'req.headers.authorization'],
        censor: '<REDACTED>',
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    options.destination ?? pino.destination({ dest: 1, sync: false }),
  );
}
