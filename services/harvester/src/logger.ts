import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** File descriptor for log output; stdout is reserved for harvest output. */
  fd?: number;
}

/**
 * Structured logger handed to the catalogue client, pool and resolver.
 * Records are written as `{ msg, ... }` objects.
 */
export function createLogger({ level = 'info', fd = 2 }: LoggerOptions = {}): Logger {
  return pino(
    {
      level,
      base: { service: 'geoharvest' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd, sync: true }),
  );
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
