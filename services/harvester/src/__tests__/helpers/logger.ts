import pino from 'pino';
import type { Logger } from '../../logger.js';

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** Pino logger writing parsed records into an array. */
export function memoryLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  );
  return { logger, lines };
}

export const messages = (lines: readonly LogLine[]) => lines.map((l) => l.msg);
