import { pino, destination, type Logger } from 'pino';
import type { Env } from './env.js';

export type { Logger };

// Diagnostics go to stderr so stdout stays clean for tables and exports.
export function createLogger(level: Env['LOG_LEVEL']): Logger {
  return pino(
    {
      name: 'pharmaops',
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination(2),
  );
}
