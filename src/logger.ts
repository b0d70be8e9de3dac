import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/** Pino levels accepted by {@link createLogger}, most verbose first. */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(name: string, level: LogLevel = 'warn'): Logger {
  return pino({ name, level });
}
