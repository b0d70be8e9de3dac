/**
 * @module config
 *
 * Database option resolution.
 *
 * Option values cascade through two levels:
 *
 * 1. {@link GeoDatabaseOptions} passed to `GeoDatabase.open` (highest priority)
 * 2. {@link DEFAULT_OPTIONS} built-in fallbacks
 *
 * Nothing is read from the environment.
 *
 * @example
 * ```typescript
 * const db = await GeoDatabase.open('./data/DB24.BIN', {
 *   connector: new HttpConnector({ timeout: 5_000 }),
 *   logLevel: 'debug',
 * });
 * ```
 */

import { z } from 'zod';
import type { Connector } from './connectors/connector.js';
import { LocalConnector } from './connectors/local.js';
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from './logger.js';

/**
 * Options accepted by `GeoDatabase.open`.
 *
 * Any field left `undefined` falls through to the built-in default via
 * {@link resolveOptions}.
 */
export interface GeoDatabaseOptions {
  /**
   * Byte source for the database path. The path format is interpreted by
   * the connector:
   *
   * | Connector | Path format |
   * |-----------|------------|
   * | `LocalConnector` | Filesystem path (`./data/DB24.BIN`) |
   * | `MemoryConnector` | Any registered key |
   * | `HttpConnector` | Full URL (`https://cdn.example.com/DB24.BIN`) |
   * | `S3Connector` | S3 URI (`s3://bucket/DB24.BIN`) |
   *
   * @defaultValue a new `LocalConnector`
   */
  connector?: Connector;
  /** Logger to use instead of creating one. When set, `logLevel` is ignored. */
  logger?: Logger;
  /** Level of the logger created when none is injected. @defaultValue 'warn' */
  logLevel?: LogLevel;
}

/** Options with every default applied. */
export interface ResolvedOptions {
  connector: Connector;
  logger: Logger;
}

/** Built-in values used when an option is omitted. */
export const DEFAULT_OPTIONS = {
  logLevel: 'warn',
  loggerName: 'ipgeo-bin',
} as const satisfies { logLevel: LogLevel; loggerName: string };

const connectorSchema = z.custom<Connector>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'read' in value &&
    typeof value.read === 'function' &&
    'close' in value &&
    typeof value.close === 'function',
  { message: 'Expected a connector with read and close methods' },
);

const loggerSchema = z.custom<Logger>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'debug' in value &&
    typeof value.debug === 'function' &&
    'warn' in value &&
    typeof value.warn === 'function' &&
    'error' in value &&
    typeof value.error === 'function',
  { message: 'Expected a pino-compatible logger' },
);

const optionsSchema = z
  .object({
    connector: connectorSchema.optional(),
    logger: loggerSchema.optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
  })
  .strict();

/**
 * Validate `options` and fill in defaults.
 *
 * @throws {Error} If an option has the wrong shape or `logLevel` is not a
 *   pino level.
 */
export function resolveOptions(options: GeoDatabaseOptions = {}): ResolvedOptions {
  const result = optionsSchema.safeParse(options);
  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    throw new Error(`Invalid database options: ${JSON.stringify(formatted)}`);
  }

  const { connector, logger, logLevel } = result.data;
  return {
    connector: connector ?? new LocalConnector(),
    logger: logger ?? createLogger(DEFAULT_OPTIONS.loggerName, logLevel ?? DEFAULT_OPTIONS.logLevel),
  };
}
