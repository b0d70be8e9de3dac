/**
 * @module errors
 *
 * Error taxonomy for database access and lookups.
 *
 * Every failure surfaced by this library is a {@link GeoDatabaseError}
 * subclass with a stable `code`, so callers can branch on the kind of
 * failure without matching message text.
 */

/** Stable machine-readable error codes. */
export type GeoDatabaseErrorCode =
  | 'INVALID_ADDRESS'
  | 'READ_ERROR'
  | 'UNSUPPORTED_DATABASE'
  | 'DATABASE_CLOSED';

/** Base class for all errors raised by this library. */
export class GeoDatabaseError extends Error {
  readonly code: GeoDatabaseErrorCode;

  constructor(code: GeoDatabaseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GeoDatabaseError';
    this.code = code;
  }
}

/**
 * The address string is neither a valid IPv4 nor IPv6 address.
 *
 * Raised before any row is read.
 */
export class InvalidAddressError extends GeoDatabaseError {
  constructor(readonly address: string) {
    super('INVALID_ADDRESS', `Invalid IP address: ${JSON.stringify(address)}`);
    this.name = 'InvalidAddressError';
  }
}

/**
 * A byte range could not be read in full, either because the connector
 * failed or because the file ended early.
 */
export class DatabaseReadError extends GeoDatabaseError {
  constructor(
    readonly path: string,
    readonly offset: number,
    readonly length: number,
    message: string,
    cause?: unknown,
  ) {
    super('READ_ERROR', `${message} (${path} [${offset}+${length}])`, { cause });
    this.name = 'DatabaseReadError';
  }
}

/** The header declares a database type with no known column layout. */
export class UnsupportedDatabaseError extends GeoDatabaseError {
  constructor(readonly databaseType: number) {
    super('UNSUPPORTED_DATABASE', `Unsupported database type: ${databaseType}`);
    this.name = 'UnsupportedDatabaseError';
  }
}

/** A lookup was attempted after {@link GeoDatabase.close}. */
export class DatabaseClosedError extends GeoDatabaseError {
  constructor(readonly path: string) {
    super('DATABASE_CLOSED', `Database is closed: ${path}`);
    this.name = 'DatabaseClosedError';
  }
}
