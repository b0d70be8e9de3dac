/**
 * @module ipgeo-bin
 *
 * Public API surface for the ipgeo-bin library.
 *
 * ipgeo-bin resolves IPv4 and IPv6 addresses to geolocation records stored
 * in range-sorted BIN database files. A database is opened once and then
 * answers point lookups with a few positional reads each; the bytes can
 * come from local disk, memory, an HTTP server or S3.
 *
 * ---
 *
 * ### Lookups
 *
 * | Export | Purpose |
 * |--------|---------|
 * | {@link GeoDatabase} | Open handle: `query`, `queryMany`, one `get*` per attribute, `close` |
 * | {@link Field} | Attribute bits combined into request masks |
 * | {@link formatRecord} | `label: value` text rendering of a record |
 *
 * ---
 *
 * ### Connectors
 *
 * Connectors abstract byte-range I/O across storage backends. Each
 * implements the {@link Connector} interface:
 *
 * | Connector | Backend | Path format |
 * |-----------|---------|-------------|
 * | {@link LocalConnector} | Local filesystem (Node.js `FileHandle`) | `./data/DB24.BIN` |
 * | {@link MemoryConnector} | Preloaded `Uint8Array` | any key |
 * | {@link HttpConnector} | HTTP/HTTPS with Range Requests | `https://cdn.example.com/DB24.BIN` |
 * | {@link S3Connector} | AWS S3 / S3-compatible stores | `s3://bucket/DB24.BIN` |
 *
 * ---
 *
 * ### Errors
 *
 * Every failure is a {@link GeoDatabaseError} with a stable `code`:
 * {@link InvalidAddressError}, {@link DatabaseReadError},
 * {@link UnsupportedDatabaseError}, {@link DatabaseClosedError}.
 */

// ─── Lookups ────────────────────────────────────────────────────────────────

export { GeoDatabase, API_VERSION } from './database.js';
export { Field } from './types.js';
export { emptyRecord, formatRecord } from './record.js';
export { formatBuildDate } from './bin/header.js';
export { classifyAddress } from './ip/classify.js';

// ─── Connectors ─────────────────────────────────────────────────────────────

export { LocalConnector } from './connectors/local.js';
export { MemoryConnector } from './connectors/memory.js';
export { HttpConnector } from './connectors/http.js';
export { S3Connector } from './connectors/s3.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  GeoDatabaseError,
  InvalidAddressError,
  DatabaseReadError,
  UnsupportedDatabaseError,
  DatabaseClosedError,
} from './errors.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { Connector } from './connectors/connector.js';
export type { LocalConnectorOptions } from './connectors/local.js';
export type { HttpConnectorOptions } from './connectors/http.js';
export type { S3ConnectorOptions, S3RangeClient } from './connectors/s3.js';
export type { GeoDatabaseOptions } from './config.js';
export type { LogLevel } from './logger.js';
export type { GeoDatabaseErrorCode } from './errors.js';
export type {
  AddressFamily,
  BuildDate,
  DatabaseHeader,
  FamilyTable,
  FieldMask,
  FieldName,
  GeoRecord,
  NormalizedAddress,
} from './types.js';
