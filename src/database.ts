/**
 * @module database
 *
 * Open BIN database handle and the lookup API.
 *
 * A {@link GeoDatabase} reads the header once at {@link GeoDatabase.open},
 * resolves the column layout of the file's database type, and then answers
 * point lookups with a handful of positional reads each. It keeps no cursor
 * and no cache, so any number of lookups may run concurrently over the same
 * handle.
 *
 * @example
 * ```typescript
 * import { Field, GeoDatabase } from 'ipgeo-bin';
 *
 * const db = await GeoDatabase.open('./data/DB24.BIN');
 *
 * const all = await db.query('192.0.2.1');
 * const where = await db.query('2001:db8::1', Field.CountryShort | Field.City);
 * const city = (await db.getCity('192.0.2.1')).city;
 *
 * await db.close();
 * ```
 */

import { formatBuildDate, readHeader } from './bin/header.js';
import { BinaryReader } from './bin/reader.js';
import { fieldsInMask, resolveLayout } from './bin/schema.js';
import { resolveOptions, type GeoDatabaseOptions } from './config.js';
import type { Connector } from './connectors/connector.js';
import { DatabaseClosedError, InvalidAddressError } from './errors.js';
import { bucketAddress, classifyAddress } from './ip/classify.js';
import type { Logger } from './logger.js';
import { emptyRecord } from './record.js';
import { extractFields } from './search/extract.js';
import { findRow } from './search/range-search.js';
import {
  Field,
  type DatabaseHeader,
  type FieldLayout,
  type FieldMask,
  type FieldName,
  type GeoRecord,
} from './types.js';

/** Version of the lookup API implemented by this package. */
export const API_VERSION = '8.0.3';

/**
 * Read-only handle to one BIN database file.
 *
 * Construct with {@link GeoDatabase.open}. Call {@link GeoDatabase.close}
 * when done; the connector is released then and every later lookup
 * rejects with {@link DatabaseClosedError}.
 */
export class GeoDatabase {
  /** Path the database was opened from, as understood by the connector. */
  readonly path: string;
  /** Parsed header: database type, build date and both row tables. */
  readonly meta: DatabaseHeader;

  private readonly connector: Connector;
  private readonly reader: BinaryReader;
  private readonly layout: FieldLayout;
  private readonly logger: Logger;
  private closePromise: Promise<void> | null = null;

  private constructor(
    path: string,
    meta: DatabaseHeader,
    layout: FieldLayout,
    reader: BinaryReader,
    logger: Logger,
  ) {
    this.path = path;
    this.meta = meta;
    this.layout = layout;
    this.reader = reader;
    this.connector = reader.connector;
    this.logger = logger;
  }

  /**
   * Open a database: read its header and resolve its column layout.
   *
   * When no connector is passed a {@link LocalConnector} is created, and it
   * is closed again if opening fails. An injected connector is left open.
   *
   * @throws {DatabaseReadError} If the header cannot be read.
   * @throws {UnsupportedDatabaseError} If the database type is unknown.
   * @throws {Error} If `options` are invalid.
   */
  static async open(path: string, options?: GeoDatabaseOptions): Promise<GeoDatabase> {
    const { connector, logger } = resolveOptions(options);
    const reader = new BinaryReader(connector, path);

    let meta: DatabaseHeader;
    let layout: FieldLayout;
    try {
      meta = await readHeader(reader);
      layout = resolveLayout(meta.databaseType);
    } catch (err) {
      logger.error({ err, path }, 'Failed to open database');
      if (!options?.connector) {
        await connector.close();
      }
      throw err;
    }

    logger.debug(
      { path, databaseType: meta.databaseType, buildDate: formatBuildDate(meta.buildDate) },
      'Opened database',
    );
    return new GeoDatabase(path, meta, layout, reader, logger);
  }

  /** Whether {@link GeoDatabase.close} has been called. */
  get closed(): boolean {
    return this.closePromise !== null;
  }

  // ─── Schema ────────────────────────────────────────────────────────────

  /** Whether this database's type stores `field`. */
  isFieldEnabled(field: Field): boolean {
    return fieldsInMask(field).some(name => this.layout[name].enabled);
  }

  /** Every attribute this database's type stores, in canonical order. */
  supportedFields(): FieldName[] {
    return fieldsInMask(Field.All).filter(name => this.layout[name].enabled);
  }

  // ─── Lookups ───────────────────────────────────────────────────────────

  /**
   * Look up `address` and decode the attributes selected by `fields`.
   *
   * Attributes not requested, or not stored by this database type, are
   * `''` or `0`. An address that falls in no row, or whose family has no
   * rows in this file, yields an all-empty record.
   *
   * @param address - Textual IPv4 or IPv6 address.
   * @param fields - Bitwise OR of {@link Field} flags.
   * @throws {InvalidAddressError} If `address` is not an IP address. No
   *   bytes are read.
   * @throws {DatabaseClosedError} If the database has been closed.
   * @throws {DatabaseReadError} If any read fails.
   */
  async query(address: string, fields: FieldMask = Field.All): Promise<GeoRecord> {
    if (this.closed) throw new DatabaseClosedError(this.path);

    const normalized = classifyAddress(address);
    if (!normalized) throw new InvalidAddressError(address);

    const { family, magnitude } = normalized;
    const table = family === 4 ? this.meta.ipv4 : this.meta.ipv6;
    // IPv4-only editions carry an empty IPv6 table
    if (table.rowCount === 0) return emptyRecord();

    const bucket = bucketAddress(family, magnitude, table.indexBaseAddress);

    const rowOffset = await findRow(this.reader, table, magnitude, bucket);
    if (rowOffset === null) {
      this.logger.warn({ path: this.path, address, family }, 'No row matched address');
      return emptyRecord();
    }

    return extractFields(this.reader, rowOffset, family, this.layout, fields);
  }

  /**
   * Look up several addresses concurrently. Results are in input order.
   *
   * Rejects with the first failure, as `Promise.all` does.
   */
  async queryMany(addresses: readonly string[], fields: FieldMask = Field.All): Promise<GeoRecord[]> {
    return Promise.all(addresses.map(address => this.query(address, fields)));
  }

  async getAll(address: string): Promise<GeoRecord> {
    return this.query(address, Field.All);
  }

  async getCountryShort(address: string): Promise<GeoRecord> {
    return this.query(address, Field.CountryShort);
  }

  async getCountryLong(address: string): Promise<GeoRecord> {
    return this.query(address, Field.CountryLong);
  }

  async getRegion(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Region);
  }

  async getCity(address: string): Promise<GeoRecord> {
    return this.query(address, Field.City);
  }

  async getIsp(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Isp);
  }

  async getLatitude(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Latitude);
  }

  async getLongitude(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Longitude);
  }

  async getDomain(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Domain);
  }

  async getZipCode(address: string): Promise<GeoRecord> {
    return this.query(address, Field.ZipCode);
  }

  async getTimeZone(address: string): Promise<GeoRecord> {
    return this.query(address, Field.TimeZone);
  }

  async getNetSpeed(address: string): Promise<GeoRecord> {
    return this.query(address, Field.NetSpeed);
  }

  async getIddCode(address: string): Promise<GeoRecord> {
    return this.query(address, Field.IddCode);
  }

  async getAreaCode(address: string): Promise<GeoRecord> {
    return this.query(address, Field.AreaCode);
  }

  async getWeatherStationCode(address: string): Promise<GeoRecord> {
    return this.query(address, Field.WeatherStationCode);
  }

  async getWeatherStationName(address: string): Promise<GeoRecord> {
    return this.query(address, Field.WeatherStationName);
  }

  async getMcc(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Mcc);
  }

  async getMnc(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Mnc);
  }

  async getMobileBrand(address: string): Promise<GeoRecord> {
    return this.query(address, Field.MobileBrand);
  }

  async getElevation(address: string): Promise<GeoRecord> {
    return this.query(address, Field.Elevation);
  }

  async getUsageType(address: string): Promise<GeoRecord> {
    return this.query(address, Field.UsageType);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────

  /**
   * Release the connector. Later calls return the same promise and do not
   * close it again.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.connector.close();
    }
    return this.closePromise;
  }
}
