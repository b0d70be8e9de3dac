/** @module bin/schema
 *
 * Column layout of every database type.
 *
 * Each database type (0–24) is a fixed edition of the file format that
 * carries a particular subset of the optional attributes at particular
 * column positions. The position table lives in
 * `data/column-positions.json`: one row per column, 25 entries per row,
 * each entry the 1-based column index for that type or `0` when the type
 * lacks the column. `countryShort` and `countryLong` share the `country`
 * column.
 *
 * The table is validated once at module load and turned into a
 * {@link FieldLayout} per type on demand.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { UnsupportedDatabaseError } from '../errors.js';
import { Field, type FieldLayout, type FieldMask, type FieldName, type FieldSlot } from '../types.js';

/** Number of known database types (`0` through `24`). */
export const DATABASE_TYPE_COUNT = 25;

const positionRow = z
  .array(z.number().int().min(0).max(255))
  .length(DATABASE_TYPE_COUNT);

const columnPositionsSchema = z
  .object({
    country: positionRow,
    region: positionRow,
    city: positionRow,
    isp: positionRow,
    latitude: positionRow,
    longitude: positionRow,
    domain: positionRow,
    zipCode: positionRow,
    timeZone: positionRow,
    netSpeed: positionRow,
    iddCode: positionRow,
    areaCode: positionRow,
    weatherStationCode: positionRow,
    weatherStationName: positionRow,
    mcc: positionRow,
    mnc: positionRow,
    mobileBrand: positionRow,
    elevation: positionRow,
    usageType: positionRow,
  })
  .strict();

/** Physical column keys; one per stored attribute column. */
export type ColumnKey = keyof z.infer<typeof columnPositionsSchema>;

/**
 * Load and validate the position table.
 *
 * @throws {Error} If the file is missing or does not match the expected shape.
 */
export function loadColumnPositions(
  url: URL = new URL('../../data/column-positions.json', import.meta.url),
): Readonly<Record<ColumnKey, readonly number[]>> {
  const raw: unknown = JSON.parse(readFileSync(url, 'utf8'));
  const result = columnPositionsSchema.safeParse(raw);
  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    throw new Error(`Invalid column position table: ${JSON.stringify(formatted)}`);
  }
  return result.data;
}

/** Column position table, indexed `[column][databaseType]`. */
export const COLUMN_POSITIONS = loadColumnPositions();

// ─── Field metadata ─────────────────────────────────────────────────────────

/** Attribute names in canonical output order. */
export const FIELD_NAMES: readonly FieldName[] = [
  'countryShort',
  'countryLong',
  'region',
  'city',
  'isp',
  'latitude',
  'longitude',
  'domain',
  'zipCode',
  'timeZone',
  'netSpeed',
  'iddCode',
  'areaCode',
  'weatherStationCode',
  'weatherStationName',
  'mcc',
  'mnc',
  'mobileBrand',
  'elevation',
  'usageType',
];

/** Request bit of each attribute. */
export const FIELD_BITS: Readonly<Record<FieldName, Field>> = {
  countryShort: Field.CountryShort,
  countryLong: Field.CountryLong,
  region: Field.Region,
  city: Field.City,
  isp: Field.Isp,
  latitude: Field.Latitude,
  longitude: Field.Longitude,
  domain: Field.Domain,
  zipCode: Field.ZipCode,
  timeZone: Field.TimeZone,
  netSpeed: Field.NetSpeed,
  iddCode: Field.IddCode,
  areaCode: Field.AreaCode,
  weatherStationCode: Field.WeatherStationCode,
  weatherStationName: Field.WeatherStationName,
  mcc: Field.Mcc,
  mnc: Field.Mnc,
  mobileBrand: Field.MobileBrand,
  elevation: Field.Elevation,
  usageType: Field.UsageType,
};

/** Column each attribute is stored in. */
export const FIELD_COLUMNS: Readonly<Record<FieldName, ColumnKey>> = {
  countryShort: 'country',
  countryLong: 'country',
  region: 'region',
  city: 'city',
  isp: 'isp',
  latitude: 'latitude',
  longitude: 'longitude',
  domain: 'domain',
  zipCode: 'zipCode',
  timeZone: 'timeZone',
  netSpeed: 'netSpeed',
  iddCode: 'iddCode',
  areaCode: 'areaCode',
  weatherStationCode: 'weatherStationCode',
  weatherStationName: 'weatherStationName',
  mcc: 'mcc',
  mnc: 'mnc',
  mobileBrand: 'mobileBrand',
  elevation: 'elevation',
  usageType: 'usageType',
};

/**
 * Attribute names selected by `mask`, in canonical order.
 */
export function fieldsInMask(mask: FieldMask): FieldName[] {
  return FIELD_NAMES.filter(name => (mask & FIELD_BITS[name]) !== 0);
}

// ─── Layout resolution ──────────────────────────────────────────────────────

/**
 * Resolve the per-attribute row placement for a database type.
 *
 * For every attribute with a nonzero column `c`, the slot is enabled with
 * `offset = (c − 1) × 4`; the same offsets serve IPv4 and IPv6 rows because
 * every column after the range start is 4 bytes wide.
 *
 * @throws {UnsupportedDatabaseError} If `databaseType` is outside 0–24.
 */
export function resolveLayout(databaseType: number): FieldLayout {
  if (!Number.isInteger(databaseType) || databaseType < 0 || databaseType >= DATABASE_TYPE_COUNT) {
    throw new UnsupportedDatabaseError(databaseType);
  }

  return Object.freeze(
    mapFields((name): FieldSlot => {
      const column = COLUMN_POSITIONS[FIELD_COLUMNS[name]][databaseType];
      return column === 0
        ? { column: 0, offset: 0, enabled: false }
        : { column, offset: (column - 1) * 4, enabled: true };
    }),
  );
}

/**
 * Build a record keyed by every attribute name.
 */
export function mapFields<T>(fn: (name: FieldName) => T): Record<FieldName, T> {
  return {
    countryShort: fn('countryShort'),
    countryLong: fn('countryLong'),
    region: fn('region'),
    city: fn('city'),
    isp: fn('isp'),
    latitude: fn('latitude'),
    longitude: fn('longitude'),
    domain: fn('domain'),
    zipCode: fn('zipCode'),
    timeZone: fn('timeZone'),
    netSpeed: fn('netSpeed'),
    iddCode: fn('iddCode'),
    areaCode: fn('areaCode'),
    weatherStationCode: fn('weatherStationCode'),
    weatherStationName: fn('weatherStationName'),
    mcc: fn('mcc'),
    mnc: fn('mnc'),
    mobileBrand: fn('mobileBrand'),
    elevation: fn('elevation'),
    usageType: fn('usageType'),
  };
}
