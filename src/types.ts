/**
 * @module types
 *
 * Shared type definitions for the ipgeo-bin lookup engine.
 *
 * This module defines the data structures that flow between the decoding
 * stages:
 *
 * - **Field** — one bit per optional attribute, combined into request masks
 * - **DatabaseHeader / FamilyTable** — parsed fixed header and the derived
 *   per-family row geometry
 * - **FieldSlot / FieldLayout** — per-field column placement for one
 *   database type
 * - **GeoRecord** — the assembled lookup result
 */

// ─── Fields ─────────────────────────────────────────────────────────────────

/**
 * Optional attribute bits.
 *
 * Masks are built by OR-ing members together, e.g.
 * `Field.CountryShort | Field.City`. {@link Field.All} requests every
 * attribute the database edition carries.
 */
export const Field = {
  CountryShort: 0x00001,
  CountryLong: 0x00002,
  Region: 0x00004,
  City: 0x00008,
  Isp: 0x00010,
  Latitude: 0x00020,
  Longitude: 0x00040,
  Domain: 0x00080,
  ZipCode: 0x00100,
  TimeZone: 0x00200,
  NetSpeed: 0x00400,
  IddCode: 0x00800,
  AreaCode: 0x01000,
  WeatherStationCode: 0x02000,
  WeatherStationName: 0x04000,
  Mcc: 0x08000,
  Mnc: 0x10000,
  MobileBrand: 0x20000,
  Elevation: 0x40000,
  UsageType: 0x80000,
  All: 0xfffff,
} as const;

/** A single {@link Field} member. */
export type Field = (typeof Field)[keyof typeof Field];

/** Any combination of {@link Field} bits. */
export type FieldMask = number;

/** Attribute names as they appear on {@link GeoRecord}. */
export type FieldName = keyof GeoRecord;

// ─── Addresses ──────────────────────────────────────────────────────────────

/** IP address family tag. */
export type AddressFamily = 4 | 6;

/**
 * A textual address reduced to its family and unsigned integer value.
 *
 * IPv4 magnitudes fit in 32 bits, IPv6 magnitudes in 128 bits; both are
 * carried as `bigint` so the search engine compares them uniformly.
 */
export interface NormalizedAddress {
  family: AddressFamily;
  magnitude: bigint;
}

// ─── Header ─────────────────────────────────────────────────────────────────

/** Database build date as stored in the header (two-digit year). */
export interface BuildDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * Row table geometry for one address family.
 *
 * `baseAddress` and `indexBaseAddress` are 1-based file positions. An
 * `indexBaseAddress` of `0` means the family has no bucket index.
 */
export interface FamilyTable {
  readonly family: AddressFamily;
  readonly rowCount: number;
  readonly baseAddress: number;
  readonly indexBaseAddress: number;
  /** Bytes per row: `4 × columns` for IPv4, `16 + 4 × (columns − 1)` for IPv6. */
  readonly rowSize: number;
}

/**
 * Parsed fixed-size file header plus derived row geometry. Frozen, together
 * with its nested objects, by {@link parseHeader}.
 */
export interface DatabaseHeader {
  readonly databaseType: number;
  readonly columnCount: number;
  readonly buildDate: BuildDate;
  readonly ipv4: FamilyTable;
  readonly ipv6: FamilyTable;
}

// ─── Layout ─────────────────────────────────────────────────────────────────

/**
 * Placement of one attribute inside a row.
 *
 * `offset` is meaningful only when `enabled` is `true`. It is measured from
 * the first 4-byte-equivalent column, i.e. after skipping the 12 extra
 * range-start bytes on IPv6 rows.
 */
export interface FieldSlot {
  /** 1-based column index, `0` when the edition lacks the attribute. */
  column: number;
  offset: number;
  enabled: boolean;
}

/** Per-attribute placement for one database type. */
export type FieldLayout = Readonly<Record<FieldName, FieldSlot>>;

// ─── Record ─────────────────────────────────────────────────────────────────

/**
 * Result of a lookup.
 *
 * Attributes outside the requested mask, or absent from the database
 * edition, keep their empty defaults (`''` or `0`).
 */
export interface GeoRecord {
  countryShort: string;
  countryLong: string;
  region: string;
  city: string;
  isp: string;
  latitude: number;
  longitude: number;
  domain: string;
  zipCode: string;
  timeZone: string;
  netSpeed: string;
  iddCode: string;
  areaCode: string;
  weatherStationCode: string;
  weatherStationName: string;
  mcc: string;
  mnc: string;
  mobileBrand: string;
  elevation: number;
  usageType: string;
}
