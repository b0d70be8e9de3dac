/**
 * @module search/extract
 *
 * Decode the requested attributes of a matched row.
 */

import type { BinaryReader } from '../bin/reader.js';
import { FIELD_BITS, FIELD_NAMES } from '../bin/schema.js';
import { emptyRecord } from '../record.js';
import type { AddressFamily, FieldLayout, FieldMask, FieldName, GeoRecord } from '../types.js';

/**
 * Bytes by which an IPv6 `ipFrom` column is wider than an IPv4 one. Column
 * offsets are computed for 4-byte columns, so IPv6 rows shift by this much.
 */
const IPV6_ROW_SHIFT = 12;

/** Width of the two-letter country code slot that precedes the long name. */
const COUNTRY_SHORT_SLOT = 3;

/**
 * Read every attribute that is both requested in `mask` and enabled in
 * `layout`. All other attributes keep their zero value.
 *
 * A failed read rejects the whole extraction; no partial record is returned.
 *
 * @param rowOffset - 1-based position of the matched row.
 */
export async function extractFields(
  reader: BinaryReader,
  rowOffset: number,
  family: AddressFamily,
  layout: FieldLayout,
  mask: FieldMask,
): Promise<GeoRecord> {
  const base = family === 6 ? rowOffset + IPV6_ROW_SHIFT : rowOffset;
  const record = emptyRecord();

  const pointer = (name: FieldName) => reader.readUint32(base + layout[name].offset);

  for (const name of FIELD_NAMES) {
    if ((mask & FIELD_BITS[name]) === 0 || !layout[name].enabled) continue;

    switch (name) {
      case 'latitude':
      case 'longitude':
        record[name] = await reader.readFloat32(base + layout[name].offset);
        break;
      case 'elevation':
        record.elevation = parseElevation(await reader.readString(await pointer(name)));
        break;
      case 'countryLong':
        record.countryLong = await reader.readString((await pointer(name)) + COUNTRY_SHORT_SLOT);
        break;
      default:
        record[name] = await reader.readString(await pointer(name));
    }
  }

  return record;
}

/** Signed decimal with optional fraction and exponent, nothing around it. */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Elevation is stored as text. Anything that is not wholly a decimal number
 * (`"12m"`, `""`, `"0x10"`, `" 12 "`) reads as `0`; parsed values are
 * rounded to single precision.
 */
export function parseElevation(text: string): number {
  if (!DECIMAL_PATTERN.test(text)) return 0;
  const value = Number(text);
  return Number.isFinite(value) ? Math.fround(value) : 0;
}
