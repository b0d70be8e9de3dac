/**
 * @module record
 *
 * Zero-valued records and their plain-text rendering.
 */

import { FIELD_NAMES, mapFields } from './bin/schema.js';
import type { FieldName, GeoRecord } from './types.js';

/**
 * A record with every string `''` and every number `0`.
 *
 * Returned for lookups that match no row, and used as the starting point
 * for field extraction.
 */
export function emptyRecord(): GeoRecord {
  return {
    countryShort: '',
    countryLong: '',
    region: '',
    city: '',
    isp: '',
    latitude: 0,
    longitude: 0,
    domain: '',
    zipCode: '',
    timeZone: '',
    netSpeed: '',
    iddCode: '',
    areaCode: '',
    weatherStationCode: '',
    weatherStationName: '',
    mcc: '',
    mnc: '',
    mobileBrand: '',
    elevation: 0,
    usageType: '',
  };
}

/** Output label of each attribute. */
export const RECORD_LABELS: Readonly<Record<FieldName, string>> = mapFields(
  name => name === 'countryShort' ? 'country_short'
    : name === 'countryLong' ? 'country_long'
    : name.toLowerCase(),
);

/**
 * Render a record as one `label: value` line per attribute, in canonical
 * order, each line ending in `\n`. Numbers are printed with six decimals.
 *
 * @example
 * ```typescript
 * formatRecord(emptyRecord()).split('\n')[5]; // 'latitude: 0.000000'
 * ```
 */
export function formatRecord(record: GeoRecord): string {
  let out = '';
  for (const name of FIELD_NAMES) {
    const value = record[name];
    const text = typeof value === 'number' ? value.toFixed(6) : value;
    out += `${RECORD_LABELS[name]}: ${text}\n`;
  }
  return out;
}
