/** @module bin/header
 *
 * BIN database header parser.
 *
 * The first 29 bytes of every file describe its edition and where the row
 * tables live. All positions below are 1-based and all integers
 * little-endian:
 *
 * | Pos | Field                | Type |
 * | --- | -------------------- | ---- |
 * |  1  | databaseType         | u8   |
 * |  2  | columnCount          | u8   |
 * |  3  | year (two digits)    | u8   |
 * |  4  | month                | u8   |
 * |  5  | day                  | u8   |
 * |  6  | ipv4RowCount         | u32  |
 * | 10  | ipv4BaseAddress      | u32  |
 * | 14  | ipv6RowCount         | u32  |
 * | 18  | ipv6BaseAddress      | u32  |
 * | 22  | ipv4IndexBaseAddress | u32  |
 * | 26  | ipv6IndexBaseAddress | u32  |
 *
 * Only the header sits at a fixed place. The bucket indexes, the two row
 * tables and the string payload are found through the addresses it stores.
 */

import type { BinaryReader } from './reader.js';
import type { BuildDate, DatabaseHeader, FamilyTable } from '../types.js';

/** Byte length of the fixed header. */
export const HEADER_SIZE = 29;

/** Width of one IPv4 column, and of every IPv6 column except the range start. */
const COLUMN_WIDTH = 4;

/** Width of the IPv6 range-start column. */
const IPV6_ADDRESS_WIDTH = 16;

/**
 * Parse the fixed header from the first {@link HEADER_SIZE} bytes of a file.
 *
 * Row sizes are derived here so that lookups never recompute them:
 * IPv4 rows are `4 × columnCount` bytes, IPv6 rows are
 * `16 + 4 × (columnCount − 1)` bytes. The result and its nested objects
 * are frozen.
 *
 * @param bytes - Raw bytes starting at file offset 0.
 * @throws {Error} If fewer than {@link HEADER_SIZE} bytes are given.
 */
export function parseHeader(bytes: Uint8Array): DatabaseHeader {
  if (bytes.length < HEADER_SIZE) {
    throw new Error(`Not enough bytes to read database header: ${bytes.length} < ${HEADER_SIZE}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  // 1-based positions from the table above
  const u8 = (pos: number) => view.getUint8(pos - 1);
  const u32 = (pos: number) => view.getUint32(pos - 1, true);

  const columnCount = u8(2);

  const buildDate: BuildDate = { year: u8(3), month: u8(4), day: u8(5) };
  const ipv4: FamilyTable = {
    family: 4,
    rowCount: u32(6),
    baseAddress: u32(10),
    indexBaseAddress: u32(22),
    rowSize: COLUMN_WIDTH * columnCount,
  };
  const ipv6: FamilyTable = {
    family: 6,
    rowCount: u32(14),
    baseAddress: u32(18),
    indexBaseAddress: u32(26),
    rowSize: IPV6_ADDRESS_WIDTH + COLUMN_WIDTH * Math.max(columnCount - 1, 0),
  };

  return Object.freeze({
    databaseType: u8(1),
    columnCount,
    buildDate: Object.freeze(buildDate),
    ipv4: Object.freeze(ipv4),
    ipv6: Object.freeze(ipv6),
  });
}

/**
 * Read and parse the header through a {@link BinaryReader}.
 *
 * @throws {DatabaseReadError} If the file is shorter than the header.
 */
export async function readHeader(reader: BinaryReader): Promise<DatabaseHeader> {
  const bytes = await reader.readExact(0, HEADER_SIZE);
  return parseHeader(bytes);
}

/**
 * Render a build date as `YYYY-MM-DD`, assuming the two-digit year is in
 * the 2000s.
 */
export function formatBuildDate(date: BuildDate): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${2000 + date.year}-${pad(date.month)}-${pad(date.day)}`;
}
