/**
 * @module search/range-search
 *
 * Binary search over a family's sorted row table.
 *
 * Rows are contiguous, sorted half-open ranges: row `i` covers
 * `[ipFrom(i), ipFrom(i + 1))`, and the table carries one trailing sentinel
 * row whose `ipFrom` closes the last range. The first column of each row is
 * `ipFrom`, a u32 for IPv4 and a u128 for IPv6.
 */

import type { BinaryReader } from '../bin/reader.js';
import { maxMagnitude } from '../ip/classify.js';
import type { FamilyTable } from '../types.js';

/**
 * Locate the row whose range contains `magnitude`.
 *
 * When `bucket` is nonzero the search starts from the `[low, high]` row
 * bounds stored at that index position instead of the whole table.
 *
 * The largest address of a family is looked up as `max − 1`, so it lands in
 * the last defined row rather than past the sentinel.
 *
 * @param bucket - 1-based index bucket position, or `0` for no index.
 * @returns 1-based position of the matched row, or `null` when no row
 *   matches (only possible for a corrupt table).
 */
export async function findRow(
  reader: BinaryReader,
  table: FamilyTable,
  magnitude: bigint,
  bucket: number,
): Promise<number | null> {
  const { baseAddress, rowSize } = table;

  let low = 0;
  let high = table.rowCount;
  if (bucket > 0) {
    low = await reader.readUint32(bucket);
    high = await reader.readUint32(bucket + 4);
  }

  let target = magnitude;
  if (target >= maxMagnitude(table.family)) {
    target -= 1n;
  }

  const readFrom = table.family === 4
    ? async (pos: number) => BigInt(await reader.readUint32(pos))
    : (pos: number) => reader.readUint128(pos);

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const rowOffset = baseAddress + mid * rowSize;

    const ipFrom = await readFrom(rowOffset);
    const ipTo = await readFrom(rowOffset + rowSize);

    if (target >= ipFrom && target < ipTo) {
      return rowOffset;
    }
    if (target < ipFrom) {
      high = mid - 1;
    } else {
      low = mid + 1;
    }
  }

  return null;
}
