/** @module bin/reader
 *
 * Positional little-endian primitive reads against a {@link Connector}.
 *
 * Numeric reads take **1-based** file positions, matching how the header
 * and row pointers address the file. String reads take the pointer value
 * stored in a column **as-is**: the length byte sits at that zero-based
 * offset and the characters follow it. Mixing the two conventions up shifts
 * every string by one byte.
 */

import type { Connector } from '../connectors/connector.js';
import { DatabaseReadError } from '../errors.js';

const decoder = new TextDecoder('utf-8');

/**
 * Read-only decoder for one database file.
 *
 * Holds no cursor; every call names its own position, so one reader can be
 * shared by any number of concurrent lookups.
 */
export class BinaryReader {
  readonly connector: Connector;
  readonly path: string;

  constructor(connector: Connector, path: string) {
    this.connector = connector;
    this.path = path;
  }

  // ─── Scalar reads (1-based) ───────────────────────────────────────────

  async readUint8(pos: number): Promise<number> {
    const bytes = await this.readExact(pos - 1, 1);
    return bytes[0];
  }

  async readUint32(pos: number): Promise<number> {
    const bytes = await this.readExact(pos - 1, 4);
    return view(bytes).getUint32(0, true);
  }

  /**
   * Read a 16-byte little-endian unsigned integer.
   */
  async readUint128(pos: number): Promise<bigint> {
    const bytes = await this.readExact(pos - 1, 16);
    const v = view(bytes);
    const lo = v.getBigUint64(0, true);
    const hi = v.getBigUint64(8, true);
    return (hi << 64n) | lo;
  }

  async readFloat32(pos: number): Promise<number> {
    const bytes = await this.readExact(pos - 1, 4);
    return view(bytes).getFloat32(0, true);
  }

  // ─── String reads (zero-based) ────────────────────────────────────────

  /**
   * Read a length-prefixed string whose length byte is at zero-based
   * offset `pos`.
   *
   * Bytes are decoded as UTF-8 without validation; malformed sequences
   * become U+FFFD rather than failing the lookup.
   */
  async readString(pos: number): Promise<string> {
    const [len] = await this.readExact(pos, 1);
    if (len === 0) return '';
    const bytes = await this.readExact(pos + 1, len);
    return decoder.decode(bytes);
  }

  // ─── Raw access ───────────────────────────────────────────────────────

  /**
   * Read exactly `length` bytes at zero-based `offset`.
   *
   * @throws {DatabaseReadError} On a connector failure or a short read.
   */
  async readExact(offset: number, length: number): Promise<Uint8Array> {
    if (offset < 0) {
      throw new DatabaseReadError(this.path, offset, length, 'Negative read offset');
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.connector.read(this.path, offset, length);
    } catch (err) {
      throw new DatabaseReadError(this.path, offset, length, 'Read failed', err);
    }

    if (bytes.length < length) {
      throw new DatabaseReadError(
        this.path, offset, length,
        `Short read: got ${bytes.length} of ${length} bytes`,
      );
    }
    return bytes.length === length ? bytes : bytes.subarray(0, length);
  }
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
