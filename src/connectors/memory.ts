/**
 * @module connectors/memory
 *
 * In-memory {@link Connector} over preloaded byte arrays.
 *
 * Useful when the whole database fits comfortably in memory (lookups then
 * cost no syscalls) and for building fixtures in tests. Reads return
 * zero-copy `subarray` views.
 */

import type { Connector } from './connector.js';

/**
 * Connector serving reads from byte arrays registered under a path key.
 *
 * @example
 * ```typescript
 * const bytes = await readFile('./data/DB24.BIN');
 * const connector = new MemoryConnector({ 'DB24.BIN': bytes });
 * const db = await GeoDatabase.open('DB24.BIN', { connector });
 * ```
 */
export class MemoryConnector implements Connector {
  private readonly files = new Map<string, Uint8Array>();

  constructor(files?: Record<string, Uint8Array>) {
    if (files) {
      for (const [path, bytes] of Object.entries(files)) {
        this.files.set(path, bytes);
      }
    }
  }

  /** Register (or replace) the bytes served for `path`. */
  set(path: string, bytes: Uint8Array): void {
    this.files.set(path, bytes);
  }

  /**
   * @throws {Error} If no bytes are registered for `path`.
   */
  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const bytes = this.files.get(path);
    if (!bytes) {
      throw new Error(`ENOENT: no in-memory file registered for ${path}`);
    }
    const start = Math.min(Math.max(offset, 0), bytes.length);
    const end = Math.min(start + length, bytes.length);
    return bytes.subarray(start, end);
  }

  /** Drops every registered file. */
  async close(): Promise<void> {
    this.files.clear();
  }
}
