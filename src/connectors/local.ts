/**
 * @module connectors/local
 *
 * Local filesystem {@link Connector} implementation.
 *
 * Uses Node.js `FileHandle.read()` with an explicit position for every
 * call, so no file cursor is shared between concurrent lookups. Handles are
 * kept in an LRU pool to bound the number of open descriptors when one
 * connector serves several database files.
 */

import { open, type FileHandle } from 'node:fs/promises';
import type { Connector } from './connector.js';

/**
 * Maximum number of bytes per individual `FileHandle.read()` call.
 *
 * Node's `fs.read` binding requires `length` to fit in an `Int32`. Larger
 * reads are split into sequential chunks and reassembled.
 */
const MAX_READ_CHUNK = 1024 * 1024 * 1024; // 1 GiB

/**
 * Configuration options for {@link LocalConnector}.
 */
export interface LocalConnectorOptions {
  /**
   * Maximum number of file handles kept open in the LRU pool.
   *
   * @defaultValue 16
   */
  maxOpenFiles?: number;
}

/**
 * Local filesystem connector using Node.js `FileHandle` with LRU pooling.
 *
 * @example
 * ```typescript
 * import { GeoDatabase, LocalConnector } from 'ipgeo-bin';
 *
 * const db = await GeoDatabase.open('./data/DB24.BIN', {
 *   connector: new LocalConnector({ maxOpenFiles: 4 }),
 * });
 * ```
 */
export class LocalConnector implements Connector {
  private readonly maxOpenFiles: number;
  /** LRU pool: Map preserves insertion order; most recently used is moved to end */
  private readonly handles = new Map<string, FileHandle>();
  /** In-flight opens, so concurrent first reads share one descriptor */
  private readonly opening = new Map<string, Promise<FileHandle>>();

  constructor(options?: LocalConnectorOptions) {
    this.maxOpenFiles = options?.maxOpenFiles ?? 16;
  }

  /**
   * Read a contiguous byte range from a local file.
   *
   * The returned array is shorter than `length` when the file ends first.
   *
   * @throws {Error} If the file cannot be opened or read (`ENOENT`, `EACCES`, ...).
   */
  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const handle = await this.getHandle(path);
    const buf = Buffer.alloc(length);

    if (length <= MAX_READ_CHUNK) {
      const { bytesRead } = await handle.read(buf, 0, length, offset);
      return new Uint8Array(buf.buffer, buf.byteOffset, bytesRead);
    }

    let totalRead = 0;
    let remaining = length;
    while (remaining > 0) {
      const chunk = Math.min(remaining, MAX_READ_CHUNK);
      const { bytesRead } = await handle.read(buf, totalRead, chunk, offset + totalRead);
      totalRead += bytesRead;
      if (bytesRead < chunk) break; // EOF
      remaining -= bytesRead;
    }

    return new Uint8Array(buf.buffer, buf.byteOffset, totalRead);
  }

  /**
   * Close all pooled file handles.
   *
   * A later read reopens the file on demand.
   */
  async close(): Promise<void> {
    const handles = [...this.handles.values()];
    this.handles.clear();
    await Promise.all(handles.map(h => h.close()));
  }

  /** Number of descriptors currently held in the pool. */
  get openFiles(): number {
    return this.handles.size;
  }

  // ─── Handle pool ────────────────────────────────────────────────────

  private async getHandle(path: string): Promise<FileHandle> {
    const existing = this.handles.get(path);
    if (existing) {
      this.handles.delete(path);
      this.handles.set(path, existing);
      return existing;
    }

    const pending = this.opening.get(path);
    if (pending) return pending;

    const opened = this.openHandle(path);
    this.opening.set(path, opened);
    try {
      return await opened;
    } finally {
      this.opening.delete(path);
    }
  }

  private async openHandle(path: string): Promise<FileHandle> {
    const handle = await open(path, 'r');
    this.handles.set(path, handle);

    if (this.handles.size > this.maxOpenFiles) {
      const oldest = this.handles.entries().next();
      if (!oldest.done) {
        const [oldestPath, oldestHandle] = oldest.value;
        this.handles.delete(oldestPath);
        await oldestHandle.close();
      }
    }

    return handle;
  }
}
