/**
 * @module connector
 *
 * Positional byte-range access interface for BIN database files.
 *
 * A {@link Connector} hides the transport details of a storage backend
 * (local filesystem, memory, HTTP, S3) behind a uniform byte-range read API.
 * The decoder never holds a seek cursor: every read names its own offset, so
 * concurrent lookups sharing one connector cannot interleave incorrectly.
 *
 * Connectors are **path-agnostic** -- a single instance can serve reads
 * against several database files, with paths interpreted in a
 * backend-specific format (filesystem paths, URLs, S3 URIs, memory keys).
 *
 * Implementations manage their own resources (file handles, SDK clients)
 * and release them when {@link Connector.close} is called.
 *
 * Built-in implementations:
 *
 * - {@link LocalConnector} -- Node.js filesystem with LRU file-handle pooling
 * - {@link MemoryConnector} -- preloaded byte arrays
 * - {@link HttpConnector} -- HTTP(S) with Range Requests and retry
 * - {@link S3Connector} -- AWS S3 (and compatible stores) via `@aws-sdk/client-s3`
 */

export interface Connector {
  /**
   * Read a contiguous byte range from the resource at `path`.
   *
   * @param path - Connector-specific resource identifier.
   * @param offset - Zero-based byte offset to begin reading from.
   * @param length - Number of bytes to read.
   * @returns The requested bytes. May be shorter than `length` when the
   *   resource ends before `offset + length`.
   * @throws {Error} If the resource cannot be read.
   */
  read(path: string, offset: number, length: number): Promise<Uint8Array>;

  /**
   * Release all resources held by this connector.
   *
   * Calling `close()` on an already-closed connector is a safe no-op.
   */
  close(): Promise<void>;
}
