/**
 * @module connectors/s3
 *
 * Amazon S3 {@link Connector} implementation using AWS SDK v3.
 *
 * Reads byte ranges via `GetObject` with the `Range` header. The
 * `@aws-sdk/client-s3` package is loaded lazily at first use so that
 * applications not using S3 pay no import cost.
 *
 * Compatible with any S3-compatible object store (MinIO, Cloudflare R2,
 * Backblaze B2, etc.) via the `endpoint` and `forcePathStyle` options.
 */

import type { S3ClientConfig } from '@aws-sdk/client-s3';
import type { Connector } from './connector.js';

/**
 * The slice of an S3 client this connector needs: ranged object reads and
 * teardown. The default implementation wraps `S3Client` + `GetObjectCommand`.
 */
export interface S3RangeClient {
  /**
   * Fetch `range` (an HTTP `bytes=start-end` expression) of an object.
   *
   * @returns The body bytes, or `null` when the response has no body.
   */
  getObjectRange(bucket: string, key: string, range: string): Promise<Uint8Array | null>;
  /** Release the underlying HTTP connection pool. */
  destroy(): void;
}

/**
 * Configuration options for {@link S3Connector}.
 */
export interface S3ConnectorOptions {
  /** AWS region for the S3 client (e.g. `"us-east-1"`). */
  region: string;
  /**
   * Explicit AWS credentials.
   *
   * When omitted, the SDK falls back to the default credential provider
   * chain (environment variables, shared credentials file, instance
   * metadata, ...).
   */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  /** Custom endpoint URL for S3-compatible object stores. */
  endpoint?: string;
  /** Force path-style addressing (`endpoint/bucket/key`). */
  forcePathStyle?: boolean;
  /**
   * Pre-built range client. When set, the SDK is never loaded and the
   * region/credential options are ignored.
   */
  client?: S3RangeClient;
}

/**
 * Parse an S3 path into bucket and key.
 *
 * - `"s3://my-bucket/geo/DB24.BIN"` -> `{ bucket: "my-bucket", key: "geo/DB24.BIN" }`
 * - `"my-bucket/geo/DB24.BIN"` -> `{ bucket: "my-bucket", key: "geo/DB24.BIN" }`
 *
 * @throws {Error} If the path has no key portion.
 */
export function parseS3Path(path: string): { bucket: string; key: string } {
  let normalized = path;
  if (normalized.startsWith('s3://')) {
    normalized = normalized.slice(5);
  }
  const slashIdx = normalized.indexOf('/');
  if (slashIdx <= 0 || slashIdx === normalized.length - 1) {
    throw new Error(`Invalid S3 path (no key): ${path}`);
  }
  return {
    bucket: normalized.slice(0, slashIdx),
    key: normalized.slice(slashIdx + 1),
  };
}

/**
 * Load `@aws-sdk/client-s3` and wrap a new `S3Client` as an
 * {@link S3RangeClient}.
 *
 * @throws {Error} If the optional peer dependency is not installed.
 */
async function createSdkClient(options: S3ConnectorOptions): Promise<S3RangeClient> {
  let sdk: typeof import('@aws-sdk/client-s3');
  try {
    sdk = await import('@aws-sdk/client-s3');
  } catch (err) {
    throw new Error(
      'S3Connector requires @aws-sdk/client-s3 as a peer dependency. ' +
      'Install it with: npm install @aws-sdk/client-s3',
      { cause: err },
    );
  }

  const config: S3ClientConfig = { region: options.region };
  if (options.credentials) config.credentials = options.credentials;
  if (options.endpoint) config.endpoint = options.endpoint;
  if (options.forcePathStyle) config.forcePathStyle = true;

  const client = new sdk.S3Client(config);

  return {
    async getObjectRange(bucket, key, range) {
      const response = await client.send(
        new sdk.GetObjectCommand({ Bucket: bucket, Key: key, Range: range }),
      );
      if (!response.Body) return null;
      return response.Body.transformToByteArray();
    },
    destroy() {
      client.destroy();
    },
  };
}

/**
 * S3 connector using AWS SDK v3 (`@aws-sdk/client-s3`).
 *
 * The SDK is an optional **peer dependency** -- it is only loaded when this
 * connector performs its first read. Call {@link S3Connector.close} to
 * destroy the client.
 *
 * @example
 * ```typescript
 * import { GeoDatabase, S3Connector } from 'ipgeo-bin';
 *
 * const db = await GeoDatabase.open('s3://geo-data/DB24.BIN', {
 *   connector: new S3Connector({ region: 'eu-west-1' }),
 * });
 * ```
 */
export class S3Connector implements Connector {
  private readonly options: S3ConnectorOptions;
  private client: S3RangeClient | null;
  private clientPromise: Promise<S3RangeClient> | null = null;

  /**
   * Construction is synchronous and never throws; the client is created on
   * the first read.
   */
  constructor(options: S3ConnectorOptions) {
    this.options = options;
    this.client = options.client ?? null;
  }

  /**
   * Read a contiguous byte range from an S3 object.
   *
   * @throws {Error} If the response body is empty, the SDK call fails, or
   *   the peer dependency is missing.
   */
  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const client = await this.getClient();
    const { bucket, key } = parseS3Path(path);
    const end = offset + length - 1;

    const body = await client.getObjectRange(bucket, key, `bytes=${offset}-${end}`);
    if (!body) {
      throw new Error(`Empty response body for ${path} [${offset}-${end}]`);
    }
    return body;
  }

  /**
   * Destroy the client and release its connection pool. Safe to call twice.
   */
  async close(): Promise<void> {
    this.clientPromise = null;
    if (this.client) {
      this.client.destroy();
      this.client = null;
    }
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * Return the cached client, creating it on first use. Concurrent callers
   * during initialization share one promise.
   */
  private getClient(): Promise<S3RangeClient> {
    if (this.client) return Promise.resolve(this.client);

    if (!this.clientPromise) {
      this.clientPromise = this.initClient();
    }

    return this.clientPromise;
  }

  private async initClient(): Promise<S3RangeClient> {
    try {
      this.client = await createSdkClient(this.options);
      return this.client;
    } catch (err) {
      this.clientPromise = null; // allow retry on failure
      throw err;
    }
  }
}
