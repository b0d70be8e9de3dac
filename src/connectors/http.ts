/**
 * @module connectors/http
 *
 * HTTP(S) {@link Connector} implementation using Range Requests.
 *
 * Issues `Range: bytes=...` requests through the Node.js built-in `fetch`
 * against any endpoint that supports partial content responses (status
 * 206). Includes retry with exponential backoff, and per-request timeouts via
 * `AbortController`.
 *
 * A lookup costs O(log rowCount) small reads, so this connector suits
 * low-volume lookups against a database hosted on a CDN or behind a
 * pre-signed URL; latency-sensitive callers should prefer
 * {@link LocalConnector} or {@link MemoryConnector}.
 */

import type { Connector } from './connector.js';

/**
 * Configuration options for {@link HttpConnector}.
 */
export interface HttpConnectorOptions {
  /**
   * Default headers sent with every request (authorization tokens,
   * user-agent strings, ...).
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Retry configuration for transient failures.
   *
   * Retries are attempted on HTTP 5xx, HTTP 429, network errors, and
   * timeouts. Backoff between attempts is `backoff * 2^attempt` ms.
   *
   * @defaultValue \{ attempts: 3, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts (including the initial request). */
    attempts: number;
    /** Base backoff delay in milliseconds before the first retry. */
    backoff: number;
  };
}

/**
 * HTTP(S) connector using the built-in `fetch` with Range Requests.
 *
 * @example
 * ```typescript
 * import { GeoDatabase, HttpConnector } from 'ipgeo-bin';
 *
 * const db = await GeoDatabase.open('https://cdn.example.com/geo/DB11.BIN', {
 *   connector: new HttpConnector({ timeout: 5_000, retry: { attempts: 5, backoff: 100 } }),
 * });
 * ```
 */
export class HttpConnector implements Connector {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;

  constructor(options?: HttpConnectorOptions) {
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30_000;
    this.retryAttempts = options?.retry?.attempts ?? 3;
    this.retryBackoff = options?.retry?.backoff ?? 200;
  }

  /**
   * Read a contiguous byte range with a
   * `Range: bytes=offset-(offset+length-1)` request.
   *
   * A 200 response from a server that ignores `Range` is sliced down to
   * the requested window.
   *
   * @throws {Error} If the server answers with a non-success status after
   *   retries are exhausted.
   */
  async read(path: string, offset: number, length: number): Promise<Uint8Array> {
    const end = offset + length - 1;
    const response = await this.fetchWithRetry(path, {
      headers: {
        ...this.headers,
        Range: `bytes=${offset}-${end}`,
      },
    });

    if (!response.ok) {
      throw new Error(
        `HTTP ${response.status} reading ${path} [${offset}-${end}]`,
      );
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    if (response.status === 206) return bytes;

    // Full body: the server ignored the Range header
    return bytes.subarray(Math.min(offset, bytes.length), Math.min(offset + length, bytes.length));
  }

  /**
   * No-op: `fetch` keeps no connections that need explicit cleanup.
   */
  async close(): Promise<void> {
    // Nothing to release
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async fetchWithRetry(url: string, init: RequestInit): Promise<Response> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeout);

      try {
        const response = await fetch(url, {
          ...init,
          signal: controller.signal,
        });

        // Retry on 5xx or 429
        if (response.status >= 500 || response.status === 429) {
          lastError = new Error(`HTTP ${response.status}`);
          if (attempt < this.retryAttempts - 1) {
            await sleep(this.retryBackoff * Math.pow(2, attempt));
            continue;
          }
        }

        return response;
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        if (attempt < this.retryAttempts - 1) {
          await sleep(this.retryBackoff * Math.pow(2, attempt));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw lastError ?? new Error(`Failed to fetch ${url}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
