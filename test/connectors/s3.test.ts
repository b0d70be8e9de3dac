import { describe, it, expect, afterEach, vi } from 'vitest';
import { S3Connector, parseS3Path, type S3RangeClient } from '../../src/connectors/s3.js';
import { GeoDatabase } from '../../src/database.js';
import { buildMockBin, ip4 } from '../helpers/mock-bin.js';

// ── Mock client ─────────────────────────────────────────────────────────────

/** Simulated S3 object store: keys are "bucket/key" */
type ObjectStore = Record<string, Uint8Array>;

function createMockClient(store: ObjectStore) {
  const getObjectRange = vi.fn(async (bucket: string, key: string, range: string): Promise<Uint8Array | null> => {
    const objectKey = `${bucket}/${key}`;
    const data = store[objectKey];
    if (!data) throw new Error(`NoSuchKey: ${objectKey}`);

    const match = range.match(/^bytes=(\d+)-(\d+)$/);
    if (!match) throw new Error(`Invalid Range header: ${range}`);

    return data.slice(Number(match[1]), Number(match[2]) + 1);
  });
  const destroy = vi.fn();
  const client: S3RangeClient = { getObjectRange, destroy };
  return { client, getObjectRange, destroy };
}

// ── Test data ───────────────────────────────────────────────────────────────

// 256 sequential bytes: value at index i === i
const TEST_BYTES = Uint8Array.from({ length: 256 }, (_, i) => i);

const STORE: ObjectStore = {
  'test-bucket/geo/DB1.BIN': TEST_BYTES,
  'other-bucket/nested/path/DB24.BIN': TEST_BYTES,
};

// ── Tests ───────────────────────────────────────────────────────────────────

describe('parseS3Path', () => {
  it('should parse s3:// URIs', () => {
    expect(parseS3Path('s3://test-bucket/geo/DB1.BIN')).toEqual({ bucket: 'test-bucket', key: 'geo/DB1.BIN' });
  });

  it('should parse bare bucket/key paths', () => {
    expect(parseS3Path('other-bucket/nested/path/DB24.BIN'))
      .toEqual({ bucket: 'other-bucket', key: 'nested/path/DB24.BIN' });
  });

  it('should reject paths without a key', () => {
    expect(() => parseS3Path('bucket-only')).toThrow('Invalid S3 path (no key): bucket-only');
    expect(() => parseS3Path('s3://bucket-only/')).toThrow('Invalid S3 path (no key): s3://bucket-only/');
    expect(() => parseS3Path('/key')).toThrow('Invalid S3 path');
  });
});

describe('S3Connector', () => {
  let connector: S3Connector | undefined;

  afterEach(async () => {
    if (connector) await connector.close();
    connector = undefined;
  });

  describe('read', () => {
    it('should read a byte range', async () => {
      const mock = createMockClient(STORE);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      const result = await connector.read('s3://test-bucket/geo/DB1.BIN', 10, 5);

      expect([...result]).toEqual([10, 11, 12, 13, 14]);
      expect(mock.getObjectRange).toHaveBeenCalledWith('test-bucket', 'geo/DB1.BIN', 'bytes=10-14');
    });

    it('should request a single byte at offset 0', async () => {
      const mock = createMockClient(STORE);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      expect([...await connector.read('test-bucket/geo/DB1.BIN', 0, 1)]).toEqual([0]);
      expect(mock.getObjectRange.mock.calls[0][2]).toBe('bytes=0-0');
    });

    it('should propagate S3 errors', async () => {
      const mock = createMockClient(STORE);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      await expect(connector.read('s3://missing/DB1.BIN', 0, 1)).rejects.toThrow('NoSuchKey: missing/DB1.BIN');
    });

    it('should throw on an empty response body', async () => {
      const mock = createMockClient(STORE);
      mock.getObjectRange.mockResolvedValueOnce(null);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      await expect(connector.read('s3://test-bucket/geo/DB1.BIN', 4, 2))
        .rejects.toThrow('Empty response body for s3://test-bucket/geo/DB1.BIN [4-5]');
    });

    it('should reject a path without a key before calling S3', async () => {
      const mock = createMockClient(STORE);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      await expect(connector.read('s3://bucket-only', 0, 1)).rejects.toThrow('Invalid S3 path');
      expect(mock.getObjectRange).not.toHaveBeenCalled();
    });
  });

  describe('close', () => {
    it('should destroy the client once', async () => {
      const mock = createMockClient(STORE);
      connector = new S3Connector({ region: 'us-east-1', client: mock.client });

      await connector.read('s3://test-bucket/geo/DB1.BIN', 0, 1);
      await connector.close();
      await connector.close();

      expect(mock.destroy).toHaveBeenCalledOnce();
    });
  });

  it('should serve a database from an object store', async () => {
    const mock = createMockClient({
      'geo-data/DB1.BIN': buildMockBin({
        databaseType: 1,
        ipv4: [
          { from: 0n, values: { countryShort: '-', countryLong: '-' } },
          { from: ip4(203, 0, 113, 0), values: { countryShort: 'NZ', countryLong: 'New Zealand' } },
          { from: ip4(203, 0, 114, 0), values: { countryShort: '-', countryLong: '-' } },
        ],
      }),
    });
    connector = new S3Connector({ region: 'us-east-1', client: mock.client });

    const db = await GeoDatabase.open('s3://geo-data/DB1.BIN', { connector, logLevel: 'silent' });
    const record = await db.getCountryLong('203.0.113.9');

    expect(record.countryLong).toBe('New Zealand');
    expect(mock.getObjectRange.mock.calls[0]).toEqual(['geo-data', 'DB1.BIN', 'bytes=0-28']);
    await db.close();
  });
});
