import { describe, it, expect, afterEach, vi } from 'vitest';
import { HttpConnector } from '../../src/connectors/http.js';
import { GeoDatabase } from '../../src/database.js';
import { buildMockBin, ip4 } from '../helpers/mock-bin.js';

const URL = 'https://cdn.example.com/geo/DB3.BIN';

/** Answer Range requests from `data`, the way a static file host does. */
function serve(data: Uint8Array) {
  return vi.fn(async (_url: string, init?: RequestInit) => {
    const range = new Headers(init?.headers).get('Range') ?? '';
    const match = range.match(/^bytes=(\d+)-(\d+)$/);
    if (!match) return new Response(data, { status: 200 });
    const start = Number(match[1]);
    const end = Number(match[2]);
    return new Response(data.slice(start, end + 1), { status: 206 });
  });
}

function rangeOf(fetchMock: ReturnType<typeof serve>, call: number): string | null {
  return new Headers(fetchMock.mock.calls[call][1]?.headers).get('Range');
}

describe('HttpConnector', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should request the byte range with default headers', async () => {
    const fetchMock = serve(Uint8Array.from({ length: 32 }, (_, i) => i));
    vi.stubGlobal('fetch', fetchMock);

    const connector = new HttpConnector({ headers: { Authorization: 'Bearer test-secret' } });
    const bytes = await connector.read(URL, 10, 3);

    expect([...bytes]).toEqual([10, 11, 12]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(URL);
    expect(rangeOf(fetchMock, 0)).toBe('bytes=10-12');
    expect(new Headers(fetchMock.mock.calls[0][1]?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('should slice a full response from a server that ignores Range', async () => {
    const data = Uint8Array.from({ length: 10 }, (_, i) => i);
    vi.stubGlobal('fetch', vi.fn(async () => new Response(data, { status: 200 })));

    const connector = new HttpConnector();
    expect([...await connector.read(URL, 3, 4)]).toEqual([3, 4, 5, 6]);
    expect([...await connector.read(URL, 8, 4)]).toEqual([8, 9]);
  });

  it('should retry transient statuses', async () => {
    const fetchMock = vi.fn(async () => new Response(new Uint8Array([7]), { status: 206 }));
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 503 }));
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 429 }));
    vi.stubGlobal('fetch', fetchMock);

    const connector = new HttpConnector({ retry: { attempts: 3, backoff: 0 } });

    expect([...await connector.read(URL, 0, 1)]).toEqual([7]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should fail with the last status once retries are exhausted', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 500 }));
    vi.stubGlobal('fetch', fetchMock);

    const connector = new HttpConnector({ retry: { attempts: 2, backoff: 0 } });

    await expect(connector.read(URL, 0, 4)).rejects.toThrow(`HTTP 500 reading ${URL} [0-3]`);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should not retry client errors', async () => {
    const fetchMock = vi.fn(async () => new Response(null, { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    const connector = new HttpConnector({ retry: { attempts: 3, backoff: 0 } });

    await expect(connector.read(URL, 4, 4)).rejects.toThrow(`HTTP 404 reading ${URL} [4-7]`);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry network errors and rethrow the last one', async () => {
    const fetchMock = vi.fn(async (): Promise<Response> => {
      throw new Error('socket hang up');
    });
    vi.stubGlobal('fetch', fetchMock);

    const connector = new HttpConnector({ retry: { attempts: 3, backoff: 0 } });

    await expect(connector.read(URL, 0, 1)).rejects.toThrow('socket hang up');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should serve a database over range requests', async () => {
    const fetchMock = serve(buildMockBin({
      databaseType: 3,
      ipv4: [
        { from: 0n, values: { countryShort: '-', countryLong: '-' } },
        { from: ip4(198, 51, 100, 0), values: { countryShort: 'CA', countryLong: 'Canada', city: 'Test Town' } },
        { from: ip4(198, 51, 101, 0), values: { countryShort: '-', countryLong: '-' } },
      ],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const db = await GeoDatabase.open(URL, { connector: new HttpConnector(), logLevel: 'silent' });
    const record = await db.getCity('198.51.100.200');

    expect(record.city).toBe('Test Town');
    expect(rangeOf(fetchMock, 0)).toBe('bytes=0-28');
    await db.close();
  });
});
