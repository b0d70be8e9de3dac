import { describe, it, expect, vi } from 'vitest';
import { readHeader } from '../../src/bin/header.js';
import { BinaryReader } from '../../src/bin/reader.js';
import { resolveLayout } from '../../src/bin/schema.js';
import { MemoryConnector } from '../../src/connectors/memory.js';
import { DatabaseReadError } from '../../src/errors.js';
import { emptyRecord } from '../../src/record.js';
import { extractFields, parseElevation } from '../../src/search/extract.js';
import { Field, type AddressFamily, type GeoRecord } from '../../src/types.js';
import { buildMockBin, type MockValues } from '../helpers/mock-bin.js';

const FULL: GeoRecord = {
  countryShort: 'NZ',
  countryLong: 'New Zealand',
  region: 'Region One',
  city: 'Test City',
  isp: 'Example ISP',
  latitude: -41.5,
  longitude: 174.75,
  domain: 'example.net',
  zipCode: '6011',
  timeZone: '+12:00',
  netSpeed: 'DSL',
  iddCode: '64',
  areaCode: '04',
  weatherStationCode: 'NZXX0001',
  weatherStationName: 'Test Station',
  mcc: '530',
  mnc: '01',
  mobileBrand: 'TestMobile',
  elevation: 12.5,
  usageType: 'ISP',
};

async function firstRow(bytes: Uint8Array, family: AddressFamily) {
  const connector = new MemoryConnector({ 'db.bin': bytes });
  const reader = new BinaryReader(connector, 'db.bin');
  const header = await readHeader(reader);
  const table = family === 4 ? header.ipv4 : header.ipv6;
  return { connector, reader, rowOffset: table.baseAddress, layout: resolveLayout(header.databaseType) };
}

function singleRow(family: AddressFamily, values: MockValues, databaseType = 24): Uint8Array {
  const rows = [{ from: 0n, values }];
  return buildMockBin(family === 4 ? { databaseType, ipv4: rows } : { databaseType, ipv6: rows });
}

describe('extractFields', () => {
  it.each([4, 6] as const)('should decode every field of an IPv%s row', async family => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(family, FULL), family);
    expect(await extractFields(reader, rowOffset, family, layout, Field.All)).toEqual(FULL);
  });

  it('should decode only the requested fields', async () => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, FULL), 4);
    const record = await extractFields(reader, rowOffset, 4, layout, Field.CountryShort | Field.City);

    expect(record).toEqual({ ...emptyRecord(), countryShort: 'NZ', city: 'Test City' });
  });

  it('should read the long country name three bytes after the code', async () => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, FULL), 4);
    const record = await extractFields(reader, rowOffset, 4, layout, Field.CountryLong);

    expect(record).toEqual({ ...emptyRecord(), countryLong: 'New Zealand' });
  });

  it('should read the coordinates as float32', async () => {
    const values = { ...FULL, latitude: 0.1, longitude: -0.2 };
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, values), 4);
    const record = await extractFields(reader, rowOffset, 4, layout, Field.Latitude | Field.Longitude);

    expect(record.latitude).toBe(Math.fround(0.1));
    expect(record.longitude).toBe(Math.fround(-0.2));
  });

  it('should read nothing for an empty mask', async () => {
    const { connector, reader, rowOffset, layout } = await firstRow(singleRow(4, FULL), 4);
    const spy = vi.spyOn(connector, 'read');

    expect(await extractFields(reader, rowOffset, 4, layout, 0)).toEqual(emptyRecord());
    expect(spy).not.toHaveBeenCalled();
  });

  it('should leave fields the database type lacks at their zero value', async () => {
    // Type 1 carries the country pair only
    const { connector, reader, rowOffset, layout } = await firstRow(singleRow(4, FULL, 1), 4);
    const spy = vi.spyOn(connector, 'read');
    const record = await extractFields(reader, rowOffset, 4, layout, Field.All);

    expect(record).toEqual({ ...emptyRecord(), countryShort: 'NZ', countryLong: 'New Zealand' });
    // Pointer, length byte and text, once for the code and once for the name
    expect(spy).toHaveBeenCalledTimes(6);
  });

  it('should apply the country short mask like every other field', async () => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, FULL), 4);
    // Any mask with the CountryShort bit set, not only the bare bit
    const record = await extractFields(reader, rowOffset, 4, layout, Field.CountryShort | Field.Region);

    expect(record.countryShort).toBe('NZ');
    expect(record.region).toBe('Region One');
  });

  it('should read elevation text as a float', async () => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, { ...FULL, elevation: '-3.25' }), 4);
    const record = await extractFields(reader, rowOffset, 4, layout, Field.Elevation);
    expect(record.elevation).toBe(-3.25);
  });

  it('should read unparseable elevation as 0', async () => {
    const { reader, rowOffset, layout } = await firstRow(singleRow(4, { ...FULL, elevation: 'n/a' }), 4);
    const record = await extractFields(reader, rowOffset, 4, layout, Field.Elevation);
    expect(record.elevation).toBe(0);
  });

  it('should reject when a string runs past the end of the file', async () => {
    // usageType is the last string in the payload: [3, 'I', 'S', 'P']
    const bytes = singleRow(4, FULL);
    const { reader, rowOffset, layout } = await firstRow(bytes.subarray(0, bytes.length - 2), 4);

    await expect(extractFields(reader, rowOffset, 4, layout, Field.UsageType))
      .rejects.toThrow(DatabaseReadError);
    await expect(extractFields(reader, rowOffset, 4, layout, Field.All))
      .rejects.toThrow('Short read: got 1 of 3 bytes');
  });
});

describe('parseElevation', () => {
  it.each([
    ['12.5', 12.5],
    ['-3', -3],
    ['0', 0],
    ['1e3', 1000],
    ['0.1', Math.fround(0.1)],
    ['', 0],
    ['   ', 0],
    ['12m', 0],
    ['abc', 0],
    ['Infinity', 0],
    ['+4', 4],
    ['.5', 0.5],
    ['7.', 7],
    ['0x10', 0],
    ['0b11', 0],
    ['0o7', 0],
    [' 12 ', 0],
    ['1_000', 0],
  ])('should read %j as %s', (text, expected) => {
    expect(parseElevation(text)).toBe(expected);
  });
});
