/**
 * Performance benchmarks for ipgeo-bin.
 *
 * These benchmarks exercise address parsing on its own and lookups end-to-end
 * against synthetic databases held in memory, measuring lookups/sec.
 *
 * Run: npm run bench
 */

import { classifyAddress } from '../src/ip/classify.js';
import { MemoryConnector } from '../src/connectors/memory.js';
import { GeoDatabase } from '../src/database.js';
import { Field } from '../src/types.js';
import type { FieldMask } from '../src/types.js';
import { buildMockBin, type MockRange } from '../test/helpers/mock-bin.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function report(name: string, iterations: number, elapsed: number): void {
  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  report(name, iterations, performance.now() - start);
}

async function benchAsync(name: string, fn: (i: number) => Promise<unknown>, iterations: number): Promise<void> {
  for (let i = 0; i < Math.min(iterations, 100); i++) await fn(i);

  const start = performance.now();
  for (let i = 0; i < iterations; i++) await fn(i);
  report(name, iterations, performance.now() - start);
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

// ─── Synthetic data generators ──────────────────────────────────────────────

const COUNTRIES = [
  ['AU', 'Australia'],
  ['BR', 'Brazil'],
  ['DE', 'Germany'],
  ['JP', 'Japan'],
  ['US', 'United States of America'],
] as const;

/** `count` ranges of equal width covering the whole space below `max`. */
function generateRanges(count: number, max: bigint): MockRange[] {
  const width = max / BigInt(count);
  return Array.from({ length: count }, (_, i) => {
    const [short, long] = COUNTRIES[i % COUNTRIES.length];
    return {
      from: BigInt(i) * width,
      values: {
        countryShort: short,
        countryLong: long,
        region: `Region ${i % 97}`,
        city: `City ${i}`,
        latitude: (i % 180) - 90,
        longitude: (i % 360) - 180,
        zipCode: String(10000 + (i % 89999)),
        timeZone: '+00:00',
        elevation: i % 3000,
      },
    };
  });
}

function randomIpv4(): string {
  return Array.from({ length: 4 }, () => Math.floor(Math.random() * 256)).join('.');
}

function randomIpv6(): string {
  return Array.from({ length: 8 }, () => Math.floor(Math.random() * 0x10000).toString(16)).join(':');
}

async function openSynthetic(index: boolean): Promise<GeoDatabase> {
  const bytes = buildMockBin({
    databaseType: 24,
    ipv4: generateRanges(20000, 0xffffffffn),
    ipv6: generateRanges(5000, (1n << 128n) - 1n),
    ipv4Index: index,
    ipv6Index: index,
  });
  const connector = new MemoryConnector({ 'bench.bin': bytes });
  return GeoDatabase.open('bench.bin', { connector, logLevel: 'silent' });
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchParsing() {
  console.log('\n── Address parsing ──');

  const v4 = Array.from({ length: 1000 }, randomIpv4);
  const v6 = Array.from({ length: 1000 }, randomIpv6);
  let i = 0;

  bench('dotted IPv4', () => classifyAddress(v4[i++ % v4.length]), 200000);
  bench('full-form IPv6', () => classifyAddress(v6[i++ % v6.length]), 200000);
  bench('compressed IPv6', () => classifyAddress('2001:db8::8:800:200c:417a'), 200000);
  bench('IPv4-mapped IPv6', () => classifyAddress('::ffff:192.0.2.1'), 200000);
}

async function benchLookups(index: boolean) {
  console.log(`\n── Lookups (${index ? 'with' : 'without'} index) ──`);

  const db = await openSynthetic(index);
  const v4 = Array.from({ length: 1000 }, randomIpv4);
  const v6 = Array.from({ length: 1000 }, randomIpv6);

  const cases: Array<[string, string[], FieldMask]> = [
    ['IPv4 country only', v4, Field.CountryShort],
    ['IPv4 all fields', v4, Field.All],
    ['IPv6 country only', v6, Field.CountryShort],
    ['IPv6 all fields', v6, Field.All],
  ];

  for (const [label, addresses, mask] of cases) {
    await benchAsync(label, i => db.query(addresses[i % addresses.length], mask), 20000);
  }

  await db.close();
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  ipgeo-bin Performance Benchmarks                                    ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchParsing();
await benchLookups(true);
await benchLookups(false);

console.log('\nDone.');
