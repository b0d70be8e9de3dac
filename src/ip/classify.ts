/**
 * @module ip/classify
 *
 * Textual IP address → `(family, magnitude)` normalization, plus the index
 * bucket address derived from the magnitude's top 16 bits.
 *
 * IPv4-mapped IPv6 addresses (`::ffff:192.0.2.1`, `::ffff:c000:201`) are
 * reported as family 4 with the embedded IPv4 value, so they are looked up
 * in the IPv4 table.
 */

import type { AddressFamily, NormalizedAddress } from '../types.js';

/** Largest IPv4 magnitude, `2^32 − 1`. */
export const MAX_IPV4 = 0xffffffffn;

/** Largest IPv6 magnitude, `2^128 − 1`. */
export const MAX_IPV6 = (1n << 128n) - 1n;

/** Bits 32–127 of an IPv4-mapped IPv6 address (`::ffff:0:0/96`). */
const IPV4_MAPPED_PREFIX = 0xffffn;

const DECIMAL_OCTET = /^(0|[1-9]\d{0,2})$/;
const HEX_GROUP = /^[0-9a-fA-F]{1,4}$/;

/**
 * Parse a dotted-quad IPv4 address.
 *
 * Octets must be decimal without leading zeros and at most 255.
 *
 * @returns The 32-bit value, or `null` when the text is not an IPv4 address.
 */
export function parseIpv4(text: string): bigint | null {
  const parts = text.split('.');
  if (parts.length !== 4) return null;

  let value = 0n;
  for (const part of parts) {
    if (!DECIMAL_OCTET.test(part)) return null;
    const octet = Number.parseInt(part, 10);
    if (octet > 255) return null;
    value = (value << 8n) | BigInt(octet);
  }
  return value;
}

/**
 * Parse an IPv6 address in full, `::`-compressed, or trailing dotted-quad
 * form. Zone identifiers and prefix lengths are rejected.
 *
 * @returns The 128-bit value, or `null` when the text is not an IPv6 address.
 */
export function parseIpv6(text: string): bigint | null {
  if (text.length === 0 || text.length > 45) return null;

  const halves = text.split('::');
  if (halves.length > 2) return null;

  const head = parseGroups(halves[0]);
  const tail = halves.length === 2 ? parseGroups(halves[1]) : EMPTY_GROUPS;
  if (head === null || tail === null) return null;

  // A dotted quad may only end the address
  if (halves.length === 2 && head.hasDottedQuad) return null;

  const groups = [...head.groups, ...tail.groups];
  if (halves.length === 2) {
    // "::" stands for at least one zero group
    if (groups.length > 7) return null;
    const zeros = new Array<number>(8 - groups.length).fill(0);
    groups.splice(head.groups.length, 0, ...zeros);
  } else if (groups.length !== 8) {
    return null;
  }

  let value = 0n;
  for (const group of groups) {
    value = (value << 16n) | BigInt(group);
  }
  return value;
}

interface ParsedGroups {
  groups: readonly number[];
  hasDottedQuad: boolean;
}

const EMPTY_GROUPS: ParsedGroups = { groups: [], hasDottedQuad: false };

/**
 * Parse one side of a `::` split into 16-bit groups. An empty side yields no
 * groups. A trailing dotted quad contributes two groups.
 */
function parseGroups(section: string): ParsedGroups | null {
  if (section === '') return EMPTY_GROUPS;

  const parts = section.split(':');
  const groups: number[] = [];
  let hasDottedQuad = false;

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (part.includes('.')) {
      if (i !== parts.length - 1) return null;
      const v4 = parseIpv4(part);
      if (v4 === null) return null;
      groups.push(Number(v4 >> 16n), Number(v4 & 0xffffn));
      hasDottedQuad = true;
    } else {
      if (!HEX_GROUP.test(part)) return null;
      groups.push(Number.parseInt(part, 16));
    }
  }

  return { groups, hasDottedQuad };
}

/**
 * Classify a textual address and compute its integer value.
 *
 * @returns `null` when the text is neither IPv4 nor IPv6.
 *
 * @example
 * ```typescript
 * classifyAddress('192.0.2.1');        // { family: 4, magnitude: 3221225985n }
 * classifyAddress('::ffff:192.0.2.1'); // { family: 4, magnitude: 3221225985n }
 * classifyAddress('2001:db8::1');      // { family: 6, magnitude: 0x20010db8...01n }
 * classifyAddress('not-an-ip');        // null
 * ```
 */
export function classifyAddress(text: string): NormalizedAddress | null {
  const v4 = parseIpv4(text);
  if (v4 !== null) return { family: 4, magnitude: v4 };

  const v6 = parseIpv6(text);
  if (v6 === null) return null;

  if (v6 >> 32n === IPV4_MAPPED_PREFIX) {
    return { family: 4, magnitude: v6 & MAX_IPV4 };
  }
  return { family: 6, magnitude: v6 };
}

/**
 * Compute the 1-based position of the index bucket covering `magnitude`.
 *
 * Buckets are keyed by the top 16 bits of the address and sit 8 bytes
 * apart (two u32 row bounds each).
 *
 * @returns The bucket position, or `0` when the family has no index.
 */
export function bucketAddress(
  family: AddressFamily,
  magnitude: bigint,
  indexBaseAddress: number,
): number {
  if (indexBaseAddress <= 0) return 0;
  const prefix = family === 4 ? magnitude >> 16n : magnitude >> 112n;
  return Number(prefix << 3n) + indexBaseAddress;
}

/** Largest magnitude representable in `family`. */
export function maxMagnitude(family: AddressFamily): bigint {
  return family === 4 ? MAX_IPV4 : MAX_IPV6;
}
