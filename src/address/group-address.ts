/**
 * IPv6 group address parsing and formatting.
 *
 * Accepts the usual colon notation (with `::` compression and an optional
 * trailing dotted IPv4 part). Input whose hextet separators were dropped,
 * such as `ff12c909:3199:...`, is recovered by splitting long segments into
 * 4-character chunks before giving up.
 *
 * @module address/group-address
 */

import { ProbeError, ProbeErrorCode } from '../errors.js';
import { log } from '../log.js';

// ============================================================================
// Constants
// ============================================================================

export const ADDRESS_BYTES = 16;
const HEXTET_COUNT = 8;
const MAX_SEGMENT_LENGTH = 4;
const MULTICAST_PREFIX = 0xff;

const HEXTET_PATTERN = /^[0-9a-f]{1,4}$/i;
const IPV4_PATTERN = /^(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})$/;

// ============================================================================
// Types
// ============================================================================

/** RFC 4291 multicast scope, from the low nibble of the second byte. */
export const MulticastScope = {
  INTERFACE_LOCAL: 0x1,
  LINK_LOCAL: 0x2,
  REALM_LOCAL: 0x3,
  ADMIN_LOCAL: 0x4,
  SITE_LOCAL: 0x5,
  ORGANIZATION_LOCAL: 0x8,
  GLOBAL: 0xe,
} as const;

export type MulticastScope = (typeof MulticastScope)[keyof typeof MulticastScope];

export interface GroupAddress {
  readonly bytes: Uint8Array;
  /** Canonical compressed form (RFC 5952). */
  readonly text: string;
  readonly isMulticast: boolean;
  /** Raw scope nibble, or null for non-multicast addresses. */
  readonly scope: number | null;
}

export type ParseAddressResult =
  | {
      readonly success: true;
      readonly address: GroupAddress;
      /** Original input when the segment-splitting recovery was needed. */
      readonly fixedFrom: string | null;
      readonly warning: string | null;
    }
  | {
      readonly success: false;
      readonly error: ProbeError;
    };

// ============================================================================
// Raw Parsing
// ============================================================================

function parseIpv4Tail(piece: string): number[] | null {
  const match = IPV4_PATTERN.exec(piece);
  if (match === null) {
    return null;
  }

  const octets: number[] = [];
  for (let i = 1; i <= 4; i += 1) {
    const octet = parseInt(match[i], 10);
    if (octet > 255) {
      return null;
    }
    octets.push(octet);
  }

  return [(octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]];
}

function parseHextets(part: string, allowIpv4Tail: boolean): number[] | null {
  if (part === '') {
    return [];
  }

  const pieces = part.split(':');
  const hextets: number[] = [];

  for (let i = 0; i < pieces.length; i += 1) {
    const piece = pieces[i];
    const isLast = i === pieces.length - 1;

    if (isLast && allowIpv4Tail && piece.includes('.')) {
      const tail = parseIpv4Tail(piece);
      if (tail === null) {
        return null;
      }
      hextets.push(...tail);
      continue;
    }

    if (!HEXTET_PATTERN.test(piece)) {
      return null;
    }
    hextets.push(parseInt(piece, 16));
  }

  return hextets;
}

/**
 * Parse IPv6 colon notation into 16 bytes, or null when malformed.
 * Zone suffixes (`%eth0`) are rejected.
 */
export function parseIpv6(text: string): Uint8Array | null {
  if (text.includes('%')) {
    return null;
  }

  const compression = text.indexOf('::');
  if (compression !== text.lastIndexOf('::')) {
    return null;
  }

  let hextets: number[];

  if (compression === -1) {
    const parsed = parseHextets(text, true);
    if (parsed === null || parsed.length !== HEXTET_COUNT) {
      return null;
    }
    hextets = parsed;
  } else {
    const left = parseHextets(text.slice(0, compression), false);
    const right = parseHextets(text.slice(compression + 2), true);
    if (left === null || right === null) {
      return null;
    }

    const missing = HEXTET_COUNT - left.length - right.length;
    if (missing < 1) {
      return null;
    }
    hextets = [...left, ...new Array<number>(missing).fill(0), ...right];
  }

  const bytes = new Uint8Array(ADDRESS_BYTES);
  for (let i = 0; i < HEXTET_COUNT; i += 1) {
    bytes[i * 2] = hextets[i] >> 8;
    bytes[i * 2 + 1] = hextets[i] & 0xff;
  }

  return bytes;
}

// ============================================================================
// Formatting
// ============================================================================

function toHextets(bytes: Uint8Array): number[] {
  const hextets: number[] = [];
  for (let i = 0; i < HEXTET_COUNT; i += 1) {
    hextets.push((bytes[i * 2] << 8) | bytes[i * 2 + 1]);
  }
  return hextets;
}

/**
 * RFC 5952 text: lower case, no leading zeros, and the longest run of two
 * or more zero hextets (first one on ties) collapsed to `::`.
 */
export function formatIpv6(bytes: Uint8Array): string {
  const hextets = toHextets(bytes);

  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;

  for (let i = 0; i <= HEXTET_COUNT; i += 1) {
    if (i < HEXTET_COUNT && hextets[i] === 0) {
      if (runStart === -1) {
        runStart = i;
      }
      continue;
    }

    if (runStart !== -1) {
      const runLength = i - runStart;
      if (runLength > bestLength) {
        bestStart = runStart;
        bestLength = runLength;
      }
      runStart = -1;
    }
  }

  const words = hextets.map((h) => h.toString(16));

  if (bestLength < 2) {
    return words.join(':');
  }

  const head = words.slice(0, bestStart).join(':');
  const tail = words.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

/** Every hextet written out as four digits. */
export function formatIpv6Expanded(bytes: Uint8Array): string {
  return toHextets(bytes)
    .map((h) => h.toString(16).padStart(4, '0'))
    .join(':');
}

// ============================================================================
// Group Address
// ============================================================================

export function isMulticastBytes(bytes: Uint8Array): boolean {
  return bytes.length === ADDRESS_BYTES && bytes[0] === MULTICAST_PREFIX;
}

export function createGroupAddress(bytes: Uint8Array): GroupAddress {
  const copy = new Uint8Array(bytes);
  const isMulticast = isMulticastBytes(copy);

  return Object.freeze({
    bytes: copy,
    text: formatIpv6(copy),
    isMulticast,
    scope: isMulticast ? copy[1] & 0x0f : null,
  });
}

export function addressEquals(a: GroupAddress, b: GroupAddress): boolean {
  if (a.bytes.length !== b.bytes.length) {
    return false;
  }
  for (let i = 0; i < a.bytes.length; i += 1) {
    if (a.bytes[i] !== b.bytes[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Split every colon-delimited segment longer than four characters into
 * four-character chunks. `ff12c909:3199` becomes `ff12:c909:3199`.
 */
export function tryFixAddress(text: string): string {
  return text
    .split(':')
    .flatMap((segment) => {
      if (segment.length <= MAX_SEGMENT_LENGTH) {
        return [segment];
      }
      const chunks: string[] = [];
      for (let i = 0; i < segment.length; i += MAX_SEGMENT_LENGTH) {
        chunks.push(segment.slice(i, i + MAX_SEGMENT_LENGTH));
      }
      return chunks;
    })
    .join(':');
}

function stripBrackets(text: string): string {
  if (text.startsWith('[') && text.endsWith(']')) {
    return text.slice(1, -1);
  }
  return text;
}

function succeed(bytes: Uint8Array, fixedFrom: string | null): ParseAddressResult {
  const address = createGroupAddress(bytes);
  const warning = address.isMulticast
    ? null
    : `address ${address.text} is not an IPv6 multicast address (ff00::/8)`;

  return { success: true, address, fixedFrom, warning };
}

/**
 * Parse a multicast group address, recovering from dropped hextet
 * separators when the direct parse fails.
 */
export function parseMulticastAddress(input: string): ParseAddressResult {
  const text = stripBrackets(input.trim());

  const direct = parseIpv6(text);
  if (direct !== null) {
    return succeed(direct, null);
  }

  const fixed = tryFixAddress(text);
  const recovered = parseIpv6(fixed);
  if (recovered !== null) {
    log.address('recovered %s as %s', text, fixed);
    return succeed(recovered, text);
  }

  return {
    success: false,
    error: new ProbeError(
      ProbeErrorCode.INVALID_ADDRESS,
      `failed to parse IPv6 address '${text}', tried '${fixed}'`
    ),
  };
}

/** Informational line for a recovered address, or null when none applies. */
export function describeRecovery(result: ParseAddressResult): string | null {
  if (!result.success || result.fixedFrom === null) {
    return null;
  }
  return `Note: fixed multicast address from '${result.fixedFrom}' -> '${result.address.text}'`;
}
