import { describe, test, expect } from 'vitest';

import {
  addressEquals,
  describeRecovery,
  formatIpv6,
  formatIpv6Expanded,
  parseIpv6,
  parseMulticastAddress,
  tryFixAddress,
  MulticastScope,
  type GroupAddress,
} from '../../address/index.js';
import { ProbeErrorCode } from '../../errors.js';

function mustParse(text: string): GroupAddress {
  const result = parseMulticastAddress(text);
  if (!result.success) {
    throw new Error(`expected ${text} to parse: ${result.error.message}`);
  }
  return result.address;
}

function formatted(text: string): string {
  const bytes = parseIpv6(text);
  if (bytes === null) {
    throw new Error(`expected ${text} to be valid IPv6`);
  }
  return formatIpv6(bytes);
}

describe('parseIpv6', () => {
  test('accepts compressed and full notation', () => {
    expect(parseIpv6('ff02::1')).toEqual(
      new Uint8Array([0xff, 0x02, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x01])
    );
    expect(parseIpv6('::')).toEqual(new Uint8Array(16));
    expect(parseIpv6('1:2:3:4:5:6:7::')).not.toBeNull();
  });

  test('accepts a dotted IPv4 tail', () => {
    expect(formatted('::ffff:192.0.2.1')).toBe('::ffff:c000:201');
    expect(formatted('::ffff:0.0.10.0')).toBe('::ffff:0:a00');
  });

  test('rejects malformed input', () => {
    expect(parseIpv6('ff02:::1')).toBeNull();
    expect(parseIpv6('1:2:3:4:5:6:7:8:9')).toBeNull();
    expect(parseIpv6('1::2::3')).toBeNull();
    expect(parseIpv6('12345::')).toBeNull();
    expect(parseIpv6('::1.2.3.256')).toBeNull();
    expect(parseIpv6('::ffff:01.2.3.4')).toBeNull();
    expect(parseIpv6('::ffff:1.2.3.004')).toBeNull();
    expect(parseIpv6('1.2.3.4::')).toBeNull();
    expect(parseIpv6('ff02::1%eth0')).toBeNull();
    expect(parseIpv6('')).toBeNull();
  });
});

describe('formatIpv6', () => {
  test('compresses the first of equally long zero runs', () => {
    expect(formatted('2001:db8:0:0:1:0:0:1')).toBe('2001:db8::1:0:0:1');
  });

  test('leaves a single zero hextet alone', () => {
    expect(formatted('2001:db8:0:1:1:1:1:1')).toBe('2001:db8:0:1:1:1:1:1');
  });

  test('lower-cases and drops leading zeros', () => {
    expect(formatted('FF05:0000:0000:0000:0000:0000:0000:00FB')).toBe('ff05::fb');
    expect(formatted('::')).toBe('::');
  });

  test('expanded form writes every hextet out', () => {
    const bytes = parseIpv6('ff02::1');
    expect(bytes).not.toBeNull();
    if (bytes !== null) {
      expect(formatIpv6Expanded(bytes)).toBe('ff02:0000:0000:0000:0000:0000:0000:0001');
    }
  });
});

describe('parseMulticastAddress', () => {
  test('parses a well-formed group', () => {
    const result = parseMulticastAddress('ff02::1');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.address.text).toBe('ff02::1');
      expect(result.address.isMulticast).toBe(true);
      expect(result.address.scope).toBe(MulticastScope.LINK_LOCAL);
      expect(result.fixedFrom).toBeNull();
      expect(result.warning).toBeNull();
    }
  });

  test('accepts brackets and surrounding whitespace', () => {
    expect(mustParse('  [ff0e::1:3] ').text).toBe('ff0e::1:3');
  });

  test('parsing is idempotent through the canonical text', () => {
    const inputs = [
      'ff02::1',
      'FF05:0:0:0:0:0:0:2',
      'ff0e::1:3',
      '[ff02::fb]',
      'ff12:c909:3199:e8ba:6f6f:7d23:e6ae:d85d',
    ];

    for (const input of inputs) {
      const first = mustParse(input);
      const second = mustParse(first.text);
      expect(addressEquals(first, second)).toBe(true);
      expect(second.text).toBe(first.text);
    }
  });

  test('recovers a segment whose separator was dropped', () => {
    const input = 'ff12c909:3199:e8ba:6f6f:7d23:e6ae:d85d';
    const result = parseMulticastAddress(input);

    expect(result.success).toBe(true);
    if (!result.success) {
      return;
    }

    expect(result.fixedFrom).toBe(input);
    expect(result.address.text).toBe('ff12:c909:3199:e8ba:6f6f:7d23:e6ae:d85d');
    for (const segment of result.address.text.split(':')) {
      expect(segment.length).toBeLessThanOrEqual(4);
    }
    expect(describeRecovery(result)).toBe(
      "Note: fixed multicast address from 'ff12c909:3199:e8ba:6f6f:7d23:e6ae:d85d' " +
        "-> 'ff12:c909:3199:e8ba:6f6f:7d23:e6ae:d85d'"
    );
  });

  test('reports both the original and the attempted fix on failure', () => {
    const result = parseMulticastAddress('ff12c909c:1');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ProbeErrorCode.INVALID_ADDRESS);
      expect(result.error.message).toBe(
        "failed to parse IPv6 address 'ff12c909c:1', tried 'ff12:c909:c:1'"
      );
    }
  });

  test('rejects garbage that recovery cannot help', () => {
    const result = parseMulticastAddress('ff02::zz');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("failed to parse IPv6 address 'ff02::zz', tried 'ff02::zz'");
    }
  });

  test('rejects zone suffixes', () => {
    expect(parseMulticastAddress('ff02::1%eth0').success).toBe(false);
  });

  test('warns about non-multicast addresses but still succeeds', () => {
    const result = parseMulticastAddress('2001:db8::1');
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.address.isMulticast).toBe(false);
      expect(result.address.scope).toBeNull();
      expect(result.warning).toBe('address 2001:db8::1 is not an IPv6 multicast address (ff00::/8)');
    }
  });

  test('no recovery note for direct parses', () => {
    expect(describeRecovery(parseMulticastAddress('ff02::1'))).toBeNull();
  });
});

describe('tryFixAddress', () => {
  test('splits long segments into four-character chunks', () => {
    expect(tryFixAddress('abcdef12:1')).toBe('abcd:ef12:1');
    expect(tryFixAddress('abcdefg')).toBe('abcd:efg');
  });

  test('keeps short segments and compression as they are', () => {
    expect(tryFixAddress('ff02::1')).toBe('ff02::1');
  });
});
