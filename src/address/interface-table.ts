/**
 * Platform interface tables.
 *
 * Maps interface names to numeric indexes and produces the zone string
 * Node's dgram expects after `%` in scoped addresses: the interface name
 * on Unix, the numeric index on Windows.
 *
 * @module address/interface-table
 */

import { readFileSync } from 'node:fs';
import { networkInterfaces, type NetworkInterfaceInfo } from 'node:os';

import { log } from '../log.js';

// ============================================================================
// Types
// ============================================================================

export interface InterfaceRef {
  readonly index: number;
  readonly name: string | null;
}

export const DEFAULT_INTERFACE: InterfaceRef = Object.freeze({ index: 0, name: null });

export type InterfacePlatform = 'unix' | 'windows';

export interface InterfaceTable {
  readonly platform: InterfacePlatform;
  /** Index for a name, or null when the OS does not know it. */
  indexOf(name: string): number | null;
  nameOf(index: number): string | null;
  /** Zone suffix for scoped addresses; null for the default interface. */
  zoneOf(iface: InterfaceRef): string | null;
}

/** Where a table reads interface data from. Swapped out in tests. */
export interface InterfaceSource {
  list(): NodeJS.Dict<NetworkInterfaceInfo[]>;
  /** Kernel-reported index (Linux sysfs), or null when unavailable. */
  readIndex(name: string): number | null;
}

// ============================================================================
// System Source
// ============================================================================

const SAFE_NAME_PATTERN = /^[A-Za-z0-9_.:@-]+$/;

function readSysfsIndex(name: string): number | null {
  if (!SAFE_NAME_PATTERN.test(name) || name === '.' || name === '..') {
    return null;
  }

  try {
    const raw = readFileSync(`/sys/class/net/${name}/ifindex`, 'utf8');
    const index = parseInt(raw.trim(), 10);
    return Number.isInteger(index) && index > 0 ? index : null;
  } catch (err) {
    log.address('no sysfs index for %s: %O', name, err);
    return null;
  }
}

export const systemInterfaceSource: InterfaceSource = {
  list: () => networkInterfaces(),
  readIndex: readSysfsIndex,
};

// ============================================================================
// Shared Lookups
// ============================================================================

function scopeIdOf(source: InterfaceSource, name: string): number | null {
  const infos = source.list()[name];
  if (infos === undefined) {
    return null;
  }

  for (const info of infos) {
    if (info.family === 'IPv6' && info.scopeid > 0) {
      return info.scopeid;
    }
  }
  return null;
}

function listNames(source: InterfaceSource): string[] {
  return Object.keys(source.list());
}

// ============================================================================
// Unix
// ============================================================================

export function createUnixInterfaceTable(
  source: InterfaceSource = systemInterfaceSource
): InterfaceTable {
  function indexOf(name: string): number | null {
    return source.readIndex(name) ?? scopeIdOf(source, name);
  }

  function nameOf(index: number): string | null {
    for (const name of listNames(source)) {
      if (indexOf(name) === index) {
        return name;
      }
    }
    return null;
  }

  function zoneOf(iface: InterfaceRef): string | null {
    if (iface.index === 0) {
      return null;
    }
    // An index the OS cannot name has no usable zone
    return iface.name ?? nameOf(iface.index);
  }

  return { platform: 'unix', indexOf, nameOf, zoneOf };
}

// ============================================================================
// Windows
// ============================================================================

export function createWindowsInterfaceTable(
  source: InterfaceSource = systemInterfaceSource
): InterfaceTable {
  function indexOf(name: string): number | null {
    return scopeIdOf(source, name);
  }

  function nameOf(index: number): string | null {
    for (const name of listNames(source)) {
      if (scopeIdOf(source, name) === index) {
        return name;
      }
    }
    return null;
  }

  function zoneOf(iface: InterfaceRef): string | null {
    if (iface.index === 0) {
      return null;
    }
    return String(iface.index);
  }

  return { platform: 'windows', indexOf, nameOf, zoneOf };
}

export function createInterfaceTable(
  platform: NodeJS.Platform = process.platform,
  source: InterfaceSource = systemInterfaceSource
): InterfaceTable {
  if (platform === 'win32') {
    return createWindowsInterfaceTable(source);
  }
  return createUnixInterfaceTable(source);
}
