/**
 * Interface name/index resolution.
 *
 * @module address/interface-resolver
 */

import { ProbeError, ProbeErrorCode } from '../errors.js';
import {
  DEFAULT_INTERFACE,
  createInterfaceTable,
  type InterfaceRef,
  type InterfaceTable,
} from './interface-table.js';

const NUMERIC_PATTERN = /^\d+$/;
const MAX_INTERFACE_INDEX = 0xffffffff;

export type ResolveInterfaceResult =
  | { readonly success: true; readonly iface: InterfaceRef }
  | { readonly success: false; readonly error: ProbeError };

function notFound(input: string): ResolveInterfaceResult {
  return {
    success: false,
    error: new ProbeError(
      ProbeErrorCode.INTERFACE_NOT_FOUND,
      `interface '${input}' not found or cannot be converted to index`
    ),
  };
}

/**
 * Resolve an interface name or literal index.
 *
 * Absent input means the default interface (index 0). A numeric string is
 * taken as-is, whether or not such an interface exists.
 */
export function resolveInterface(
  nameOrIndex: string | undefined,
  table: InterfaceTable = createInterfaceTable()
): ResolveInterfaceResult {
  if (nameOrIndex === undefined) {
    return { success: true, iface: DEFAULT_INTERFACE };
  }

  const input = nameOrIndex.trim();
  if (input === '') {
    return { success: true, iface: DEFAULT_INTERFACE };
  }

  if (NUMERIC_PATTERN.test(input)) {
    const index = parseInt(input, 10);
    if (index > MAX_INTERFACE_INDEX) {
      return notFound(input);
    }
    if (index === 0) {
      return { success: true, iface: DEFAULT_INTERFACE };
    }
    return { success: true, iface: Object.freeze({ index, name: table.nameOf(index) }) };
  }

  const index = table.indexOf(input);
  if (index === null || index === 0) {
    return notFound(input);
  }

  return { success: true, iface: Object.freeze({ index, name: input }) };
}

export function isDefaultInterface(iface: InterfaceRef): boolean {
  return iface.index === 0;
}

export function describeInterface(iface: InterfaceRef): string {
  if (iface.index === 0) {
    return 'default';
  }
  if (iface.name === null) {
    return `#${iface.index}`;
  }
  return `${iface.name} (#${iface.index})`;
}
