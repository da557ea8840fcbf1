/**
 * Address module exports.
 *
 * @module address
 */

export {
  parseMulticastAddress,
  parseIpv6,
  formatIpv6,
  formatIpv6Expanded,
  tryFixAddress,
  createGroupAddress,
  addressEquals,
  isMulticastBytes,
  describeRecovery,
  MulticastScope,
  ADDRESS_BYTES,
  type GroupAddress,
  type ParseAddressResult,
} from './group-address.js';

export {
  createInterfaceTable,
  createUnixInterfaceTable,
  createWindowsInterfaceTable,
  systemInterfaceSource,
  DEFAULT_INTERFACE,
  type InterfaceRef,
  type InterfaceTable,
  type InterfacePlatform,
  type InterfaceSource,
} from './interface-table.js';

export {
  resolveInterface,
  isDefaultInterface,
  describeInterface,
  type ResolveInterfaceResult,
} from './interface-resolver.js';
