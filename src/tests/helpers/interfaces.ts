import type { NetworkInterfaceInfo } from 'node:os';

import {
  createUnixInterfaceTable,
  createWindowsInterfaceTable,
  type InterfaceSource,
  type InterfaceTable,
} from '../../address/index.js';

// eth0 (#2) and wlan0 (#3) carry link-local IPv6 addresses; lo (#1) only
// has ::1, whose scope id is 0, so its index comes from sysfs alone.
const INTERFACES: NodeJS.Dict<NetworkInterfaceInfo[]> = {
  lo: [
    {
      address: '::1',
      netmask: 'ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff',
      family: 'IPv6',
      mac: '00:00:00:00:00:00',
      internal: true,
      cidr: '::1/128',
      scopeid: 0,
    },
  ],
  eth0: [
    {
      address: '192.0.2.10',
      netmask: '255.255.255.0',
      family: 'IPv4',
      mac: '02:00:00:00:00:02',
      internal: false,
      cidr: '192.0.2.10/24',
    },
    {
      address: 'fe80::2',
      netmask: 'ffff:ffff:ffff:ffff::',
      family: 'IPv6',
      mac: '02:00:00:00:00:02',
      internal: false,
      cidr: 'fe80::2/64',
      scopeid: 2,
    },
  ],
  wlan0: [
    {
      address: 'fe80::3',
      netmask: 'ffff:ffff:ffff:ffff::',
      family: 'IPv6',
      mac: '02:00:00:00:00:03',
      internal: false,
      cidr: 'fe80::3/64',
      scopeid: 3,
    },
  ],
};

const SYSFS_INDEXES: Record<string, number> = { lo: 1, eth0: 2, wlan0: 3 };

export function fakeSource(withSysfs: boolean): InterfaceSource {
  return {
    list: () => INTERFACES,
    readIndex: (name) => (withSysfs ? SYSFS_INDEXES[name] ?? null : null),
  };
}

export function fakeUnixTable(): InterfaceTable {
  return createUnixInterfaceTable(fakeSource(true));
}

export function fakeWindowsTable(): InterfaceTable {
  return createWindowsInterfaceTable(fakeSource(false));
}
