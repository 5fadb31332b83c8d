/**
 * Entity factories shared by reconciler and pipeline tests
 */

import type { Cable, Device, Interface, InventoryItem, IPAddress } from '../../src/entities/types.js';

export function createDevice(overrides: Partial<Device> = {}): Device {
  return {
    hostname: 'core-sw1',
    host: '10.0.0.1',
    platform: null,
    model: 'C9300-48P',
    serial: 'SN1',
    version: null,
    site: null,
    role: null,
    tenant: null,
    ...overrides,
  };
}

export function createInterface(overrides: Partial<Interface> = {}): Interface {
  return {
    device: 'core-sw1',
    name: 'GigabitEthernet0/1',
    description: null,
    status: 'up',
    speed: null,
    mtu: null,
    duplex: null,
    type: '1000base-t',
    mode: null,
    untaggedVlan: null,
    taggedVlans: [],
    lag: null,
    macAddress: null,
    ipAddress: null,
    ...overrides,
  };
}

export function createIpAddress(overrides: Partial<IPAddress> = {}): IPAddress {
  return {
    device: 'core-sw1',
    interface: 'Vlan1',
    address: '10.0.0.1',
    prefixLength: 24,
    description: null,
    primary: false,
    ...overrides,
  };
}

export function createCable(a: [string, string], b: [string, string]): Cable {
  return {
    a: { device: a[0], interface: a[1] },
    b: { device: b[0], interface: b[1] },
  };
}

export function createInventoryItem(overrides: Partial<InventoryItem> = {}): InventoryItem {
  return {
    device: 'core-sw1',
    name: 'Chassis',
    partId: 'C9300-48P',
    serial: 'FOC1',
    description: null,
    manufacturer: null,
    ...overrides,
  };
}
