/**
 * Unit Tests: Record to Entity Mappers
 *
 * Tests the mapping of collected flat records into typed entities,
 * including per-device error records and derived IP addresses and VLANs.
 *
 * @see src/entities/mappers.ts
 * @see src/collectors/mapping.ts
 */

import { describe, it, expect } from 'vitest';
import {
  toDevices,
  toInterfaces,
  toCables,
  toInventoryItems,
  toMacEntries,
  deriveIpAddresses,
  deriveVlans,
  truncateInventoryName,
  INVENTORY_NAME_MAX,
} from '../../src/entities/mappers.js';
import { mapCollected, withTargetDefaults } from '../../src/collectors/mapping.js';
import type { Device, Interface } from '../../src/entities/types.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function createDevice(overrides: Partial<Device> = {}): Device {
  return {
    hostname: 'core-sw1',
    host: '10.0.0.1',
    platform: null,
    model: 'C9300-48P',
    serial: 'SN-CORE-1',
    version: null,
    site: null,
    role: null,
    tenant: null,
    ...overrides,
  };
}

function createInterface(overrides: Partial<Interface> = {}): Interface {
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

// =============================================================================
// Collector Records
// =============================================================================

describe('toDevices', () => {
  it('reads alternative field names', () => {
    const { entities } = toDevices([
      { hostname: 'core-sw1', ip: '10.0.0.1', hardware: 'C9300-48P', serial_number: 'SN1', os: 'ios' },
    ]);
    expect(entities).toEqual([
      createDevice({ serial: 'SN1', platform: 'ios' }),
    ]);
  });

  it('reports collector errors as warnings', () => {
    const result = toDevices([{ host: '10.0.0.9', _error: 'timeout' }, { hostname: 'core-sw1', host: '10.0.0.1' }]);
    expect(result.warnings).toEqual(['10.0.0.9: timeout']);
    expect(result.entities).toHaveLength(1);
  });
});

describe('toInterfaces', () => {
  it('maps a trunk port', () => {
    const { entities } = toInterfaces([
      {
        hostname: 'core-sw1',
        interface: 'Gi0/1',
        status: 'connected',
        speed: '1000 Mbit',
        duplex: 'a-full',
        mode: 'trunk',
        trunking_vlans: '10,20',
        native_vlan: '1',
        mac: 'aabb.ccdd.eeff',
        description: 'uplink',
        port_channel: 'Po1',
      },
    ]);

    expect(entities).toEqual([
      createInterface({
        description: 'uplink',
        speed: 1000000,
        duplex: 'full',
        mode: 'tagged',
        untaggedVlan: 1,
        taggedVlans: [10, 20],
        lag: 'Port-channel1',
        macAddress: 'aa:bb:cc:dd:ee:ff',
      }),
    ]);
  });

  it('lets an admin-down status win over the link status', () => {
    const { entities } = toInterfaces([
      {
        hostname: 'core-sw1',
        interface: 'Gi0/2',
        mode: 'static access',
        access_vlan: 10,
        admin_status: 'administratively down',
        status: 'up',
      },
    ]);
    expect(entities[0]).toMatchObject({ status: 'disabled', mode: 'access', untaggedVlan: 10, taggedVlans: [] });
  });

  it('carries SVI addresses in CIDR form', () => {
    const { entities } = toInterfaces([
      { hostname: 'core-sw1', interface: 'Vlan10', ip_address: '10.0.10.1', mask: '255.255.255.0' },
    ]);
    expect(entities[0]).toMatchObject({ name: 'Vlan10', type: 'virtual', ipAddress: '10.0.10.1/24' });
  });

  it('drops records without an identity', () => {
    expect(toInterfaces([{ hostname: 'core-sw1' }]).entities).toEqual([]);
  });
});

describe('toCables', () => {
  it('builds a cable from a neighbor record', () => {
    const { entities } = toCables([
      {
        hostname: 'core-sw1',
        local_interface: 'Gi0/1',
        remote_hostname: 'access-sw1.corp.example.net',
        remote_port: 'Te1/1/1',
      },
    ]);
    expect(entities).toEqual([
      {
        a: { device: 'core-sw1', interface: 'GigabitEthernet0/1' },
        b: { device: 'access-sw1', interface: 'TenGigabitEthernet1/1/1' },
      },
    ]);
  });
});

describe('toInventoryItems and toMacEntries', () => {
  it('truncates long inventory names', () => {
    const long = 'x'.repeat(70);
    const { entities } = toInventoryItems([{ hostname: 'core-sw1', name: long, pid: 'PWR-1100', sn: 'PS1' }]);
    expect(entities[0].name).toBe(`${'x'.repeat(61)}...`);
    expect(entities[0].name).toHaveLength(INVENTORY_NAME_MAX);
    expect(entities[0]).toMatchObject({ partId: 'PWR-1100', serial: 'PS1', manufacturer: null });
  });

  it('keeps short names as they are', () => {
    expect(truncateInventoryName('Slot 1')).toBe('Slot 1');
  });

  it('maps MAC table entries', () => {
    const { entities } = toMacEntries([
      { hostname: 'core-sw1', destination_port: 'Gi0/5', destination_address: '0011.2233.4455', vlan: '10' },
    ]);
    expect(entities).toEqual([
      {
        device: 'core-sw1',
        interface: 'GigabitEthernet0/5',
        macAddress: '00:11:22:33:44:55',
        vlan: 10,
        type: null,
      },
    ]);
  });
});

// =============================================================================
// Derived Entities
// =============================================================================

describe('deriveIpAddresses', () => {
  it('marks the management address as primary', () => {
    const interfaces = [
      createInterface({ name: 'Vlan1', ipAddress: '10.0.0.1/24', description: 'mgmt' }),
      createInterface({ name: 'Vlan10', ipAddress: '10.0.10.1/24' }),
      createInterface({ name: 'GigabitEthernet0/1' }),
    ];

    const addresses = deriveIpAddresses(interfaces, [createDevice()]);

    expect(addresses).toEqual([
      {
        device: 'core-sw1',
        interface: 'Vlan1',
        address: '10.0.0.1',
        prefixLength: 24,
        description: 'mgmt',
        primary: true,
      },
      {
        device: 'core-sw1',
        interface: 'Vlan10',
        address: '10.0.10.1',
        prefixLength: 24,
        description: null,
        primary: false,
      },
    ]);
  });
});

describe('deriveVlans', () => {
  it('derives one VLAN per site and id', () => {
    const interfaces = [
      createInterface({ name: 'Vlan10', description: 'users' }),
      createInterface({ device: 'access-sw1', name: 'Vlan10' }),
      createInterface({ device: 'access-sw1', name: 'Vlan20' }),
      createInterface({ name: 'GigabitEthernet0/1' }),
    ];

    const vlans = deriveVlans(interfaces, () => 'DC1');

    expect(vlans).toEqual([
      { site: 'DC1', vid: 10, name: 'users' },
      { site: 'DC1', vid: 20, name: 'VLAN 20' },
    ]);
  });
});

// =============================================================================
// Collector Mapping
// =============================================================================

describe('mapCollected', () => {
  it('uses the neighbor mapper for both lldp and cdp', () => {
    const record = { hostname: 'core-sw1', local_port: 'Gi0/1', neighbor: 'access-sw1', neighbor_interface: 'Gi0/48' };
    expect(mapCollected('lldp', [record]).entities).toEqual(mapCollected('cdp', [record]).entities);
  });
});

describe('withTargetDefaults', () => {
  it('fills missing scope fields from the inventory', () => {
    const [device] = withTargetDefaults(
      [createDevice({ site: null, role: 'distribution' })],
      [{ host: '10.0.0.1', site: 'DC1', role: 'core', platform: 'cisco_ios' }]
    );
    expect(device).toMatchObject({ site: 'DC1', role: 'distribution', platform: 'cisco_ios', tenant: null });
  });

  it('matches by hostname when the address differs', () => {
    const [device] = withTargetDefaults(
      [createDevice({ host: '192.0.2.1' })],
      [{ host: '10.9.9.9', hostname: 'CORE-SW1.corp', tenant: 'acme' }]
    );
    expect(device.tenant).toBe('acme');
  });

  it('leaves unknown devices untouched', () => {
    const original = createDevice({ hostname: 'edge-rtr1', host: '10.0.0.50' });
    expect(withTargetDefaults([original], [{ host: '10.0.0.1' }])).toEqual([original]);
  });
});
