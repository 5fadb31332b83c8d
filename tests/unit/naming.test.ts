/**
 * Unit Tests: Interface and Hostname Naming
 *
 * @see src/entities/naming.ts
 */

import { describe, it, expect } from 'vitest';
import {
  shortInterfaceName,
  longInterfaceName,
  interfaceKey,
  isLagName,
  isSviName,
  sviVlanId,
  shortHostname,
  hostnameKey,
} from '../../src/entities/naming.js';

describe('shortInterfaceName', () => {
  it('shortens long names', () => {
    expect(shortInterfaceName('GigabitEthernet0/1')).toBe('Gi0/1');
    expect(shortInterfaceName('TenGigabitEthernet1/0/1')).toBe('Te1/0/1');
    expect(shortInterfaceName('Port-channel10')).toBe('Po10');
  });

  it('removes spaces before matching', () => {
    expect(shortInterfaceName('Ten 1/1/4')).toBe('Te1/1/4');
  });

  it('returns unknown names without spaces', () => {
    expect(shortInterfaceName('mgmt 0')).toBe('mgmt0');
    expect(shortInterfaceName('')).toBe('');
  });
});

describe('longInterfaceName', () => {
  it('expands short forms', () => {
    expect(longInterfaceName('Gi0/1')).toBe('GigabitEthernet0/1');
    expect(longInterfaceName('Te1/1/4')).toBe('TenGigabitEthernet1/1/4');
    expect(longInterfaceName('Twe1/0/1')).toBe('TwentyFiveGigE1/0/1');
    expect(longInterfaceName('Po1')).toBe('Port-channel1');
    expect(longInterfaceName('Gig 0/1')).toBe('GigabitEthernet0/1');
  });

  it('gives canonical casing to lowercase long forms', () => {
    expect(longInterfaceName('gigabitethernet0/1')).toBe('GigabitEthernet0/1');
    expect(longInterfaceName('Ethernet1/1')).toBe('Ethernet1/1');
  });
});

describe('interfaceKey', () => {
  it('maps every spelling of a port to the same key', () => {
    const keys = ['GigabitEthernet0/1', 'Gi0/1', 'gi0/1', 'Gig 0/1'].map(interfaceKey);
    expect(new Set(keys)).toEqual(new Set(['gigabitethernet0/1']));
  });

  it('keys LAGs by their long form', () => {
    expect(interfaceKey('Po1')).toBe('port-channel1');
  });
});

describe('LAG and SVI detection', () => {
  it('recognizes LAG names', () => {
    expect(isLagName('Po1')).toBe(true);
    expect(isLagName('Port-channel10')).toBe(true);
    expect(isLagName('AggregatePort 1')).toBe(true);
    expect(isLagName('Gi0/1')).toBe(false);
    expect(isLagName('Power')).toBe(false);
  });

  it('recognizes SVIs and their VLAN id', () => {
    expect(isSviName('Vlan10')).toBe(true);
    expect(isSviName('Gi0/1')).toBe(false);
    expect(sviVlanId('Vl20')).toBe(20);
    expect(sviVlanId('Gi0/1')).toBeNull();
  });
});

describe('hostnames', () => {
  it('strips domain suffixes', () => {
    expect(shortHostname('sw1.corp.example.net')).toBe('sw1');
  });

  it('keeps IPv4 literals', () => {
    expect(shortHostname('10.0.0.1')).toBe('10.0.0.1');
  });

  it('drops CDP serial suffixes', () => {
    expect(shortHostname('sw1(FOC1234X0AB)')).toBe('sw1');
  });

  it('builds case-insensitive keys', () => {
    expect(hostnameKey('SW1.corp')).toBe('sw1');
  });
});
