/**
 * Unit Tests: IP Address Reconciliation
 *
 * @see src/reconcilers/ip-addresses/sync.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { syncIpAddresses } from '../../src/reconcilers/ip-addresses/sync.js';
import type { RemoteDevice, RemoteInterface } from '../../src/api/types.js';
import { FakeRegistry } from '../helpers/fake-registry.js';
import { createIpAddress } from '../helpers/fixtures.js';
import { captureLogger } from '../helpers/logger.js';

describe('syncIpAddresses', () => {
  let registry: FakeRegistry;
  let device: RemoteDevice;
  let mgmt: RemoteInterface;
  let users: RemoteInterface;

  const addresses = [
    createIpAddress({ interface: 'Vlan1', address: '10.0.0.1', description: 'mgmt', primary: true }),
    createIpAddress({ interface: 'Vlan10', address: '10.0.10.1' }),
    createIpAddress({ interface: 'Vlan99', address: '10.0.99.1' }),
  ];

  beforeEach(() => {
    registry = new FakeRegistry();
    device = registry.addDevice('core-sw1');
    mgmt = registry.addInterface(device, 'Vlan1', { type: 'virtual' });
    users = registry.addInterface(device, 'Vlan10', { type: 'virtual' });
  });

  it('fails when the device is not in the registry', async () => {
    const outcome = await syncIpAddresses(registry, 'ghost-sw', addresses, { logger: captureLogger().logger });

    expect(outcome.success).toBe(false);
    expect(outcome.error?.code).toBe('SCOPE_NOT_FOUND');
  });

  it('creates addresses on registry interfaces and skips the rest', async () => {
    const outcome = await syncIpAddresses(registry, 'core-sw1', addresses, { logger: captureLogger().logger });

    expect(outcome.stats.created).toBe(2);
    expect(outcome.stats.warnings).toEqual(['Interface Vlan99 not found in registry; 10.0.99.1/24 skipped']);
    expect(registry.ipAddresses.createMany).toHaveBeenCalledWith([
      { address: '10.0.0.1/24', interfaceId: mgmt.id, status: 'active', description: 'mgmt' },
      { address: '10.0.10.1/24', interfaceId: users.id, status: 'active' },
    ]);
  });

  it('points the primary IPv4 at the created address', async () => {
    await syncIpAddresses(registry, 'core-sw1', addresses, { logger: captureLogger().logger });

    const primary = registry.ipAddresses.records.find((record) => record.address === '10.0.0.1/24');
    expect(registry.devices.update).toHaveBeenCalledWith({ id: device.id, primaryIp4Id: primary?.id });
    expect(registry.devices.records[0].primaryIp4Id).toBe(primary?.id);
  });

  it('is idempotent', async () => {
    const log = captureLogger().logger;
    await syncIpAddresses(registry, 'core-sw1', addresses, { logger: log });
    const second = await syncIpAddresses(registry, 'core-sw1', addresses, { logger: log });

    expect(second.stats).toMatchObject({ created: 0, updated: 0, skipped: 2, failed: 0 });
    expect(registry.devices.update).toHaveBeenCalledTimes(1);
  });

  it('sets the primary of an existing address', async () => {
    const existing = registry.ipAddresses.seed({ address: '10.0.0.1/24', interfaceId: mgmt.id, description: 'mgmt' });

    const outcome = await syncIpAddresses(registry, 'core-sw1', [addresses[0]], { logger: captureLogger().logger });

    expect(outcome.stats.details.update).toEqual([
      { name: 'Vlan1 10.0.0.1/24', device: 'core-sw1', changes: ['primary'] },
    ]);
    expect(registry.ipAddresses.updateMany).toHaveBeenCalledWith([{ id: existing.id }]);
    expect(registry.devices.update).toHaveBeenCalledWith({ id: device.id, primaryIp4Id: existing.id });
  });

  it('leaves the registry primary alone when the address is not observed as primary', async () => {
    const existing = registry.ipAddresses.seed({ address: '10.0.0.1/24', interfaceId: mgmt.id, description: 'mgmt' });
    device.primaryIp4Id = existing.id;
    const observed = [createIpAddress({ interface: 'Vlan1', address: '10.0.0.1', description: 'mgmt', primary: false })];
    const log = captureLogger().logger;

    const first = await syncIpAddresses(registry, 'core-sw1', observed, { logger: log });
    const second = await syncIpAddresses(registry, 'core-sw1', observed, { logger: log });

    expect(first.stats).toMatchObject({ updated: 0, skipped: 1 });
    expect(second.stats).toMatchObject({ updated: 0, skipped: 1 });
    expect(registry.ipAddresses.updateMany).not.toHaveBeenCalled();
    expect(registry.devices.update).not.toHaveBeenCalled();
    expect(registry.devices.records[0].primaryIp4Id).toBe(existing.id);
  });

  it('records a failed primary update without failing the call', async () => {
    registry.devices.update = vi.fn().mockRejectedValue(new Error('forbidden'));

    const outcome = await syncIpAddresses(registry, 'core-sw1', addresses, { logger: captureLogger().logger });

    expect(outcome.success).toBe(true);
    expect(outcome.stats.failed).toBe(1);
    expect(outcome.stats.errors).toEqual(['update primary_ip4 core-sw1: forbidden']);
  });

  it('does not write in dry run', async () => {
    const outcome = await syncIpAddresses(registry, 'core-sw1', addresses, { dryRun: true });

    expect(outcome.stats.created).toBe(2);
    expect(registry.ipAddresses.createMany).not.toHaveBeenCalled();
    expect(registry.devices.update).not.toHaveBeenCalled();
  });
});
