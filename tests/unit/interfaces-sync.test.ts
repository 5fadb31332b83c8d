/**
 * Unit Tests: Interface Reconciliation
 *
 * Tests per-device interface sync:
 * - Device scope resolution
 * - VLAN number → registry id resolution
 * - Two-phase LAG handling (LAGs before members)
 * - Batch fallback and idempotency
 *
 * @see src/reconcilers/interfaces/sync.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { syncInterfaces, dropUnknownVlans } from '../../src/reconcilers/interfaces/sync.js';
import { ScopeNotFoundError } from '../../src/reconcilers/errors.js';
import type { RemoteDevice, RemoteSite, RemoteVlan } from '../../src/api/types.js';
import { FakeRegistry } from '../helpers/fake-registry.js';
import { createInterface } from '../helpers/fixtures.js';
import { captureLogger } from '../helpers/logger.js';

describe('syncInterfaces', () => {
  let registry: FakeRegistry;
  let site: RemoteSite;
  let device: RemoteDevice;
  let users: RemoteVlan;
  let voice: RemoteVlan;

  beforeEach(() => {
    registry = new FakeRegistry();
    site = registry.addSite('DC1');
    device = registry.addDevice('core-sw1', { site: 'DC1' });
    users = registry.addVlan(site, 10, 'users');
    voice = registry.addVlan(site, 20, 'voice');
  });

  it('fails when the device is not in the registry', async () => {
    const outcome = await syncInterfaces(registry, 'ghost-sw', [createInterface()], {
      logger: captureLogger().logger,
    });

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBeInstanceOf(ScopeNotFoundError);
    expect(outcome.error?.message).toBe('Device not found in registry: ghost-sw');
    expect(registry.interfaces.list).not.toHaveBeenCalled();
  });

  it('computes changes in dry run without mutating', async () => {
    const outcome = await syncInterfaces(registry, 'core-sw1', [createInterface()], { dryRun: true });

    expect(outcome.stats.created).toBe(1);
    expect(registry.interfaces.list).toHaveBeenCalledWith({ deviceId: device.id });
    expect(registry.interfaces.createMany).not.toHaveBeenCalled();
  });

  it('does not look up VLANs when no interface references one', async () => {
    await syncInterfaces(registry, 'core-sw1', [createInterface()], { dryRun: true });

    expect(registry.sites.getByName).not.toHaveBeenCalled();
    expect(registry.vlans.list).not.toHaveBeenCalled();
  });

  // ===========================================================================
  // VLANs
  // ===========================================================================

  describe('VLAN resolution', () => {
    it('writes registry VLAN ids and drops unknown VLANs', async () => {
      const outcome = await syncInterfaces(
        registry,
        'core-sw1',
        [
          createInterface({ name: 'GigabitEthernet0/3', mode: 'access', untaggedVlan: 10 }),
          createInterface({ name: 'GigabitEthernet0/4', mode: 'tagged', taggedVlans: [10, 20, 30] }),
        ],
        { logger: captureLogger().logger }
      );

      expect(registry.vlans.list).toHaveBeenCalledWith({ siteId: site.id });
      expect(outcome.stats.warnings).toEqual(['VLAN 30 not found in site DC1; dropped from GigabitEthernet0/4']);
      expect(registry.interfaces.createMany).toHaveBeenCalledWith([
        {
          deviceId: device.id,
          name: 'GigabitEthernet0/3',
          type: '1000base-t',
          enabled: true,
          mode: 'access',
          untaggedVlanId: users.id,
        },
        {
          deviceId: device.id,
          name: 'GigabitEthernet0/4',
          type: '1000base-t',
          enabled: true,
          mode: 'tagged',
          taggedVlanIds: [users.id, voice.id],
        },
      ]);
      expect(registry.interfaces.records.map((record) => record.taggedVlans)).toEqual([[], [10, 20]]);
    });

    it('reports unknown VLANs per interface', () => {
      const { interfaces, warnings } = dropUnknownVlans(
        [createInterface({ untaggedVlan: 99, taggedVlans: [10, 98] })],
        new Map([[10, 1]]),
        null
      );
      expect(interfaces[0]).toMatchObject({ untaggedVlan: null, taggedVlans: [10] });
      expect(warnings).toEqual(['VLAN 99,98 not found in the registry; dropped from GigabitEthernet0/1']);
    });
  });

  // ===========================================================================
  // Link Aggregation
  // ===========================================================================

  describe('LAGs', () => {
    const interfaces = [
      createInterface({ name: 'GigabitEthernet0/1', lag: 'Port-channel1' }),
      createInterface({ name: 'Port-channel1', type: 'lag' }),
      createInterface({ name: 'GigabitEthernet0/2', lag: 'Po1' }),
    ];

    it('creates LAG interfaces before their members', async () => {
      await syncInterfaces(registry, 'core-sw1', interfaces, { logger: captureLogger().logger });

      const calls = registry.interfaces.createMany.mock.calls;
      expect(calls).toHaveLength(2);
      expect(calls[0][0].map((write) => write.name)).toEqual(['Port-channel1']);

      const lag = registry.interfaces.records.find((record) => record.name === 'Port-channel1');
      expect(calls[1][0].map((write) => [write.name, write.lagId])).toEqual([
        ['GigabitEthernet0/1', lag?.id],
        ['GigabitEthernet0/2', lag?.id],
      ]);
      expect(registry.interfaces.records.map((record) => [record.name, record.lag])).toEqual([
        ['Port-channel1', null],
        ['GigabitEthernet0/1', 'Port-channel1'],
        ['GigabitEthernet0/2', 'Port-channel1'],
      ]);
    });

    it('links members to a LAG already in the registry', async () => {
      const existing = registry.addInterface(device, 'Port-channel1', { type: 'lag' });

      await syncInterfaces(registry, 'core-sw1', interfaces, { logger: captureLogger().logger });

      expect(registry.interfaces.createMany).toHaveBeenCalledTimes(1);
      expect(registry.interfaces.createMany.mock.calls[0][0].map((write) => write.lagId)).toEqual([
        existing.id,
        existing.id,
      ]);
    });

    it('leaves a member without LAG when the LAG is unknown', async () => {
      const outcome = await syncInterfaces(
        registry,
        'core-sw1',
        [createInterface({ name: 'GigabitEthernet0/1', lag: 'Port-channel9' })],
        { logger: captureLogger().logger }
      );

      expect(outcome.stats.warnings).toEqual([
        'LAG Port-channel9 not found in registry; GigabitEthernet0/1 left without LAG',
      ]);
      expect(registry.interfaces.createMany).toHaveBeenCalledWith([
        { deviceId: device.id, name: 'GigabitEthernet0/1', type: '1000base-t', enabled: true },
      ]);
    });

    it('is idempotent', async () => {
      const log = captureLogger().logger;
      await syncInterfaces(registry, 'core-sw1', interfaces, { logger: log });
      const second = await syncInterfaces(registry, 'core-sw1', interfaces, { logger: log });

      expect(second.stats).toMatchObject({ created: 0, updated: 0, skipped: 3, failed: 0 });
      expect(registry.interfaces.updateMany).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Updates and Cleanup
  // ===========================================================================

  it('updates changed fields by registry id', async () => {
    const existing = registry.addInterface(device, 'GigabitEthernet0/1', { description: 'old', enabled: true });

    const outcome = await syncInterfaces(
      registry,
      'core-sw1',
      [createInterface({ name: 'Gi0/1', description: 'uplink', status: 'disabled' })],
      { logger: captureLogger().logger }
    );

    expect(outcome.stats.details.update).toEqual([
      { name: 'Gi0/1', device: 'core-sw1', changes: ['description', 'enabled'] },
    ]);
    expect(registry.interfaces.updateMany).toHaveBeenCalledWith([
      { id: existing.id, description: 'uplink', enabled: false },
    ]);
  });

  it('deletes unobserved interfaces only with cleanup', async () => {
    const stale = registry.addInterface(device, 'GigabitEthernet0/9');
    const log = captureLogger().logger;

    await syncInterfaces(registry, 'core-sw1', [], { logger: log });
    expect(registry.interfaces.deleteMany).not.toHaveBeenCalled();

    const outcome = await syncInterfaces(registry, 'core-sw1', [], { cleanup: true, logger: log });
    expect(registry.interfaces.deleteMany).toHaveBeenCalledWith([stale.id]);
    expect(outcome.stats.details.delete).toEqual([{ name: 'GigabitEthernet0/9', device: 'core-sw1' }]);
  });

  it('reaches the same end state when batches fail', async () => {
    const interfaces = [
      createInterface({ name: 'Port-channel1', type: 'lag' }),
      createInterface({ name: 'GigabitEthernet0/1', lag: 'Port-channel1' }),
      createInterface({ name: 'GigabitEthernet0/3', mode: 'access', untaggedVlan: 10 }),
    ];
    const log = captureLogger().logger;

    const batched = await syncInterfaces(registry, 'core-sw1', interfaces, { logger: log });

    const fallback = new FakeRegistry();
    const fallbackSite = fallback.addSite('DC1');
    fallback.addDevice('core-sw1', { site: 'DC1' });
    fallback.addVlan(fallbackSite, 10, 'users');
    fallback.addVlan(fallbackSite, 20, 'voice');
    fallback.interfaces.failBatches = true;
    const replayed = await syncInterfaces(fallback, 'core-sw1', interfaces, { logger: log });

    expect(replayed.stats).toEqual(batched.stats);
    expect(fallback.interfaces.records).toEqual(registry.interfaces.records);
    expect(fallback.interfaces.create).toHaveBeenCalledTimes(3);
  });
});
