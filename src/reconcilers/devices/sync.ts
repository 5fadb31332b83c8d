/**
 * Device reconciliation
 *
 * Creates and updates devices by hostname. Cleanup is bounded by a tenant:
 * without one the call is refused before anything is read or written.
 */

import type { RegistryClient } from '../../api/client.js';
import type { DeviceWrite, RemoteDevice, WithId } from '../../api/types.js';
import type { Device } from '../../entities/types.js';
import type { CreateItem, ReconcileOutcome, SyncOptions, UpdateItem } from '../types.js';
import { logger } from '../../api/logger.js';
import { slugify } from '../../api/client.js';
import { CleanupRequiresTenantError } from '../errors.js';
import { applyDiff, emptyStats, failedOutcome, recordSkips, statsFromDiff } from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { DEVICE_DEFAULTS, UNKNOWN_MODEL, diffDevices, withScopeDefaults } from './diff.js';

function createWrite(item: CreateItem<Device>, options: SyncOptions): DeviceWrite {
  const device = item.local;
  const write: DeviceWrite = {
    name: device.hostname,
    site: device.site ?? DEVICE_DEFAULTS.site,
    role: device.role ?? DEVICE_DEFAULTS.role,
    model: device.model || UNKNOWN_MODEL,
    manufacturer: options.manufacturer ?? DEVICE_DEFAULTS.manufacturer,
    status: DEVICE_DEFAULTS.status,
  };
  if (device.serial) write.serial = device.serial;
  if (device.platform) write.platform = device.platform;
  if (device.tenant) write.tenant = device.tenant;
  return write;
}

function updateWrite(item: UpdateItem<Device, RemoteDevice>, options: SyncOptions): WithId<DeviceWrite> {
  const device = item.local;
  const write: WithId<DeviceWrite> = { id: item.remote.id };
  for (const field of item.changedFields) {
    switch (field) {
      case 'serial':
        write.serial = device.serial ?? '';
        break;
      case 'model':
        if (device.model) {
          write.model = device.model;
          write.manufacturer = item.remote.manufacturer ?? options.manufacturer ?? DEVICE_DEFAULTS.manufacturer;
        }
        break;
      case 'platform':
        write.platform = device.platform;
        break;
      case 'site':
        if (device.site) write.site = device.site;
        break;
      case 'role':
        if (device.role) write.role = device.role;
        break;
      case 'tenant':
        write.tenant = device.tenant;
        break;
    }
  }
  return write;
}

/**
 * Reconcile devices
 *
 * With `cleanup`, registry devices of `options.tenant` that were not
 * observed are deleted; without a tenant the call fails with
 * CleanupRequiresTenantError and performs no mutation.
 */
export async function syncDevices(
  client: RegistryClient,
  devices: Device[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    if (options.cleanup && !options.tenant) {
      throw new CleanupRequiresTenantError();
    }

    const local = withScopeDefaults(devices, options);
    // Observed devices are looked up by name; cleanup also needs the
    // tenant's full device list to find the ones no longer observed
    const remoteById = new Map<number, RemoteDevice>();
    if (local.length > 0) {
      for (const record of await client.devices.list({ names: local.map((device) => device.hostname) })) {
        remoteById.set(record.id, record);
      }
    }
    if (options.cleanup && options.tenant) {
      for (const record of await client.devices.list({ tenant: slugify(options.tenant) })) {
        remoteById.set(record.id, record);
      }
    }
    const remote = [...remoteById.values()];

    const diff = diffDevices(local, remote, options);
    log.info(summarizeDiff(diff));

    if (options.dryRun) {
      return { success: true, stats: statsFromDiff(diff) };
    }

    recordSkips(stats, diff);
    await applyDiff(
      diff,
      client.devices,
      {
        create: (item) => createWrite(item, options),
        update: (item) => updateWrite(item, options),
        remoteId: (record) => record.id,
      },
      { label: 'devices', stats, log }
    );
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, 'devices');
  }
}
