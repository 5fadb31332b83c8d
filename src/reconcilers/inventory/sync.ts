/**
 * Inventory reconciliation
 *
 * Runs per device. Items without a serial number (empty slots, virtual
 * modules) are not reconciled and count as skipped; cleanup never deletes
 * a registry item with the name of an observed item.
 */

import type { RegistryClient } from '../../api/client.js';
import type { InventoryItemWrite, RemoteInventoryItem, WithId } from '../../api/types.js';
import type { InventoryItem } from '../../entities/types.js';
import type { ReconcileOutcome, SyncOptions, UpdateItem } from '../types.js';
import { logger } from '../../api/logger.js';
import { ScopeNotFoundError } from '../errors.js';
import { applyDiff, emptyStats, failedOutcome, recordSkips, statsFromDiff } from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { inventoryKey } from '../../entities/keys.js';
import { diffInventory } from './diff.js';

function updateWrite(item: UpdateItem<InventoryItem, RemoteInventoryItem>): WithId<InventoryItemWrite> {
  const local = item.local;
  const write: WithId<InventoryItemWrite> = { id: item.remote.id };
  for (const field of item.changedFields) {
    switch (field) {
      case 'partId':
        write.partId = local.partId ?? '';
        break;
      case 'serial':
        write.serial = local.serial ?? '';
        break;
      case 'description':
        write.description = local.description ?? '';
        break;
      case 'manufacturer':
        write.manufacturer = local.manufacturer;
        break;
    }
  }
  return write;
}

/**
 * Reconcile the inventory items of one device
 *
 * Fails with ScopeNotFoundError when the device is not in the registry.
 */
export async function syncInventory(
  client: RegistryClient,
  deviceName: string,
  items: InventoryItem[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    const device = await client.devices.getByName(deviceName);
    if (!device) {
      throw new ScopeNotFoundError('device', deviceName);
    }

    const local = items.filter((item) => Boolean(item.serial));
    const withoutSerial = items.length - local.length;
    const observed = new Set(items.map(inventoryKey));
    if (withoutSerial > 0) {
      log.debug(`Skipping ${withoutSerial} inventory items without serial`, { device: deviceName });
    }

    const remote = await client.inventory.list({ deviceId: device.id });
    const diff = diffInventory(local, remote, options, deviceName);
    diff.deleteCandidates = diff.deleteCandidates.filter((candidate) => !observed.has(inventoryKey(candidate.remote)));
    diff.hasChanges = diff.create.length > 0 || diff.update.length > 0 || (diff.cleanup && diff.deleteCandidates.length > 0);
    log.info(summarizeDiff(diff), { device: deviceName });

    if (options.dryRun) {
      const preview = statsFromDiff(diff);
      preview.skipped += withoutSerial;
      return { success: true, stats: preview };
    }

    stats.skipped += withoutSerial;
    recordSkips(stats, diff);
    await applyDiff(
      diff,
      client.inventory,
      {
        create: ({ local: item }) => {
          const write: InventoryItemWrite = { deviceId: device.id, name: item.name, discovered: true };
          if (item.partId) write.partId = item.partId;
          if (item.serial) write.serial = item.serial;
          if (item.description) write.description = item.description;
          if (item.manufacturer) write.manufacturer = item.manufacturer;
          return write;
        },
        update: updateWrite,
        remoteId: (record) => record.id,
      },
      { label: 'inventory items', stats, log, device: deviceName }
    );
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, `inventory for ${deviceName}`);
  }
}
