/**
 * Inventory diff
 *
 * Items are matched within a device by name. Manufacturer compares
 * case-insensitively, and an item observed without a manufacturer clears
 * the registry value.
 */

import type { RemoteInventoryItem } from '../../api/types.js';
import type { InventoryItem } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff } from '../types.js';
import { inventoryKey } from '../../entities/keys.js';
import { computeDiff } from '../diff.js';

const caseless = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);

export const inventorySpec: CategorySpec<InventoryItem, RemoteInventoryItem> = {
  category: 'inventory',
  localKey: inventoryKey,
  remoteKey: inventoryKey,
  localName: (item) => item.name,
  remoteName: (record) => record.name,
  fields: [
    { field: 'partId', local: (i) => i.partId, remote: (r) => r.partId },
    { field: 'serial', local: (i) => i.serial, remote: (r) => r.serial },
    { field: 'description', local: (i) => i.description, remote: (r) => r.description },
    {
      field: 'manufacturer',
      local: (i) => i.manufacturer,
      remote: (r) => r.manufacturer,
      normalize: caseless,
      compareNull: true,
    },
  ],
};

export function diffInventory(
  local: InventoryItem[],
  remote: RemoteInventoryItem[],
  options: DiffOptions = {},
  device?: string
): SyncDiff<InventoryItem, RemoteInventoryItem> {
  return computeDiff(inventorySpec, local, remote, options, device);
}
