/**
 * Reconcilers module - sync observed network state into the registry
 *
 * One reconciler per entity category, sharing the diff calculator and the
 * bulk apply with per-item fallback.
 *
 * @module reconcilers
 */

import type { RegistryClient } from '../api/client.js';
import type { Cable, Device, Interface, InventoryItem, IPAddress, Vlan } from '../entities/types.js';
import type { ReconcileOutcome, SyncOptions } from './types.js';
import { syncDevices } from './devices/sync.js';
import { syncInterfaces } from './interfaces/sync.js';
import { syncIpAddresses } from './ip-addresses/sync.js';
import { syncVlans } from './vlans/sync.js';
import { syncCables } from './cables/sync.js';
import { syncInventory } from './inventory/sync.js';

export * as devices from './devices/index.js';
export * as interfaces from './interfaces/index.js';
export * as ipAddresses from './ip-addresses/index.js';
export * as vlans from './vlans/index.js';
export * as cables from './cables/index.js';
export * as inventory from './inventory/index.js';

export type * from './types.js';
export { ReconcileError, ScopeNotFoundError, CleanupRequiresTenantError, toReconcileError } from './errors.js';
export type { ReconcileErrorCode } from './errors.js';
export { computeDiff, computeChanges, valuesEqual, arrayEquals, summarizeDiff, formatDiffDetails } from './diff.js';
export { runBulk, emptyStats, statsFromDiff, mergeStats } from './apply.js';
export type { BulkOperation, BulkResult } from './apply.js';

/**
 * One reconciliation call: a category, its scope and the observed entities
 */
export type SyncRequest =
  | { category: 'devices'; entities: Device[] }
  | { category: 'interfaces'; device: string; entities: Interface[] }
  | { category: 'ip_addresses'; device: string; entities: IPAddress[] }
  | { category: 'vlans'; site: string; entities: Vlan[] }
  | { category: 'cables'; entities: Cable[] }
  | { category: 'inventory'; device: string; entities: InventoryItem[] };

/**
 * Reconcile one category and scope
 */
export function syncCategory(
  client: RegistryClient,
  request: SyncRequest,
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  switch (request.category) {
    case 'devices':
      return syncDevices(client, request.entities, options);
    case 'interfaces':
      return syncInterfaces(client, request.device, request.entities, options);
    case 'ip_addresses':
      return syncIpAddresses(client, request.device, request.entities, options);
    case 'vlans':
      return syncVlans(client, request.site, request.entities, options);
    case 'cables':
      return syncCables(client, request.entities, options);
    case 'inventory':
      return syncInventory(client, request.device, request.entities, options);
  }
}
