/**
 * Interface reconciliation
 *
 * Runs per device. VLAN numbers are resolved to registry ids through the
 * device's site; VLANs the site does not know are dropped with a warning.
 *
 * Link aggregation is applied in two phases: LAG interfaces are created
 * (and updated) before their members, because a member references its LAG
 * by registry id.
 */

import type { RegistryClient } from '../../api/client.js';
import type { InterfaceWrite, RecordId, RemoteDevice, RemoteInterface, WithId } from '../../api/types.js';
import type { EnabledMode, Interface } from '../../entities/types.js';
import type { ApplyContext } from '../apply.js';
import type { CreateItem, ReconcileOutcome, SyncOptions, UpdateItem } from '../types.js';
import { logger } from '../../api/logger.js';
import { interfaceKey, isLagName } from '../../entities/naming.js';
import { isEnabled } from '../../entities/parsers.js';
import { ScopeNotFoundError } from '../errors.js';
import {
  applyCreates,
  applyDeletes,
  applyUpdates,
  emptyStats,
  failedOutcome,
  recordSkips,
  statsFromDiff,
} from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { diffInterfaces } from './diff.js';

// =============================================================================
// VLAN Resolution
// =============================================================================

/**
 * Map of VLAN number → registry id for the VLANs the interfaces reference
 */
async function resolveVlanIds(
  client: RegistryClient,
  device: RemoteDevice,
  interfaces: Interface[]
): Promise<Map<number, RecordId>> {
  const ids = new Map<number, RecordId>();
  const referenced = interfaces.some((iface) => iface.untaggedVlan !== null || iface.taggedVlans.length > 0);
  if (!referenced || !device.site) return ids;

  const site = await client.sites.getByName(device.site);
  if (!site) return ids;

  for (const vlan of await client.vlans.list({ siteId: site.id })) {
    ids.set(vlan.vid, vlan.id);
  }
  return ids;
}

/**
 * Remove VLAN references the registry cannot resolve
 */
export function dropUnknownVlans(
  interfaces: Interface[],
  vlanIds: ReadonlyMap<number, RecordId>,
  site: string | null
): { interfaces: Interface[]; warnings: string[] } {
  const warnings: string[] = [];
  const where = site ? `site ${site}` : 'the registry';

  const result = interfaces.map((iface) => {
    const unknown: number[] = [];
    let untaggedVlan = iface.untaggedVlan;
    if (untaggedVlan !== null && !vlanIds.has(untaggedVlan)) {
      unknown.push(untaggedVlan);
      untaggedVlan = null;
    }
    const taggedVlans = iface.taggedVlans.filter((vid) => {
      if (vlanIds.has(vid)) return true;
      unknown.push(vid);
      return false;
    });

    if (unknown.length === 0) return iface;
    warnings.push(`VLAN ${unknown.join(',')} not found in ${where}; dropped from ${iface.name}`);
    return { ...iface, untaggedVlan, taggedVlans };
  });

  return { interfaces: result, warnings };
}

// =============================================================================
// Writes
// =============================================================================

interface WriteContext {
  deviceId: RecordId;
  enabledMode: EnabledMode;
  vlanIds: ReadonlyMap<number, RecordId>;
  /** Registry ids of this device's interfaces by key; grows as LAGs are created */
  interfaceIds: Map<string, RecordId>;
  warnings: string[];
}

function lagId(iface: Interface, context: WriteContext): RecordId | null {
  if (!iface.lag) return null;
  const id = context.interfaceIds.get(interfaceKey(iface.lag));
  if (id === undefined) {
    context.warnings.push(`LAG ${iface.lag} not found in registry; ${iface.name} left without LAG`);
    return null;
  }
  return id;
}

function vlanIdList(vids: number[], context: WriteContext): RecordId[] {
  const ids: RecordId[] = [];
  for (const vid of vids) {
    const id = context.vlanIds.get(vid);
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

function createWrite(item: CreateItem<Interface>, context: WriteContext): InterfaceWrite {
  const iface = item.local;
  const write: InterfaceWrite = {
    deviceId: context.deviceId,
    name: iface.name,
    type: iface.type ?? 'other',
  };

  const enabled = isEnabled(iface.status, context.enabledMode);
  if (enabled !== null) write.enabled = enabled;
  if (iface.description) write.description = iface.description;
  if (iface.mtu !== null) write.mtu = iface.mtu;
  if (iface.speed !== null) write.speed = iface.speed;
  if (iface.duplex !== null) write.duplex = iface.duplex;
  if (iface.mode !== null) write.mode = iface.mode;
  if (iface.untaggedVlan !== null) write.untaggedVlanId = context.vlanIds.get(iface.untaggedVlan) ?? null;
  if (iface.taggedVlans.length > 0) write.taggedVlanIds = vlanIdList(iface.taggedVlans, context);
  if (iface.macAddress) write.macAddress = iface.macAddress;

  const lag = lagId(iface, context);
  if (lag !== null) write.lagId = lag;
  return write;
}

function updateWrite(item: UpdateItem<Interface, RemoteInterface>, context: WriteContext): WithId<InterfaceWrite> {
  const iface = item.local;
  const write: WithId<InterfaceWrite> = { id: item.remote.id };

  for (const field of item.changedFields) {
    switch (field) {
      case 'description':
        write.description = iface.description ?? '';
        break;
      case 'enabled': {
        const enabled = isEnabled(iface.status, context.enabledMode);
        if (enabled !== null) write.enabled = enabled;
        break;
      }
      case 'type':
        if (iface.type) write.type = iface.type;
        break;
      case 'mtu':
        write.mtu = iface.mtu;
        break;
      case 'speed':
        write.speed = iface.speed;
        break;
      case 'duplex':
        write.duplex = iface.duplex;
        break;
      case 'mode':
        write.mode = iface.mode;
        break;
      case 'untaggedVlan':
        write.untaggedVlanId = iface.untaggedVlan === null ? null : (context.vlanIds.get(iface.untaggedVlan) ?? null);
        break;
      case 'taggedVlans':
        write.taggedVlanIds = vlanIdList(iface.taggedVlans, context);
        break;
      case 'lag':
        write.lagId = lagId(iface, context);
        break;
      case 'macAddress':
        write.macAddress = iface.macAddress;
        break;
    }
  }
  return write;
}

function partitionByLag<T extends { local: Interface }>(items: T[]): [T[], T[]] {
  const lags: T[] = [];
  const members: T[] = [];
  for (const item of items) {
    (isLagName(item.local.name) ? lags : members).push(item);
  }
  return [lags, members];
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Reconcile the interfaces of one device
 *
 * Fails with ScopeNotFoundError when the device is not in the registry.
 */
export async function syncInterfaces(
  client: RegistryClient,
  deviceName: string,
  interfaces: Interface[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    const device = await client.devices.getByName(deviceName);
    if (!device) {
      throw new ScopeNotFoundError('device', deviceName);
    }

    const vlanIds = await resolveVlanIds(client, device, interfaces);
    const resolved = dropUnknownVlans(interfaces, vlanIds, device.site);
    const remote = await client.interfaces.list({ deviceId: device.id });

    const diff = diffInterfaces(resolved.interfaces, remote, options, deviceName);
    diff.warnings.unshift(...resolved.warnings);
    log.info(summarizeDiff(diff), { device: deviceName });

    if (options.dryRun) {
      return { success: true, stats: statsFromDiff(diff) };
    }

    recordSkips(stats, diff);
    const writeContext: WriteContext = {
      deviceId: device.id,
      enabledMode: options.enabledMode ?? 'admin',
      vlanIds,
      interfaceIds: new Map(remote.map((record) => [interfaceKey(record.name), record.id])),
      warnings: stats.warnings,
    };
    const context: ApplyContext = { label: 'interfaces', stats, log, device: deviceName };
    const toCreate = (item: CreateItem<Interface>): InterfaceWrite => createWrite(item, writeContext);
    const toUpdate = (item: UpdateItem<Interface, RemoteInterface>): WithId<InterfaceWrite> =>
      updateWrite(item, writeContext);

    const [lagCreates, memberCreates] = partitionByLag(diff.create);
    const createdLags = await applyCreates(lagCreates, client.interfaces, toCreate, context);
    for (const { output } of createdLags.succeeded) {
      writeContext.interfaceIds.set(interfaceKey(output.name), output.id);
    }
    await applyCreates(memberCreates, client.interfaces, toCreate, context);

    const [lagUpdates, memberUpdates] = partitionByLag(diff.update);
    await applyUpdates(lagUpdates, client.interfaces, toUpdate, context);
    await applyUpdates(memberUpdates, client.interfaces, toUpdate, context);

    if (diff.cleanup) {
      await applyDeletes(diff.deleteCandidates, client.interfaces, (record) => record.id, context);
    }
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, `interfaces for ${deviceName}`);
  }
}
