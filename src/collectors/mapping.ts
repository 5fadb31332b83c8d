/**
 * Collector name → entity mapper
 *
 * Records become typed entities at the collect boundary; nothing downstream
 * of the run context sees a flat record.
 */

import type { Device, FlatRecord } from '../entities/types.js';
import type { MappedEntities } from '../entities/mappers.js';
import type { CollectedEntity, CollectorName, DeviceTarget } from './types.js';
import {
  toCables,
  toConfigBackups,
  toDevices,
  toInterfaces,
  toInventoryItems,
  toMacEntries,
} from '../entities/mappers.js';
import { hostnameKey } from '../entities/naming.js';

type MapperTable = { [K in CollectorName]: (records: FlatRecord[]) => MappedEntities<CollectedEntity[K]> };

export const COLLECTOR_MAPPERS: MapperTable = {
  devices: toDevices,
  interfaces: toInterfaces,
  mac: toMacEntries,
  lldp: toCables,
  cdp: toCables,
  inventory: toInventoryItems,
  backup: toConfigBackups,
};

export function mapCollected<K extends CollectorName>(
  target: K,
  records: FlatRecord[]
): MappedEntities<CollectedEntity[K]> {
  const mapper: MapperTable[K] = COLLECTOR_MAPPERS[target];
  return mapper(records);
}

/**
 * Fill site, role and tenant of collected devices from the device inventory
 */
export function withTargetDefaults(devices: Device[], targets: DeviceTarget[]): Device[] {
  const byHost = new Map<string, DeviceTarget>();
  for (const target of targets) {
    byHost.set(target.host, target);
    if (target.hostname) byHost.set(hostnameKey(target.hostname), target);
  }

  return devices.map((device) => {
    const target = byHost.get(device.host) ?? byHost.get(hostnameKey(device.hostname));
    if (!target) return device;
    return {
      ...device,
      platform: device.platform ?? target.platform ?? null,
      site: device.site ?? target.site ?? null,
      role: device.role ?? target.role ?? null,
      tenant: device.tenant ?? target.tenant ?? null,
    };
  });
}
