/**
 * Collector interface
 *
 * A collector polls devices (or reads what was polled earlier) and returns
 * flat records. Per-device failures are reported inline with an `_error`
 * field instead of failing the whole call.
 */

import type { Cable, ConfigBackup, Device, FlatRecord, Interface, InventoryItem, MacEntry } from '../entities/types.js';

export const COLLECTOR_NAMES = ['devices', 'interfaces', 'mac', 'lldp', 'cdp', 'inventory', 'backup'] as const;

export type CollectorName = (typeof COLLECTOR_NAMES)[number];

/**
 * Entity type produced by each collector
 */
export interface CollectedEntity {
  devices: Device;
  interfaces: Interface;
  mac: MacEntry;
  lldp: Cable;
  cdp: Cable;
  inventory: InventoryItem;
  backup: ConfigBackup;
}

/**
 * A device to collect from, as listed in the device inventory
 */
export interface DeviceTarget {
  /** Management address */
  host: string;
  /** Platform driver name (e.g. cisco_ios) */
  platform?: string;
  /** Hostname, when known before polling */
  hostname?: string;
  site?: string;
  role?: string;
  tenant?: string;
}

/**
 * Device login credentials
 */
export interface Credentials {
  username?: string;
  password?: string;
  /** Enable secret */
  secret?: string;
}

export type CollectOptions = Record<string, unknown>;

export interface Collector {
  collect(
    target: CollectorName,
    devices: DeviceTarget[],
    options: CollectOptions,
    credentials: Credentials
  ): Promise<FlatRecord[]>;
}

export function isCollectorName(value: string): value is CollectorName {
  return COLLECTOR_NAMES.some((name) => name === value);
}
