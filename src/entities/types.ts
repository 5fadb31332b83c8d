/**
 * Canonical entity model
 *
 * Typed records produced from collected device data. Every entity has an
 * identity key unique within its parent scope (see ./keys.ts); entities are
 * created per pipeline run and never mutated by the reconcilers.
 */

// =============================================================================
// Value Types
// =============================================================================

/**
 * Registry switchport mode
 */
export type InterfaceMode = 'access' | 'tagged' | 'tagged-all';

export type Duplex = 'full' | 'half' | 'auto';

/**
 * Normalized interface status as observed on the device
 */
export type InterfaceStatus = 'up' | 'down' | 'disabled' | 'error';

/**
 * How `enabled` is derived from the observed status:
 * - admin: enabled unless administratively disabled or error-disabled
 * - link: enabled only when the link is up
 */
export type EnabledMode = 'admin' | 'link';

/**
 * A flat key/value record as returned by a collector
 */
export type FlatRecord = Record<string, unknown>;

// =============================================================================
// Entities
// =============================================================================

export interface Device {
  /** Identity */
  hostname: string;
  /** Management address the device was polled on */
  host: string;
  platform: string | null;
  model: string | null;
  serial: string | null;
  version: string | null;
  site: string | null;
  role: string | null;
  tenant: string | null;
}

export interface Interface {
  /** Identity part 1: owning device hostname */
  device: string;
  /** Identity part 2: interface name in its long form */
  name: string;
  description: string | null;
  status: InterfaceStatus | null;
  /** kbit/s */
  speed: number | null;
  mtu: number | null;
  duplex: Duplex | null;
  type: string | null;
  mode: InterfaceMode | null;
  untaggedVlan: number | null;
  taggedVlans: number[];
  /** Long name of the LAG this interface is a member of */
  lag: string | null;
  macAddress: string | null;
  /** CIDR address when the interface carries one (SVI, routed port) */
  ipAddress: string | null;
}

export interface IPAddress {
  device: string;
  interface: string;
  /** Host address without mask */
  address: string;
  prefixLength: number;
  description: string | null;
  primary: boolean;
}

export interface Vlan {
  site: string;
  vid: number;
  name: string;
}

export interface CableEndpoint {
  device: string;
  interface: string;
}

export interface Cable {
  a: CableEndpoint;
  b: CableEndpoint;
}

export interface InventoryItem {
  device: string;
  name: string;
  partId: string | null;
  serial: string | null;
  description: string | null;
  manufacturer: string | null;
}

/**
 * MAC table entry (collected and exported, not reconciled)
 */
export interface MacEntry {
  device: string;
  interface: string;
  macAddress: string;
  vlan: number | null;
  type: string | null;
}

/**
 * Configuration backup (collected and exported, not reconciled)
 */
export interface ConfigBackup {
  device: string;
  content: string;
}

// =============================================================================
// Categories
// =============================================================================

/**
 * Entity categories the reconciler can sync
 */
export type EntityCategory = 'devices' | 'interfaces' | 'ip_addresses' | 'vlans' | 'cables' | 'inventory';

export interface EntityByCategory {
  devices: Device;
  interfaces: Interface;
  ip_addresses: IPAddress;
  vlans: Vlan;
  cables: Cable;
  inventory: InventoryItem;
}
