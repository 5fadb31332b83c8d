/**
 * Record → entity mappers
 *
 * One mapper per collector output. Records that carry an `_error` field
 * (a device the collector could not poll) are dropped and reported as
 * warnings; records without an identity are dropped silently.
 */

import type {
  Cable,
  ConfigBackup,
  Device,
  FlatRecord,
  Interface,
  InventoryItem,
  IPAddress,
  MacEntry,
  Vlan,
} from './types.js';
import { hostnameKey, longInterfaceName, shortHostname, sviVlanId } from './naming.js';
import {
  inferInterfaceType,
  normalizeMac,
  parseCidr,
  parseDuplex,
  parseMode,
  parseSpeed,
  parseStatus,
  parseVlanList,
  pickText,
  readInt,
} from './parsers.js';

// =============================================================================
// Types
// =============================================================================

export interface MappedEntities<T> {
  entities: T[];
  /** Per-record problems (device errors reported by the collector) */
  warnings: string[];
}

/** Maximum length of an inventory item name in the registry */
export const INVENTORY_NAME_MAX = 64;

// =============================================================================
// Helpers
// =============================================================================

function recordError(record: FlatRecord): string | null {
  const error = pickText(record, '_error');
  if (!error) return null;
  const host = pickText(record, 'hostname', 'host', 'ip', 'device') ?? 'unknown device';
  return `${host}: ${error}`;
}

function mapRecords<T>(records: FlatRecord[], map: (record: FlatRecord) => T | null): MappedEntities<T> {
  const entities: T[] = [];
  const warnings: string[] = [];
  for (const record of records) {
    const error = recordError(record);
    if (error) {
      warnings.push(error);
      continue;
    }
    const entity = map(record);
    if (entity !== null) entities.push(entity);
  }
  return { entities, warnings };
}

function deviceName(record: FlatRecord): string | null {
  return pickText(record, 'hostname', 'device', 'device_name');
}

/**
 * Truncate an inventory name to the registry's limit (61 chars + `...`)
 */
export function truncateInventoryName(name: string): string {
  return name.length > INVENTORY_NAME_MAX ? `${name.slice(0, INVENTORY_NAME_MAX - 3)}...` : name;
}

// =============================================================================
// Mappers
// =============================================================================

export function toDevices(records: FlatRecord[]): MappedEntities<Device> {
  return mapRecords(records, (record) => {
    const hostname = deviceName(record) ?? pickText(record, 'name');
    if (!hostname) return null;
    return {
      hostname,
      host: pickText(record, 'host', 'ip', 'ip_address', 'device_ip') ?? '',
      platform: pickText(record, 'platform', 'device_type', 'os'),
      model: pickText(record, 'model', 'hardware', 'hardware_model', 'pid'),
      serial: pickText(record, 'serial', 'serial_number'),
      version: pickText(record, 'version', 'software_version', 'os_version'),
      site: pickText(record, 'site'),
      role: pickText(record, 'role'),
      tenant: pickText(record, 'tenant'),
    };
  });
}

export function toInterfaces(records: FlatRecord[]): MappedEntities<Interface> {
  return mapRecords(records, (record) => {
    const device = deviceName(record);
    const rawName = pickText(record, 'interface', 'name', 'port');
    if (!device || !rawName) return null;

    const name = longInterfaceName(rawName);
    const speed = parseSpeed(record.speed ?? record.bandwidth);
    const allowed = record.tagged_vlans ?? record.trunking_vlans ?? record.allowed_vlans;
    const mode = parseMode(record.mode ?? record.switchport_mode, allowed);
    const adminStatus = parseStatus(record.admin_status);
    const status = adminStatus === 'disabled' ? 'disabled' : parseStatus(record.status ?? record.link_status);
    const lag = pickText(record, 'lag', 'port_channel', 'member_of');
    const ip = parseCidr(record.ip_address, record.prefix_length ?? record.mask ?? record.netmask);

    return {
      device,
      name,
      description: pickText(record, 'description'),
      status,
      speed,
      mtu: readInt(record.mtu),
      duplex: parseDuplex(record.duplex),
      type: inferInterfaceType(name, speed, pickText(record, 'port_type', 'type')),
      mode,
      untaggedVlan:
        mode === 'access'
          ? readInt(record.access_vlan ?? record.untagged_vlan)
          : mode === null
            ? null
            : readInt(record.native_vlan ?? record.untagged_vlan),
      taggedVlans: mode === 'tagged' ? parseVlanList(allowed) : [],
      lag: lag ? longInterfaceName(lag) : null,
      macAddress: normalizeMac(record.mac ?? record.mac_address),
      ipAddress: ip ? `${ip.address}/${ip.prefixLength}` : null,
    };
  });
}

/**
 * Neighbor records (LLDP or CDP) → cables between the local and the remote port
 */
export function toCables(records: FlatRecord[]): MappedEntities<Cable> {
  return mapRecords(records, (record) => {
    const device = deviceName(record) ?? pickText(record, 'local_device');
    const localPort = pickText(record, 'local_interface', 'local_port');
    const neighbor = pickText(record, 'remote_hostname', 'neighbor', 'neighbor_name', 'remote_system_name');
    const remotePort = pickText(record, 'remote_port', 'neighbor_interface', 'remote_interface');
    if (!device || !localPort || !neighbor || !remotePort) return null;
    return {
      a: { device: shortHostname(device), interface: longInterfaceName(localPort) },
      b: { device: shortHostname(neighbor), interface: longInterfaceName(remotePort) },
    };
  });
}

export function toInventoryItems(records: FlatRecord[]): MappedEntities<InventoryItem> {
  return mapRecords(records, (record) => {
    const device = deviceName(record);
    const name = pickText(record, 'name', 'item');
    if (!device || !name) return null;
    return {
      device,
      name: truncateInventoryName(name),
      partId: pickText(record, 'pid', 'part_id'),
      serial: pickText(record, 'serial', 'sn'),
      description: pickText(record, 'description', 'descr'),
      manufacturer: pickText(record, 'manufacturer', 'vendor'),
    };
  });
}

export function toMacEntries(records: FlatRecord[]): MappedEntities<MacEntry> {
  return mapRecords(records, (record) => {
    const device = deviceName(record);
    const port = pickText(record, 'interface', 'port', 'destination_port');
    const macAddress = normalizeMac(record.mac ?? record.mac_address ?? record.destination_address);
    if (!device || !port || !macAddress) return null;
    return {
      device,
      interface: longInterfaceName(port),
      macAddress,
      vlan: readInt(record.vlan ?? record.vlan_id),
      type: pickText(record, 'type'),
    };
  });
}

export function toConfigBackups(records: FlatRecord[]): MappedEntities<ConfigBackup> {
  return mapRecords(records, (record) => {
    const device = deviceName(record);
    const content = pickText(record, 'config', 'content');
    if (!device || content === null) return null;
    return { device, content };
  });
}

// =============================================================================
// Derived Entities
// =============================================================================

/**
 * IP addresses carried by interfaces
 *
 * An address equal to the device's management host is marked primary.
 */
export function deriveIpAddresses(interfaces: Interface[], devices: Device[] = []): IPAddress[] {
  const hostByDevice = new Map<string, string>();
  for (const device of devices) {
    if (device.host) hostByDevice.set(hostnameKey(device.hostname), device.host);
  }

  const result: IPAddress[] = [];
  for (const iface of interfaces) {
    const cidr = parseCidr(iface.ipAddress);
    if (!cidr) continue;
    result.push({
      device: iface.device,
      interface: iface.name,
      address: cidr.address,
      prefixLength: cidr.prefixLength,
      description: iface.description,
      primary: hostByDevice.get(hostnameKey(iface.device)) === cidr.address,
    });
  }
  return result;
}

/**
 * VLANs derived from SVI interfaces (`Vlan<n>`)
 *
 * @param siteOf - Resolves the site of a device hostname
 */
export function deriveVlans(interfaces: Interface[], siteOf: (device: string) => string): Vlan[] {
  const seen = new Set<string>();
  const result: Vlan[] = [];
  for (const iface of interfaces) {
    const vid = sviVlanId(iface.name);
    if (vid === null || vid < 1 || vid > 4094) continue;
    const site = siteOf(iface.device);
    const key = `${site.toLowerCase()}|${vid}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push({ site, vid, name: iface.description ?? `VLAN ${vid}` });
  }
  return result;
}
