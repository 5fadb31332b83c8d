/**
 * Identity keys
 *
 * Keys are normalized (case, interface naming convention) so that entities
 * observed under different spellings compare equal. An empty key marks an
 * invalid entity that is excluded from diffing.
 */

import type { Cable, CableEndpoint, Device, Interface, InventoryItem, IPAddress, Vlan } from './types.js';
import { hostnameKey, interfaceKey } from './naming.js';

export function deviceKey(device: Pick<Device, 'hostname'>): string {
  return device.hostname ? hostnameKey(device.hostname) : '';
}

/**
 * Interface key within its device scope
 */
export function interfaceIdentity(iface: Pick<Interface, 'name'>): string {
  return iface.name ? interfaceKey(iface.name) : '';
}

/**
 * IP address key within its device scope: interface plus address/prefix
 */
export function ipAddressKey(ip: Pick<IPAddress, 'interface' | 'address' | 'prefixLength'>): string {
  if (!ip.interface || !ip.address) return '';
  return `${interfaceKey(ip.interface)}|${ip.address.toLowerCase()}/${ip.prefixLength}`;
}

/**
 * VLAN key within its site scope
 */
export function vlanKey(vlan: Pick<Vlan, 'vid'>): string {
  return Number.isInteger(vlan.vid) && vlan.vid > 0 ? String(vlan.vid) : '';
}

function endpointKey(endpoint: CableEndpoint): string {
  if (!endpoint.device || !endpoint.interface) return '';
  return `${hostnameKey(endpoint.device)}:${interfaceKey(endpoint.interface)}`;
}

/**
 * Symmetric cable key: (A,B) and (B,A) give the same key
 */
export function cableKey(cable: Cable): string {
  const a = endpointKey(cable.a);
  const b = endpointKey(cable.b);
  if (!a || !b) return '';
  return [a, b].sort().join(' <-> ');
}

/**
 * Inventory key within its device scope
 */
export function inventoryKey(item: Pick<InventoryItem, 'name'>): string {
  return item.name ? item.name.trim().toLowerCase() : '';
}

/**
 * Human-readable cable label used in change details
 */
export function cableLabel(cable: Cable): string {
  return `${cable.a.device}:${cable.a.interface} <-> ${cable.b.device}:${cable.b.interface}`;
}
