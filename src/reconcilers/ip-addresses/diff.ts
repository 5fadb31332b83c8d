/**
 * IP address diff
 *
 * Addresses are matched within a device by interface plus address/prefix.
 * An address observed as primary is compared against the device's primary
 * IPv4; the primary is only ever set, never cleared.
 */

import type { RecordId, RemoteIPAddress } from '../../api/types.js';
import type { IPAddress } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff } from '../types.js';
import { ipAddressKey } from '../../entities/keys.js';
import { interfaceKey } from '../../entities/naming.js';
import { computeDiff } from '../diff.js';

/**
 * Key of a registry address, in the same form as ipAddressKey
 */
export function remoteIpAddressKey(record: RemoteIPAddress): string {
  if (!record.interface || !record.address) return '';
  return `${interfaceKey(record.interface)}|${record.address.toLowerCase()}`;
}

export function ipAddressSpec(primaryIp4Id: RecordId | null): CategorySpec<IPAddress, RemoteIPAddress> {
  return {
    category: 'ip_addresses',
    localKey: ipAddressKey,
    remoteKey: remoteIpAddressKey,
    localName: (ip) => `${ip.interface} ${ip.address}/${ip.prefixLength}`,
    remoteName: (record) => `${record.interface ?? '?'} ${record.address}`,
    fields: [
      { field: 'description', local: (ip) => ip.description, remote: (r) => r.description },
      {
        field: 'primary',
        local: (ip) => (ip.primary ? true : null),
        remote: (r) => primaryIp4Id !== null && r.id === primaryIp4Id,
      },
    ],
  };
}

export function diffIpAddresses(
  local: IPAddress[],
  remote: RemoteIPAddress[],
  primaryIp4Id: RecordId | null,
  options: DiffOptions = {},
  device?: string
): SyncDiff<IPAddress, RemoteIPAddress> {
  return computeDiff(ipAddressSpec(primaryIp4Id), local, remote, options, device);
}
