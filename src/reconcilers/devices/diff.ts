/**
 * Device diff
 *
 * Devices are matched by hostname. The model string `Unknown` (reported when
 * the collector could not read the hardware) is never compared, and the
 * asset tag is maintained in the registry only.
 */

import type { RemoteDevice } from '../../api/types.js';
import type { Device } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff, SyncOptions } from '../types.js';
import { slugify } from '../../api/client.js';
import { deviceKey } from '../../entities/keys.js';
import { hostnameKey } from '../../entities/naming.js';
import { computeDiff } from '../diff.js';

/** Model reported when the hardware could not be read */
export const UNKNOWN_MODEL = 'Unknown';

export const DEVICE_DEFAULTS = {
  site: 'Main',
  role: 'switch',
  manufacturer: 'Cisco',
  status: 'active',
} as const;

const caseless = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);
const asSlug = (value: unknown): unknown => (typeof value === 'string' ? slugify(value) : value);

export const deviceSpec: CategorySpec<Device, RemoteDevice> = {
  category: 'devices',
  localKey: deviceKey,
  remoteKey: (record) => (record.name ? hostnameKey(record.name) : ''),
  localName: (device) => device.hostname,
  remoteName: (record) => record.name,
  fields: [
    { field: 'serial', local: (d) => d.serial, remote: (r) => r.serial },
    {
      field: 'model',
      local: (d) => (d.model && d.model !== UNKNOWN_MODEL ? d.model : null),
      remote: (r) => r.model,
    },
    { field: 'platform', local: (d) => d.platform, remote: (r) => r.platform, normalize: caseless },
    { field: 'site', local: (d) => d.site, remote: (r) => r.site, normalize: caseless },
    { field: 'role', local: (d) => d.role, remote: (r) => r.role, normalize: caseless },
    { field: 'tenant', local: (d) => d.tenant, remote: (r) => r.tenant, normalize: asSlug },
    { field: 'assetTag', local: () => null, remote: () => null, kind: 'registry-managed' },
  ],
};

/**
 * Fill site, role and tenant from the call options where the device
 * did not report them
 */
export function withScopeDefaults(devices: Device[], options: Pick<SyncOptions, 'site' | 'role' | 'tenant'>): Device[] {
  return devices.map((device) => ({
    ...device,
    site: device.site ?? options.site ?? null,
    role: device.role ?? options.role ?? null,
    tenant: device.tenant ?? options.tenant ?? null,
  }));
}

export function diffDevices(
  local: Device[],
  remote: RemoteDevice[],
  options: DiffOptions = {}
): SyncDiff<Device, RemoteDevice> {
  return computeDiff(deviceSpec, local, remote, options);
}
