/**
 * Interface diff
 *
 * Interfaces are matched within a device by their long-form name, so
 * `Gi0/1` observed on the device and `GigabitEthernet0/1` in the registry
 * are the same interface.
 */

import type { RemoteInterface } from '../../api/types.js';
import type { EnabledMode, Interface } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff } from '../types.js';
import { interfaceIdentity } from '../../entities/keys.js';
import { interfaceKey } from '../../entities/naming.js';
import { isEnabled } from '../../entities/parsers.js';
import { computeDiff } from '../diff.js';

const lowercase = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);
const asInterfaceKey = (value: unknown): unknown => (typeof value === 'string' ? interfaceKey(value) : value);

export function interfaceSpec(enabledMode: EnabledMode = 'admin'): CategorySpec<Interface, RemoteInterface> {
  return {
    category: 'interfaces',
    localKey: interfaceIdentity,
    remoteKey: (record) => (record.name ? interfaceKey(record.name) : ''),
    localName: (iface) => iface.name,
    remoteName: (record) => record.name,
    fields: [
      { field: 'description', local: (i) => i.description, remote: (r) => r.description },
      { field: 'enabled', local: (i) => isEnabled(i.status, enabledMode), remote: (r) => r.enabled },
      { field: 'type', local: (i) => i.type, remote: (r) => r.type },
      { field: 'mtu', local: (i) => i.mtu, remote: (r) => r.mtu },
      { field: 'speed', local: (i) => i.speed, remote: (r) => r.speed },
      { field: 'duplex', local: (i) => i.duplex, remote: (r) => r.duplex },
      { field: 'mode', local: (i) => i.mode, remote: (r) => r.mode },
      { field: 'untaggedVlan', local: (i) => i.untaggedVlan, remote: (r) => r.untaggedVlan },
      { field: 'taggedVlans', local: (i) => i.taggedVlans, remote: (r) => r.taggedVlans },
      { field: 'lag', local: (i) => i.lag, remote: (r) => r.lag, normalize: asInterfaceKey },
      { field: 'macAddress', local: (i) => i.macAddress, remote: (r) => r.macAddress, normalize: lowercase },
      { field: 'status', local: (i) => i.status, remote: () => null, kind: 'observe-only' },
    ],
  };
}

export function diffInterfaces(
  local: Interface[],
  remote: RemoteInterface[],
  options: DiffOptions & { enabledMode?: EnabledMode } = {},
  device?: string
): SyncDiff<Interface, RemoteInterface> {
  return computeDiff(interfaceSpec(options.enabledMode), local, remote, options, device);
}
