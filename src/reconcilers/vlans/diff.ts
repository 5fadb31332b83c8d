/**
 * VLAN diff: matched by VLAN number within a site, compared by name
 */

import type { RemoteVlan } from '../../api/types.js';
import type { Vlan } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff } from '../types.js';
import { vlanKey } from '../../entities/keys.js';
import { computeDiff } from '../diff.js';

export const vlanSpec: CategorySpec<Vlan, RemoteVlan> = {
  category: 'vlans',
  localKey: vlanKey,
  remoteKey: vlanKey,
  localName: (vlan) => `VLAN ${vlan.vid} (${vlan.name})`,
  remoteName: (record) => `VLAN ${record.vid} (${record.name})`,
  fields: [{ field: 'name', local: (vlan) => vlan.name, remote: (record) => record.name }],
};

export function diffVlans(
  local: Vlan[],
  remote: RemoteVlan[],
  options: DiffOptions = {},
  site?: string
): SyncDiff<Vlan, RemoteVlan> {
  return computeDiff(vlanSpec, local, remote, options, site);
}
