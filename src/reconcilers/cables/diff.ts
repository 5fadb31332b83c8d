/**
 * Cable diff
 *
 * A cable is identified by its two endpoints regardless of order. Cables
 * have no comparable fields: a changed endpoint is a different cable.
 */

import type { RecordId, RemoteCable, RemoteCableEndpoint } from '../../api/types.js';
import type { Cable } from '../../entities/types.js';
import type { CategorySpec, DiffOptions, SyncDiff } from '../types.js';
import { cableKey, cableLabel } from '../../entities/keys.js';
import { computeDiff } from '../diff.js';

/**
 * A cable whose endpoints are resolved to registry interfaces
 */
export interface ResolvedCable extends Cable {
  aInterfaceId: RecordId;
  bInterfaceId: RecordId;
}

/**
 * Endpoint pair of a registry cable; null when either side is not a single interface
 */
export function remoteCableEnds(record: RemoteCable): [RemoteCableEndpoint, RemoteCableEndpoint] | null {
  if (record.aEnd.length !== 1 || record.bEnd.length !== 1) return null;
  return [record.aEnd[0], record.bEnd[0]];
}

export function remoteCableKey(record: RemoteCable): string {
  const ends = remoteCableEnds(record);
  if (!ends) return '';
  const [a, b] = ends;
  return cableKey({
    a: { device: a.device, interface: a.interface },
    b: { device: b.device, interface: b.interface },
  });
}

function remoteCableLabel(record: RemoteCable): string {
  const ends = remoteCableEnds(record);
  if (!ends) return `cable #${record.id}`;
  const [a, b] = ends;
  return `${a.device}:${a.interface} <-> ${b.device}:${b.interface}`;
}

export const cableSpec: CategorySpec<ResolvedCable, RemoteCable> = {
  category: 'cables',
  localKey: cableKey,
  remoteKey: remoteCableKey,
  localName: cableLabel,
  remoteName: remoteCableLabel,
  fields: [],
};

export function diffCables(
  local: ResolvedCable[],
  remote: RemoteCable[],
  options: DiffOptions = {}
): SyncDiff<ResolvedCable, RemoteCable> {
  return computeDiff(cableSpec, local, remote, options);
}
