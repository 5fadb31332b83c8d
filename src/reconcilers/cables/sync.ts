/**
 * Cable reconciliation
 *
 * Cables are reconciled across the whole observed device set at once. A
 * neighbor is linked only when both the device and the port exist in the
 * registry; LAG endpoints are never cabled. Cleanup is limited to cables
 * whose both ends sit on observed devices, so a cable towards a device that
 * was not polled this run is never removed.
 */

import type { RegistryClient } from '../../api/client.js';
import type { Logger } from '../../api/logger.js';
import type { RecordId, RemoteDevice } from '../../api/types.js';
import type { Cable, CableEndpoint } from '../../entities/types.js';
import type { ReconcileOutcome, SyncOptions } from '../types.js';
import { logger } from '../../api/logger.js';
import { cableKey, cableLabel } from '../../entities/keys.js';
import { hostnameKey, interfaceKey, isLagName } from '../../entities/naming.js';
import { applyDiff, emptyStats, failedOutcome, recordSkips, statsFromDiff } from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { diffCables, remoteCableEnds, type ResolvedCable } from './diff.js';

/**
 * Per-run cache of registry devices and their interface ids
 */
class EndpointResolver {
  private readonly devices = new Map<string, RemoteDevice | null>();
  private readonly interfaces = new Map<RecordId, Map<string, RecordId>>();

  constructor(private readonly client: RegistryClient) {}

  async device(name: string): Promise<RemoteDevice | null> {
    const key = hostnameKey(name);
    const cached = this.devices.get(key);
    if (cached !== undefined) return cached;
    const device = await this.client.devices.getByName(name);
    this.devices.set(key, device);
    return device;
  }

  async interfaceId(endpoint: CableEndpoint): Promise<RecordId | null> {
    const device = await this.device(endpoint.device);
    if (!device) return null;

    let ids = this.interfaces.get(device.id);
    if (!ids) {
      ids = new Map();
      for (const iface of await this.client.interfaces.list({ deviceId: device.id })) {
        ids.set(interfaceKey(iface.name), iface.id);
      }
      this.interfaces.set(device.id, ids);
    }
    return ids.get(interfaceKey(endpoint.interface)) ?? null;
  }
}

/**
 * Resolve observed cables to registry interface ids
 *
 * Each physical link is reported from both ends; only the first report is kept.
 */
async function resolveCables(
  cables: Cable[],
  resolver: EndpointResolver,
  warnings: string[],
  log: Logger
): Promise<ResolvedCable[]> {
  const resolved: ResolvedCable[] = [];
  const seen = new Set<string>();

  for (const cable of cables) {
    const key = cableKey(cable);
    if (!key || seen.has(key)) continue;
    seen.add(key);

    if (isLagName(cable.a.interface) || isLagName(cable.b.interface)) {
      log.debug(`Skipping LAG link ${cableLabel(cable)}`);
      continue;
    }
    if (!(await resolver.device(cable.b.device))) {
      warnings.push(`Neighbor ${cable.b.device} not found in registry; skipped ${cableLabel(cable)}`);
      continue;
    }

    const aInterfaceId = await resolver.interfaceId(cable.a);
    const bInterfaceId = await resolver.interfaceId(cable.b);
    if (aInterfaceId === null || bInterfaceId === null) {
      warnings.push(`Interface not found in registry; skipped ${cableLabel(cable)}`);
      continue;
    }
    resolved.push({ ...cable, aInterfaceId, bInterfaceId });
  }

  return resolved;
}

/**
 * Reconcile cables between the observed devices and their neighbors
 */
export async function syncCables(
  client: RegistryClient,
  cables: Cable[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    const resolver = new EndpointResolver(client);
    const warnings: string[] = [];

    // Devices that reported neighbors this run
    const observed = new Map<string, RemoteDevice>();
    for (const cable of cables) {
      const device = await resolver.device(cable.a.device);
      if (device) {
        observed.set(hostnameKey(device.name), device);
      } else if (!observed.has(hostnameKey(cable.a.device))) {
        warnings.push(`Device ${cable.a.device} not found in registry; its cables are skipped`);
      }
    }

    const local = await resolveCables(
      cables.filter((cable) => observed.has(hostnameKey(cable.a.device))),
      resolver,
      warnings,
      log
    );
    const remote =
      observed.size === 0 ? [] : await client.cables.list({ deviceIds: [...observed.values()].map((d) => d.id) });

    const diff = diffCables(local, remote, options);
    diff.warnings.unshift(...new Set(warnings));
    diff.deleteCandidates = diff.deleteCandidates.filter((candidate) => {
      const ends = remoteCableEnds(candidate.remote);
      return ends !== null && ends.every((end) => observed.has(hostnameKey(end.device)));
    });
    diff.hasChanges = diff.create.length > 0 || (diff.cleanup && diff.deleteCandidates.length > 0);
    log.info(summarizeDiff(diff));

    if (options.dryRun) {
      return { success: true, stats: statsFromDiff(diff) };
    }

    recordSkips(stats, diff);
    await applyDiff(
      diff,
      client.cables,
      {
        create: ({ local: cable }) => ({
          aInterfaceId: cable.aInterfaceId,
          bInterfaceId: cable.bInterfaceId,
          status: 'connected',
        }),
        update: ({ remote: record }) => ({ id: record.id }),
        remoteId: (record) => record.id,
      },
      { label: 'cables', stats, log }
    );
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, 'cables');
  }
}
