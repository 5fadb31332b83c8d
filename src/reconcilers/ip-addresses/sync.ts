/**
 * IP address reconciliation
 *
 * Runs per device. Addresses on interfaces the registry does not have yet
 * are skipped with a warning. Once addresses are written, the device's
 * primary IPv4 is pointed at the observed primary address.
 */

import type { RegistryClient } from '../../api/client.js';
import type { IPAddressWrite, RecordId, RemoteDevice, RemoteIPAddress } from '../../api/types.js';
import type { IPAddress } from '../../entities/types.js';
import type { ReconcileOutcome, SyncOptions, SyncStats } from '../types.js';
import type { Logger } from '../../api/logger.js';
import { logger } from '../../api/logger.js';
import { ipAddressKey } from '../../entities/keys.js';
import { interfaceKey } from '../../entities/naming.js';
import { ScopeNotFoundError } from '../errors.js';
import { applyDiff, emptyStats, failedOutcome, recordSkips, statsFromDiff } from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { diffIpAddresses, remoteIpAddressKey } from './diff.js';

function cidr(ip: IPAddress): string {
  return `${ip.address}/${ip.prefixLength}`;
}

/**
 * Point the device's primary IPv4 at the observed primary address
 */
async function updatePrimary(
  client: RegistryClient,
  device: RemoteDevice,
  primary: IPAddress | undefined,
  idsByKey: ReadonlyMap<string, RecordId>,
  stats: SyncStats,
  log: Logger
): Promise<void> {
  if (!primary) return;
  const id = idsByKey.get(ipAddressKey(primary));
  if (id === undefined || id === device.primaryIp4Id) return;

  try {
    await client.devices.update({ id: device.id, primaryIp4Id: id });
    log.info(`Primary IPv4 of ${device.name} set to ${cidr(primary)}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Failed to set primary IPv4 of ${device.name}`, error instanceof Error ? error : undefined);
    stats.failed++;
    stats.errors.push(`update primary_ip4 ${device.name}: ${message}`);
  }
}

/**
 * Reconcile the IP addresses of one device
 *
 * Fails with ScopeNotFoundError when the device is not in the registry.
 */
export async function syncIpAddresses(
  client: RegistryClient,
  deviceName: string,
  addresses: IPAddress[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    const device = await client.devices.getByName(deviceName);
    if (!device) {
      throw new ScopeNotFoundError('device', deviceName);
    }

    const interfaceIds = new Map<string, RecordId>();
    for (const iface of await client.interfaces.list({ deviceId: device.id })) {
      interfaceIds.set(interfaceKey(iface.name), iface.id);
    }

    const warnings: string[] = [];
    const local = addresses.filter((ip) => {
      if (interfaceIds.has(interfaceKey(ip.interface))) return true;
      warnings.push(`Interface ${ip.interface} not found in registry; ${cidr(ip)} skipped`);
      return false;
    });

    const remote = await client.ipAddresses.list({ deviceId: device.id });
    const diff = diffIpAddresses(local, remote, device.primaryIp4Id, options, deviceName);
    diff.warnings.unshift(...warnings);
    log.info(summarizeDiff(diff), { device: deviceName });

    if (options.dryRun) {
      return { success: true, stats: statsFromDiff(diff) };
    }

    recordSkips(stats, diff);
    const idsByKey = new Map<string, RecordId>();
    for (const record of remote) {
      idsByKey.set(remoteIpAddressKey(record), record.id);
    }

    const applied = await applyDiff<IPAddress, RemoteIPAddress, IPAddressWrite>(
      diff,
      client.ipAddresses,
      {
        create: ({ local: ip }) => {
          const interfaceId = interfaceIds.get(interfaceKey(ip.interface));
          if (interfaceId === undefined) {
            throw new Error(`Interface not found in registry: ${ip.interface}`);
          }
          const write: IPAddressWrite = { address: cidr(ip), interfaceId, status: 'active' };
          if (ip.description) write.description = ip.description;
          return write;
        },
        update: ({ local: ip, remote: record, changedFields }) =>
          changedFields.includes('description') ? { id: record.id, description: ip.description ?? '' } : { id: record.id },
        remoteId: (record) => record.id,
      },
      { label: 'IP addresses', stats, log, device: deviceName }
    );
    for (const { item, output } of applied.created.succeeded) {
      idsByKey.set(item.key, output.id);
    }

    await updatePrimary(
      client,
      device,
      local.find((ip) => ip.primary),
      idsByKey,
      stats,
      log
    );
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, `IP addresses for ${deviceName}`);
  }
}
