/**
 * VLAN reconciliation
 *
 * Runs per site. VLANs are matched by number and renamed when the observed
 * name differs; the site must already exist in the registry.
 */

import type { RegistryClient } from '../../api/client.js';
import type { Vlan } from '../../entities/types.js';
import type { ReconcileOutcome, SyncOptions } from '../types.js';
import { logger } from '../../api/logger.js';
import { ScopeNotFoundError } from '../errors.js';
import { applyDiff, emptyStats, failedOutcome, recordSkips, statsFromDiff } from '../apply.js';
import { summarizeDiff } from '../diff.js';
import { diffVlans } from './diff.js';

/**
 * Reconcile the VLANs of one site
 *
 * Fails with ScopeNotFoundError when the site is not in the registry.
 */
export async function syncVlans(
  client: RegistryClient,
  siteName: string,
  vlans: Vlan[],
  options: SyncOptions = {}
): Promise<ReconcileOutcome> {
  const log = options.logger ?? logger;
  const stats = emptyStats();

  try {
    const site = await client.sites.getByName(siteName);
    if (!site) {
      throw new ScopeNotFoundError('site', siteName);
    }

    const remote = await client.vlans.list({ siteId: site.id });
    const diff = diffVlans(vlans, remote, options, siteName);
    log.info(summarizeDiff(diff), { site: siteName });

    if (options.dryRun) {
      return { success: true, stats: statsFromDiff(diff) };
    }

    recordSkips(stats, diff);
    await applyDiff(
      diff,
      client.vlans,
      {
        create: ({ local }) => ({ vid: local.vid, name: local.name, siteId: site.id, status: 'active' }),
        update: ({ local, remote: record }) => ({ id: record.id, name: local.name }),
        remoteId: (record) => record.id,
      },
      { label: 'VLANs', stats, log }
    );
    return { success: true, stats };
  } catch (error) {
    return failedOutcome(error, stats, log, `VLANs for ${siteName}`);
  }
}
