/**
 * Record-file collector
 *
 * Reads records collected earlier (by a separate polling job) from
 * `<dir>/<target>.json`. The file holds an array of flat records; records
 * are limited to the devices of the run when a device list is given.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { FlatRecord } from '../entities/types.js';
import type { CollectOptions, Collector, CollectorName, Credentials, DeviceTarget } from './types.js';
import { pickText } from '../entities/parsers.js';
import { hostnameKey } from '../entities/naming.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';

const RecordFileSchema = z.array(z.record(z.unknown()));

/**
 * Failure reading a record file
 */
export class CollectorError extends Error {
  constructor(
    message: string,
    public readonly target: CollectorName,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'CollectorError';
  }
}

function belongsTo(record: FlatRecord, devices: DeviceTarget[]): boolean {
  const host = pickText(record, 'host', 'device_ip', 'ip');
  const hostname = pickText(record, 'hostname', 'device', 'local_device');
  if (!host && !hostname) return true;
  return devices.some(
    (device) =>
      (host !== null && device.host === host) ||
      (hostname !== null && device.hostname !== undefined && hostnameKey(device.hostname) === hostnameKey(hostname))
  );
}

export class RecordFileCollector implements Collector {
  private readonly log: Logger;

  constructor(
    private readonly directory: string,
    log?: Logger
  ) {
    this.log = log ?? defaultLogger;
  }

  /**
   * `cdp` reads `cdp.json`; `lldp` with `protocol: both` also reads
   * `cdp.json` when present
   */
  async collect(
    target: CollectorName,
    devices: DeviceTarget[],
    options: CollectOptions,
    _credentials: Credentials
  ): Promise<FlatRecord[]> {
    const records = await this.readRecords(target);
    if (target === 'lldp' && options.protocol === 'both') {
      records.push(...(await this.readRecords('cdp', true)));
    }

    const selected = devices.length > 0 ? records.filter((record) => belongsTo(record, devices)) : records;
    this.log.debug(`Read ${selected.length} ${target} records`, { directory: this.directory });
    return selected;
  }

  private async readRecords(target: CollectorName, optional = false): Promise<FlatRecord[]> {
    const path = join(this.directory, `${target}.json`);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (optional) return [];
      throw new CollectorError(
        `No collected ${target} records at ${path}`,
        target,
        path,
        err instanceof Error ? err : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new CollectorError(
        `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
        target,
        path
      );
    }

    const result = RecordFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CollectorError(`${path} must contain an array of records`, target, path);
    }
    return result.data;
  }
}
