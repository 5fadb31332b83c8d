/**
 * Device inventory and device credentials
 *
 * The inventory is a YAML file listing the devices to collect from, either
 * as a top-level list or under `devices:`:
 *
 * ```yaml
 * devices:
 *   - host: 10.0.0.1
 *     hostname: core-sw1
 *     platform: cisco_ios
 *     site: HQ
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Credentials, DeviceTarget } from '../collectors/types.js';

const DeviceTargetSchema = z.object({
  host: z.string().min(1, 'host is required'),
  hostname: z.string().optional(),
  platform: z.string().optional(),
  site: z.string().optional(),
  role: z.string().optional(),
  tenant: z.string().optional(),
});

const InventorySchema = z.union([
  z.array(DeviceTargetSchema),
  z.object({ devices: z.array(DeviceTargetSchema) }),
]);

export const DEFAULT_INVENTORY_FILE = 'devices.yaml';

/**
 * Invalid or unreadable device inventory
 */
export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'InventoryError';
  }
}

export function parseInventory(content: string, source = '<input>'): DeviceTarget[] {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new InventoryError(
      `Failed to parse device inventory ${source}: ${err instanceof Error ? err.message : String(err)}`,
      source
    );
  }

  const parsed = InventorySchema.safeParse(data ?? []);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InventoryError(`Invalid device inventory ${source}: ${issues.join('; ')}`, source);
  }
  return Array.isArray(parsed.data) ? parsed.data : parsed.data.devices;
}

export async function loadInventory(path: string = DEFAULT_INVENTORY_FILE): Promise<DeviceTarget[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    throw new InventoryError(`Device inventory not found: ${path}`, path);
  }
  return parseInventory(content, path);
}

/**
 * Device login credentials from NETSYNC_USERNAME, NETSYNC_PASSWORD and NETSYNC_SECRET
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const credentials: Credentials = {};
  if (env.NETSYNC_USERNAME) credentials.username = env.NETSYNC_USERNAME;
  if (env.NETSYNC_PASSWORD) credentials.password = env.NETSYNC_PASSWORD;
  if (env.NETSYNC_SECRET) credentials.secret = env.NETSYNC_SECRET;
  return credentials;
}
