/**
 * Configuration module exports
 */

export {
  resolveRegistryConnection,
  readSettings,
  defaultSettingsPath,
  type ConnectionSource,
  type ResolvedConnection,
  type ResolveConnectionOptions,
  type Settings,
} from './registry.js';

export {
  loadInventory,
  parseInventory,
  resolveCredentials,
  InventoryError,
  DEFAULT_INVENTORY_FILE,
} from './inventory.js';

export const DEFAULT_PIPELINES_DIR = 'pipelines';

/**
 * Pipelines directory: explicit option, then NETSYNC_PIPELINES_DIR, then ./pipelines
 */
export function resolvePipelinesDir(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicit || env.NETSYNC_PIPELINES_DIR || DEFAULT_PIPELINES_DIR;
}
