/**
 * Registry connection resolution
 *
 * ## Resolution Order
 *
 * For the URL and the token independently:
 * 1. Explicit values (CLI flags `--registry-url`, `--registry-token`)
 * 2. Environment: NETSYNC_REGISTRY_URL, NETSYNC_REGISTRY_TOKEN
 * 3. ~/.netsync/settings.json:
 *    {
 *      "registry": { "url": "...", "token": "..." }
 *    }
 *
 * A missing URL is not an error here; the executor fails the first sync
 * step instead, so collect-and-export pipelines run without a registry.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import type { RegistryConnection } from '../api/types.js';

const SettingsSchema = z.object({
  registry: z
    .object({
      url: z.string().optional(),
      token: z.string().optional(),
    })
    .optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

export type ConnectionSource = 'explicit' | 'env' | 'settings' | 'none';

export interface ResolvedConnection extends RegistryConnection {
  /** Where the URL came from */
  urlSource: ConnectionSource;
  tokenSource: ConnectionSource;
}

export interface ResolveConnectionOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Settings file (default: ~/.netsync/settings.json) */
  settingsPath?: string;
}

export function defaultSettingsPath(): string {
  return path.join(os.homedir(), '.netsync', 'settings.json');
}

/**
 * Read the settings file; a missing or malformed file yields empty settings
 */
export function readSettings(settingsPath: string = defaultSettingsPath()): Settings {
  let raw: string;
  try {
    raw = fs.readFileSync(settingsPath, 'utf-8');
  } catch {
    return {};
  }

  try {
    const parsed = SettingsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function pick(
  explicit: string | undefined,
  fromEnv: string | undefined,
  fromSettings: string | undefined
): { value?: string; source: ConnectionSource } {
  const candidates: Array<[string | undefined, ConnectionSource]> = [
    [explicit, 'explicit'],
    [fromEnv, 'env'],
    [fromSettings, 'settings'],
  ];
  for (const [candidate, source] of candidates) {
    const value = nonEmpty(candidate);
    if (value) return { value, source };
  }
  return { source: 'none' };
}

/**
 * Resolve the registry URL and token
 */
export function resolveRegistryConnection(
  explicit: RegistryConnection = {},
  options: ResolveConnectionOptions = {}
): ResolvedConnection {
  const env = options.env ?? process.env;
  const settings = readSettings(options.settingsPath).registry ?? {};

  const url = pick(explicit.url, env.NETSYNC_REGISTRY_URL, settings.url);
  const token = pick(explicit.token, env.NETSYNC_REGISTRY_TOKEN, settings.token);

  return {
    url: url.value,
    token: token.value,
    urlSource: url.source,
    tokenSource: token.source,
  };
}
