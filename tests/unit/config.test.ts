/**
 * Unit Tests: Configuration
 *
 * Tests registry connection resolution order, the device inventory file
 * and credentials from the environment.
 *
 * @see src/config/registry.ts
 * @see src/config/inventory.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readSettings, resolveRegistryConnection } from '../../src/config/registry.js';
import { InventoryError, loadInventory, parseInventory, resolveCredentials } from '../../src/config/inventory.js';
import { resolvePipelinesDir } from '../../src/config/index.js';

let directory: string;
let settingsPath: string;

beforeEach(async () => {
  directory = await mkdtemp(join(tmpdir(), 'netsync-config-'));
  settingsPath = join(directory, 'settings.json');
});

afterEach(async () => {
  await rm(directory, { recursive: true, force: true });
});

// =============================================================================
// Registry Connection
// =============================================================================

describe('resolveRegistryConnection', () => {
  it('prefers explicit values, then the environment', () => {
    const connection = resolveRegistryConnection(
      { url: 'https://flag.registry.test' },
      {
        env: { NETSYNC_REGISTRY_URL: 'https://env.registry.test', NETSYNC_REGISTRY_TOKEN: 'test-secret' },
        settingsPath,
      }
    );

    expect(connection).toEqual({
      url: 'https://flag.registry.test',
      token: 'test-secret',
      urlSource: 'explicit',
      tokenSource: 'env',
    });
  });

  it('falls back to the settings file', async () => {
    await writeFile(
      settingsPath,
      JSON.stringify({ registry: { url: 'https://settings.registry.test', token: 'test-secret' } }),
      'utf-8'
    );

    const connection = resolveRegistryConnection({ url: '  ' }, { env: {}, settingsPath });

    expect(connection).toEqual({
      url: 'https://settings.registry.test',
      token: 'test-secret',
      urlSource: 'settings',
      tokenSource: 'settings',
    });
  });

  it('reports a missing connection without failing', () => {
    expect(resolveRegistryConnection({}, { env: {}, settingsPath })).toEqual({
      url: undefined,
      token: undefined,
      urlSource: 'none',
      tokenSource: 'none',
    });
  });

  it('ignores a malformed settings file', async () => {
    await writeFile(settingsPath, '{ not json', 'utf-8');
    expect(readSettings(settingsPath)).toEqual({});

    await writeFile(settingsPath, JSON.stringify({ registry: { url: 42 } }), 'utf-8');
    expect(readSettings(settingsPath)).toEqual({});
  });
});

// =============================================================================
// Device Inventory
// =============================================================================

describe('parseInventory', () => {
  it('reads a top-level list', () => {
    expect(parseInventory('- host: 10.0.0.1\n- host: 10.0.0.2\n  hostname: access-sw1\n')).toEqual([
      { host: '10.0.0.1' },
      { host: '10.0.0.2', hostname: 'access-sw1' },
    ]);
  });

  it('reads a devices section', () => {
    const devices = parseInventory(
      ['devices:', '  - host: 10.0.0.1', '    platform: cisco_ios', '    site: HQ', '    tenant: Lab'].join('\n')
    );

    expect(devices).toEqual([{ host: '10.0.0.1', platform: 'cisco_ios', site: 'HQ', tenant: 'Lab' }]);
  });

  it('treats an empty file as no devices', () => {
    expect(parseInventory('')).toEqual([]);
  });

  it('rejects devices without a host', () => {
    expect(() => parseInventory('devices:\n  - hostname: core-sw1\n', 'devices.yaml')).toThrow(
      /^Invalid device inventory devices\.yaml: /
    );
  });

  it('rejects malformed YAML', () => {
    expect(() => parseInventory('devices: [', 'devices.yaml')).toThrow(InventoryError);
  });
});

describe('loadInventory', () => {
  it('reads the inventory file', async () => {
    const path = join(directory, 'devices.yaml');
    await writeFile(path, '- host: 10.0.0.1\n', 'utf-8');

    expect(await loadInventory(path)).toEqual([{ host: '10.0.0.1' }]);
  });

  it('fails for a missing file', async () => {
    const path = join(directory, 'missing.yaml');

    await expect(loadInventory(path)).rejects.toThrow(`Device inventory not found: ${path}`);
  });
});

// =============================================================================
// Credentials and Directories
// =============================================================================

describe('resolveCredentials', () => {
  it('reads the set variables only', () => {
    expect(resolveCredentials({ NETSYNC_USERNAME: 'netops', NETSYNC_PASSWORD: 'test-secret' })).toEqual({
      username: 'netops',
      password: 'test-secret',
    });
  });
});

describe('resolvePipelinesDir', () => {
  it('uses the option, then the environment, then ./pipelines', () => {
    expect(resolvePipelinesDir('custom', { NETSYNC_PIPELINES_DIR: 'env-dir' })).toBe('custom');
    expect(resolvePipelinesDir(undefined, { NETSYNC_PIPELINES_DIR: 'env-dir' })).toBe('env-dir');
    expect(resolvePipelinesDir(undefined, {})).toBe('pipelines');
  });
});
