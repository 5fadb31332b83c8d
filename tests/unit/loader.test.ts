/**
 * Unit Tests: Pipeline Loading and Storage
 *
 * Tests YAML parsing with file-format defaults and the pipeline
 * directory store (list, find, create, delete).
 *
 * @see src/pipeline/loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PipelineStore, parsePipeline, stringifyPipeline } from '../../src/pipeline/loader.js';
import { PipelineLoadError } from '../../src/pipeline/errors.js';
import { createPipeline, createStep } from '../helpers/pipelines.js';
import { captureLogger } from '../helpers/logger.js';

const PIPELINE_YAML = `
id: devices-only
name: Devices only
steps:
  - id: collect_devices
    type: collect
    target: devices
  - id: sync_devices
    type: sync
    target: devices
    depends_on: [collect_devices]
    options:
      tenant: Lab
`;

// =============================================================================
// Parsing
// =============================================================================

describe('parsePipeline', () => {
  it('applies file defaults', () => {
    const pipeline = parsePipeline(PIPELINE_YAML);

    expect(pipeline).toEqual({
      id: 'devices-only',
      name: 'Devices only',
      description: '',
      enabled: true,
      steps: [
        { id: 'collect_devices', type: 'collect', target: 'devices', enabled: true, options: {}, dependsOn: [] },
        {
          id: 'sync_devices',
          type: 'sync',
          target: 'devices',
          enabled: true,
          options: { tenant: 'Lab' },
          dependsOn: ['collect_devices'],
        },
      ],
    });
  });

  it('reads a pipeline back from its own output', () => {
    const pipeline = createPipeline({
      description: 'nightly',
      steps: [createStep({ options: { protocol: 'cdp' } }), createStep({ id: 'off', enabled: false })],
    });

    expect(parsePipeline(stringifyPipeline(pipeline))).toEqual(pipeline);
  });

  it('writes snake_case keys', () => {
    const text = stringifyPipeline(createPipeline({ steps: [createStep({ dependsOn: ['a'] })] }));

    expect(text).toContain('depends_on:');
    expect(text).not.toContain('dependsOn');
  });

  it('rejects malformed YAML', () => {
    expect(() => parsePipeline('steps: [unclosed', 'broken.yaml')).toThrow(PipelineLoadError);
  });

  it('rejects a malformed structure with the field path', () => {
    expect(() => parsePipeline('id: x\nsteps: not-a-list', 'bad.yaml')).toThrow(
      'bad.yaml: Invalid pipeline definition: steps: Expected array, received string'
    );
  });

  it('rejects unknown step types', () => {
    try {
      parsePipeline('id: x\nsteps:\n  - id: s\n    type: deploy\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PipelineLoadError);
      if (!(err instanceof PipelineLoadError)) return;
      expect(err.code).toBe('PIPELINE_PARSE_ERROR');
      expect(err.message).toContain('steps.0.type');
    }
  });
});

// =============================================================================
// Store
// =============================================================================

describe('PipelineStore', () => {
  let directory: string;
  let store: PipelineStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'netsync-pipelines-'));
    store = new PipelineStore(directory, captureLogger().logger);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('lists nothing for a missing directory', async () => {
    const missing = new PipelineStore(join(directory, 'missing'));

    expect(await missing.list()).toEqual([]);
  });

  it('stores a pipeline as <id>.yaml', async () => {
    const path = await store.create(createPipeline());

    expect(path).toBe(join(directory, 'inventory-sync.yaml'));
    expect(parsePipeline(await readFile(path, 'utf-8'))).toEqual(createPipeline());
  });

  it('refuses to overwrite without force', async () => {
    await store.create(createPipeline());

    await expect(store.create(createPipeline({ name: 'Renamed' }))).rejects.toMatchObject({
      code: 'PIPELINE_EXISTS',
    });

    await store.create(createPipeline({ name: 'Renamed' }), { force: true });
    const stored = await store.find('inventory-sync');
    expect(stored?.pipeline.name).toBe('Renamed');
  });

  it('lists pipelines sorted by file name and skips unreadable files', async () => {
    const captured = captureLogger();
    const logged = new PipelineStore(directory, captured.logger);
    await logged.create(createPipeline({ id: 'zeta' }));
    await logged.create(createPipeline({ id: 'alpha' }));
    await writeFile(join(directory, 'broken.yml'), 'steps: [', 'utf-8');
    await writeFile(join(directory, 'notes.txt'), 'not a pipeline', 'utf-8');

    const listed = await logged.list();

    expect(listed.map((stored) => stored.pipeline.id)).toEqual(['alpha', 'zeta']);
    expect(captured.at('warn')).toHaveLength(1);
    expect(captured.at('warn')[0]).toContain(`Skipping unreadable pipeline file ${join(directory, 'broken.yml')}`);
  });

  it('finds a pipeline by file name, path or id', async () => {
    await writeFile(join(directory, 'nightly.yml'), PIPELINE_YAML, 'utf-8');

    expect((await store.find('nightly'))?.pipeline.id).toBe('devices-only');
    expect((await store.find(join(directory, 'nightly.yml')))?.path).toBe(join(directory, 'nightly.yml'));
    expect((await store.find('devices-only'))?.path).toBe(join(directory, 'nightly.yml'));
    expect(await store.find('unknown')).toBeNull();
  });

  it('deletes a pipeline file', async () => {
    const path = await store.create(createPipeline());

    expect(await store.delete('inventory-sync')).toBe(path);
    expect(existsSync(path)).toBe(false);
    await expect(store.delete('inventory-sync')).rejects.toThrow('Pipeline not found: inventory-sync');
  });
});
