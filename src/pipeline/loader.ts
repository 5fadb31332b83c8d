/**
 * Pipeline YAML loading and storage
 *
 * Pipelines are stored one per file as `<id>.yaml` in a pipelines
 * directory. The file format uses snake_case keys (`depends_on`).
 */

import { mkdir, readdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname, isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { Pipeline, PipelineStep } from './types.js';
import { STEP_TYPES } from './types.js';
import { PipelineLoadError } from './errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';

// =============================================================================
// File Format
// =============================================================================

const StepFileSchema = z.object({
  id: z.string().default(''),
  type: z.enum(STEP_TYPES).default('collect'),
  target: z.string().default(''),
  enabled: z.boolean().default(true),
  options: z.record(z.unknown()).nullish(),
  depends_on: z.array(z.string()).nullish(),
});

const PipelineFileSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  description: z.string().nullish(),
  enabled: z.boolean().default(true),
  steps: z.array(StepFileSchema).nullish(),
});

/**
 * Pipeline as stored in a file
 */
export interface PipelineObject {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  steps: Array<{
    id: string;
    type: string;
    target: string;
    enabled: boolean;
    options: Record<string, unknown>;
    depends_on: string[];
  }>;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Build a pipeline from its file form, applying defaults
 *
 * @throws PipelineLoadError when the structure is malformed
 */
export function pipelineFromObject(data: unknown): Pipeline {
  const parsed = PipelineFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new PipelineLoadError(`Invalid pipeline definition: ${formatZodIssues(parsed.error)}`, 'PIPELINE_PARSE_ERROR');
  }

  const file = parsed.data;
  const steps: PipelineStep[] = (file.steps ?? []).map((step) => ({
    id: step.id,
    type: step.type,
    target: step.target,
    enabled: step.enabled,
    options: step.options ?? {},
    dependsOn: step.depends_on ?? [],
  }));

  return {
    id: file.id,
    name: file.name,
    description: file.description ?? '',
    enabled: file.enabled,
    steps,
  };
}

export function pipelineToObject(pipeline: Pipeline): PipelineObject {
  return {
    id: pipeline.id,
    name: pipeline.name,
    description: pipeline.description,
    enabled: pipeline.enabled,
    steps: pipeline.steps.map((step) => ({
      id: step.id,
      type: step.type,
      target: step.target,
      enabled: step.enabled,
      options: step.options,
      depends_on: step.dependsOn,
    })),
  };
}

/**
 * Parse pipeline YAML
 *
 * @param source - File path for error messages
 */
export function parsePipeline(content: string, source = '<input>'): Pipeline {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new PipelineLoadError(
      `Failed to parse pipeline YAML ${source}: ${err instanceof Error ? err.message : String(err)}`,
      'PIPELINE_PARSE_ERROR',
      { path: source }
    );
  }
  try {
    return pipelineFromObject(data);
  } catch (err) {
    if (err instanceof PipelineLoadError) {
      throw new PipelineLoadError(`${source}: ${err.message}`, err.code, { path: source });
    }
    throw err;
  }
}

export function stringifyPipeline(pipeline: Pipeline): string {
  return stringifyYaml(pipelineToObject(pipeline));
}

export async function loadPipeline(path: string): Promise<Pipeline> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new PipelineLoadError(`Pipeline file not found: ${path}`, 'PIPELINE_NOT_FOUND', {
      path,
      originalError: err instanceof Error ? err.message : String(err),
    });
  }
  return parsePipeline(content, path);
}

// =============================================================================
// Pipeline Store
// =============================================================================

const PIPELINE_EXTENSIONS = ['.yaml', '.yml'];

export interface StoredPipeline {
  path: string;
  pipeline: Pipeline;
}

/**
 * Directory of pipeline files
 */
export class PipelineStore {
  readonly directory: string;
  private readonly log: Logger;

  constructor(directory: string, log?: Logger) {
    this.directory = resolve(directory);
    this.log = log ?? defaultLogger;
  }

  /**
   * All parseable pipelines, sorted by file name; unreadable files are logged and skipped
   */
  async list(): Promise<StoredPipeline[]> {
    if (!existsSync(this.directory)) return [];

    const files = (await readdir(this.directory))
      .filter((file) => PIPELINE_EXTENSIONS.includes(extname(file)))
      .sort();

    const pipelines: StoredPipeline[] = [];
    for (const file of files) {
      const path = join(this.directory, file);
      try {
        pipelines.push({ path, pipeline: await loadPipeline(path) });
      } catch (err) {
        this.log.warn(`Skipping unreadable pipeline file ${path}`, {
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return pipelines;
  }

  /**
   * Find a pipeline by file path, by file name in the store, or by id
   */
  async find(name: string): Promise<StoredPipeline | null> {
    const candidates = [isAbsolute(name) ? name : resolve(name)];
    for (const extension of PIPELINE_EXTENSIONS) {
      candidates.push(join(this.directory, `${name}${extension}`));
    }

    for (const path of candidates) {
      if (PIPELINE_EXTENSIONS.includes(extname(path)) && existsSync(path)) {
        return { path, pipeline: await loadPipeline(path) };
      }
    }

    const byId = (await this.list()).find((stored) => stored.pipeline.id === name);
    return byId ?? null;
  }

  /**
   * Store a pipeline as `<id>.yaml`
   *
   * @throws PipelineLoadError (PIPELINE_EXISTS) when the file exists and `force` is not set
   */
  async create(pipeline: Pipeline, options: { force?: boolean } = {}): Promise<string> {
    const path = join(this.directory, `${pipeline.id}.yaml`);
    if (existsSync(path) && !options.force) {
      throw new PipelineLoadError(`Pipeline '${pipeline.id}' already exists: ${path}`, 'PIPELINE_EXISTS', { path });
    }

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, stringifyPipeline(pipeline), 'utf-8');
    } catch (err) {
      throw new PipelineLoadError(
        `Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`,
        'PIPELINE_WRITE_ERROR',
        { path }
      );
    }
    this.log.debug('Pipeline stored', { id: pipeline.id, path });
    return path;
  }

  /**
   * Delete a pipeline file; returns the deleted path
   */
  async delete(name: string): Promise<string> {
    const stored = await this.find(name);
    if (!stored) {
      throw new PipelineLoadError(`Pipeline not found: ${name}`, 'PIPELINE_NOT_FOUND', { name });
    }
    await unlink(stored.path);
    return stored.path;
  }
}
