/**
 * create command - Validate a pipeline file and store it as `<id>.yaml`
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { Pipeline } from '../pipeline/types.js';
import { loadPipeline } from '../pipeline/loader.js';
import { validatePipeline, validationMessages } from '../pipeline/validator.js';
import { PipelineLoadError } from '../pipeline/errors.js';
import { error as printError, success, verbose } from '../utils/output.js';

export interface CreateOptions {
  /** Overwrite an existing pipeline with the same id */
  force?: boolean;
}

export interface CreateData {
  id: string;
  path: string;
}

export async function createCommand(
  ctx: CommandContext,
  file: string,
  options: CreateOptions = {}
): Promise<CommandResult<CreateData>> {
  const { options: globalOpts, outputFormat, store } = ctx;
  verbose(`Loading pipeline from ${file}`, globalOpts.verbose);

  const fail = (message: string, errors?: string[]): CommandResult<CreateData> => {
    if (outputFormat === 'human') printError(message);
    return { success: false, message, errors };
  };

  let pipeline: Pipeline;
  try {
    pipeline = await loadPipeline(file);
  } catch (err) {
    if (err instanceof PipelineLoadError) return fail(err.message);
    throw err;
  }

  const validation = validatePipeline(pipeline);
  if (!validation.valid) {
    return fail(`Pipeline '${pipeline.id}' is invalid`, validationMessages(validation));
  }

  try {
    const path = await store.create(pipeline, { force: options.force });
    const message = `Created pipeline '${pipeline.id}' at ${path}`;
    if (outputFormat === 'human') success(message);
    return { success: true, message, data: { id: pipeline.id, path } };
  } catch (err) {
    if (err instanceof PipelineLoadError && err.code === 'PIPELINE_EXISTS') {
      return fail(`${err.message} (use --force to overwrite)`);
    }
    if (err instanceof PipelineLoadError) return fail(err.message);
    throw err;
  }
}
