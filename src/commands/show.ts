/**
 * show command - Print one pipeline definition
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { PipelineObject } from '../pipeline/loader.js';
import { pipelineToObject } from '../pipeline/loader.js';
import { error as printError, printPipeline } from '../utils/output.js';

export interface ShowData {
  path: string;
  pipeline: PipelineObject;
}

export async function showCommand(ctx: CommandContext, name: string): Promise<CommandResult<ShowData>> {
  const stored = await ctx.store.find(name);
  if (!stored) {
    const message = `Pipeline not found: ${name}`;
    if (ctx.outputFormat === 'human') printError(message);
    return { success: false, message };
  }

  if (ctx.outputFormat === 'human') {
    printPipeline(stored.pipeline, stored.path);
  }

  return {
    success: true,
    message: `Pipeline '${stored.pipeline.id}'`,
    data: { path: stored.path, pipeline: pipelineToObject(stored.pipeline) },
  };
}
