/**
 * list command - Show the pipelines of the pipelines directory
 */

import type { CommandContext, CommandResult } from '../types.js';
import { info, printTable, truncate, verbose } from '../utils/output.js';

export interface PipelineSummary {
  id: string;
  name: string;
  steps: number;
  enabled: boolean;
  description: string;
  path: string;
}

const DESCRIPTION_WIDTH = 30;

export async function listCommand(ctx: CommandContext): Promise<CommandResult<PipelineSummary[]>> {
  const { options: globalOpts, outputFormat, store } = ctx;
  verbose(`Reading pipelines from ${store.directory}`, globalOpts.verbose);

  const stored = await store.list();
  const summaries: PipelineSummary[] = stored.map(({ path, pipeline }) => ({
    id: pipeline.id,
    name: pipeline.name,
    steps: pipeline.steps.length,
    enabled: pipeline.enabled,
    description: pipeline.description,
    path,
  }));

  if (outputFormat === 'human') {
    if (summaries.length === 0) {
      info(`No pipelines found in ${store.directory}`);
    } else {
      printTable(
        ['ID', 'NAME', 'STEPS', 'ENABLED', 'DESCRIPTION'],
        summaries.map((summary) => [
          summary.id,
          summary.name,
          String(summary.steps),
          summary.enabled ? 'yes' : 'no',
          truncate(summary.description, DESCRIPTION_WIDTH),
        ])
      );
    }
  }

  return {
    success: true,
    message: `Found ${summaries.length} pipeline(s)`,
    data: summaries,
  };
}
