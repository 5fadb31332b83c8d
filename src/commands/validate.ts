/**
 * validate command - Check a pipeline without running it
 */

import type { CommandContext, CommandResult } from '../types.js';
import { validatePipeline, validationMessages } from '../pipeline/validator.js';
import { error as printError, success, warn } from '../utils/output.js';

export interface ValidateData {
  id: string;
  valid: boolean;
  steps: number;
  errors: string[];
  warnings: string[];
}

export async function validateCommand(ctx: CommandContext, name: string): Promise<CommandResult<ValidateData>> {
  const { outputFormat } = ctx;
  const stored = await ctx.store.find(name);
  if (!stored) {
    const message = `Pipeline not found: ${name}`;
    if (outputFormat === 'human') printError(message);
    return { success: false, message };
  }

  const { pipeline } = stored;
  const result = validatePipeline(pipeline);
  const errors = validationMessages(result);
  const warnings = result.warnings.map((issue) => issue.message);
  const data: ValidateData = { id: pipeline.id, valid: result.valid, steps: pipeline.steps.length, errors, warnings };

  if (!result.valid) {
    const message = `Pipeline '${pipeline.id}' is invalid (${errors.length} error(s))`;
    if (outputFormat === 'human') printError(message);
    return { success: false, message, data, errors };
  }

  const message = `Pipeline '${pipeline.id}' is valid (${pipeline.steps.length} steps)`;
  if (outputFormat === 'human') {
    success(message);
    warnings.forEach((warning) => warn(warning));
  }
  return { success: true, message, data };
}
