/**
 * delete command - Remove a pipeline file
 */

import type { CommandContext, CommandResult } from '../types.js';
import { promptConfirmation } from '../utils/prompt.js';
import { error as printError, info, success } from '../utils/output.js';

export interface DeleteOptions {
  /** Skip the confirmation prompt */
  force?: boolean;
  /** Confirmation prompt (default: terminal prompt) */
  confirm?: (question: string) => Promise<boolean>;
}

export interface DeleteData {
  id: string;
  path: string;
}

export async function deleteCommand(
  ctx: CommandContext,
  name: string,
  options: DeleteOptions = {}
): Promise<CommandResult<DeleteData>> {
  const { outputFormat, store } = ctx;
  const stored = await store.find(name);
  if (!stored) {
    const message = `Pipeline not found: ${name}`;
    if (outputFormat === 'human') printError(message);
    return { success: false, message };
  }

  const { pipeline, path } = stored;
  if (!options.force) {
    const confirm = options.confirm ?? promptConfirmation;
    const confirmed = await confirm(`Delete pipeline '${pipeline.id}' (${path})?`);
    if (!confirmed) {
      const message = 'Deletion cancelled';
      if (outputFormat === 'human') info(message);
      return { success: false, message };
    }
  }

  const deleted = await store.delete(path);
  const message = `Deleted pipeline '${pipeline.id}'`;
  if (outputFormat === 'human') success(message);
  return { success: true, message, data: { id: pipeline.id, path: deleted } };
}
