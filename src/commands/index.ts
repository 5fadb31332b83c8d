/**
 * Command exports
 */

export { listCommand, type PipelineSummary } from './list.js';
export { showCommand, type ShowData } from './show.js';
export { validateCommand, type ValidateData } from './validate.js';
export { runCommand, DEFAULT_RECORDS_DIR, type RunCommandOptions } from './run.js';
export { createCommand, type CreateOptions, type CreateData } from './create.js';
export { deleteCommand, type DeleteOptions, type DeleteData } from './delete.js';
