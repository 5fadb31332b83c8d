#!/usr/bin/env node
/**
 * netsync CLI - Run network discovery pipelines against an inventory registry
 *
 * Commands:
 * - list: Show stored pipelines
 * - show: Print a pipeline definition
 * - validate: Check a pipeline without running it
 * - run: Execute a pipeline (dry run unless --apply)
 * - create: Store a pipeline file
 * - delete: Remove a stored pipeline
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  createCommand,
  deleteCommand,
  listCommand,
  runCommand,
  showCommand,
  validateCommand,
} from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { resolvePipelinesDir } from './config/index.js';
import { PipelineStore } from './pipeline/loader.js';
import { logger } from './api/logger.js';

const VERSION = '0.1.0';

interface RunFlags {
  dryRun?: boolean;
  apply?: boolean;
  devices?: string;
  records?: string;
  registryUrl?: string;
  registryToken?: string;
}

interface ForceFlag {
  force?: boolean;
}

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }
  const log = logger.child({});
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    store: new PipelineStore(resolvePipelinesDir(options.pipelinesDir), log),
    logger: log,
  };
}

/**
 * Run a command, print its JSON result when asked, and exit
 */
async function execute<T>(
  label: string,
  command: (ctx: CommandContext) => Promise<CommandResult<T>>
): Promise<void> {
  const ctx = createContext(program.opts<GlobalOptions>());
  try {
    const result = await command(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('netsync')
  .description('Collect network device state and reconcile it into an inventory registry')
  .version(VERSION)
  .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false))
  .addOption(new Option('--pipelines-dir <dir>', 'Directory holding pipeline files').env('NETSYNC_PIPELINES_DIR'));

program
  .command('list')
  .description('List stored pipelines')
  .action(async () => {
    await execute('List', (ctx) => listCommand(ctx));
  });

program
  .command('show')
  .description('Show a pipeline definition')
  .argument('<name>', 'Pipeline id, file name or path')
  .action(async (name: string) => {
    await execute('Show', (ctx) => showCommand(ctx, name));
  });

program
  .command('validate')
  .description('Validate a pipeline without running it')
  .argument('<name>', 'Pipeline id, file name or path')
  .action(async (name: string) => {
    await execute('Validate', (ctx) => validateCommand(ctx, name));
  });

program
  .command('run')
  .description('Run a pipeline (dry run unless --apply is given)')
  .argument('<name>', 'Pipeline id, file name or path')
  .option('--dry-run', 'Compute changes without touching the registry (default)')
  .option('--apply', 'Apply changes to the registry')
  .option('--devices <file>', 'Device inventory file', 'devices.yaml')
  .option('--records <dir>', 'Directory of collected record files', 'records')
  .option('--registry-url <url>', 'Registry base URL')
  .option('--registry-token <token>', 'Registry API token')
  .action(async (name: string, cmdOpts: RunFlags) => {
    await execute('Run', (ctx) =>
      runCommand(ctx, name, {
        apply: cmdOpts.apply === true && cmdOpts.dryRun !== true,
        devices: cmdOpts.devices,
        records: cmdOpts.records,
        registryUrl: cmdOpts.registryUrl,
        registryToken: cmdOpts.registryToken,
      })
    );
  });

program
  .command('create')
  .description('Validate a pipeline file and store it')
  .argument('<file>', 'Pipeline YAML file')
  .option('--force', 'Overwrite an existing pipeline with the same id')
  .action(async (file: string, cmdOpts: ForceFlag) => {
    await execute('Create', (ctx) => createCommand(ctx, file, { force: cmdOpts.force }));
  });

program
  .command('delete')
  .description('Delete a stored pipeline')
  .argument('<name>', 'Pipeline id, file name or path')
  .option('--force', 'Delete without confirmation')
  .action(async (name: string, cmdOpts: ForceFlag) => {
    await execute('Delete', (ctx) => deleteCommand(ctx, name, { force: cmdOpts.force }));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
