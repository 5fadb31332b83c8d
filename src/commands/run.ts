/**
 * run command - Execute a pipeline against the device inventory
 *
 * Dry run unless `--apply` is given: reconcilers compute and report every
 * change without mutating the registry.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { Collector, DeviceTarget } from '../collectors/types.js';
import type { RegistryClient } from '../api/client.js';
import type { RegistryConnection } from '../api/types.js';
import type { RunReport } from '../pipeline/report.js';
import { PipelineExecutor } from '../pipeline/executor.js';
import { firstFailure, toRunReport } from '../pipeline/report.js';
import { RecordFileCollector } from '../collectors/file.js';
import { DEFAULT_INVENTORY_FILE, InventoryError, loadInventory, resolveCredentials } from '../config/inventory.js';
import { resolveRegistryConnection } from '../config/registry.js';
import {
  dryRunNotice,
  error as printError,
  header,
  printRunSummary,
  printStepResult,
  printStepStart,
  verbose,
} from '../utils/output.js';

export const DEFAULT_RECORDS_DIR = 'records';

export interface RunCommandOptions {
  /** Mutate the registry (default: dry run) */
  apply?: boolean;
  /** Device inventory file */
  devices?: string;
  /** Directory of collected record files */
  records?: string;
  registryUrl?: string;
  registryToken?: string;
  /** Collector override (default: record files under `records`) */
  collector?: Collector;
  /** Registry client override */
  clientFactory?: (connection: RegistryConnection) => RegistryClient;
}

export async function runCommand(
  ctx: CommandContext,
  name: string,
  options: RunCommandOptions = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat, store, logger } = ctx;
  const human = outputFormat === 'human';

  const fail = (message: string): CommandResult<RunReport> => {
    if (human) printError(message);
    return { success: false, message };
  };

  const stored = await store.find(name);
  if (!stored) return fail(`Pipeline not found: ${name}`);
  const { pipeline } = stored;
  if (!pipeline.enabled) return fail(`Pipeline '${pipeline.id}' is disabled`);

  const inventoryPath = options.devices ?? DEFAULT_INVENTORY_FILE;
  let devices: DeviceTarget[];
  try {
    devices = await loadInventory(inventoryPath);
  } catch (err) {
    if (err instanceof InventoryError) return fail(err.message);
    throw err;
  }

  const connection = resolveRegistryConnection({ url: options.registryUrl, token: options.registryToken });
  verbose(`Registry: ${connection.url ?? '(not configured)'} (url via ${connection.urlSource})`, globalOpts.verbose);
  verbose(`Devices: ${devices.length} from ${inventoryPath}`, globalOpts.verbose);

  const dryRun = !options.apply;
  if (human) {
    header(`Pipeline ${pipeline.name} (${pipeline.id})`);
    if (dryRun) dryRunNotice();
  }

  const executor = new PipelineExecutor(pipeline, {
    collector: options.collector ?? new RecordFileCollector(options.records ?? DEFAULT_RECORDS_DIR, logger),
    clientFactory: options.clientFactory,
    logger,
    onStepStart: human ? printStepStart : undefined,
    onStepComplete: human ? (_step, result) => printStepResult(result) : undefined,
  });

  const result = await executor.run({
    devices,
    credentials: resolveCredentials(),
    registry: { url: connection.url, token: connection.token },
    dryRun,
  });

  if (human) printRunSummary(result);

  const report = toRunReport(result);
  const failure = firstFailure(result);
  if (failure) {
    return {
      success: false,
      message: `Pipeline '${pipeline.id}' failed at step '${failure.stepId}': ${failure.error ?? 'unknown error'}`,
      data: report,
      errors: failure.error ? [failure.error] : undefined,
    };
  }

  return {
    success: true,
    message: `Pipeline '${pipeline.id}' completed${dryRun ? ' (dry run)' : ''}`,
    data: report,
  };
}
