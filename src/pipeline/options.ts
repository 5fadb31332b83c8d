/**
 * Step option bag
 *
 * Options are free-form in pipeline files; the keys the executor reads are
 * validated here so a typo in a value fails validation instead of a run.
 */

import { z } from 'zod';
import type { Logger } from '../api/logger.js';
import type { SyncOptions } from '../reconcilers/types.js';
import { EXPORT_FORMATS } from '../exporters/types.js';

export const StepOptionsSchema = z
  .object({
    cleanup: z.boolean().optional(),
    tenant: z.string().min(1).optional(),
    site: z.string().min(1).optional(),
    role: z.string().min(1).optional(),
    manufacturer: z.string().min(1).optional(),
    update_existing: z.boolean().optional(),
    create_missing: z.boolean().optional(),
    exclude_patterns: z.array(z.string()).optional(),
    enabled_mode: z.enum(['admin', 'link']).optional(),
    collect_options: z.record(z.unknown()).optional(),
    format: z.enum(EXPORT_FORMATS).optional(),
    output_dir: z.string().min(1).optional(),
    protocol: z.enum(['lldp', 'cdp', 'both']).optional(),
  })
  .passthrough();

export type StepOptions = z.infer<typeof StepOptionsSchema>;

export interface OptionIssue {
  option: string;
  reason: string;
}

export type ParsedStepOptions =
  | { success: true; options: StepOptions }
  | { success: false; issues: OptionIssue[] };

export function parseStepOptions(raw: Record<string, unknown>): ParsedStepOptions {
  const result = StepOptionsSchema.safeParse(raw);
  if (result.success) {
    return { success: true, options: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => ({
      option: issue.path.length > 0 ? issue.path.join('.') : '(options)',
      reason: issue.message,
    })),
  };
}

/**
 * Reconciler options for a sync step
 */
export function toSyncOptions(options: StepOptions, dryRun: boolean, logger?: Logger): SyncOptions {
  return {
    dryRun,
    cleanup: options.cleanup ?? false,
    tenant: options.tenant,
    site: options.site,
    role: options.role,
    manufacturer: options.manufacturer,
    updateExisting: options.update_existing,
    createMissing: options.create_missing,
    excludePatterns: options.exclude_patterns,
    enabledMode: options.enabled_mode,
    logger,
  };
}
