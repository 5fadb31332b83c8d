/**
 * Applying a diff
 *
 * Each bucket is sent as one batched call. When the batch fails for any
 * reason the same mutations are replayed one item at a time. Nothing here
 * retries; transport retries live in the registry client.
 */

import type { MutationClient } from '../api/client.js';
import type { Logger } from '../api/logger.js';
import type { RecordId, WithId } from '../api/types.js';
import type {
  ChangeAction,
  CreateItem,
  DeleteItem,
  DetailEntry,
  ReconcileOutcome,
  SyncDiff,
  SyncStats,
  UpdateItem,
} from './types.js';
import { toReconcileError } from './errors.js';

// =============================================================================
// Bulk Operations
// =============================================================================

/**
 * A batched mutation with its single-item fallback
 */
export interface BulkOperation<TIn, TOut> {
  /** Action label for logs, e.g. "create interfaces" */
  label: string;
  many: (items: TIn[]) => Promise<TOut[]>;
  one: (item: TIn) => Promise<TOut>;
  /** Human-readable identity of an item */
  describe: (item: TIn) => string;
}

export interface BulkSuccess<TIn, TOut> {
  item: TIn;
  output: TOut;
}

export interface BulkFailure<TIn> {
  item: TIn;
  error: Error;
}

export interface BulkResult<TIn, TOut> {
  succeeded: BulkSuccess<TIn, TOut>[];
  failed: BulkFailure<TIn>[];
  /** The batch failed and items were applied one at a time */
  usedFallback: boolean;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run a batched mutation, falling back to per-item calls on failure
 */
export async function runBulk<TIn, TOut>(
  items: TIn[],
  operation: BulkOperation<TIn, TOut>,
  log: Logger
): Promise<BulkResult<TIn, TOut>> {
  const result: BulkResult<TIn, TOut> = { succeeded: [], failed: [], usedFallback: false };
  if (items.length === 0) return result;

  try {
    const outputs = await operation.many(items);
    if (outputs.length !== items.length) {
      throw new Error(`Batch returned ${outputs.length} results for ${items.length} items`);
    }
    items.forEach((item, index) => {
      result.succeeded.push({ item, output: outputs[index] });
    });
    log.debug(`Batch ${operation.label} succeeded`, { count: items.length });
    return result;
  } catch (batchError) {
    log.warn(`Batch ${operation.label} failed, falling back to per-item calls`, {
      count: items.length,
      error: toError(batchError).message,
    });
    result.usedFallback = true;
  }

  for (const item of items) {
    try {
      const output = await operation.one(item);
      result.succeeded.push({ item, output });
    } catch (itemError) {
      const error = toError(itemError);
      log.error(`Failed to ${operation.label}: ${operation.describe(item)}`, error);
      result.failed.push({ item, error });
    }
  }

  return result;
}

// =============================================================================
// Stats
// =============================================================================

export function emptyStats(): SyncStats {
  return {
    created: 0,
    updated: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
    details: { create: [], update: [], delete: [] },
    errors: [],
    warnings: [],
  };
}

/**
 * Stats a diff would produce if applied in full (dry run)
 */
export function statsFromDiff<L, R>(diff: SyncDiff<L, R>): SyncStats {
  const stats = emptyStats();
  stats.created = diff.create.length;
  stats.updated = diff.update.length;
  stats.deleted = diff.cleanup ? diff.deleteCandidates.length : 0;
  stats.skipped = diff.skip.length;
  stats.details.create = diff.create.map((item) => ({ name: item.name }));
  stats.details.update = diff.update.map((item) => ({ name: item.name, changes: item.changedFields }));
  stats.details.delete = diff.cleanup ? diff.deleteCandidates.map((item) => ({ name: item.name })) : [];
  stats.warnings.push(...diff.warnings);
  return stats;
}

/**
 * Record the outcome of one bulk bucket into the stats
 */
export function recordBulk<TIn, TOut>(
  stats: SyncStats,
  action: ChangeAction,
  result: BulkResult<TIn, TOut>,
  detail: (item: TIn) => DetailEntry
): void {
  for (const { item } of result.succeeded) {
    stats.details[action].push(detail(item));
  }
  const count = result.succeeded.length;
  if (action === 'create') stats.created += count;
  if (action === 'update') stats.updated += count;
  if (action === 'delete') stats.deleted += count;

  for (const { item, error } of result.failed) {
    stats.failed++;
    stats.errors.push(`${action} ${detail(item).name}: ${error.message}`);
  }
}

/**
 * Add `source` into `target`, tagging detail entries with a device name
 */
export function mergeStats(target: SyncStats, source: SyncStats, device?: string): SyncStats {
  target.created += source.created;
  target.updated += source.updated;
  target.deleted += source.deleted;
  target.skipped += source.skipped;
  target.failed += source.failed;
  for (const action of ['create', 'update', 'delete'] as const) {
    for (const entry of source.details[action]) {
      target.details[action].push(device && !entry.device ? { ...entry, device } : entry);
    }
  }
  target.errors.push(...source.errors.map((error) => (device ? `${device}: ${error}` : error)));
  target.warnings.push(...source.warnings.map((warning) => (device ? `${device}: ${warning}` : warning)));
  return target;
}

// =============================================================================
// Diff Application
// =============================================================================

/**
 * Apply the create bucket (or a slice of it)
 */
export async function applyCreates<L, R, W>(
  items: CreateItem<L>[],
  client: MutationClient<R, W>,
  toWrite: (item: CreateItem<L>) => W,
  context: ApplyContext
): Promise<BulkResult<CreateItem<L>, R>> {
  const result = await runBulk(
    items,
    {
      label: `create ${context.label}`,
      many: (batch) => client.createMany(batch.map(toWrite)),
      one: (item) => client.create(toWrite(item)),
      describe: (item) => item.name,
    },
    context.log
  );
  recordBulk(context.stats, 'create', result, (item) => detailEntry(item.name, context.device));
  return result;
}

/**
 * Apply the update bucket (or a slice of it)
 */
export async function applyUpdates<L, R, W>(
  items: UpdateItem<L, R>[],
  client: MutationClient<R, W>,
  toWrite: (item: UpdateItem<L, R>) => WithId<W>,
  context: ApplyContext
): Promise<BulkResult<UpdateItem<L, R>, R>> {
  const result = await runBulk(
    items,
    {
      label: `update ${context.label}`,
      many: (batch) => client.updateMany(batch.map(toWrite)),
      one: (item) => client.update(toWrite(item)),
      describe: (item) => item.name,
    },
    context.log
  );
  recordBulk(context.stats, 'update', result, (item) => ({
    ...detailEntry(item.name, context.device),
    changes: item.changedFields,
  }));
  return result;
}

/**
 * Apply the delete bucket; a rejected delete counts as a failure
 */
export async function applyDeletes<R, W>(
  items: DeleteItem<R>[],
  client: MutationClient<R, W>,
  remoteId: (record: R) => RecordId,
  context: ApplyContext
): Promise<BulkResult<DeleteItem<R>, boolean>> {
  const result = await runBulk(
    items,
    {
      label: `delete ${context.label}`,
      async many(batch) {
        const ok = await client.deleteMany(batch.map((item) => remoteId(item.remote)));
        if (!ok) throw new Error('Registry rejected the bulk delete');
        return batch.map(() => true);
      },
      async one(item) {
        const ok = await client.delete(remoteId(item.remote));
        if (!ok) throw new Error('Registry rejected the delete');
        return true;
      },
      describe: (item) => item.name,
    },
    context.log
  );
  recordBulk(context.stats, 'delete', result, (item) => detailEntry(item.name, context.device));
  return result;
}

/**
 * Where bulk results are recorded
 */
export interface ApplyContext {
  /** Category label used in log lines ("interfaces") */
  label: string;
  stats: SyncStats;
  log: Logger;
  /** Owning device, copied into detail entries */
  device?: string;
}

function detailEntry(name: string, device?: string): DetailEntry {
  return device ? { name, device } : { name };
}

/**
 * Carry a diff's skips and warnings into stats that are about to be applied
 */
export function recordSkips<L, R>(stats: SyncStats, diff: SyncDiff<L, R>): void {
  stats.skipped += diff.skip.length;
  stats.warnings.push(...diff.warnings);
}

/**
 * Convert a failure escaping a reconciler into its outcome, keeping the
 * stats recorded before the failure
 */
export function failedOutcome(error: unknown, stats: SyncStats, log: Logger, label: string): ReconcileOutcome {
  const failure = toReconcileError(error);
  log.error(`Sync ${label} failed: ${failure.message}`, failure, { code: failure.code });
  return { success: false, stats, error: failure };
}

export interface AppliedDiff<L, R> {
  created: BulkResult<CreateItem<L>, R>;
  updated: BulkResult<UpdateItem<L, R>, R>;
  deleted: BulkResult<DeleteItem<R>, boolean>;
}

/**
 * Apply a whole diff: creates, then updates, then deletes when cleanup is set
 */
export async function applyDiff<L, R, W>(
  diff: SyncDiff<L, R>,
  client: MutationClient<R, W>,
  writers: {
    create: (item: CreateItem<L>) => W;
    update: (item: UpdateItem<L, R>) => WithId<W>;
    remoteId: (record: R) => RecordId;
  },
  context: ApplyContext
): Promise<AppliedDiff<L, R>> {
  const created = await applyCreates(diff.create, client, writers.create, context);
  const updated = await applyUpdates(diff.update, client, writers.update, context);
  const deleted = diff.cleanup
    ? await applyDeletes(diff.deleteCandidates, client, writers.remoteId, context)
    : { succeeded: [], failed: [], usedFallback: false };
  return { created, updated, deleted };
}
