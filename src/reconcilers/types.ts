/**
 * Shared types for entity reconciliation
 *
 * A reconciliation run for one category and scope goes through two stages:
 * the diff (three buckets plus skipped items) and the apply (bulk mutations
 * with per-item fallback), producing SyncStats.
 */

import type { EnabledMode, EntityCategory } from '../entities/types.js';
import type { ReconcileError } from './errors.js';
import type { Logger } from '../api/logger.js';

// =============================================================================
// Diff
// =============================================================================

export type ChangeAction = 'create' | 'update' | 'delete';

/**
 * Why an item was left alone
 */
export type SkipReason =
  | 'no changes'
  | 'update disabled'
  | 'create disabled'
  | 'excluded by pattern';

/**
 * A single field difference
 */
export interface FieldChange {
  field: string;
  /** Registry value */
  oldValue: unknown;
  /** Observed value */
  newValue: unknown;
}

export interface CreateItem<L> {
  key: string;
  name: string;
  local: L;
}

export interface UpdateItem<L, R> {
  key: string;
  name: string;
  local: L;
  remote: R;
  changes: FieldChange[];
  changedFields: string[];
}

export interface DeleteItem<R> {
  key: string;
  name: string;
  remote: R;
}

export interface SkipItem {
  key: string;
  name: string;
  reason: SkipReason;
}

/**
 * Three-bucket classification of local vs. remote entities
 */
export interface SyncDiff<L, R> {
  category: EntityCategory;
  /** Scope label (device, site) for reporting */
  scope?: string;
  create: CreateItem<L>[];
  update: UpdateItem<L, R>[];
  /** Remote entities with no local match; acted on only when cleanup is set */
  deleteCandidates: DeleteItem<R>[];
  skip: SkipItem[];
  /** Whether cleanup was requested for this diff */
  cleanup: boolean;
  hasChanges: boolean;
  warnings: string[];
}

/**
 * Options for the diff calculation
 */
export interface DiffOptions {
  /** Act on delete candidates */
  cleanup?: boolean;
  /** Update entities whose fields differ (default: true) */
  updateExisting?: boolean;
  /** Create entities missing from the registry (default: true) */
  createMissing?: boolean;
  /** Case-insensitive regular expressions matched against display names */
  excludePatterns?: string[];
  /** Fields never compared in this run */
  ignoreFields?: string[];
}

/**
 * How a field takes part in comparison
 * - compare: compared whenever the local value is known
 * - registry-managed: maintained by the registry, never observed (skipped)
 * - observe-only: observed locally, not stored by the registry (skipped)
 */
export type FieldKind = 'compare' | 'registry-managed' | 'observe-only';

/**
 * Comparison rule for one field of a category
 */
export interface FieldRule<L, R> {
  field: string;
  local: (entity: L) => unknown;
  remote: (record: R) => unknown;
  kind?: FieldKind;
  /** Applied to both sides before comparison */
  normalize?: (value: unknown) => unknown;
  /** Compare even when the local value is null (null then clears the remote) */
  compareNull?: boolean;
}

/**
 * Identity and comparison description of a category
 */
export interface CategorySpec<L, R> {
  category: EntityCategory;
  localKey: (entity: L) => string;
  remoteKey: (record: R) => string;
  localName: (entity: L) => string;
  remoteName: (record: R) => string;
  fields: FieldRule<L, R>[];
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Options for a reconciliation call
 */
export interface SyncOptions extends DiffOptions {
  /** Compute everything, mutate nothing */
  dryRun?: boolean;
  /** Tenant slug: scopes device cleanup and is assigned to created devices */
  tenant?: string | null;
  /** Default site for created devices and for VLAN scope */
  site?: string;
  /** Default role for created devices */
  role?: string;
  /** Default manufacturer for created devices */
  manufacturer?: string;
  /** How `enabled` is derived for interfaces */
  enabledMode?: EnabledMode;
  /** Logger for mutation and fallback messages (default: process logger) */
  logger?: Logger;
}

/**
 * One line of the change report
 */
export interface DetailEntry {
  name: string;
  /** Owning device, for per-device categories */
  device?: string;
  /** Changed field names (updates) */
  changes?: string[];
}

export type SyncDetails = Record<ChangeAction, DetailEntry[]>;

/**
 * Aggregated reconciliation counters and change report
 */
export interface SyncStats {
  created: number;
  updated: number;
  deleted: number;
  skipped: number;
  failed: number;
  details: SyncDetails;
  /** Per-item failures */
  errors: string[];
  warnings: string[];
}

/**
 * Result of a reconciliation call; never thrown across the boundary
 */
export interface ReconcileOutcome {
  success: boolean;
  stats: SyncStats;
  error?: ReconcileError;
}
