/**
 * Diff calculator
 *
 * Classifies local (observed) entities against remote (registry) records of
 * one category and scope into create / update / delete-candidate buckets.
 * Entities are matched by normalized identity key; comparison follows the
 * category's field rules.
 */

import type {
  CategorySpec,
  DiffOptions,
  FieldChange,
  FieldRule,
  SkipItem,
  SyncDiff,
} from './types.js';

// =============================================================================
// Value Comparison
// =============================================================================

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Order-insensitive array equality
 */
export function arrayEquals(a: unknown[], b: unknown[]): boolean {
  if (a.length !== b.length) return false;
  const left = a.map((v) => JSON.stringify(v)).sort();
  const right = b.map((v) => JSON.stringify(v)).sort();
  return left.every((value, index) => value === right[index]);
}

/**
 * Equality on normalized values: empty string and null are the same,
 * arrays compare as sets
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (isAbsent(a) && isAbsent(b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) return arrayEquals(a, b);
  if (typeof a === 'object' && a !== null && typeof b === 'object' && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return a === b;
}

/**
 * Compare one local/remote pair and return the differing fields
 */
export function computeChanges<L, R>(
  local: L,
  remote: R,
  fields: FieldRule<L, R>[],
  ignoreFields: ReadonlySet<string> = new Set()
): FieldChange[] {
  const changes: FieldChange[] = [];

  for (const rule of fields) {
    if ((rule.kind ?? 'compare') !== 'compare' || ignoreFields.has(rule.field)) {
      continue;
    }

    const normalize = rule.normalize ?? ((value: unknown) => value);
    const newValue = normalize(rule.local(local));
    if ((newValue === null || newValue === undefined) && !rule.compareNull) {
      continue;
    }

    const oldValue = normalize(rule.remote(remote));
    if (!valuesEqual(newValue, oldValue)) {
      changes.push({ field: rule.field, oldValue, newValue });
    }
  }

  return changes;
}

// =============================================================================
// Patterns
// =============================================================================

/**
 * Compile exclude patterns; invalid expressions are reported and dropped
 */
export function compileExcludePatterns(patterns: string[] = []): { regexes: RegExp[]; invalid: string[] } {
  const regexes: RegExp[] = [];
  const invalid: string[] = [];
  for (const pattern of patterns) {
    try {
      regexes.push(new RegExp(pattern, 'i'));
    } catch {
      invalid.push(pattern);
    }
  }
  return { regexes, invalid };
}

function isExcluded(name: string, regexes: RegExp[]): boolean {
  return regexes.some((regex) => regex.test(name));
}

// =============================================================================
// Diff
// =============================================================================

/**
 * Compute the diff for one category and scope
 *
 * - local entities with an empty key are excluded
 * - duplicate local keys keep the first occurrence and add a warning
 * - `hasChanges` counts delete candidates only when cleanup is requested
 */
export function computeDiff<L, R>(
  spec: CategorySpec<L, R>,
  local: L[],
  remote: R[],
  options: DiffOptions = {},
  scope?: string
): SyncDiff<L, R> {
  const diff: SyncDiff<L, R> = {
    category: spec.category,
    scope,
    create: [],
    update: [],
    deleteCandidates: [],
    skip: [],
    cleanup: options.cleanup ?? false,
    hasChanges: false,
    warnings: [],
  };

  if (local.length === 0 && remote.length === 0) {
    return diff;
  }

  const updateExisting = options.updateExisting ?? true;
  const createMissing = options.createMissing ?? true;
  const ignoreFields = new Set(options.ignoreFields ?? []);
  const { regexes, invalid } = compileExcludePatterns(options.excludePatterns);
  for (const pattern of invalid) {
    diff.warnings.push(`Invalid exclude pattern ignored: ${pattern}`);
  }

  const remoteByKey = new Map<string, R>();
  for (const record of remote) {
    const key = spec.remoteKey(record);
    if (key && !remoteByKey.has(key)) {
      remoteByKey.set(key, record);
    }
  }

  const seen = new Set<string>();
  const skip = (item: SkipItem): void => {
    diff.skip.push(item);
  };

  for (const entity of local) {
    const key = spec.localKey(entity);
    if (!key) continue;
    const name = spec.localName(entity);

    if (seen.has(key)) {
      diff.warnings.push(`Duplicate ${spec.category} entry ignored: ${name}`);
      continue;
    }
    seen.add(key);

    if (isExcluded(name, regexes)) {
      skip({ key, name, reason: 'excluded by pattern' });
      continue;
    }

    const match = remoteByKey.get(key);
    if (match === undefined) {
      if (createMissing) {
        diff.create.push({ key, name, local: entity });
      } else {
        skip({ key, name, reason: 'create disabled' });
      }
      continue;
    }

    const changes = computeChanges(entity, match, spec.fields, ignoreFields);
    if (changes.length === 0) {
      skip({ key, name, reason: 'no changes' });
    } else if (!updateExisting) {
      skip({ key, name, reason: 'update disabled' });
    } else {
      diff.update.push({
        key,
        name,
        local: entity,
        remote: match,
        changes,
        changedFields: changes.map((change) => change.field),
      });
    }
  }

  for (const [key, record] of remoteByKey) {
    if (seen.has(key)) continue;
    const name = spec.remoteName(record);
    if (isExcluded(name, regexes)) continue;
    diff.deleteCandidates.push({ key, name, remote: record });
  }

  diff.hasChanges =
    diff.create.length > 0 ||
    diff.update.length > 0 ||
    (diff.cleanup && diff.deleteCandidates.length > 0);

  return diff;
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * One-line summary: `interfaces: +2 create, ~1 update, -0 delete`
 */
export function summarizeDiff<L, R>(diff: SyncDiff<L, R>): string {
  if (!diff.hasChanges) {
    return `${diff.category}: no changes`;
  }
  const deletes = diff.cleanup ? diff.deleteCandidates.length : 0;
  return `${diff.category}: +${diff.create.length} create, ~${diff.update.length} update, -${deletes} delete`;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined || value === '') return '(none)';
  if (Array.isArray(value)) return `[${value.join(',')}]`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Multi-line change report: `+ name`, `~ name: field: old → new`, `- name`
 */
export function formatDiffDetails<L, R>(diff: SyncDiff<L, R>): string[] {
  const lines: string[] = [];
  for (const item of diff.create) {
    lines.push(`+ ${item.name}`);
  }
  for (const item of diff.update) {
    const changes = item.changes
      .map((change) => `${change.field}: ${formatValue(change.oldValue)} → ${formatValue(change.newValue)}`)
      .join(', ');
    lines.push(`~ ${item.name}: ${changes}`);
  }
  if (diff.cleanup) {
    for (const item of diff.deleteCandidates) {
      lines.push(`- ${item.name}`);
    }
  }
  return lines;
}
