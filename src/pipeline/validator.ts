/**
 * Pipeline validation
 *
 * All rules run before any step does:
 * 1. Required fields - id, name and at least one step
 * 2. Step targets - known collector (collect, export) or sync category (sync)
 * 3. Step options - values of the known option keys
 * 4. Unique step ids
 * 5. Dependencies - every depends_on names a step of the pipeline
 * 6. Sync prerequisites - e.g. an interfaces sync needs an earlier devices sync
 *
 * A sync step without a matching collect step is valid: the executor
 * collects on demand.
 *
 * @example Invalid Pipeline - Missing Prerequisite
 * ```yaml
 * id: interfaces-only
 * name: Interfaces only
 * steps:
 *   - id: sync_interfaces
 *     type: sync
 *     target: interfaces   # ERROR: Sync 'interfaces' requires sync 'devices' first
 * ```
 */

import type { Pipeline } from './types.js';
import type { ValidationIssue, ValidationResult } from './errors.js';
import { COLLECTOR_NAMES, isCollectorName } from '../collectors/types.js';
import { SYNC_DEPENDENCIES, SYNC_TARGETS, isSyncTarget } from './types.js';
import { parseStepOptions } from './options.js';
import {
  PipelineValidationError,
  duplicateStepId,
  invalidStepOption,
  mergeValidationResults,
  missingRequiredField,
  missingSyncPrerequisite,
  noSteps,
  unknownCollector,
  unknownDependency,
  unknownSyncTarget,
  validationFailure,
  validationSuccess,
} from './errors.js';

export interface PipelineValidationOptions {
  /** Throw PipelineValidationError instead of returning an invalid result */
  throwOnError?: boolean;
}

function resultOf(issues: ValidationIssue[]): ValidationResult {
  return issues.length > 0 ? validationFailure(issues) : validationSuccess();
}

// =============================================================================
// Rules
// =============================================================================

export function validateRequiredFields(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  if (!pipeline.id) issues.push(missingRequiredField('id', 'Pipeline id is required'));
  if (!pipeline.name) issues.push(missingRequiredField('name', 'Pipeline name is required'));
  if (pipeline.steps.length === 0) issues.push(noSteps());

  pipeline.steps.forEach((step, index) => {
    if (!step.id) issues.push(missingRequiredField(`steps.${index}.id`, 'Step id is required'));
  });
  return resultOf(issues);
}

export function validateStepTargets(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  for (const step of pipeline.steps) {
    if (step.type === 'sync') {
      if (!isSyncTarget(step.target)) {
        issues.push(unknownSyncTarget(step.id, step.target, SYNC_TARGETS));
      }
    } else if (!isCollectorName(step.target)) {
      issues.push(unknownCollector(step.id, step.target, COLLECTOR_NAMES));
    }
  }
  return resultOf(issues);
}

export function validateStepOptions(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  for (const step of pipeline.steps) {
    const parsed = parseStepOptions(step.options);
    if (!parsed.success) {
      for (const issue of parsed.issues) {
        issues.push(invalidStepOption(step.id, issue.option, issue.reason));
      }
    }
  }
  return resultOf(issues);
}

export function validateUniqueStepIds(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();
  for (const step of pipeline.steps) {
    if (!step.id) continue;
    if (seen.has(step.id)) {
      issues.push(duplicateStepId(step.id));
    }
    seen.add(step.id);
  }
  return resultOf(issues);
}

export function validateDependencies(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  const ids = new Set(pipeline.steps.map((step) => step.id));
  for (const step of pipeline.steps) {
    for (const dependency of step.dependsOn) {
      if (!ids.has(dependency)) {
        issues.push(unknownDependency(step.id, dependency));
      }
    }
  }
  return resultOf(issues);
}

/**
 * Each sync category's prerequisite must be synced by an earlier step
 */
export function validateSyncPrerequisites(pipeline: Pipeline): ValidationResult {
  const issues: ValidationIssue[] = [];
  const synced = new Set<string>();
  for (const step of pipeline.steps) {
    if (step.type !== 'sync' || !isSyncTarget(step.target)) continue;
    for (const required of SYNC_DEPENDENCIES[step.target] ?? []) {
      if (!synced.has(required)) {
        issues.push(missingSyncPrerequisite(step.id, step.target, required));
      }
    }
    synced.add(step.target);
  }
  return resultOf(issues);
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Run every validation rule
 *
 * @throws PipelineValidationError when `throwOnError` is set and the pipeline is invalid
 */
export function validatePipeline(pipeline: Pipeline, options: PipelineValidationOptions = {}): ValidationResult {
  const result = mergeValidationResults(
    validateRequiredFields(pipeline),
    validateStepTargets(pipeline),
    validateStepOptions(pipeline),
    validateUniqueStepIds(pipeline),
    validateDependencies(pipeline),
    validateSyncPrerequisites(pipeline)
  );

  if (options.throwOnError && !result.valid) {
    const errorCount = result.errors.length;
    throw new PipelineValidationError(
      `Pipeline validation failed with ${errorCount} error${errorCount > 1 ? 's' : ''}`,
      result
    );
  }
  return result;
}

/**
 * Error messages of a result, in rule order
 */
export function validationMessages(result: ValidationResult): string[] {
  return result.errors.map((issue) => issue.message);
}

export function getValidationSummary(result: ValidationResult): string {
  if (result.valid && result.warnings.length === 0) {
    return '✅ Pipeline validation passed';
  }
  const lines: string[] = [];
  if (!result.valid) {
    lines.push(`❌ Pipeline validation failed: ${result.errors.length} error(s)`);
  }
  if (result.warnings.length > 0) {
    lines.push(`⚠️  ${result.warnings.length} warning(s)`);
  }
  return lines.join('\n');
}
