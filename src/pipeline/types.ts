/**
 * Pipeline model
 *
 * A pipeline is an ordered list of collect, sync and export steps. The
 * definition is immutable; runtime state (step statuses, collected data)
 * lives in the run context of each execution.
 */

import type { CollectorName } from '../collectors/types.js';
import type { ExportFormat } from '../exporters/types.js';
import type { SyncStats } from '../reconcilers/types.js';

// =============================================================================
// Constants
// =============================================================================

export const STEP_TYPES = ['collect', 'sync', 'export'] as const;

export type StepType = (typeof STEP_TYPES)[number];

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

export const SYNC_TARGETS = ['devices', 'interfaces', 'cables', 'inventory', 'vlans', 'ip_addresses'] as const;

export type SyncTarget = (typeof SYNC_TARGETS)[number];

/**
 * Collectors that provide the data of each sync category, in order of preference
 */
export const SYNC_COLLECT_MAPPING: Record<SyncTarget, readonly [CollectorName, ...CollectorName[]]> = {
  devices: ['devices'],
  interfaces: ['interfaces'],
  cables: ['lldp', 'cdp'],
  inventory: ['inventory'],
  vlans: ['interfaces'],
  ip_addresses: ['interfaces'],
};

/**
 * Sync categories that must be synced earlier in the same pipeline
 */
export const SYNC_DEPENDENCIES: Partial<Record<SyncTarget, readonly SyncTarget[]>> = {
  interfaces: ['devices'],
  cables: ['interfaces'],
  inventory: ['devices'],
  vlans: ['devices'],
  ip_addresses: ['interfaces'],
};

/** Step reason for a dependency that did not complete */
export const DEPENDENCY_NOT_MET = 'dependency not met';

/** Step reason for a sync or export with nothing to work on */
export const NO_DATA = 'no data';

// =============================================================================
// Definition
// =============================================================================

export interface PipelineStep {
  /** Unique within the pipeline */
  id: string;
  type: StepType;
  /** Collector name (collect, export) or sync category (sync) */
  target: string;
  enabled: boolean;
  /** Free-form option bag (snake_case keys in files) */
  options: Record<string, unknown>;
  /** Ids of steps that must complete before this one starts */
  dependsOn: string[];
}

export interface Pipeline {
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  steps: PipelineStep[];
}

// =============================================================================
// Results
// =============================================================================

export interface CollectStepData {
  target: CollectorName;
  count: number;
  /** Devices the collector could not poll */
  warnings: string[];
}

export interface SyncStepData extends SyncStats {
  target: SyncTarget;
  dryRun: boolean;
}

export interface ExportStepData {
  target: CollectorName;
  format: ExportFormat;
  file: string;
  count: number;
}

export type StepData = CollectStepData | SyncStepData | ExportStepData;

export interface StepResult {
  stepId: string;
  status: StepStatus;
  /** Step output; kept for failed sync steps so accumulated stats are not lost */
  data: StepData | null;
  error?: string;
  /** Why a step was skipped */
  reason?: string;
  durationMs: number;
}

export interface PipelineResult {
  pipelineId: string;
  status: StepStatus;
  steps: StepResult[];
  totalDurationMs: number;
}

export function isSyncStepData(data: StepData | null): data is SyncStepData {
  return data !== null && 'created' in data;
}

export function isSyncTarget(value: string): value is SyncTarget {
  return SYNC_TARGETS.some((target) => target === value);
}
