/**
 * Run report: a pipeline result with snake_case keys, for JSON output
 */

import type { SyncDetails } from '../reconcilers/types.js';
import type { PipelineResult, StepData, StepResult, StepStatus } from './types.js';
import { isSyncStepData } from './types.js';

export type StepReportData =
  | { target: string; count: number; warnings: string[] }
  | { target: string; format: string; file: string; count: number }
  | {
      target: string;
      dry_run: boolean;
      created: number;
      updated: number;
      deleted: number;
      skipped: number;
      failed: number;
      details: SyncDetails;
      errors: string[];
      warnings: string[];
    };

export interface StepReport {
  step_id: string;
  status: StepStatus;
  error?: string;
  reason?: string;
  duration_ms: number;
  data: StepReportData | null;
}

export interface RunReport {
  pipeline_id: string;
  status: StepStatus;
  steps: StepReport[];
  total_duration_ms: number;
}

function dataReport(data: StepData | null): StepReportData | null {
  if (data === null) return null;
  if (isSyncStepData(data)) {
    const { dryRun, ...stats } = data;
    return { ...stats, dry_run: dryRun };
  }
  return data;
}

export function stepReport(result: StepResult): StepReport {
  const report: StepReport = {
    step_id: result.stepId,
    status: result.status,
    duration_ms: result.durationMs,
    data: dataReport(result.data),
  };
  if (result.error !== undefined) report.error = result.error;
  if (result.reason !== undefined) report.reason = result.reason;
  return report;
}

export function toRunReport(result: PipelineResult): RunReport {
  return {
    pipeline_id: result.pipelineId,
    status: result.status,
    steps: result.steps.map(stepReport),
    total_duration_ms: result.totalDurationMs,
  };
}

/**
 * First failed step, for the one-line failure summary
 */
export function firstFailure(result: PipelineResult): StepResult | undefined {
  return result.steps.find((step) => step.status === 'failed');
}
