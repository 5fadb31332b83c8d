/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ChangeAction, DetailEntry, SyncDetails } from '../reconcilers/types.js';
import type { Pipeline, PipelineResult, PipelineStep, StepResult, StepStatus } from '../pipeline/types.js';
import { isSyncStepData } from '../pipeline/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied to the registry\n'));
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Shorten text to `max` characters, ending in `...` when cut
 */
export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/**
 * Render rows as space-padded columns under a header line
 */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join('  ')
      .trimEnd();

  return [line(headers), line(widths.map((width) => '-'.repeat(width))), ...rows.map(line)];
}

export function printTable(headers: string[], rows: string[][]): void {
  const [head, rule, ...body] = formatTable(headers, rows);
  console.log(chalk.bold(head));
  console.log(chalk.gray(rule));
  for (const row of body) {
    console.log(row);
  }
}

// ============================================================================
// Pipelines
// ============================================================================

function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (typeof value === 'string') {
    return value.length > 50 ? value.slice(0, 50) + '...' : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Print a pipeline definition with its steps and options
 */
export function printPipeline(pipeline: Pipeline, path?: string): void {
  console.log(chalk.bold(`\n${pipeline.name}`), chalk.gray(`(${pipeline.id})`));
  if (pipeline.description) {
    console.log(`  ${pipeline.description}`);
  }
  if (path) {
    console.log(`  ${chalk.gray('File:')} ${path}`);
  }
  console.log(`  ${chalk.gray('Enabled:')} ${pipeline.enabled ? chalk.green('yes') : chalk.yellow('no')}`);

  console.log(chalk.bold(`\nSteps (${pipeline.steps.length}):\n`));
  pipeline.steps.forEach((step, index) => {
    const disabled = step.enabled ? '' : chalk.yellow(' [disabled]');
    console.log(`  ${index + 1}. ${chalk.cyan(step.id)} ${step.type} ${step.target}${disabled}`);
    if (step.dependsOn.length > 0) {
      console.log(`     ${chalk.gray('Depends on:')} ${step.dependsOn.join(', ')}`);
    }
    for (const [key, value] of Object.entries(step.options)) {
      console.log(`     ${chalk.gray(key + ':')} ${formatValue(value)}`);
    }
  });
}

// ============================================================================
// Runs
// ============================================================================

function getStatusIcon(status: StepStatus): string {
  switch (status) {
    case 'completed':
      return chalk.green('✓');
    case 'failed':
      return chalk.red('✗');
    case 'skipped':
      return chalk.yellow('○');
    case 'running':
      return chalk.blue('▶');
    case 'pending':
      return chalk.gray('·');
  }
}

function getActionIcon(action: ChangeAction): string {
  switch (action) {
    case 'create':
      return '+';
    case 'update':
      return '~';
    case 'delete':
      return '-';
  }
}

function getActionColor(action: ChangeAction): typeof chalk.green {
  switch (action) {
    case 'create':
      return chalk.green;
    case 'update':
      return chalk.yellow;
    case 'delete':
      return chalk.red;
  }
}

/**
 * One change line: `+ Gi0/1 (core-sw1)` or `~ core-sw1: serial, model`
 */
export function formatDetail(action: ChangeAction, entry: DetailEntry): string {
  const device = entry.device ? ` (${entry.device})` : '';
  const changes = entry.changes && entry.changes.length > 0 ? `: ${entry.changes.join(', ')}` : '';
  return `${getActionIcon(action)} ${entry.name}${device}${changes}`;
}

export function printStepStart(step: PipelineStep): void {
  console.log(chalk.blue('▶'), `${step.id} (${step.type} ${step.target})`);
}

/**
 * Step completion line followed by its change details
 */
export function printStepResult(result: StepResult): void {
  const seconds = (result.durationMs / 1000).toFixed(1);
  const suffix = result.error ?? result.reason;
  console.log(
    getStatusIcon(result.status),
    `${result.stepId}: ${result.status}${suffix ? ` (${suffix})` : ''}`,
    chalk.gray(`${seconds}s`)
  );

  if (isSyncStepData(result.data)) {
    printSyncDetails(result.data.details);
    for (const warning of result.data.warnings) {
      console.log(chalk.yellow(`    ⚠ ${warning}`));
    }
    for (const err of result.data.errors) {
      console.log(chalk.red(`    ✗ ${err}`));
    }
  }
}

export function printSyncDetails(details: SyncDetails): void {
  for (const action of ['create', 'update', 'delete'] as const) {
    const color = getActionColor(action);
    for (const entry of details[action]) {
      console.log(color(`    ${formatDetail(action, entry)}`));
    }
  }
}

/**
 * Per-step counters after a run
 */
export function printRunSummary(result: PipelineResult): void {
  console.log(chalk.bold('\nSummary:\n'));
  for (const step of result.steps) {
    const data = step.data;
    let counters = '';
    if (isSyncStepData(data)) {
      counters = `created=${data.created} updated=${data.updated} deleted=${data.deleted} skipped=${data.skipped} failed=${data.failed}`;
    } else if (data && 'file' in data) {
      counters = `${data.count} → ${data.file}`;
    } else if (data) {
      counters = `count=${data.count}`;
    }
    console.log(`  ${getStatusIcon(step.status)} ${step.stepId.padEnd(24)} ${chalk.gray(counters)}`);
  }
  const seconds = (result.totalDurationMs / 1000).toFixed(1);
  const status = result.status === 'completed' ? chalk.green(result.status) : chalk.red(result.status);
  console.log(`\n  Pipeline ${result.pipelineId}: ${status} in ${seconds}s`);
}
