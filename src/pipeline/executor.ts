/**
 * Pipeline executor
 *
 * Runs the enabled steps of a pipeline one at a time, in declared order:
 *
 * - collect: the collector's records become typed entities in the run context
 * - sync: entities from the run context are reconciled into the registry,
 *   collecting them first when no earlier step did
 * - export: entities from the run context are written to a file
 *
 * A step whose dependencies did not complete is skipped. The first failed
 * step ends the run. Nothing thrown inside a step escapes `run()`.
 */

import { randomUUID } from 'node:crypto';
import type { RegistryClient } from '../api/client.js';
import type { RegistryConnection } from '../api/types.js';
import type { Device, FlatRecord } from '../entities/types.js';
import type { MappedEntities } from '../entities/mappers.js';
import type {
  CollectedEntity,
  CollectOptions,
  Collector,
  CollectorName,
  Credentials,
  DeviceTarget,
} from '../collectors/types.js';
import type { SyncRequest } from '../reconcilers/index.js';
import type { StepOptions } from './options.js';
import type {
  CollectStepData,
  ExportStepData,
  Pipeline,
  PipelineResult,
  PipelineStep,
  StepData,
  StepResult,
  StepStatus,
  SyncStepData,
  SyncTarget,
} from './types.js';
import { createRegistryClient } from '../api/client.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import { deriveIpAddresses, deriveVlans } from '../entities/mappers.js';
import { hostnameKey } from '../entities/naming.js';
import { isCollectorName } from '../collectors/types.js';
import { mapCollected, withTargetDefaults } from '../collectors/mapping.js';
import { emptyStats, mergeStats, syncCategory } from '../reconcilers/index.js';
import { exportEntities } from '../exporters/index.js';
import { DEPENDENCY_NOT_MET, NO_DATA, SYNC_COLLECT_MAPPING, isSyncTarget } from './types.js';
import { parseStepOptions, toSyncOptions } from './options.js';
import { validatePipeline, validationMessages } from './validator.js';
import { RunContext } from './context.js';

// =============================================================================
// Types
// =============================================================================

export interface ExecutorOptions {
  collector: Collector;
  /** Builds the registry client of a run (default: REST client) */
  clientFactory?: (connection: RegistryConnection) => RegistryClient;
  /** Called once when a step starts */
  onStepStart?: (step: PipelineStep) => void;
  /** Called once when a started step finishes */
  onStepComplete?: (step: PipelineStep, result: StepResult) => void;
  logger?: Logger;
}

export interface RunOptions {
  devices: DeviceTarget[];
  credentials?: Credentials;
  registry?: RegistryConnection | null;
  /** Compute changes without mutating the registry (default: true) */
  dryRun?: boolean;
  runId?: string;
}

interface StepOutcome {
  status: StepStatus;
  data: StepData | null;
  error?: string;
  reason?: string;
}

/** Collector options applied before those of the step */
const COLLECT_DEFAULTS: Partial<Record<CollectorName, CollectOptions>> = {
  lldp: { protocol: 'both' },
  cdp: { protocol: 'cdp' },
};

const DEFAULT_SITE = 'Main';
const DEFAULT_EXPORT_DIR = 'output';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(key(item));
    if (group) {
      group.push(item);
    } else {
      groups.set(key(item), [item]);
    }
  }
  return groups;
}

function storeCollected<K extends CollectorName>(
  context: RunContext,
  target: K,
  records: FlatRecord[]
): MappedEntities<CollectedEntity[K]> {
  const mapped = mapCollected(target, records);
  context.set(target, mapped.entities);
  return mapped;
}

function requestScope(request: SyncRequest): string | undefined {
  switch (request.category) {
    case 'interfaces':
    case 'ip_addresses':
    case 'inventory':
      return request.device;
    case 'vlans':
      return request.site;
    default:
      return undefined;
  }
}

function resolveOptions(step: PipelineStep): StepOptions {
  const parsed = parseStepOptions(step.options);
  if (!parsed.success) {
    const reasons = parsed.issues.map((issue) => `${issue.option}: ${issue.reason}`);
    throw new Error(`Invalid options: ${reasons.join('; ')}`);
  }
  return parsed.options;
}

// =============================================================================
// Executor
// =============================================================================

export class PipelineExecutor {
  private readonly log: Logger;
  private readonly clientFactory: (connection: RegistryConnection) => RegistryClient;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly options: ExecutorOptions
  ) {
    this.log = options.logger ?? defaultLogger;
    this.clientFactory =
      options.clientFactory ?? ((connection) => createRegistryClient({ ...connection, logger: this.log }));
  }

  async run(options: RunOptions): Promise<PipelineResult> {
    const started = Date.now();
    const runId = options.runId ?? randomUUID();
    const log = this.log.child({ runId, pipeline: this.pipeline.id });

    const validation = validatePipeline(this.pipeline);
    if (!validation.valid) {
      const error = validationMessages(validation).join('; ');
      log.error(`Pipeline validation failed: ${error}`);
      return {
        pipelineId: this.pipeline.id,
        status: 'failed',
        steps: [{ stepId: 'validation', status: 'failed', data: null, error, durationMs: 0 }],
        totalDurationMs: Date.now() - started,
      };
    }

    const context = new RunContext({
      runId,
      devices: options.devices,
      credentials: options.credentials ?? {},
      registry: options.registry ?? null,
      dryRun: options.dryRun ?? true,
    });

    log.info(`Running pipeline ${this.pipeline.id}`, {
      devices: options.devices.length,
      dryRun: context.dryRun,
    });

    const results: StepResult[] = [];
    for (const step of this.pipeline.steps) {
      if (!step.enabled) continue;

      const unmet = step.dependsOn.filter((dependency) => context.getStatus(dependency) !== 'completed');
      if (unmet.length > 0) {
        log.warn(`Skipping step ${step.id}: ${DEPENDENCY_NOT_MET}`, { unmet });
        context.setStatus(step.id, 'skipped');
        results.push({ stepId: step.id, status: 'skipped', data: null, reason: DEPENDENCY_NOT_MET, durationMs: 0 });
        continue;
      }

      this.options.onStepStart?.(step);
      context.setStatus(step.id, 'running');
      const result = await this.executeStep(step, context, log.child({ step: step.id }));
      context.setStatus(step.id, result.status);
      results.push(result);
      this.options.onStepComplete?.(step, result);

      if (result.status === 'failed') break;
    }

    const status: StepStatus = results.some((result) => result.status === 'failed') ? 'failed' : 'completed';
    const totalDurationMs = Date.now() - started;
    log.info(`Pipeline ${this.pipeline.id} ${status}`, { totalDurationMs });

    return { pipelineId: this.pipeline.id, status, steps: results, totalDurationMs };
  }

  private async executeStep(step: PipelineStep, context: RunContext, log: Logger): Promise<StepResult> {
    const started = Date.now();
    let outcome: StepOutcome;
    try {
      outcome = await this.dispatch(step, resolveOptions(step), context, log);
    } catch (err) {
      const error = errorMessage(err);
      log.error(`Step ${step.id} failed: ${error}`, err instanceof Error ? err : undefined);
      outcome = { status: 'failed', data: null, error };
    }

    return { stepId: step.id, ...outcome, durationMs: Date.now() - started };
  }

  private dispatch(step: PipelineStep, options: StepOptions, context: RunContext, log: Logger): Promise<StepOutcome> {
    switch (step.type) {
      case 'collect':
        return this.collectStep(step, options, context, log);
      case 'sync':
        return this.syncStep(step, options, context, log);
      case 'export':
        return this.exportStep(step, options, context, log);
    }
  }

  // ---------------------------------------------------------------------------
  // Collect
  // ---------------------------------------------------------------------------

  private async collect(
    target: CollectorName,
    options: CollectOptions,
    context: RunContext,
    log: Logger
  ): Promise<CollectStepData> {
    const records = await this.options.collector.collect(
      target,
      context.devices,
      { ...COLLECT_DEFAULTS[target], ...options },
      context.credentials
    );
    const mapped = storeCollected(context, target, records);

    const devices = context.get('devices');
    if (target === 'devices' && devices) {
      context.set('devices', withTargetDefaults(devices, context.devices));
    }

    for (const warning of mapped.warnings) {
      log.warn(`Collect ${target}: ${warning}`);
    }
    log.info(`Collected ${mapped.entities.length} ${target}`);
    return { target, count: mapped.entities.length, warnings: mapped.warnings };
  }

  private async collectStep(
    step: PipelineStep,
    options: StepOptions,
    context: RunContext,
    log: Logger
  ): Promise<StepOutcome> {
    if (!isCollectorName(step.target)) {
      throw new Error(`Unknown collector '${step.target}'`);
    }
    const { collect_options: collectOptions, ...rest } = options;
    const data = await this.collect(step.target, { ...rest, ...collectOptions }, context, log);
    return { status: 'completed', data };
  }

  // ---------------------------------------------------------------------------
  // Sync
  // ---------------------------------------------------------------------------

  private async syncStep(
    step: PipelineStep,
    options: StepOptions,
    context: RunContext,
    log: Logger
  ): Promise<StepOutcome> {
    if (!isSyncTarget(step.target)) {
      throw new Error(`Unknown sync target '${step.target}'`);
    }
    const target = step.target;
    const client = context.registryClient(this.clientFactory);

    const sources = SYNC_COLLECT_MAPPING[target];
    if (!sources.some((source) => context.has(source))) {
      const [auto] = sources;
      log.info(`No collected data for ${target}; running auto_collect_${auto}`);
      try {
        await this.collect(auto, options.collect_options ?? {}, context, log.child({ step: `auto_collect_${auto}` }));
      } catch (err) {
        throw new Error(`Auto-collect ${auto} failed for sync ${target}: ${errorMessage(err)}`);
      }
    }

    const requests = this.buildRequests(target, options, context);
    if (requests.every((request) => request.entities.length === 0)) {
      log.info(`Nothing to sync for ${target}`);
      return { status: 'skipped', data: null, reason: NO_DATA };
    }

    const syncOptions = toSyncOptions(options, context.dryRun, log);
    const total = emptyStats();
    const failures: string[] = [];

    for (const request of requests) {
      const scope = requestScope(request);
      const outcome = await syncCategory(client, request, syncOptions);
      mergeStats(total, outcome.stats, request.category === 'vlans' ? undefined : scope);
      if (!outcome.success) {
        const message = outcome.error?.message ?? 'sync failed';
        failures.push(scope ? `${scope}: ${message}` : message);
      }
    }

    const data: SyncStepData = { target, dryRun: context.dryRun, ...total };
    log.info(`Sync ${target}${context.dryRun ? ' (dry run)' : ''}`, {
      created: total.created,
      updated: total.updated,
      deleted: total.deleted,
      skipped: total.skipped,
      failed: total.failed,
    });

    if (failures.length > 0) {
      return { status: 'failed', data, error: failures.join('; ') };
    }
    return { status: 'completed', data };
  }

  /**
   * Reconciliation calls of a sync step, one per device or site where the
   * category is scoped
   */
  private buildRequests(target: SyncTarget, options: StepOptions, context: RunContext): SyncRequest[] {
    const devices = context.get('devices') ?? [];
    const interfaces = context.get('interfaces') ?? [];

    switch (target) {
      case 'devices':
        return [{ category: 'devices', entities: devices }];
      case 'interfaces':
        return [...groupBy(interfaces, (item) => item.device)].map(([device, entities]): SyncRequest => ({
          category: 'interfaces',
          device,
          entities,
        }));
      case 'inventory':
        return [...groupBy(context.get('inventory') ?? [], (item) => item.device)].map(([device, entities]): SyncRequest => ({
          category: 'inventory',
          device,
          entities,
        }));
      case 'ip_addresses':
        return [...groupBy(deriveIpAddresses(interfaces, devices), (item) => item.device)].map(
          ([device, entities]): SyncRequest => ({ category: 'ip_addresses', device, entities })
        );
      case 'vlans': {
        const siteOf = this.siteResolver(devices, context.devices, options.site);
        return [...groupBy(deriveVlans(interfaces, siteOf), (item) => item.site)].map(([site, entities]): SyncRequest => ({
          category: 'vlans',
          site,
          entities,
        }));
      }
      case 'cables':
        return [{ category: 'cables', entities: context.get('lldp') ?? context.get('cdp') ?? [] }];
    }
  }

  /**
   * Site of a device: collected device, then device inventory, then the
   * step's `site` option
   */
  private siteResolver(
    devices: Device[],
    targets: DeviceTarget[],
    fallback: string | undefined
  ): (device: string) => string {
    const sites = new Map<string, string>();
    for (const target of targets) {
      if (target.hostname && target.site) sites.set(hostnameKey(target.hostname), target.site);
    }
    for (const device of devices) {
      if (device.site) sites.set(hostnameKey(device.hostname), device.site);
    }
    return (device) => sites.get(hostnameKey(device)) ?? fallback ?? DEFAULT_SITE;
  }

  // ---------------------------------------------------------------------------
  // Export
  // ---------------------------------------------------------------------------

  private async exportStep(
    step: PipelineStep,
    options: StepOptions,
    context: RunContext,
    log: Logger
  ): Promise<StepOutcome> {
    if (!isCollectorName(step.target)) {
      throw new Error(`Unknown collector '${step.target}'`);
    }
    const entities = context.get(step.target);
    if (!entities || entities.length === 0) {
      log.info(`Nothing to export for ${step.target}`);
      return { status: 'skipped', data: null, reason: NO_DATA };
    }

    const format = options.format ?? 'json';
    const result = await exportEntities(format, step.target, entities, options.output_dir ?? DEFAULT_EXPORT_DIR);
    log.info(`Exported ${result.count} ${step.target} to ${result.file}`);

    const data: ExportStepData = { target: step.target, format, file: result.file, count: result.count };
    return { status: 'completed', data };
  }
}
