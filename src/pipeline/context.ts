/**
 * Per-run state owned by the executor
 */

import type { RegistryClient } from '../api/client.js';
import type { RegistryConnection } from '../api/types.js';
import type { CollectedEntity, CollectorName, Credentials, DeviceTarget } from '../collectors/types.js';
import { COLLECTOR_NAMES } from '../collectors/types.js';
import type { StepStatus } from './types.js';

type CollectedData = Partial<{ [K in CollectorName]: CollectedEntity[K][] }>;

export interface RunContextInit {
  runId: string;
  devices: DeviceTarget[];
  credentials: Credentials;
  registry: RegistryConnection | null;
  dryRun: boolean;
}

/**
 * Collected entities by collector name plus step statuses of one run
 */
export class RunContext {
  readonly runId: string;
  readonly devices: DeviceTarget[];
  readonly credentials: Credentials;
  readonly registry: RegistryConnection | null;
  readonly dryRun: boolean;

  private readonly data: CollectedData = {};
  private readonly statuses = new Map<string, StepStatus>();
  private client: RegistryClient | null = null;

  constructor(init: RunContextInit) {
    this.runId = init.runId;
    this.devices = init.devices;
    this.credentials = init.credentials;
    this.registry = init.registry;
    this.dryRun = init.dryRun;
  }

  get<K extends CollectorName>(target: K): CollectedData[K] {
    return this.data[target];
  }

  /** Replaces any earlier value for the target */
  set<K extends CollectorName>(target: K, entities: CollectedEntity[K][]): void {
    this.data[target] = entities;
  }

  has(target: CollectorName): boolean {
    return this.data[target] !== undefined;
  }

  collectedTargets(): CollectorName[] {
    return COLLECTOR_NAMES.filter((name) => this.data[name] !== undefined);
  }

  setStatus(stepId: string, status: StepStatus): void {
    this.statuses.set(stepId, status);
  }

  getStatus(stepId: string): StepStatus {
    return this.statuses.get(stepId) ?? 'pending';
  }

  /**
   * Registry client of the run, created on first use
   */
  registryClient(factory: (connection: RegistryConnection) => RegistryClient): RegistryClient {
    if (this.client) return this.client;
    if (!this.registry?.url) {
      throw new Error('Registry URL is required for sync');
    }
    this.client = factory(this.registry);
    return this.client;
  }
}
