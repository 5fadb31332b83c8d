/**
 * netsync library entry point
 *
 * The CLI lives in ./cli.ts; this module exposes the building blocks for
 * embedding pipelines in other tools.
 */

export * as api from './api/index.js';
export * as entities from './entities/index.js';
export * as reconcilers from './reconcilers/index.js';
export * as collectors from './collectors/index.js';
export * as exporters from './exporters/index.js';
export * as pipeline from './pipeline/index.js';
export * as config from './config/index.js';

export { createRegistryClient } from './api/client.js';
export type { RegistryClient } from './api/client.js';
export { syncCategory } from './reconcilers/index.js';
export type { SyncRequest } from './reconcilers/index.js';
export { PipelineExecutor } from './pipeline/executor.js';
export { PipelineStore, loadPipeline } from './pipeline/loader.js';
export { validatePipeline } from './pipeline/validator.js';
export { RecordFileCollector } from './collectors/file.js';
export type { Collector, DeviceTarget, Credentials } from './collectors/types.js';
export type { Pipeline, PipelineStep, PipelineResult, StepResult } from './pipeline/types.js';
