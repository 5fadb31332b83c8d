/**
 * Pipeline module - definitions, validation, storage and execution
 *
 * @module pipeline
 */

export * from './types.js';
export * from './errors.js';
export { StepOptionsSchema, parseStepOptions, toSyncOptions } from './options.js';
export type { StepOptions, OptionIssue, ParsedStepOptions } from './options.js';
export {
  validatePipeline,
  validateRequiredFields,
  validateStepTargets,
  validateStepOptions,
  validateUniqueStepIds,
  validateDependencies,
  validateSyncPrerequisites,
  validationMessages,
  getValidationSummary,
} from './validator.js';
export type { PipelineValidationOptions } from './validator.js';
export {
  PipelineStore,
  loadPipeline,
  parsePipeline,
  stringifyPipeline,
  pipelineFromObject,
  pipelineToObject,
} from './loader.js';
export type { PipelineObject, StoredPipeline } from './loader.js';
export { RunContext } from './context.js';
export type { RunContextInit } from './context.js';
export { PipelineExecutor } from './executor.js';
export type { ExecutorOptions, RunOptions } from './executor.js';
export { toRunReport, stepReport, firstFailure } from './report.js';
export type { RunReport, StepReport, StepReportData } from './report.js';
