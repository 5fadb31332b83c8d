/**
 * Shared types for the netsync CLI
 */

import type { Logger } from './api/logger.js';
import type { PipelineStore } from './pipeline/loader.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
  /** Directory holding pipeline files */
  pipelinesDir?: string;
}

export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  store: PipelineStore;
  logger: Logger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
