/**
 * Pipeline validation error types
 *
 * Structured validation issues with codes and suggestions; a pipeline with
 * any error-level issue never starts.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ValidationErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'NO_STEPS'
  | 'UNKNOWN_COLLECTOR'
  | 'UNKNOWN_SYNC_TARGET'
  | 'INVALID_STEP_OPTION'
  | 'DUPLICATE_STEP_ID'
  | 'UNKNOWN_DEPENDENCY'
  | 'MISSING_SYNC_PREREQUISITE';

// =============================================================================
// Validation Issue Types
// =============================================================================

export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ValidationErrorCode;
  severity: ValidationSeverity;
  /** Human-readable message */
  message: string;
  /** Path to the problematic field (e.g. "steps.sync_interfaces.target") */
  path: string;
  context?: Record<string, unknown>;
  suggestions?: string[];
}

export interface ValidationResult {
  /** No error-level issues */
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Thrown when a pipeline fails validation
 */
export class PipelineValidationError extends Error {
  constructor(
    message: string,
    public readonly result: ValidationResult
  ) {
    super(message);
    this.name = 'PipelineValidationError';
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    const lines: string[] = [];
    for (const issue of this.result.errors) {
      lines.push(`❌ [${issue.code}] ${issue.path}`);
      lines.push(`   ${issue.message}`);
      if (issue.suggestions?.length) {
        lines.push(`   Suggestions:`);
        for (const suggestion of issue.suggestions) {
          lines.push(`     • ${suggestion}`);
        }
      }
    }
    return lines.join('\n');
  }
}

export type PipelineLoadErrorCode = 'PIPELINE_NOT_FOUND' | 'PIPELINE_PARSE_ERROR' | 'PIPELINE_EXISTS' | 'PIPELINE_WRITE_ERROR';

/**
 * Failure reading, parsing or storing a pipeline file
 */
export class PipelineLoadError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineLoadErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineLoadError';
  }
}

// =============================================================================
// Issue Builders
// =============================================================================

function stepPrefix(stepId: string): string {
  return `Step '${stepId}': `;
}

export function missingRequiredField(path: string, message: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message,
    path,
    suggestions: [`Add the required "${path.split('.').pop() ?? path}" field`],
  };
}

export function noSteps(): ValidationIssue {
  return {
    code: 'NO_STEPS',
    severity: 'error',
    message: 'Pipeline must have at least one step',
    path: 'steps',
  };
}

export function unknownCollector(stepId: string, target: string, available: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_COLLECTOR',
    severity: 'error',
    message: `${stepPrefix(stepId)}Unknown collector '${target}'. Available: ${available.join(', ')}`,
    path: `steps.${stepId}.target`,
    context: { target },
  };
}

export function unknownSyncTarget(stepId: string, target: string, available: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_SYNC_TARGET',
    severity: 'error',
    message: `${stepPrefix(stepId)}Unknown sync target '${target}'. Available: ${available.join(', ')}`,
    path: `steps.${stepId}.target`,
    context: { target },
  };
}

export function invalidStepOption(stepId: string, option: string, reason: string): ValidationIssue {
  return {
    code: 'INVALID_STEP_OPTION',
    severity: 'error',
    message: `${stepPrefix(stepId)}Invalid option '${option}': ${reason}`,
    path: `steps.${stepId}.options.${option}`,
    context: { option, reason },
  };
}

export function duplicateStepId(stepId: string): ValidationIssue {
  return {
    code: 'DUPLICATE_STEP_ID',
    severity: 'error',
    message: `Duplicate step id: ${stepId}`,
    path: `steps.${stepId}`,
    suggestions: ['Give every step a unique id'],
  };
}

export function unknownDependency(stepId: string, dependency: string): ValidationIssue {
  return {
    code: 'UNKNOWN_DEPENDENCY',
    severity: 'error',
    message: `Step '${stepId}' depends on unknown step '${dependency}'`,
    path: `steps.${stepId}.depends_on`,
    context: { dependency },
  };
}

export function missingSyncPrerequisite(stepId: string, target: string, required: string): ValidationIssue {
  return {
    code: 'MISSING_SYNC_PREREQUISITE',
    severity: 'error',
    message: `Sync '${target}' requires sync '${required}' first`,
    path: `steps.${stepId}`,
    context: { target, required },
    suggestions: [`Add a '${required}' sync step before '${stepId}'`],
  };
}

// =============================================================================
// Result Builders
// =============================================================================

export function validationSuccess(warnings: ValidationIssue[] = []): ValidationResult {
  return { valid: true, issues: warnings, errors: [], warnings };
}

export function validationFailure(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');
  return { valid: errors.length === 0, issues, errors, warnings };
}

export function mergeValidationResults(...results: ValidationResult[]): ValidationResult {
  const allIssues: ValidationIssue[] = [];
  for (const result of results) {
    allIssues.push(...result.issues);
  }
  return validationFailure(allIssues);
}
