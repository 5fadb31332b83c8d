/**
 * Reconciliation errors
 *
 * Scope and safety-gate errors stop the call before any mutation; they are
 * distinguishable from transport failures by `code`.
 */

export type ReconcileErrorCode =
  | 'SCOPE_NOT_FOUND'
  | 'CLEANUP_REQUIRES_TENANT'
  | 'REGISTRY_ERROR';

export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly details: Record<string, unknown> = {},
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ReconcileError';
  }
}

/**
 * The device or site a category is scoped to does not exist in the registry
 */
export class ScopeNotFoundError extends ReconcileError {
  constructor(
    public readonly scopeType: 'device' | 'site',
    public readonly scope: string
  ) {
    super(
      `${scopeType === 'device' ? 'Device' : 'Site'} not found in registry: ${scope}`,
      'SCOPE_NOT_FOUND',
      { scopeType, scope }
    );
    this.name = 'ScopeNotFoundError';
  }
}

/**
 * Device cleanup was requested without a tenant to bound it
 */
export class CleanupRequiresTenantError extends ReconcileError {
  constructor() {
    super(
      'Device cleanup requires a tenant scope; no devices were deleted',
      'CLEANUP_REQUIRES_TENANT'
    );
    this.name = 'CleanupRequiresTenantError';
  }
}

/**
 * Wrap any failure escaping a reconciler into a ReconcileError
 */
export function toReconcileError(error: unknown): ReconcileError {
  if (error instanceof ReconcileError) return error;
  const cause = error instanceof Error ? error : new Error(String(error));
  return new ReconcileError(cause.message, 'REGISTRY_ERROR', { errorName: cause.name }, cause);
}
