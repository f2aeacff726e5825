/**
 * Error types raised by the normalization and reconciliation engine
 */

/**
 * Error codes for programmatic handling
 */
export type ReconcileErrorCode =
  | 'UNKNOWN_SCHEMA'
  | 'NORMALIZATION_ERROR'
  | 'CYCLIC_DEPENDENCY'
  | 'REMOTE_FETCH_ERROR'
  | 'EXECUTION_ERROR';

/**
 * Base class for engine errors
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * No schema is registered for a (resource type, dialect) pair
 */
export class UnknownSchemaError extends ReconcileError {
  constructor(
    public readonly resourceType: string,
    public readonly dialect?: string
  ) {
    super(
      dialect
        ? `No schema registered for resource type '${resourceType}' and dialect '${dialect}'`
        : `Unknown resource type '${resourceType}'`,
      'UNKNOWN_SCHEMA',
      'Run `nexus-reconcile types` to list the registered resource types and dialects'
    );
    this.name = 'UnknownSchemaError';
  }
}

/**
 * A single item could not be normalized into canonical form
 */
export class NormalizationError extends ReconcileError {
  constructor(
    public readonly resourceType: string,
    public readonly naturalKey: string | undefined,
    public readonly missingPath: string | undefined,
    detail?: string
  ) {
    const subject = naturalKey ? `'${naturalKey}'` : '(unnamed item)';
    super(
      detail ?? `Missing required field '${missingPath ?? '?'}' in ${resourceType} ${subject}`,
      'NORMALIZATION_ERROR'
    );
    this.name = 'NormalizationError';
  }
}

/**
 * The static dependency table declares a cycle
 */
export class CyclicDependencyError extends ReconcileError {
  constructor(
    public readonly cycle: string[],
    message = `Cyclic dependency between resource stages: ${cycle.join(' -> ')}`
  ) {
    super(message, 'CYCLIC_DEPENDENCY');
    this.name = 'CyclicDependencyError';
  }
}

/**
 * Remote state for a resource type could not be fetched
 */
export class RemoteFetchError extends ReconcileError {
  constructor(
    public readonly resourceType: string,
    public readonly originalError?: Error
  ) {
    super(
      `Failed to fetch remote state for ${resourceType}: ${originalError?.message ?? 'unknown error'}`,
      'REMOTE_FETCH_ERROR',
      'Check connectivity and credentials; nothing was changed for this resource type'
    );
    this.name = 'RemoteFetchError';
  }
}

/**
 * A create/update/delete call failed for one item
 */
export class ExecutionError extends ReconcileError {
  constructor(
    public readonly resourceType: string,
    public readonly naturalKey: string,
    public readonly originalError?: Error
  ) {
    super(
      `${resourceType} '${naturalKey}': ${originalError?.message ?? 'unknown error'}`,
      'EXECUTION_ERROR'
    );
    this.name = 'ExecutionError';
  }
}

/**
 * Type guard for engine errors
 */
export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isReconcileError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
