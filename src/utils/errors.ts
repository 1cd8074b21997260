export type ReconciliationErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DISCOVERY_ERROR'
  | 'SCHEMA_MISMATCH'
  | 'VALIDATION_ERROR'
  | 'MATERIALIZATION_ERROR'
  | 'WAREHOUSE_ERROR'
  | 'RUN_IN_PROGRESS';

/**
 * Base class for every failure the reconciliation run can surface. Structural
 * failures abort the run before anything is written to the mart.
 */
export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ReconciliationErrorCode,
    statusCode = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReconciliationError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class ConfigurationError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

export class DiscoveryError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DISCOVERY_ERROR', 502, details);
    this.name = 'DiscoveryError';
  }
}

export class SchemaMismatchError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_MISMATCH', 422, details);
    this.name = 'SchemaMismatchError';
  }
}

// Named ValidationError so the API error handler answers 400
export class InputValidationError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class MaterializationError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MATERIALIZATION_ERROR', 502, details);
    this.name = 'MaterializationError';
  }
}

export class WarehouseError extends ReconciliationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'WAREHOUSE_ERROR', 503, details);
    this.name = 'WarehouseError';
  }
}

export class RunInProgressError extends ReconciliationError {
  constructor(startedAt: string) {
    super(`A reconciliation run started at ${startedAt} is still in progress`, 'RUN_IN_PROGRESS', 409, {
      startedAt,
    });
    this.name = 'RunInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// CLI exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION = 2;
export const EXIT_EXTERNAL = 3;
export const EXIT_UNEXPECTED = 4;

export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ConfigurationError ||
    error instanceof InputValidationError ||
    error instanceof SchemaMismatchError
  ) {
    return EXIT_VALIDATION;
  }
  if (error instanceof ReconciliationError) {
    return EXIT_EXTERNAL;
  }
  return EXIT_UNEXPECTED;
}
