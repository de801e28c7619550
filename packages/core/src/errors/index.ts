/**
 * Error classes shared across policy synchronization.
 */

export type PolicySyncErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_DATA'
  | 'CONFIGURATION_ERROR'
  | 'UNINITIALIZED_ACCESS';

/**
 * Base error class for policy synchronization
 */
export class PolicySyncError extends Error {
  constructor(
    message: string,
    public readonly code: PolicySyncErrorCode,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PolicySyncError';
    Object.setPrototypeOf(this, PolicySyncError.prototype);
  }
}

/**
 * A policy or version source could not be reached (connection, timeout,
 * query failure). Retryable.
 */
export class SourceUnavailableError extends PolicySyncError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: unknown,
  ) {
    super(message, 'SOURCE_UNAVAILABLE', cause);
    this.name = 'SourceUnavailableError';
    Object.setPrototypeOf(this, SourceUnavailableError.prototype);
  }
}

/**
 * A single record from a source is unusable. Loaders log and skip these.
 */
export class MalformedDataError extends PolicySyncError {
  constructor(
    message: string,
    public readonly record: unknown,
  ) {
    super(message, 'MALFORMED_DATA');
    this.name = 'MalformedDataError';
    Object.setPrototypeOf(this, MalformedDataError.prototype);
  }
}

/**
 * Missing or invalid configuration. Fatal at construction.
 */
export class ConfigurationError extends PolicySyncError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A public call was made before the permission checker became ready.
 */
export class UninitializedAccessError extends PolicySyncError {
  constructor(operation: string) {
    super(`Permission checker is not initialized - cannot ${operation}`, 'UNINITIALIZED_ACCESS');
    this.name = 'UninitializedAccessError';
    Object.setPrototypeOf(this, UninitializedAccessError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
