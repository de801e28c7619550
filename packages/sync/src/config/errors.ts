/**
 * Configuration Error Classes
 *
 * Custom error types for configuration loading and validation.
 */

import { ConfigurationError } from '@policy-sync/core';

export class ConfigLoadError extends ConfigurationError {
  constructor(message: string, cause?: unknown) {
    super(message, undefined, cause);
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    field: string,
    public readonly value: unknown,
  ) {
    super(message, field);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
