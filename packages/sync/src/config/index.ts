/**
 * Configuration Module
 *
 * Exports all configuration-related types, classes, and utilities.
 */

export type {
  SourceType,
  SourceConfig,
  DatabaseSourceConfig,
  ResourceSourceConfig,
  ApiSourceConfig,
  VersionSourceType,
  PollingConfig,
  EnabledPollingConfig,
  DisabledPollingConfig,
  EventsConfig,
  LoggingConfig,
  PolicySyncConfig,
} from './types';

export {
  DEFAULT_CHANNEL,
  MIN_POLLING_INTERVAL_MS,
  POLLING_DISABLED,
  VALID_SOURCE_TYPES,
  VALID_VERSION_SOURCE_TYPES,
  VALID_LOG_LEVELS,
} from './types';

export {
  SourceConfigSchema,
  PollingConfigSchema,
  PolicySyncConfigSchema,
  parseSourceConfig,
  parsePollingConfig,
  parsePolicySyncConfig,
  validateSyncConfig,
} from './schema';

export { ConfigLoadError, ConfigValidationError } from './errors';

export { ConfigManager } from './manager';
export type { ConfigManagerOptions } from './manager';

export { ModeConfigLoader } from './mode-config-loader';
export type { ConfigLoader, ModeConfigLoaderOptions } from './mode-config-loader';
