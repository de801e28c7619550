/**
 * Policy Synchronization Configuration Types
 */

import type { EngineModel, ResourceFilter } from '@policy-sync/core';
import type { LogLevel } from '../utils/logger';

// =============================================================================
// Policy Source
// =============================================================================

export type SourceType = 'database' | 'resource' | 'api';

export interface DatabaseSourceConfig {
  sourceType: 'database';
  /** SQL query selecting `id, role_id, resource_code, action_code` */
  sourceLocation: string;
  resources: ResourceFilter;
}

export interface ResourceSourceConfig {
  sourceType: 'resource';
  /** Path of the rule file, relative to the mode-scoped config directory */
  sourceLocation: string;
  resources: ResourceFilter;
}

export interface ApiSourceConfig {
  sourceType: 'api';
  /** Endpoint returning `{ data: PolicyRule[] }` */
  sourceLocation: string;
  resources: ResourceFilter;
}

export type SourceConfig = DatabaseSourceConfig | ResourceSourceConfig | ApiSourceConfig;

// =============================================================================
// Version Polling
// =============================================================================

export type VersionSourceType = 'database' | 'api';

export interface DisabledPollingConfig {
  enabled: false;
}

export interface EnabledPollingConfig {
  enabled: true;
  /** Delay between version checks in ms (at least one minute) */
  intervalMs: number;
  versionSourceType: VersionSourceType;
  /** Single-column SQL query or version endpoint URL */
  versionSource: string;
}

export type PollingConfig = DisabledPollingConfig | EnabledPollingConfig;

export const MIN_POLLING_INTERVAL_MS = 60_000;

export const POLLING_DISABLED: DisabledPollingConfig = { enabled: false };

// =============================================================================
// Full Configuration
// =============================================================================

export interface EventsConfig {
  /** Pub/sub channel carrying invalidation messages */
  channel: string;
}

export interface LoggingConfig {
  level: LogLevel;
  name: string;
}

export interface PolicySyncConfig {
  engine: EngineModel;
  source: SourceConfig;
  polling: PollingConfig;
  events: EventsConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CHANNEL = 'policy:changes';

export const VALID_SOURCE_TYPES = ['database', 'resource', 'api'] as const;
export const VALID_VERSION_SOURCE_TYPES = ['database', 'api'] as const;
export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
