/**
 * Zod schemas for policy synchronization configuration
 */

import { z } from 'zod';
import { ConfigurationError, DEFAULT_ENGINE_MODEL, EngineModelSchema, ResourceFilter } from '@policy-sync/core';
import {
  DEFAULT_CHANNEL,
  MIN_POLLING_INTERVAL_MS,
  VALID_LOG_LEVELS,
  VALID_VERSION_SOURCE_TYPES,
} from './types';
import type { PollingConfig, PolicySyncConfig, SourceConfig } from './types';
import { ConfigValidationError } from './errors';

// =============================================================================
// Source Schema
// =============================================================================

/** Accepts a YAML list or a comma-separated string (handy for env vars) */
const ResourcesSchema = z
  .union([
    z.array(z.union([z.string(), z.number()]).transform(String)),
    z.string().transform(value => value.split(',')),
  ])
  .default([])
  .transform(codes => new ResourceFilter(codes));

const LocationSchema = z.string().trim().min(1, 'Source location is required');

export const SourceConfigSchema = z.discriminatedUnion('sourceType', [
  z.object({
    sourceType: z.literal('database'),
    sourceLocation: LocationSchema,
    resources: ResourcesSchema,
  }),
  z.object({
    sourceType: z.literal('resource'),
    sourceLocation: LocationSchema,
    resources: ResourcesSchema,
  }),
  z.object({
    sourceType: z.literal('api'),
    sourceLocation: LocationSchema.url('API source location must be a URL'),
    resources: ResourcesSchema,
  }),
]);

// =============================================================================
// Polling Schema
// =============================================================================

export const PollingConfigSchema = z.discriminatedUnion('enabled', [
  z.object({
    enabled: z.literal(false),
  }),
  z.object({
    enabled: z.literal(true),
    intervalMs: z.coerce
      .number()
      .int()
      .min(MIN_POLLING_INTERVAL_MS, `Polling interval must be at least ${MIN_POLLING_INTERVAL_MS}ms (1 minute)`),
    versionSourceType: z.enum(VALID_VERSION_SOURCE_TYPES),
    versionSource: z.string().trim().min(1, 'Version source is required'),
  }),
]);

// =============================================================================
// Full Configuration Schema
// =============================================================================

export const PolicySyncConfigSchema = z
  .object({
    engine: EngineModelSchema.partial()
      .default({})
      .transform(model => ({ ...DEFAULT_ENGINE_MODEL, ...model })),
    source: SourceConfigSchema,
    polling: PollingConfigSchema.default({ enabled: false }),
    events: z
      .object({
        channel: z.string().trim().min(1, 'Event channel cannot be empty').default(DEFAULT_CHANNEL),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(VALID_LOG_LEVELS).default('info'),
        name: z.string().min(1).default('policy-sync'),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.source.sourceType === 'resource' && config.polling.enabled) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['polling', 'enabled'],
        message: 'Version polling cannot be enabled for a resource policy source',
      });
    }
  });

// =============================================================================
// Parsing Helpers
// =============================================================================

function toValidationError(error: z.ZodError, prefix: string[], input: unknown): ConfigValidationError {
  const issue = error.issues[0];
  const path = [...prefix, ...(issue?.path ?? [])].map(String);
  const field = path.join('.') || prefix.join('.');
  return new ConfigValidationError(
    `Invalid value for ${field}: ${issue?.message ?? 'validation failed'}`,
    field,
    pick(input, issue?.path ?? []),
  );
}

function pick(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function parseSourceConfig(input: unknown): SourceConfig {
  const result = SourceConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, ['source'], input);
  }
  return result.data;
}

export function parsePollingConfig(input: unknown): PollingConfig {
  const result = PollingConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, ['polling'], input);
  }
  return result.data;
}

export function parsePolicySyncConfig(input: unknown): PolicySyncConfig {
  const result = PolicySyncConfigSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, [], input);
  }
  return result.data;
}

/**
 * Cross-field checks for configurations built in code rather than parsed.
 */
export function validateSyncConfig(source: SourceConfig, polling: PollingConfig): void {
  if (!source.sourceLocation.trim()) {
    throw new ConfigurationError('Source location is required', 'source.sourceLocation');
  }
  if (!polling.enabled) return;

  if (source.sourceType === 'resource') {
    throw new ConfigurationError(
      'Version polling cannot be enabled for a resource policy source',
      'polling.enabled',
    );
  }
  if (!Number.isInteger(polling.intervalMs) || polling.intervalMs < MIN_POLLING_INTERVAL_MS) {
    throw new ConfigValidationError(
      `Polling interval must be at least ${MIN_POLLING_INTERVAL_MS}ms (1 minute)`,
      'polling.intervalMs',
      polling.intervalMs,
    );
  }
  if (!polling.versionSource.trim()) {
    throw new ConfigurationError('Version source is required', 'polling.versionSource');
  }
}
