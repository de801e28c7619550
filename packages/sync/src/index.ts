/**
 * @policy-sync/sync
 *
 * Loads authorization policies from a database, a config file or an HTTP
 * API into an enforcement engine and keeps them current through version
 * polling and pub/sub invalidation.
 */

// Permission checker
export * from './checker';

// Configuration
export * from './config';

// Policy loaders
export * from './policy';

// Version checking and polling
export * from './version';

// Invalidation events
export * from './events';

// Data sources
export * from './datasource';
export { getJson, HTTP_DEFAULTS } from './http/fetch-json';
export type { FetchFn, GetJsonOptions, HttpJsonResult } from './http/fetch-json';

// Logging
export { Logger } from './utils/logger';
export type { LogLevel } from './utils/logger';
