/**
 * Policy Source Exports
 *
 * Interchangeable loaders that replace an engine's rule set from:
 * - A relational database query
 * - A static rule file in the mode-scoped config directory
 * - A remote HTTP API
 */

export { BasePolicyLoader } from './loader';
export type { PolicyLoader, LoadResult, FetchedPolicies } from './loader';

export { DatabasePolicyLoader, addResourceFilterToQuery } from './database-loader';
export { ResourcePolicyLoader, parsePolicyFile } from './resource-loader';
export type { ParsedPolicyFile, MalformedLine } from './resource-loader';
export { ApiPolicyLoader, buildApiUrl } from './api-loader';
export type { ApiPolicyLoaderOptions } from './api-loader';

export { createPolicyLoader } from './factory';
export type { PolicyLoaderDeps, PolicyLoaderFactory } from './factory';
