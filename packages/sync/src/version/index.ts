export type { VersionChecker } from './checker';
export { toVersion } from './checker';
export { DatabaseVersionChecker } from './database-checker';
export { ApiVersionChecker } from './api-checker';
export type { ApiVersionCheckerOptions } from './api-checker';
export { createVersionChecker } from './factory';
export type { VersionCheckerDeps, VersionCheckerFactory } from './factory';
export { VersionPollingService, UNKNOWN_VERSION } from './polling-service';
export type { ReloadCallback, VersionPollingOptions } from './polling-service';
