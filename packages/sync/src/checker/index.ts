export { PermissionChecker, createPermissionChecker } from './permission-checker';
export type {
  CheckerState,
  PermissionCheckerDeps,
  PermissionCheckerOptions,
  PermissionCheckerStats,
  ReloadEvent,
  ReloadEventHandler,
  ReloadTrigger,
} from './permission-checker';
export { ReloadQueue } from './reload-queue';
export { startPermissionChecker } from './bootstrap';
export type { BootstrapDeps } from './bootstrap';
