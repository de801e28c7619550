/**
 * Version Polling Service
 *
 * Periodically asks a VersionChecker for the authoritative version and
 * triggers a reload when it differs from the cached one. Ticks run with a
 * fixed delay: the next check is scheduled only after the previous one
 * (including its reload callback) has settled, so ticks never overlap.
 */

import { ConfigurationError } from '@policy-sync/core';
import { MIN_POLLING_INTERVAL_MS } from '../config/types';
import type { Logger } from '../utils/logger';
import type { VersionChecker } from './checker';

/** Cached version before any baseline has been read */
export const UNKNOWN_VERSION = -1;

export type ReloadCallback = () => void | Promise<void>;

export interface VersionPollingOptions {
  intervalMs: number;
  logger: Logger;
  /** Time a running tick gets to finish on stop before it is aborted */
  gracePeriodMs?: number;
  /** Time allowed for an aborted tick to settle */
  forceTimeoutMs?: number;
}

export class VersionPollingService {
  private readonly intervalMs: number;
  private readonly gracePeriodMs: number;
  private readonly forceTimeoutMs: number;
  private readonly logger: Logger;

  private cachedVersion = UNKNOWN_VERSION;
  private running = false;
  private starting: Promise<void> | null = null;
  private stopRequested = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private tickController: AbortController | null = null;

  constructor(
    private readonly versionChecker: VersionChecker,
    options: VersionPollingOptions,
    private readonly reloadCallback: ReloadCallback,
  ) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs < MIN_POLLING_INTERVAL_MS) {
      throw new ConfigurationError(
        `Polling interval must be at least ${MIN_POLLING_INTERVAL_MS}ms (1 minute), got ${options.intervalMs}`,
        'polling.intervalMs',
      );
    }
    this.intervalMs = options.intervalMs;
    this.gracePeriodMs = options.gracePeriodMs ?? 5000;
    this.forceTimeoutMs = options.forceTimeoutMs ?? 2000;
    this.logger = options.logger;
  }

  /**
   * Read the baseline version and schedule periodic checks.
   * No-op when already running or when the version source is unavailable.
   */
  async start(): Promise<void> {
    if (this.running || this.starting) {
      this.logger.warn('Version polling service is already running');
      return;
    }

    this.stopRequested = false;
    this.starting = this.doStart();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  /**
   * Cancel future ticks and wait for a running one to finish.
   * Safe to call repeatedly, before start, or while start is in progress.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      this.stopRequested = true;
      await Promise.allSettled([this.starting]);
    }
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const inFlight = this.inFlight;
    if (inFlight) {
      if (!(await settlesWithin(inFlight, this.gracePeriodMs))) {
        this.logger.warn('Version check did not finish gracefully, forcing cancellation');
        this.tickController?.abort();
        if (!(await settlesWithin(inFlight, this.forceTimeoutMs))) {
          this.logger.error('Version check did not terminate after forced cancellation');
        }
      }
    }

    this.logger.info('Version polling service stopped');
  }

  /**
   * One polling tick. Absent versions are skipped; the first observed version
   * becomes the baseline; any other change updates the cache and then runs
   * the reload callback. Never rejects.
   */
  async checkVersionChange(signal?: AbortSignal): Promise<void> {
    try {
      const currentVersion = await this.versionChecker.getCurrentVersion(signal);
      if (currentVersion === null) {
        this.logger.debug('Could not get current version, skipping check');
        return;
      }

      const previousVersion = this.cachedVersion;
      if (previousVersion === UNKNOWN_VERSION) {
        this.cachedVersion = currentVersion;
        this.logger.info(`Initial version set to: ${currentVersion}`);
        return;
      }

      if (currentVersion === previousVersion) {
        this.logger.debug(`Version unchanged: ${currentVersion}`);
        return;
      }

      if (currentVersion < previousVersion) {
        this.logger.warn(`Version moved backwards from ${previousVersion} to ${currentVersion}, possible rollback`);
      } else {
        this.logger.info(`Version changed from ${previousVersion} to ${currentVersion}, triggering reload`);
      }

      // Cache first so a failing reload is not retried every tick
      this.cachedVersion = currentVersion;
      try {
        await this.reloadCallback();
      } catch (error) {
        this.logger.error('Error during policy reload', error);
      }
    } catch (error) {
      this.logger.error('Error during version check', error);
    }
  }

  getCachedVersion(): number {
    return this.cachedVersion;
  }

  setCachedVersion(version: number): void {
    this.cachedVersion = version;
    this.logger.debug(`Cached version manually set to: ${version}`);
  }

  isRunning(): boolean {
    return this.running;
  }

  getVersionChecker(): VersionChecker {
    return this.versionChecker;
  }

  private async doStart(): Promise<void> {
    if (!(await this.versionChecker.isAvailable())) {
      this.logger.warn(`Version checker is not available, polling will not start: ${this.versionChecker.describe()}`);
      return;
    }

    await this.loadInitialVersion();
    if (this.stopRequested) {
      this.logger.info('Version polling service stopped before it finished starting');
      return;
    }

    this.running = true;
    this.scheduleNext();

    this.logger.info(`Version polling service started with interval ${this.intervalMs}ms`, {
      checker: this.versionChecker.describe(),
    });
  }

  private async loadInitialVersion(): Promise<void> {
    const version = await this.versionChecker.getCurrentVersion();
    if (version === null) {
      this.logger.warn('Could not load initial version, will adopt the first version observed');
      return;
    }
    this.cachedVersion = version;
    this.logger.info(`Initial version loaded: ${version}`);
  }

  private scheduleNext(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tickController = new AbortController();
      this.inFlight = this.checkVersionChange(this.tickController.signal).finally(() => {
        this.inFlight = null;
        this.tickController = null;
        if (this.running) {
          this.scheduleNext();
        }
      });
    }, this.intervalMs);
    this.timer.unref();
  }
}

function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timeoutId = setTimeout(() => resolve(false), timeoutMs);
  });
  return Promise.race([promise.then(() => true), timeout]).finally(() => clearTimeout(timeoutId));
}
