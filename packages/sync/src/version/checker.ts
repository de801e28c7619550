/**
 * Version Checker
 *
 * Reports a monotonic marker for the authoritative policy data so drift can
 * be detected without transferring the rule set.
 */
export interface VersionChecker {
  /**
   * Current version, or null when it cannot be determined.
   * Never rejects.
   */
  getCurrentVersion(signal?: AbortSignal): Promise<number | null>;
  /** Whether the version source answers at all. Never rejects. */
  isAvailable(): Promise<boolean>;
  describe(): string;
}

/**
 * Normalizes a version value from a source into an integer.
 * Accepts numbers, numeric strings, bigints and dates (epoch seconds).
 * Values outside the safe integer range are rejected, since adjacent
 * counters would compare equal once rounded.
 */
export function toVersion(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? safeInteger(Math.floor(value)) : null;
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    if (/^\s*-?\d+\s*$/.test(value)) {
      return toVersion(BigInt(value.trim()));
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? safeInteger(Math.floor(parsed)) : null;
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : Math.floor(time / 1000);
  }
  return null;
}

function safeInteger(value: number): number | null {
  return Number.isSafeInteger(value) ? value : null;
}
