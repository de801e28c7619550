import type { PolicyRule } from '../types';

/**
 * Allowlist of resource codes a service instance loads.
 * An empty filter admits every rule.
 */
export class ResourceFilter {
  private readonly codes: ReadonlySet<string>;

  constructor(codes: Iterable<string> = []) {
    const normalized = new Set<string>();
    for (const code of codes) {
      const trimmed = code.trim();
      if (trimmed) normalized.add(trimmed);
    }
    this.codes = normalized;
  }

  static all(): ResourceFilter {
    return new ResourceFilter();
  }

  get isEmpty(): boolean {
    return this.codes.size === 0;
  }

  get size(): number {
    return this.codes.size;
  }

  /** Codes in insertion order, used for SQL placeholders and query strings */
  toArray(): string[] {
    return [...this.codes];
  }

  admits(resourceCode: string): boolean {
    return this.isEmpty || this.codes.has(resourceCode);
  }

  apply<T extends Pick<PolicyRule, 'resourceCode'>>(rules: readonly T[]): T[] {
    if (this.isEmpty) return [...rules];
    return rules.filter(rule => this.codes.has(rule.resourceCode));
  }

  toString(): string {
    return this.isEmpty ? '<all>' : this.toArray().join(',');
  }
}
