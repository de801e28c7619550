import type { EngineModel, EnginePolicy, RoleLink } from '../types';
import { DEFAULT_ENGINE_MODEL } from '../types';
import { EngineModelSchema } from '../policy/schema';
import { ConfigurationError } from '../errors';
import { getMatcher } from '../utils/pattern-matching';
import type { Matcher } from '../utils/pattern-matching';

/**
 * Enforcement Engine
 *
 * Contract consumed by the permission checker. Implementations must make
 * `clearAll()` followed by `bulkInsert()` look atomic to `check()` callers.
 */
export interface EnforcementEngine {
  /** Remove every policy and role link */
  clearAll(): void;
  /**
   * Insert policies (and optional role links) in one step.
   * Returns false when some entries already existed and were skipped.
   */
  bulkInsert(policies: readonly EnginePolicy[], roleLinks?: readonly RoleLink[]): boolean;
  check(subject: string, domain: string, object: string, action: string): boolean;
  /** Number of loaded policies */
  size(): number;
}

export type EngineFactory = (model: EngineModel) => EnforcementEngine;

export interface EngineStats {
  policies: number;
  roleLinks: number;
  subjects: number;
}

// Role hierarchies deeper than this are treated as cycles
const MAX_HIERARCHY_DEPTH = 10;

interface RuleSnapshot {
  readonly policiesBySubject: ReadonlyMap<string, readonly EnginePolicy[]>;
  readonly linksBySubject: ReadonlyMap<string, readonly RoleLink[]>;
  readonly policyKeys: ReadonlySet<string>;
  readonly linkKeys: ReadonlySet<string>;
}

const EMPTY_SNAPSHOT: RuleSnapshot = {
  policiesBySubject: new Map(),
  linksBySubject: new Map(),
  policyKeys: new Set(),
  linkKeys: new Set(),
};

/**
 * In-memory RBAC engine with domain scoping, wildcard matching and role
 * inheritance.
 *
 * The rule set lives in an immutable snapshot; every mutation builds a new
 * snapshot and swaps the reference, so `check()` never sees a half-built set.
 */
export class RuleSetEngine implements EnforcementEngine {
  private snapshot: RuleSnapshot = EMPTY_SNAPSHOT;
  private readonly model: EngineModel;
  private readonly matchDomain: Matcher;
  private readonly matchObject: Matcher;
  private readonly matchAction: Matcher;

  constructor(model: EngineModel = DEFAULT_ENGINE_MODEL) {
    const parsed = EngineModelSchema.safeParse(model);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid engine model: ${issue?.message ?? 'unknown issue'}`,
        issue ? ['engine', ...issue.path].join('.') : 'engine',
      );
    }
    this.model = parsed.data;
    this.matchDomain = getMatcher(this.model.domainMatcher);
    this.matchObject = getMatcher(this.model.objectMatcher);
    this.matchAction = getMatcher(this.model.actionMatcher);
  }

  getModel(): EngineModel {
    return { ...this.model };
  }

  clearAll(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  bulkInsert(policies: readonly EnginePolicy[], roleLinks: readonly RoleLink[] = []): boolean {
    const current = this.snapshot;
    const policiesBySubject = new Map<string, EnginePolicy[]>();
    for (const [subject, list] of current.policiesBySubject) {
      policiesBySubject.set(subject, [...list]);
    }
    const linksBySubject = new Map<string, RoleLink[]>();
    for (const [subject, list] of current.linksBySubject) {
      linksBySubject.set(subject, [...list]);
    }
    const policyKeys = new Set(current.policyKeys);
    const linkKeys = new Set(current.linkKeys);
    let allInserted = true;

    for (const policy of policies) {
      const key = policyKey(policy);
      if (policyKeys.has(key)) {
        allInserted = false;
        continue;
      }
      policyKeys.add(key);
      appendTo(policiesBySubject, policy.subject, policy);
    }

    for (const link of roleLinks) {
      const key = `${link.subject}\u0000${link.role}\u0000${link.domain}`;
      if (linkKeys.has(key)) {
        allInserted = false;
        continue;
      }
      linkKeys.add(key);
      appendTo(linksBySubject, link.subject, link);
    }

    this.snapshot = { policiesBySubject, linksBySubject, policyKeys, linkKeys };
    return allInserted;
  }

  check(subject: string, domain: string, object: string, action: string): boolean {
    const snapshot = this.snapshot;
    const subjects = this.model.roleInheritance
      ? this.expandSubjects(snapshot, subject, domain)
      : [subject];

    for (const candidate of subjects) {
      const policies = snapshot.policiesBySubject.get(candidate);
      if (!policies) continue;

      for (const policy of policies) {
        if (
          this.matchDomain(domain, policy.domain) &&
          this.matchObject(object, policy.object) &&
          this.matchAction(action, policy.action)
        ) {
          return true;
        }
      }
    }

    return false;
  }

  size(): number {
    return this.snapshot.policyKeys.size;
  }

  /** Every loaded policy, in insertion order per subject */
  listPolicies(): EnginePolicy[] {
    const result: EnginePolicy[] = [];
    for (const list of this.snapshot.policiesBySubject.values()) {
      result.push(...list);
    }
    return result;
  }

  getStats(): EngineStats {
    return {
      policies: this.snapshot.policyKeys.size,
      roleLinks: this.snapshot.linkKeys.size,
      subjects: this.snapshot.policiesBySubject.size,
    };
  }

  /**
   * Subject plus every role it reaches through role links valid in `domain`.
   */
  private expandSubjects(snapshot: RuleSnapshot, subject: string, domain: string): string[] {
    const seen = new Set<string>([subject]);
    let frontier = [subject];

    for (let depth = 0; depth < MAX_HIERARCHY_DEPTH && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const link of snapshot.linksBySubject.get(current) ?? []) {
          if (!seen.has(link.role) && this.matchDomain(domain, link.domain)) {
            seen.add(link.role);
            next.push(link.role);
          }
        }
      }
      frontier = next;
    }

    return [...seen];
  }
}

function policyKey(policy: EnginePolicy): string {
  return `${policy.subject}\u0000${policy.domain}\u0000${policy.object}\u0000${policy.action}`;
}

function appendTo<T>(map: Map<string, T[]>, key: string, value: T): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

export const createRuleSetEngine: EngineFactory = (model) => new RuleSetEngine(model);
