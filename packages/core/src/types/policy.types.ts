/**
 * Policy Types
 *
 * Value types shared by the policy sources, the enforcement engine and the
 * orchestrator.
 */

// =============================================================================
// Policy Rules
// =============================================================================

/**
 * A single grant: role `roleId` may perform `actionCode` on `resourceCode`.
 */
export interface PolicyRule {
  readonly id: number;
  readonly roleId: number;
  readonly resourceCode: string;
  readonly actionCode: string;
}

/**
 * Grouping record: `subject` inherits every grant of `role` within `domain`.
 */
export interface RoleLink {
  readonly subject: string;
  readonly role: string;
  readonly domain: string;
}

/** Engine-level policy tuple (`p = sub, dom, obj, act`) */
export interface EnginePolicy {
  readonly subject: string;
  readonly domain: string;
  readonly object: string;
  readonly action: string;
}

/** Domain assigned to rules that carry no domain of their own */
export const DEFAULT_DOMAIN = '*';

// =============================================================================
// Engine Model
// =============================================================================

export type MatcherKind = 'keyMatch' | 'segment' | 'exact';

export interface EngineModel {
  /** How request domains are matched against policy domains */
  domainMatcher: MatcherKind;
  /** How request objects are matched against policy objects */
  objectMatcher: MatcherKind;
  /** How request actions are matched against policy actions */
  actionMatcher: MatcherKind;
  /** Expand subjects through role links before matching */
  roleInheritance: boolean;
}

export const DEFAULT_ENGINE_MODEL: EngineModel = {
  domainMatcher: 'keyMatch',
  objectMatcher: 'keyMatch',
  actionMatcher: 'keyMatch',
  roleInheritance: true,
};

// =============================================================================
// Conversions
// =============================================================================

export function toEnginePolicy(rule: PolicyRule): EnginePolicy {
  return {
    subject: String(rule.roleId),
    domain: DEFAULT_DOMAIN,
    object: rule.resourceCode,
    action: rule.actionCode,
  };
}

export function formatPolicyRule(rule: PolicyRule): string {
  return `PolicyRule[${rule.id}: ${rule.roleId}->${rule.resourceCode}:${rule.actionCode}]`;
}
