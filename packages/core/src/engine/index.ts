export { RuleSetEngine, createRuleSetEngine } from './rule-set-engine';
export type { EnforcementEngine, EngineFactory, EngineStats } from './rule-set-engine';
