export {
  BUILT_IN_RULES,
  DEFAULT_RULE_ORDER,
  REJECT_REASON,
  SCORE_EPSILON,
  atLeast,
  exactAcceptRule,
  ambiguityRule,
  fuzzyAcceptRule,
  fallbackIdRule,
  rejectRule,
} from './rules.js';
export type { DecisionRule, NamedRule, RuleContext } from './rules.js';
export { RulesEngine } from './rules-engine.js';
export type { RuleSpec } from './rules-engine.js';
