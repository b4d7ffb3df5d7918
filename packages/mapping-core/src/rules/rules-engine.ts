/**
 * Rules Engine
 *
 * Applies an ordered, short-circuiting chain of rules to the ranked
 * candidates of one record. The terminal RejectRule always ends the chain,
 * so every evaluation produces a decision.
 */

import { MappingError } from '@rdg-mapper/core';
import type { Candidate, Decision, RuleName } from '@rdg-mapper/core';
import { BUILT_IN_RULES, DEFAULT_RULE_ORDER, rejectRule } from './rules.js';
import type { NamedRule, RuleContext } from './rules.js';

/** A built-in rule by name, or a custom rule */
export type RuleSpec = RuleName | NamedRule;

export class RulesEngine {
  private readonly chain: readonly NamedRule[];

  constructor(order: readonly RuleSpec[] = DEFAULT_RULE_ORDER) {
    const chain: NamedRule[] = [];
    const names = new Set<string>();

    for (const spec of order) {
      const rule = typeof spec === 'string' ? BUILT_IN_RULES[spec] : spec;
      if (names.has(rule.name)) {
        throw new MappingError({
          code: 'INVALID_RULE',
          message: `Rule '${rule.name}' appears more than once in the rule chain`,
        });
      }
      names.add(rule.name);
      if (rule !== rejectRule) chain.push(rule);
    }

    chain.push(rejectRule);
    this.chain = chain;
  }

  /** Rule names in evaluation order */
  get ruleNames(): string[] {
    return this.chain.map((rule) => rule.name);
  }

  decide(candidates: readonly Candidate[], context: RuleContext): Decision {
    const decisionPath: string[] = [];

    for (const rule of this.chain) {
      decisionPath.push(rule.name);
      const verdict = rule.evaluate(candidates, context);
      if (verdict) {
        return { ...verdict, decisionPath };
      }
    }

    // The chain ends with RejectRule, which always fires
    return { kind: 'reject', reason: 'rule chain produced no verdict', decisionPath };
  }
}
