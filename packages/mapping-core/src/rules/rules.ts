/**
 * Built-in decision rules
 *
 * Each rule is a pure function of the ranked candidates and the decision
 * context. It returns a verdict when it fires and null to pass control to
 * the next rule in the chain.
 */

import type { Candidate, MappingConfig, RuleName, RuleVerdict } from '@rdg-mapper/core';

/** Tolerance for inclusive threshold comparisons */
export const SCORE_EPSILON = 1e-9;

export interface RuleContext {
  config: MappingConfig;
  /** Record category, used by the fallback policy */
  category?: string;
}

export type DecisionRule = (
  candidates: readonly Candidate[],
  context: RuleContext
) => RuleVerdict | null;

/** A rule with the name recorded in decision paths */
export interface NamedRule {
  readonly name: string;
  readonly evaluate: DecisionRule;
}

/** a >= b, tolerating floating point noise */
export function atLeast(a: number, b: number): boolean {
  return a >= b - SCORE_EPSILON;
}

function below(a: number, b: number): boolean {
  return !atLeast(a, b);
}

export const exactAcceptRule: NamedRule = {
  name: 'ExactAcceptRule',
  evaluate: (candidates, { config }) => {
    const [top, second] = candidates;
    if (!top || !atLeast(top.score, config.exactThreshold)) return null;
    if (second && below(top.score - second.score, config.minGap)) return null;
    return { kind: 'accept', candidate: top, rule: 'ExactAcceptRule' };
  },
};

export const ambiguityRule: NamedRule = {
  name: 'AmbiguityRule',
  evaluate: (candidates, { config }) => {
    const [top, second] = candidates;
    if (!top || !second) return null;
    if (!atLeast(top.score, config.fuzzyThreshold) || !atLeast(second.score, config.fuzzyThreshold)) {
      return null;
    }
    if (atLeast(top.score - second.score, config.minGap)) return null;

    const tied = candidates.filter(
      (c) => atLeast(c.score, config.fuzzyThreshold) && below(top.score - c.score, config.minGap)
    );
    return {
      kind: 'ambiguous',
      candidates: tied,
      reason: `${tied.length} candidates within ${config.minGap} of the best score ${top.score.toFixed(4)}`,
    };
  },
};

export const fuzzyAcceptRule: NamedRule = {
  name: 'FuzzyAcceptRule',
  evaluate: (candidates, { config }) => {
    const [top] = candidates;
    if (!top || !atLeast(top.score, config.fuzzyThreshold)) return null;
    return { kind: 'accept', candidate: top, rule: 'FuzzyAcceptRule' };
  },
};

export const fallbackIdRule: NamedRule = {
  name: 'FallbackIdRule',
  evaluate: (_candidates, { config, category }) => {
    const fallbacks = config.fallbackIdsByCategory;
    if (category === undefined || !Object.hasOwn(fallbacks, category)) return null;
    const fallbackId = fallbacks[category];
    if (fallbackId === undefined) return null;
    return {
      kind: 'accept_fallback',
      fallbackId,
      reason: `fallback for category '${category}'`,
    };
  },
};

export const REJECT_REASON = 'no candidate above threshold';

export const rejectRule: NamedRule = {
  name: 'RejectRule',
  evaluate: () => ({ kind: 'reject', reason: REJECT_REASON }),
};

export const BUILT_IN_RULES: Readonly<Record<RuleName, NamedRule>> = {
  ExactAcceptRule: exactAcceptRule,
  AmbiguityRule: ambiguityRule,
  FuzzyAcceptRule: fuzzyAcceptRule,
  FallbackIdRule: fallbackIdRule,
  RejectRule: rejectRule,
};

export const DEFAULT_RULE_ORDER: readonly RuleName[] = [
  'ExactAcceptRule',
  'AmbiguityRule',
  'FuzzyAcceptRule',
  'FallbackIdRule',
  'RejectRule',
];
