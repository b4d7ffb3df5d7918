import { describe, expect, it } from 'vitest';
import { MappingError } from '@rdg-mapper/core';
import { resolveMappingConfig } from '../src/engine/config.js';
import { RulesEngine } from '../src/rules/rules-engine.js';
import { REJECT_REASON, atLeast } from '../src/rules/rules.js';
import type { NamedRule, RuleContext } from '../src/rules/rules.js';
import { candidate } from './helpers.js';

const context: RuleContext = {
  config: resolveMappingConfig({ fallbackIdsByCategory: { customer: 'R-UNK' } }),
};

const FULL_PATH = ['ExactAcceptRule', 'AmbiguityRule', 'FuzzyAcceptRule', 'FallbackIdRule', 'RejectRule'];

describe('atLeast', () => {
  it('treats floating point noise as equal', () => {
    expect(atLeast(0.1 + 0.2, 0.3)).toBe(true);
    expect(atLeast(0.3, 0.1 + 0.2)).toBe(true);
    expect(atLeast(0.79, 0.8)).toBe(false);
  });
});

describe('RulesEngine', () => {
  const engine = new RulesEngine();

  it('rejects when there are no candidates', () => {
    const decision = engine.decide([], context);

    expect(decision).toEqual({ kind: 'reject', reason: REJECT_REASON, decisionPath: FULL_PATH });
  });

  it('accepts a clear exact match', () => {
    const decision = engine.decide([candidate('R1', 1), candidate('R2', 0.5)], context);

    expect(decision.kind).toBe('accept');
    expect(decision.decisionPath).toEqual(['ExactAcceptRule']);
    if (decision.kind === 'accept') {
      expect(decision.candidate.entity.id).toBe('R1');
      expect(decision.rule).toBe('ExactAcceptRule');
    }
  });

  it('reports tied exact matches as ambiguous', () => {
    const decision = engine.decide([candidate('R1', 1), candidate('R2', 1)], context);

    expect(decision.kind).toBe('ambiguous');
    expect(decision.decisionPath).toEqual(['ExactAcceptRule', 'AmbiguityRule']);
    if (decision.kind === 'ambiguous') {
      expect(decision.candidates.map((c) => c.entity.id)).toEqual(['R1', 'R2']);
      expect(decision.reason).toBe('2 candidates within 0.05 of the best score 1.0000');
    }
  });

  it('collects every candidate within the gap of the best', () => {
    const decision = engine.decide(
      [candidate('R1', 0.9), candidate('R2', 0.88), candidate('R3', 0.86), candidate('R4', 0.81)],
      context
    );

    expect(decision.kind).toBe('ambiguous');
    if (decision.kind === 'ambiguous') {
      expect(decision.candidates.map((c) => c.entity.id)).toEqual(['R1', 'R2', 'R3']);
      expect(decision.reason).toBe('3 candidates within 0.05 of the best score 0.9000');
    }
  });

  it('accepts the best fuzzy candidate when the runner-up is below threshold', () => {
    const decision = engine.decide([candidate('R1', 0.9), candidate('R2', 0.7)], context);

    expect(decision.kind).toBe('accept');
    expect(decision.decisionPath).toEqual(['ExactAcceptRule', 'AmbiguityRule', 'FuzzyAcceptRule']);
    if (decision.kind === 'accept') {
      expect(decision.rule).toBe('FuzzyAcceptRule');
    }
  });

  it('treats a gap of exactly minGap as decisive', () => {
    const decision = engine.decide([candidate('R1', 0.9), candidate('R2', 0.85)], context);

    expect(decision.kind).toBe('accept');
    if (decision.kind === 'accept') {
      expect(decision.candidate.entity.id).toBe('R1');
    }
  });

  it('accepts a score equal to the fuzzy threshold', () => {
    expect(engine.decide([candidate('R1', 0.8)], context).kind).toBe('accept');
    expect(engine.decide([candidate('R1', 0.79)], context).kind).toBe('reject');
  });

  it('falls back by category', () => {
    const decision = engine.decide([candidate('R1', 0.5)], { ...context, category: 'customer' });

    expect(decision).toEqual({
      kind: 'accept_fallback',
      fallbackId: 'R-UNK',
      reason: "fallback for category 'customer'",
      decisionPath: FULL_PATH.slice(0, 4),
    });
  });

  it('rejects when the category has no fallback', () => {
    const decision = engine.decide([candidate('R1', 0.5)], { ...context, category: 'supplier' });

    expect(decision.kind).toBe('reject');
    expect(decision.decisionPath).toEqual(FULL_PATH);
  });

  it.each(['constructor', 'toString', '__proto__'])('finds no fallback for the category %s', (category) => {
    const decision = engine.decide([candidate('R1', 0.5)], { ...context, category });

    expect(decision).toEqual({ kind: 'reject', reason: REJECT_REASON, decisionPath: FULL_PATH });
  });

  it('always ends the chain with RejectRule', () => {
    expect(new RulesEngine(['RejectRule', 'FuzzyAcceptRule']).ruleNames).toEqual(['FuzzyAcceptRule', 'RejectRule']);
    expect(new RulesEngine([]).ruleNames).toEqual(['RejectRule']);
  });

  it('refuses a rule listed twice', () => {
    try {
      new RulesEngine(['FuzzyAcceptRule', 'FuzzyAcceptRule']);
      expect.unreachable('constructor should fail');
    } catch (err) {
      expect(err).toBeInstanceOf(MappingError);
      if (err instanceof MappingError) {
        expect(err.code).toBe('INVALID_RULE');
      }
    }
  });

  it('runs custom rules in their listed position', () => {
    const blocklist: NamedRule = {
      name: 'BlocklistRule',
      evaluate: (candidates) =>
        candidates[0]?.entity.id === 'R9' ? { kind: 'reject', reason: 'blocked' } : null,
    };
    const custom = new RulesEngine([blocklist, 'ExactAcceptRule', 'RejectRule']);

    expect(custom.decide([candidate('R9', 1)], context)).toEqual({
      kind: 'reject',
      reason: 'blocked',
      decisionPath: ['BlocklistRule'],
    });
    expect(custom.decide([candidate('R1', 1)], context).decisionPath).toEqual(['BlocklistRule', 'ExactAcceptRule']);
  });

  it('decides the same way for the same input', () => {
    const candidates = [candidate('R1', 0.91), candidate('R2', 0.9)];

    expect(engine.decide(candidates, context)).toEqual(engine.decide(candidates, context));
  });
});
