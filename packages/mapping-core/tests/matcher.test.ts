import { describe, expect, it, vi } from 'vitest';
import type { GlossaryEntry } from '@rdg-mapper/core';
import { Matcher } from '../src/matching/matcher.js';
import type { MatcherOptions } from '../src/matching/matcher.js';
import type { ScoreFunction } from '../src/matching/scoring.js';
import { IndexSnapshot, toReferenceEntity } from '../src/reference/index-snapshot.js';
import { entry, makeNormalizer, record } from './helpers.js';

const normalizer = makeNormalizer();

function snapshot(entries: GlossaryEntry[]): IndexSnapshot {
  return IndexSnapshot.build(
    entries.map((e) => toReferenceEntity(e, normalizer)),
    { generationId: 1 }
  );
}

function matcher(options: Partial<MatcherOptions> = {}): Matcher {
  return new Matcher(normalizer, { candidateLimit: 20, minScore: 0, similarity: 'jaro', ...options });
}

describe('Matcher', () => {
  const glossary = snapshot([entry('R1', 'Acme Corp'), entry('R4', 'Acme Industries')]);

  it('short-circuits on an exact key without scoring', () => {
    const scorer = vi.fn<ScoreFunction>(() => 0.5);
    const candidates = [...matcher({ similarity: scorer }).match(record('s1', 'ACME corp.'), glossary)];

    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.entity.id).toBe('R1');
    expect(candidates[0]?.score).toBe(1);
    expect(candidates[0]?.matchedOn).toEqual(['name']);
    expect(scorer).not.toHaveBeenCalled();
  });

  it('scores approximate candidates with the configured algorithm', () => {
    const only = snapshot([entry('R1', 'Acme Corp')]);
    const [best] = [...matcher().match(record('s1', 'ACME CORPORATION'), only)];

    expect(best?.entity.id).toBe('R1');
    expect(best?.score).toBeCloseTo(0.854167, 5);
  });

  it('passes normalized values and the key marker to custom scorers', () => {
    const scorer = vi.fn<ScoreFunction>(() => 0.6);
    const only = snapshot([entry('R1', 'Acme Corp')]);
    [...matcher({ similarity: scorer }).match(record('s1', 'ACME Corporation!'), only)];

    expect(scorer).toHaveBeenCalledWith('acme corporation', 'acme corp', 'normalizedKey');
  });

  it('drops candidates below minScore', () => {
    const scorer: ScoreFunction = (_r, e) => (e === 'acme corp' ? 0.9 : 0.4);
    const ids = [...matcher({ similarity: scorer, minScore: 0.5 }).match(record('s1', 'acme corporation'), glossary)].map(
      (c) => c.entity.id
    );

    expect(ids).toEqual(['R1']);
  });

  it('keeps at most candidateLimit approximate candidates', () => {
    const ids = [
      ...matcher({ similarity: () => 0.9, candidateLimit: 1 }).match(record('s1', 'acme corporation'), glossary),
    ].map((c) => c.entity.id);

    expect(ids).toEqual(['R1']);
  });

  it('orders equal scores by ascending id', () => {
    const index = snapshot([entry('R2', 'Acme Beta'), entry('R1', 'Acme Alpha')]);
    const ids = [...matcher({ similarity: () => 0.7 }).match(record('s1', 'acme'), index)].map((c) => c.entity.id);

    expect(ids).toEqual(['R1', 'R2']);
  });

  it('clamps custom scores into [0, 1]', () => {
    const only = snapshot([entry('R1', 'Acme Corp')]);

    const [high] = [...matcher({ similarity: () => 1.7 }).match(record('s1', 'acme corporation'), only)];
    const [low] = [...matcher({ similarity: () => -0.2 }).match(record('s1', 'acme corporation'), only)];
    const [nan] = [...matcher({ similarity: () => Number.NaN }).match(record('s1', 'acme corporation'), only)];

    expect(high?.score).toBe(1);
    expect(low?.score).toBe(0);
    expect(nan?.score).toBe(0);
  });

  it('combines weighted fields present on both sides', () => {
    const index = snapshot([entry('R1', 'Acme Corp', { city: 'Berlin' })]);
    const scorer: ScoreFunction = (_r, _e, attribute) => (attribute === 'name' ? 0.5 : 1);
    const fieldMatcher = matcher({
      similarity: scorer,
      fields: [
        { attribute: 'name', weight: 2 },
        { attribute: 'city', weight: 1 },
      ],
    });

    const [withCity] = [
      ...fieldMatcher.match(
        record('s1', 'Acme Corp GmbH', { attributes: { name: 'Acme Corp GmbH', city: 'BERLIN' } }),
        index
      ),
    ];
    const [withoutCity] = [...fieldMatcher.match(record('s2', 'Acme Corp GmbH'), index)];

    expect(withCity?.score).toBeCloseTo(2 / 3, 10);
    expect(withCity?.matchedOn).toEqual(['name', 'city']);
    expect(withoutCity?.score).toBe(0.5);
    expect(withoutCity?.matchedOn).toEqual(['name']);
  });

  it('yields nothing for an empty key', () => {
    expect([...matcher().match(record('s1', '!!!'), glossary)]).toEqual([]);
    expect([...matcher().match(record('s1', 'Acme Corp', { normalizedKey: '' }), glossary)]).toEqual([]);
  });

  it('yields nothing when no trigram is shared', () => {
    expect([...matcher().match(record('s1', 'Zeta Holdings'), glossary)]).toEqual([]);
  });

  it('produces a sequence that is consumed once', () => {
    const sequence = matcher().match(record('s1', 'Acme Corp'), glossary);

    expect([...sequence]).toHaveLength(1);
    expect([...sequence]).toHaveLength(0);
  });
});
