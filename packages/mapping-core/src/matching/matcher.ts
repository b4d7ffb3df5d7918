/**
 * Matcher
 *
 * Produces ranked candidates for one record against one pinned snapshot.
 * Exact key equality short-circuits; otherwise approximate candidates from
 * the trigram index are scored with the configured strategy.
 */

import type { Candidate, FieldScoringConfig, SourceRecord } from '@rdg-mapper/core';
import type { Normalizer } from '../normalization/normalizer.js';
import type { IndexSnapshot } from '../reference/index-snapshot.js';
import { WHOLE_KEY, resolveScorer } from './scoring.js';
import type { ScoreFunction, ScoringStrategy } from './scoring.js';

export interface MatcherOptions {
  candidateLimit: number;
  minScore: number;
  /** Default strategy for the key and for fields without their own algorithm */
  similarity: ScoringStrategy;
  /** Weighted per-attribute scoring; when absent the whole key is scored */
  fields?: readonly FieldScoringConfig[];
}

type ResolvedField = {
  attribute: string;
  weight: number;
  score: ScoreFunction;
};

function compareCandidates(a: Candidate, b: Candidate): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.entity.id < b.entity.id ? -1 : a.entity.id > b.entity.id ? 1 : 0;
}

export class Matcher {
  private readonly keyScorer: ScoreFunction;
  private readonly fields: readonly ResolvedField[] | null;

  constructor(
    private readonly normalizer: Normalizer,
    private readonly options: MatcherOptions
  ) {
    this.keyScorer = resolveScorer(options.similarity);
    this.fields = options.fields
      ? options.fields.map((field) => ({
          attribute: field.attribute,
          weight: field.weight,
          score: field.algorithm ? resolveScorer(field.algorithm) : this.keyScorer,
        }))
      : null;
  }

  /**
   * Candidates for `record`, descending score then ascending id.
   *
   * The sequence is lazy and can be consumed once. An empty key or an
   * empty snapshot yields nothing.
   */
  *match(record: SourceRecord, index: IndexSnapshot): Generator<Candidate, void, undefined> {
    const key = record.normalizedKey ?? this.normalizer.normalize(record.attributes);
    if (key.length === 0 || index.size === 0) return;

    const exact = index.lookupExactAll(key);
    if (exact.length > 0) {
      for (const entity of exact) {
        yield { entity, score: 1, matchedOn: this.normalizer.keyAttributes };
      }
      return;
    }

    const approximate = index.lookupCandidates(key, this.options.candidateLimit);
    if (approximate.length === 0) return;

    const recordFields = this.fields ? this.normalizeRecordFields(record) : null;
    const scored: Candidate[] = [];

    for (const { entity } of approximate) {
      const candidate = recordFields
        ? this.scoreFields(recordFields, entity)
        : {
            entity,
            score: this.keyScorer(key, entity.normalizedKey, WHOLE_KEY),
            matchedOn: this.normalizer.keyAttributes,
          };

      if (candidate && candidate.score >= this.options.minScore) {
        scored.push(candidate);
      }
    }

    scored.sort(compareCandidates);
    yield* scored;
  }

  private normalizeRecordFields(record: SourceRecord): Map<string, string> {
    const values = new Map<string, string>();
    for (const field of this.fields ?? []) {
      const value = this.normalizer.normalizeAttribute(field.attribute, record.attributes[field.attribute]);
      if (value.length > 0) values.set(field.attribute, value);
    }
    return values;
  }

  /** Weighted mean over the fields present on both sides; null when none are */
  private scoreFields(
    recordFields: ReadonlyMap<string, string>,
    entity: Candidate['entity']
  ): Candidate | null {
    let weighted = 0;
    let totalWeight = 0;
    const matchedOn: string[] = [];

    for (const field of this.fields ?? []) {
      const recordValue = recordFields.get(field.attribute);
      const entityValue = entity.normalizedFields[field.attribute];
      if (recordValue === undefined || entityValue === undefined) continue;

      weighted += field.weight * field.score(recordValue, entityValue, field.attribute);
      totalWeight += field.weight;
      matchedOn.push(field.attribute);
    }

    if (totalWeight === 0) return null;
    return { entity, score: weighted / totalWeight, matchedOn };
  }
}
