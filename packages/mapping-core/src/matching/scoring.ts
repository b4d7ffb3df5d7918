/**
 * Pluggable scoring strategies for the fuzzy pass
 */

import { calculateSimilarity } from '@rdg-mapper/entity-resolution/similarity';
import type { SimilarityAlgorithmName } from '@rdg-mapper/core';

/**
 * Similarity of two normalized values in [0, 1].
 * `attribute` names the compared field, or {@link WHOLE_KEY} for key scoring.
 */
export type ScoreFunction = (recordValue: string, entityValue: string, attribute: string) => number;

/** A named algorithm or a custom function */
export type ScoringStrategy = SimilarityAlgorithmName | ScoreFunction;

/** Attribute name passed to scorers when the whole normalized key is compared */
export const WHOLE_KEY = 'normalizedKey';

/** Clamp into [0, 1]; NaN becomes 0 */
export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

export function resolveScorer(strategy: ScoringStrategy): ScoreFunction {
  if (typeof strategy === 'function') {
    return (recordValue, entityValue, attribute) =>
      clampScore(strategy(recordValue, entityValue, attribute));
  }
  return (recordValue, entityValue) =>
    clampScore(calculateSimilarity(recordValue, entityValue, strategy).score);
}
