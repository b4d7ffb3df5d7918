/**
 * String Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'levenshtein'
  | 'jaro'
  | 'jaro_winkler'
  | 'dice_sorensen'
  | 'jaccard'
  | 'token_set'
  | 'soundex';

export interface SimilarityOptions {
  /** For n-gram algorithms: size of n-grams (default: 2) */
  ngramSize?: number;

  /** For Jaro-Winkler: prefix scale (default: 0.1, max: 0.25) */
  prefixScale?: number;
}
