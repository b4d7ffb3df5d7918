export { Matcher } from './matcher.js';
export type { MatcherOptions } from './matcher.js';
export { WHOLE_KEY, clampScore, resolveScorer } from './scoring.js';
export type { ScoreFunction, ScoringStrategy } from './scoring.js';
