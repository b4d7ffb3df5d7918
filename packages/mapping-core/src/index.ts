/**
 * @rdg-mapper/mapping-core
 *
 * Resolves source records against a Reference Data Glossary and assigns
 * stable RDG identifiers: normalize, match, decide, assign.
 */

import { MappingEngine as _MappingEngine } from './engine/index.js';
import type { MappingEngineOptions } from './engine/index.js';

// Interfaces
export * from './interfaces/index.js';

// Normalization
export { Normalizer, KEY_SEPARATOR } from './normalization/index.js';

// Reference Index
export { IndexSnapshot, toReferenceEntity, ReferenceStore } from './reference/index.js';
export type {
  ApproximateCandidate,
  IndexSnapshotOptions,
  ReferenceStoreOptions,
  ReferenceStoreStatus,
} from './reference/index.js';

// Matching
export { Matcher, WHOLE_KEY, clampScore, resolveScorer } from './matching/index.js';
export type { MatcherOptions, ScoreFunction, ScoringStrategy } from './matching/index.js';

// Rules
export {
  RulesEngine,
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
} from './rules/index.js';
export type { DecisionRule, NamedRule, RuleContext, RuleSpec } from './rules/index.js';

// Assignment
export {
  AssignmentCoordinator,
  MemoryDedupStore,
  idempotencyKey,
  toResult,
  unmatchedResult,
  REASON_CANCELLED,
  REASON_COORDINATOR_TIMEOUT,
  REASON_FALLBACK_MISSING,
  REASON_INVALID_INPUT,
  REASON_SINK_TIMEOUT,
} from './assignment/index.js';
export type {
  AssignmentCoordinatorOptions,
  DecisionSource,
  DedupStoreStats,
  MemoryDedupStoreOptions,
} from './assignment/index.js';

// Engine
export { MappingEngine, MemoryResultSink, resolveMappingConfig } from './engine/index.js';
export type { MappingEngineOptions } from './engine/index.js';

// Runtime helpers
export * from './runtime/index.js';

// Formatters
export { formatBatchReport } from './formatters/index.js';

/**
 * Factory function to create a MappingEngine
 *
 * @throws ConfigError when the mapping configuration is invalid
 */
export function createMappingEngine(options: MappingEngineOptions): _MappingEngine {
  return new _MappingEngine(options);
}
