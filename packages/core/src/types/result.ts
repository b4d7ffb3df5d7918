/**
 * Matching, decision and result types
 */

import type { EntityId, ReferenceEntity } from './record.js';

/** A scored pairing of a source record with a reference entity */
export interface Candidate {
  /** Borrowed from the index snapshot */
  readonly entity: ReferenceEntity;
  /** Similarity in [0, 1]; 1 = exact match */
  readonly score: number;
  /** Attribute(s) that produced the score */
  readonly matchedOn: readonly string[];
}

/** Rule outcomes, before the engine stamps the decision path */
export type RuleVerdict =
  | { kind: 'accept'; candidate: Candidate; rule: string }
  | { kind: 'accept_fallback'; fallbackId: EntityId; reason: string }
  | { kind: 'reject'; reason: string }
  | { kind: 'ambiguous'; candidates: readonly Candidate[]; reason: string };

/** Final decision of the rules engine for one record */
export type Decision = RuleVerdict & {
  /** Rules evaluated, in order, up to and including the one that fired */
  readonly decisionPath: readonly string[];
};

export type DecisionKind = Decision['kind'];

export type MappingStatus = 'Matched' | 'MatchedByFallback' | 'Unmatched' | 'Ambiguous';

export const MAPPING_STATUSES: readonly MappingStatus[] = [
  'Matched',
  'MatchedByFallback',
  'Unmatched',
  'Ambiguous',
];

/** The engine's output for one source record */
export interface MappingResult {
  readonly sourceId: string;
  /** null means unresolved */
  readonly assignedId: EntityId | null;
  /** Score of the winning candidate, or 0 if unresolved */
  readonly confidence: number;
  readonly decisionPath: readonly string[];
  readonly status: MappingStatus;
  /** Glossary generation the record was matched against */
  readonly generationId: number;
  readonly reason?: string;
  readonly matchedOn?: readonly string[];
  /** Tied entity ids for Ambiguous results, best first */
  readonly ambiguousIds?: readonly EntityId[];
  /** Set when duplicate suppression was unavailable for this result */
  readonly degraded?: true;
}

/** Counts by status for a batch */
export interface BatchSummary {
  total: number;
  byStatus: Record<MappingStatus, number>;
  /** Results produced without duplicate suppression */
  degraded: number;
  /** Records never scheduled because the batch was cancelled */
  skipped: number;
}

/** Outcome of handing results to a sink */
export type StoreOutcome =
  | { ok: true; count: number }
  | { ok: false; error: string };

/** Result of one batch call */
export interface BatchReport {
  batchId: string;
  generationId: number;
  /** One result per input record, same order as input */
  results: MappingResult[];
  summary: BatchSummary;
  /** Sink outcome; undefined when no sink is configured */
  sink?: StoreOutcome;
  cancelled: boolean;
  processingTimeMs: number;
}

/** Observability event, one per mapped record */
export interface MappingEvent {
  sourceId: string;
  status: MappingStatus;
  confidence: number;
  decisionPath: readonly string[];
  latencyMs: number;
  generationId: number;
  degraded: boolean;
}

/** Observability event, one per reload attempt */
export interface ReloadEvent {
  outcome: 'success' | 'failure';
  generationId?: number;
  entityCount?: number;
  durationMs: number;
  error?: string;
}
