import type { Decision, EntityId, MappingResult, MappingStatus } from '@rdg-mapper/core';

export const REASON_INVALID_INPUT = 'invalid input';
export const REASON_COORDINATOR_TIMEOUT = 'coordinator timeout';
export const REASON_SINK_TIMEOUT = 'sink timeout';
export const REASON_CANCELLED = 'cancelled';
export const REASON_FALLBACK_MISSING = 'fallback id not in glossary';

type ResultFields = {
  sourceId: string;
  assignedId: EntityId | null;
  confidence: number;
  decisionPath: readonly string[];
  status: MappingStatus;
  generationId: number;
  reason?: string;
  matchedOn?: readonly string[];
  ambiguousIds?: readonly EntityId[];
  degraded?: true;
};

function freezeResult(fields: ResultFields): MappingResult {
  const result: ResultFields = {
    ...fields,
    decisionPath: Object.freeze([...fields.decisionPath]),
  };
  if (fields.matchedOn) result.matchedOn = Object.freeze([...fields.matchedOn]);
  if (fields.ambiguousIds) result.ambiguousIds = Object.freeze([...fields.ambiguousIds]);
  return Object.freeze(result);
}

/**
 * Convert a decision into the immutable result emitted for a record
 */
export function toResult(sourceId: string, decision: Decision, generationId: number): MappingResult {
  switch (decision.kind) {
    case 'accept':
      return freezeResult({
        sourceId,
        assignedId: decision.candidate.entity.id,
        confidence: decision.candidate.score,
        decisionPath: decision.decisionPath,
        status: 'Matched',
        generationId,
        matchedOn: decision.candidate.matchedOn,
      });
    case 'accept_fallback':
      return freezeResult({
        sourceId,
        assignedId: decision.fallbackId,
        confidence: 0,
        decisionPath: decision.decisionPath,
        status: 'MatchedByFallback',
        generationId,
        reason: decision.reason,
      });
    case 'ambiguous':
      return freezeResult({
        sourceId,
        assignedId: null,
        confidence: 0,
        decisionPath: decision.decisionPath,
        status: 'Ambiguous',
        generationId,
        reason: decision.reason,
        ambiguousIds: decision.candidates.map((c) => c.entity.id),
      });
    case 'reject':
      return unmatchedResult(sourceId, generationId, decision.reason, decision.decisionPath);
  }
}

export function unmatchedResult(
  sourceId: string,
  generationId: number,
  reason: string,
  decisionPath: readonly string[] = []
): MappingResult {
  return freezeResult({
    sourceId,
    assignedId: null,
    confidence: 0,
    decisionPath,
    status: 'Unmatched',
    generationId,
    reason,
  });
}

/** Copy of `result` flagged as produced without duplicate suppression */
export function markDegraded(result: MappingResult): MappingResult {
  return Object.freeze({ ...result, degraded: true });
}

/** Copy of `result` turned into an unmatched result with `reason`, keeping its decision path */
export function downgradeToUnmatched(result: MappingResult, reason: string): MappingResult {
  const downgraded = unmatchedResult(result.sourceId, result.generationId, reason, result.decisionPath);
  return result.degraded ? markDegraded(downgraded) : downgraded;
}
