/**
 * Assignment Coordinator
 *
 * Turns decisions into results with idempotent, single-writer-per-key
 * semantics: a repeat submission of the same record within the retention
 * window returns the stored result without re-running matching.
 */

import { contentHash, errorMessage, silentLogger } from '@rdg-mapper/core';
import type { Decision, IDedupStore, Logger, MappingResult, SourceRecord } from '@rdg-mapper/core';
import { CircuitBreaker } from '../runtime/circuit-breaker.js';
import type { CircuitBreakerConfig } from '../runtime/circuit-breaker.js';
import { TimeoutError, withTimeout } from '../runtime/timeout.js';
import { MemoryDedupStore } from './memory-dedup-store.js';
import { REASON_COORDINATOR_TIMEOUT, markDegraded, toResult, unmatchedResult } from './results.js';

export interface AssignmentCoordinatorOptions {
  /** Dedup store (default: a fresh in-memory store) */
  store?: IDedupStore;
  /** How long a stored result suppresses repeats */
  retentionMs: number;
  /** Upper bound for each dedup-store call */
  timeoutMs: number;
  /** Skips the store after repeated failures (default: enabled) */
  breaker?: CircuitBreakerConfig;
  logger?: Logger;
}

/** A decision, or a thunk that computes it on a dedup miss */
export type DecisionSource = Decision | (() => Decision);

/**
 * Idempotency key: generation, source id and a hash of every input that can
 * change the decision (raw attributes, category and normalized key)
 */
export function idempotencyKey(record: SourceRecord, generationId: number): string {
  const input = {
    attributes: record.attributes,
    category: record.category,
    normalizedKey: record.normalizedKey,
  };
  return `${generationId}:${record.sourceId}:${contentHash(input)}`;
}

export class AssignmentCoordinator {
  private readonly store: IDedupStore;
  private readonly retentionMs: number;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker | null;
  private readonly logger: Logger;
  private readonly inFlight = new Map<string, Promise<MappingResult>>();

  constructor(options: AssignmentCoordinatorOptions) {
    this.store = options.store ?? new MemoryDedupStore();
    this.retentionMs = options.retentionMs;
    this.timeoutMs = options.timeoutMs;
    this.breaker = CircuitBreaker.fromConfig(options.breaker);
    this.logger = (options.logger ?? silentLogger).child({ component: 'assignment-coordinator' });
  }

  /**
   * Result for `record`. Concurrent submissions of one key share the work;
   * a dedup hit returns the stored result and never evaluates `decision`.
   */
  assign(record: SourceRecord, decision: DecisionSource, generationId: number): Promise<MappingResult> {
    const key = idempotencyKey(record, generationId);

    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const work = this.assignOnce(key, record, decision, generationId).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, work);
    return work;
  }

  /** Pure conversion of a decision into a result */
  toResult(record: SourceRecord, decision: Decision, generationId: number): MappingResult {
    return toResult(record.sourceId, decision, generationId);
  }

  get breakerMode(): string {
    return this.breaker?.mode ?? 'disabled';
  }

  private async assignOnce(
    key: string,
    record: SourceRecord,
    source: DecisionSource,
    generationId: number
  ): Promise<MappingResult> {
    let decision: Decision | undefined = typeof source === 'function' ? undefined : source;
    const resolve = (): Decision => {
      decision ??= typeof source === 'function' ? source() : source;
      return decision;
    };
    const fresh = (): MappingResult => toResult(record.sourceId, resolve(), generationId);

    if (this.breaker && !this.breaker.canRequest()) {
      return markDegraded(fresh());
    }
    this.breaker?.onStart();

    // Store outcome reaches the breaker before the decision is evaluated
    let cached: MappingResult | undefined;
    try {
      cached = await this.call(this.store.get(key), 'get', key);
    } catch (err) {
      this.breaker?.onFailure();
      return this.onStoreFailure(err, key, fresh());
    }
    this.breaker?.onSuccess();
    if (cached) return cached;

    const result = fresh();
    try {
      return await this.call(this.store.putIfAbsent(key, result, this.retentionMs), 'putIfAbsent', key);
    } catch (err) {
      this.breaker?.onFailure();
      return this.onStoreFailure(err, key, result);
    }
  }

  private call<T>(promise: Promise<T>, op: string, key: string): Promise<T> {
    return withTimeout(
      promise,
      this.timeoutMs,
      () => new TimeoutError(`Dedup store ${op} timed out after ${this.timeoutMs}ms`, { key })
    );
  }

  private onStoreFailure(err: unknown, key: string, result: MappingResult): MappingResult {
    if (err instanceof TimeoutError) {
      this.logger.warn('Dedup store timed out', { key, sourceId: result.sourceId, error: err.message });
      return unmatchedResult(result.sourceId, result.generationId, REASON_COORDINATOR_TIMEOUT, result.decisionPath);
    }

    this.logger.warn('Dedup store unavailable; assigning without duplicate suppression', {
      key,
      sourceId: result.sourceId,
      error: errorMessage(err),
    });
    return markDegraded(result);
  }
}
