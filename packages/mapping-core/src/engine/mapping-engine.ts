/**
 * Mapping Engine
 *
 * Façade composing normalizer, reference store, matcher, rules engine and
 * assignment coordinator into "map one record" and "map a batch".
 */

import { randomUUID } from 'node:crypto';
import { InvalidAttributeError, errorMessage, silentLogger } from '@rdg-mapper/core';
import type {
  Attributes,
  BatchReport,
  BatchSummary,
  Decision,
  IDedupStore,
  IGlossarySource,
  IResultSink,
  Logger,
  MappingConfig,
  MappingConfigInput,
  MappingEvent,
  MappingEventListener,
  MappingResult,
  MappingStatus,
  SourceRecord,
  StoreOutcome,
} from '@rdg-mapper/core';
import { AssignmentCoordinator } from '../assignment/assignment-coordinator.js';
import {
  REASON_CANCELLED,
  REASON_FALLBACK_MISSING,
  REASON_INVALID_INPUT,
  REASON_SINK_TIMEOUT,
  downgradeToUnmatched,
  unmatchedResult,
} from '../assignment/results.js';
import type { IMappingEngine, MapBatchOptions } from '../interfaces/index.js';
import { Matcher } from '../matching/matcher.js';
import type { ScoringStrategy } from '../matching/scoring.js';
import { Normalizer } from '../normalization/normalizer.js';
import type { IndexSnapshot } from '../reference/index-snapshot.js';
import { ReferenceStore } from '../reference/reference-store.js';
import type { ReferenceStoreStatus } from '../reference/reference-store.js';
import { RulesEngine } from '../rules/rules-engine.js';
import type { RuleSpec } from '../rules/rules-engine.js';
import type { RetryConfig } from '../runtime/retry.js';
import type { CircuitBreakerConfig } from '../runtime/circuit-breaker.js';
import { Semaphore } from '../runtime/semaphore.js';
import { TimeoutError, withTimeout } from '../runtime/timeout.js';
import { resolveMappingConfig } from './config.js';

export interface MappingEngineOptions {
  source: IGlossarySource;
  config?: MappingConfigInput;
  sink?: IResultSink;
  dedupStore?: IDedupStore;
  listener?: MappingEventListener;
  logger?: Logger;
  /** Overrides `config.similarity`, e.g. with a custom scoring function */
  scorer?: ScoringStrategy;
  /** Overrides `config.ruleOrder`; may include custom rules */
  rules?: readonly RuleSpec[];
  /** Retry policy for glossary loads */
  reloadRetry?: RetryConfig;
  /** Circuit breaker guarding the dedup store */
  dedupBreaker?: CircuitBreakerConfig;
}

type WorkerOutcome = {
  result: MappingResult;
  latencyMs: number;
};

function categoryOf(record: SourceRecord, attributes: Attributes, attribute: string): string | undefined {
  if (record.category !== undefined) return record.category;
  const value = attributes[attribute];
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

function summarize(results: readonly MappingResult[], skipped: number): BatchSummary {
  const byStatus: Record<MappingStatus, number> = {
    Matched: 0,
    MatchedByFallback: 0,
    Unmatched: 0,
    Ambiguous: 0,
  };
  let degraded = 0;
  for (const result of results) {
    byStatus[result.status]++;
    if (result.degraded) degraded++;
  }
  return { total: results.length, byStatus, degraded, skipped };
}

export class MappingEngine implements IMappingEngine {
  readonly config: MappingConfig;
  readonly normalizer: Normalizer;
  readonly reference: ReferenceStore;

  private readonly matcher: Matcher;
  private readonly rules: RulesEngine;
  private readonly coordinator: AssignmentCoordinator;
  private readonly sink?: IResultSink;
  private readonly listener?: MappingEventListener;
  private readonly logger: Logger;

  /**
   * @throws ConfigError when `options.config` is invalid
   */
  constructor(options: MappingEngineOptions) {
    this.config = resolveMappingConfig(options.config);
    this.logger = (options.logger ?? silentLogger).child({ component: 'mapping-engine' });
    this.sink = options.sink;
    this.listener = options.listener;

    this.normalizer = new Normalizer(this.config.normalization);
    this.reference = new ReferenceStore({
      source: options.source,
      normalizer: this.normalizer,
      retry: options.reloadRetry,
      fallbackIds: Object.values(this.config.fallbackIdsByCategory),
      listener: options.listener,
      logger: options.logger,
    });
    this.matcher = new Matcher(this.normalizer, {
      candidateLimit: this.config.candidateLimit,
      minScore: this.config.minScore,
      similarity: options.scorer ?? this.config.similarity,
      fields: this.config.fields,
    });
    this.rules = new RulesEngine(options.rules ?? this.config.ruleOrder);
    this.coordinator = new AssignmentCoordinator({
      store: options.dedupStore,
      retentionMs: this.config.dedupRetention,
      timeoutMs: this.config.coordinatorTimeoutMs,
      breaker: options.dedupBreaker,
      logger: options.logger,
    });
  }

  async reload(): Promise<ReferenceStoreStatus> {
    await this.reference.reload();
    return this.reference.status();
  }

  status(): ReferenceStoreStatus {
    return this.reference.status();
  }

  async mapRecord(record: SourceRecord, options?: MapBatchOptions): Promise<MappingResult> {
    const report = await this.mapBatch([record], options);
    const [result] = report.results;
    return result ?? unmatchedResult(record.sourceId, report.generationId, REASON_CANCELLED);
  }

  async mapBatch(records: readonly SourceRecord[], options: MapBatchOptions = {}): Promise<BatchReport> {
    const startTime = Date.now();
    const snapshot = this.reference.current();
    const batchId = options.batchId ?? randomUUID();
    const { signal } = options;

    const outcomes: Array<WorkerOutcome | undefined> = new Array<WorkerOutcome | undefined>(records.length);
    const semaphore = new Semaphore(this.config.concurrencyLimit);
    const tasks: Promise<void>[] = [];
    let cancelled = false;

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      if (!record) continue;

      const release = await semaphore.acquire();
      if (signal?.aborted) {
        release();
        cancelled = true;
        break;
      }

      tasks.push(
        this.mapOne(record, snapshot)
          .then((outcome) => {
            outcomes[i] = outcome;
          })
          .finally(release)
      );
    }
    await Promise.all(tasks);

    const emitted: MappingResult[] = [];
    for (const outcome of outcomes) {
      if (outcome) emitted.push(outcome.result);
    }

    let sink: StoreOutcome | undefined;
    if (this.sink && emitted.length > 0) {
      sink = await this.emitToSink(batchId, emitted, outcomes);
    }

    let skipped = 0;
    const results = outcomes.map((outcome, i) => {
      if (outcome) return outcome.result;
      skipped++;
      return unmatchedResult(records[i]?.sourceId ?? '', snapshot.generationId, REASON_CANCELLED);
    });

    for (const outcome of outcomes) {
      if (outcome) this.emitRecordEvent(outcome);
    }

    const report: BatchReport = {
      batchId,
      generationId: snapshot.generationId,
      results,
      summary: summarize(results, skipped),
      sink,
      cancelled,
      processingTimeMs: Date.now() - startTime,
    };

    this.logger.debug('Batch mapped', {
      batchId,
      generationId: snapshot.generationId,
      total: report.summary.total,
      byStatus: report.summary.byStatus,
      skipped,
      cancelled,
    });
    try {
      this.listener?.onBatchCompleted?.(report);
    } catch (err) {
      this.logger.warn('Batch listener failed', { batchId, error: errorMessage(err) });
    }

    return report;
  }

  /** Match and decide for one record against a pinned snapshot */
  decide(record: SourceRecord, snapshot: IndexSnapshot, category?: string): Decision {
    const candidates = [...this.matcher.match(record, snapshot)];
    const decision = this.rules.decide(candidates, { config: this.config, category });

    if (decision.kind === 'accept_fallback' && !snapshot.has(decision.fallbackId)) {
      return { kind: 'reject', reason: REASON_FALLBACK_MISSING, decisionPath: decision.decisionPath };
    }
    return decision;
  }

  private async mapOne(record: SourceRecord, snapshot: IndexSnapshot): Promise<WorkerOutcome> {
    const startTime = Date.now();
    const generationId = snapshot.generationId;

    try {
      const category = categoryOf(record, record.attributes, this.config.categoryAttribute);
      const prepared: SourceRecord = {
        ...record,
        category,
        normalizedKey: record.normalizedKey ?? this.normalizer.normalize(record.attributes),
      };
      const result = await this.coordinator.assign(
        prepared,
        () => this.decide(prepared, snapshot, category),
        generationId
      );
      return { result, latencyMs: Date.now() - startTime };
    } catch (err) {
      if (err instanceof InvalidAttributeError) {
        this.logger.debug('Record rejected as invalid input', {
          sourceId: record.sourceId,
          attribute: err.attribute,
          error: err.message,
        });
        return {
          result: unmatchedResult(record.sourceId, generationId, REASON_INVALID_INPUT),
          latencyMs: Date.now() - startTime,
        };
      }

      this.logger.error('Record mapping failed', { sourceId: record.sourceId, error: errorMessage(err) });
      return {
        result: unmatchedResult(record.sourceId, generationId, `internal error: ${errorMessage(err)}`),
        latencyMs: Date.now() - startTime,
      };
    }
  }

  /**
   * Hand emitted results to the sink. On timeout the affected results are
   * rewritten in `outcomes` as unmatched with reason "sink timeout".
   */
  private async emitToSink(
    batchId: string,
    emitted: readonly MappingResult[],
    outcomes: Array<WorkerOutcome | undefined>
  ): Promise<StoreOutcome> {
    const sink = this.sink;
    if (!sink) return { ok: true, count: 0 };

    const timeoutMs = this.config.sinkTimeoutMs;
    try {
      const outcome = await withTimeout(
        sink.store(emitted),
        timeoutMs,
        () => new TimeoutError(`Result sink timed out after ${timeoutMs}ms`, { batchId })
      );
      if (!outcome.ok) {
        this.logger.error('Result sink reported failure', { batchId, error: outcome.error });
      }
      return outcome;
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.warn('Result sink timed out', { batchId, timeoutMs, count: emitted.length });
        for (let i = 0; i < outcomes.length; i++) {
          const outcome = outcomes[i];
          if (outcome) {
            outcomes[i] = { ...outcome, result: downgradeToUnmatched(outcome.result, REASON_SINK_TIMEOUT) };
          }
        }
        return { ok: false, error: REASON_SINK_TIMEOUT };
      }

      const message = errorMessage(err);
      this.logger.error('Result sink failed', { batchId, error: message });
      return { ok: false, error: message };
    }
  }

  private emitRecordEvent(outcome: WorkerOutcome): void {
    const { result } = outcome;
    const event: MappingEvent = {
      sourceId: result.sourceId,
      status: result.status,
      confidence: result.confidence,
      decisionPath: result.decisionPath,
      latencyMs: outcome.latencyMs,
      generationId: result.generationId,
      degraded: result.degraded === true,
    };
    try {
      this.listener?.onRecordMapped?.(event);
    } catch (err) {
      this.logger.warn('Record listener failed', { sourceId: result.sourceId, error: errorMessage(err) });
    }
  }
}
