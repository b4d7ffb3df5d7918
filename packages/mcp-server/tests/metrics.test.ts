import { describe, expect, it } from 'vitest';
import type { BatchReport, MappingEvent } from '@rdg-mapper/core';
import { Metrics, labelsToKey } from '../src/metrics.js';

function event(sourceId: string, overrides: Partial<MappingEvent>): MappingEvent {
  return {
    sourceId,
    status: 'Matched',
    confidence: 1,
    decisionPath: ['ExactAcceptRule'],
    latencyMs: 0,
    generationId: 1,
    degraded: false,
    ...overrides,
  };
}

const failedBatch: BatchReport = {
  batchId: 'b1',
  generationId: 1,
  results: [],
  summary: {
    total: 0,
    byStatus: { Matched: 0, MatchedByFallback: 0, Unmatched: 0, Ambiguous: 0 },
    degraded: 0,
    skipped: 0,
  },
  sink: { ok: false, error: 'disk full' },
  cancelled: false,
  processingTimeMs: 0,
};

describe('labelsToKey', () => {
  it('sorts and escapes labels', () => {
    expect(labelsToKey({ tool: 'map"x', outcome: 'success' })).toBe('{outcome="success",tool="map\\"x"}');
    expect(labelsToKey({})).toBe('');
  });
});

describe('Metrics', () => {
  it('renders engine events in the Prometheus text format', () => {
    const metrics = new Metrics({ clock: () => 5000 });

    metrics.onRecordMapped(event('s1', { latencyMs: 4 }));
    metrics.onRecordMapped(event('s2', { status: 'Unmatched', latencyMs: 6, degraded: true }));
    metrics.onBatchCompleted(failedBatch);
    metrics.onReload({ outcome: 'success', generationId: 2, entityCount: 3, durationMs: 5 });
    metrics.onReload({ outcome: 'failure', durationMs: 1, error: 'Reference glossary is empty' });
    metrics.incTool('map_batch', 'success');
    metrics.observeToolDuration('map_batch', 12);

    expect(metrics.render().trimEnd().split('\n')).toEqual([
      '# HELP rdg_mapper_uptime_seconds Process uptime in seconds',
      '# TYPE rdg_mapper_uptime_seconds gauge',
      'rdg_mapper_uptime_seconds 0',
      '# HELP rdg_mapper_tool_requests_total Total MCP tool requests',
      '# TYPE rdg_mapper_tool_requests_total counter',
      'rdg_mapper_tool_requests_total{outcome="success",tool="map_batch"} 1',
      '# HELP rdg_mapper_tool_duration_ms Tool execution duration in milliseconds',
      '# TYPE rdg_mapper_tool_duration_ms summary',
      'rdg_mapper_tool_duration_ms_sum{tool="map_batch"} 12',
      'rdg_mapper_tool_duration_ms_count{tool="map_batch"} 1',
      '# HELP rdg_mapper_records_total Mapped records by status',
      '# TYPE rdg_mapper_records_total counter',
      'rdg_mapper_records_total{status="Matched"} 1',
      'rdg_mapper_records_total{status="Unmatched"} 1',
      '# HELP rdg_mapper_records_degraded_total Records mapped without duplicate suppression',
      '# TYPE rdg_mapper_records_degraded_total counter',
      'rdg_mapper_records_degraded_total 1',
      '# HELP rdg_mapper_record_latency_ms Per-record mapping latency in milliseconds',
      '# TYPE rdg_mapper_record_latency_ms summary',
      'rdg_mapper_record_latency_ms_sum 10',
      'rdg_mapper_record_latency_ms_count 2',
      '# HELP rdg_mapper_batches_total Mapped batches by outcome',
      '# TYPE rdg_mapper_batches_total counter',
      'rdg_mapper_batches_total{outcome="completed"} 1',
      '# HELP rdg_mapper_sink_failures_total Batches the result sink did not store',
      '# TYPE rdg_mapper_sink_failures_total counter',
      'rdg_mapper_sink_failures_total 1',
      '# HELP rdg_mapper_glossary_reloads_total Glossary reloads by outcome',
      '# TYPE rdg_mapper_glossary_reloads_total counter',
      'rdg_mapper_glossary_reloads_total{outcome="failure"} 1',
      'rdg_mapper_glossary_reloads_total{outcome="success"} 1',
      '# HELP rdg_mapper_glossary_generation Active glossary generation',
      '# TYPE rdg_mapper_glossary_generation gauge',
      'rdg_mapper_glossary_generation 2',
      '# HELP rdg_mapper_glossary_entities Entities in the active glossary generation',
      '# TYPE rdg_mapper_glossary_entities gauge',
      'rdg_mapper_glossary_entities 3',
    ]);
  });

  it('keeps the last good generation after a failed reload', () => {
    const metrics = new Metrics({ clock: () => 0 });

    metrics.onReload({ outcome: 'success', generationId: 4, entityCount: 10, durationMs: 1 });
    metrics.onReload({ outcome: 'failure', durationMs: 1 });

    expect(metrics.render()).toContain('\nrdg_mapper_glossary_generation 4\n');
  });
});
