import type { BatchReport, MappingEvent, MappingEventListener, ReloadEvent } from '@rdg-mapper/core';

export type ToolOutcome = 'success' | 'error';

type MetricType = 'counter' | 'gauge' | 'summary';

type Family = {
  name: string;
  type: MetricType;
  help: string;
};

const FAMILIES = [
  { name: 'rdg_mapper_tool_requests_total', type: 'counter', help: 'Total MCP tool requests' },
  { name: 'rdg_mapper_tool_duration_ms', type: 'summary', help: 'Tool execution duration in milliseconds' },
  { name: 'rdg_mapper_records_total', type: 'counter', help: 'Mapped records by status' },
  {
    name: 'rdg_mapper_records_degraded_total',
    type: 'counter',
    help: 'Records mapped without duplicate suppression',
  },
  { name: 'rdg_mapper_record_latency_ms', type: 'summary', help: 'Per-record mapping latency in milliseconds' },
  { name: 'rdg_mapper_batches_total', type: 'counter', help: 'Mapped batches by outcome' },
  { name: 'rdg_mapper_sink_failures_total', type: 'counter', help: 'Batches the result sink did not store' },
  { name: 'rdg_mapper_glossary_reloads_total', type: 'counter', help: 'Glossary reloads by outcome' },
  { name: 'rdg_mapper_glossary_generation', type: 'gauge', help: 'Active glossary generation' },
  { name: 'rdg_mapper_glossary_entities', type: 'gauge', help: 'Entities in the active glossary generation' },
] as const satisfies readonly Family[];

type FamilyName = (typeof FAMILIES)[number]['name'];

type SummaryValue = { sum: number; count: number };

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export function labelsToKey(labels: Record<string, string>): string {
  const parts = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

export interface MetricsOptions {
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

/**
 * Process-local metrics rendered in the Prometheus text format.
 * Doubles as the engine's event listener.
 */
export class Metrics implements MappingEventListener {
  private readonly clock: () => number;
  private readonly startedAt: number;
  private readonly values = new Map<FamilyName, Map<string, number>>();
  private readonly summaries = new Map<FamilyName, Map<string, SummaryValue>>();

  constructor(options: MetricsOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  incTool(tool: string, outcome: ToolOutcome): void {
    this.inc('rdg_mapper_tool_requests_total', { tool, outcome });
  }

  observeToolDuration(tool: string, durationMs: number): void {
    this.observe('rdg_mapper_tool_duration_ms', { tool }, durationMs);
  }

  onRecordMapped(event: MappingEvent): void {
    this.inc('rdg_mapper_records_total', { status: event.status });
    if (event.degraded) {
      this.inc('rdg_mapper_records_degraded_total', {});
    }
    this.observe('rdg_mapper_record_latency_ms', {}, event.latencyMs);
  }

  onBatchCompleted(report: BatchReport): void {
    this.inc('rdg_mapper_batches_total', { outcome: report.cancelled ? 'cancelled' : 'completed' });
    if (report.sink && !report.sink.ok) {
      this.inc('rdg_mapper_sink_failures_total', {});
    }
  }

  onReload(event: ReloadEvent): void {
    this.inc('rdg_mapper_glossary_reloads_total', { outcome: event.outcome });
    if (event.outcome === 'success' && event.generationId !== undefined) {
      this.set('rdg_mapper_glossary_generation', {}, event.generationId);
      this.set('rdg_mapper_glossary_entities', {}, event.entityCount ?? 0);
    }
  }

  render(): string {
    const lines: string[] = [];

    lines.push('# HELP rdg_mapper_uptime_seconds Process uptime in seconds');
    lines.push('# TYPE rdg_mapper_uptime_seconds gauge');
    lines.push(`rdg_mapper_uptime_seconds ${(this.clock() - this.startedAt) / 1000}`);

    for (const family of FAMILIES) {
      lines.push(`# HELP ${family.name} ${family.help}`);
      lines.push(`# TYPE ${family.name} ${family.type}`);

      if (family.type === 'summary') {
        const series = this.summaries.get(family.name) ?? new Map<string, SummaryValue>();
        for (const key of Array.from(series.keys()).sort()) {
          const value = series.get(key) ?? { sum: 0, count: 0 };
          lines.push(`${family.name}_sum${key} ${value.sum}`);
          lines.push(`${family.name}_count${key} ${value.count}`);
        }
        continue;
      }

      const series = this.values.get(family.name) ?? new Map<string, number>();
      for (const key of Array.from(series.keys()).sort()) {
        lines.push(`${family.name}${key} ${series.get(key) ?? 0}`);
      }
    }

    return `${lines.join('\n')}\n`;
  }

  private seriesOf(name: FamilyName): Map<string, number> {
    let series = this.values.get(name);
    if (!series) {
      series = new Map();
      this.values.set(name, series);
    }
    return series;
  }

  private inc(name: FamilyName, labels: Record<string, string>): void {
    const series = this.seriesOf(name);
    const key = labelsToKey(labels);
    series.set(key, (series.get(key) ?? 0) + 1);
  }

  private set(name: FamilyName, labels: Record<string, string>, value: number): void {
    this.seriesOf(name).set(labelsToKey(labels), value);
  }

  private observe(name: FamilyName, labels: Record<string, string>, value: number): void {
    let series = this.summaries.get(name);
    if (!series) {
      series = new Map();
      this.summaries.set(name, series);
    }
    const key = labelsToKey(labels);
    const current = series.get(key) ?? { sum: 0, count: 0 };
    series.set(key, { sum: current.sum + value, count: current.count + 1 });
  }
}
