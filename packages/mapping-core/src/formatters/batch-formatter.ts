/**
 * Batch Report Formatter
 *
 * Formats batch reports as plain text for the CLI and MCP clients.
 */

import type { BatchReport, MappingResult } from '@rdg-mapper/core';
import { MAPPING_STATUSES } from '@rdg-mapper/core';

const SAMPLE_SIZE = 10;

function describeResult(result: MappingResult): string {
  const target = result.assignedId ?? '-';
  const reason = result.reason ? ` (${result.reason})` : '';
  const degraded = result.degraded ? ' [degraded]' : '';
  return `- ${result.sourceId} → ${target}: ${result.status} ${result.confidence.toFixed(3)}${reason}${degraded}`;
}

/**
 * Format a batch report as plain text
 */
export function formatBatchReport(report: BatchReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Mapping Batch ${report.batchId}`);
  lines.push(`Glossary generation: ${report.generationId}`);
  if (report.cancelled) {
    lines.push('Cancelled: yes');
  }
  lines.push('');

  lines.push('### Summary');
  lines.push(`- Records: ${summary.total}`);
  for (const status of MAPPING_STATUSES) {
    lines.push(`- ${status}: ${summary.byStatus[status]}`);
  }
  if (summary.degraded > 0) {
    lines.push(`- Degraded (no duplicate suppression): ${summary.degraded}`);
  }
  if (summary.skipped > 0) {
    lines.push(`- Skipped (cancelled): ${summary.skipped}`);
  }

  const resolved = summary.byStatus.Matched + summary.byStatus.MatchedByFallback;
  const matchRate = summary.total > 0 ? (resolved / summary.total) * 100 : 0;
  lines.push(`- Match Rate: ${matchRate.toFixed(1)}%`);
  lines.push('');

  const review = report.results.filter((r) => r.status === 'Ambiguous' || r.status === 'Unmatched');
  if (review.length > 0) {
    lines.push(`### Needs Review (showing first ${Math.min(SAMPLE_SIZE, review.length)} of ${review.length})`);
    for (const result of review.slice(0, SAMPLE_SIZE)) {
      lines.push(describeResult(result));
      if (result.ambiguousIds && result.ambiguousIds.length > 0) {
        lines.push(`  candidates: ${result.ambiguousIds.join(', ')}`);
      }
    }
    lines.push('');
  }

  if (report.sink) {
    lines.push(
      report.sink.ok
        ? `Stored: ${report.sink.count} results`
        : `Storage failed: ${report.sink.error}`
    );
  }

  lines.push('---');
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
