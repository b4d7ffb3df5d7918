import { describe, expect, it } from 'vitest';
import type { BatchReport } from '@rdg-mapper/core';
import { formatBatchReport } from '../src/formatters/batch-formatter.js';

describe('formatBatchReport', () => {
  it('lists counts and the records needing review', () => {
    const report: BatchReport = {
      batchId: 'b1',
      generationId: 3,
      results: [
        {
          sourceId: 's1',
          assignedId: 'R1',
          confidence: 1,
          decisionPath: ['ExactAcceptRule'],
          status: 'Matched',
          generationId: 3,
        },
        {
          sourceId: 's2',
          assignedId: null,
          confidence: 0,
          decisionPath: ['ExactAcceptRule', 'AmbiguityRule'],
          status: 'Ambiguous',
          generationId: 3,
          reason: 'tied',
          ambiguousIds: ['R1', 'R2'],
        },
        {
          sourceId: 's3',
          assignedId: null,
          confidence: 0,
          decisionPath: [],
          status: 'Unmatched',
          generationId: 3,
          reason: 'no candidate above threshold',
          degraded: true,
        },
      ],
      summary: {
        total: 3,
        byStatus: { Matched: 1, MatchedByFallback: 0, Unmatched: 1, Ambiguous: 1 },
        degraded: 1,
        skipped: 0,
      },
      sink: { ok: true, count: 3 },
      cancelled: false,
      processingTimeMs: 12,
    };

    expect(formatBatchReport(report).split('\n')).toEqual([
      '## Mapping Batch b1',
      'Glossary generation: 3',
      '',
      '### Summary',
      '- Records: 3',
      '- Matched: 1',
      '- MatchedByFallback: 0',
      '- Unmatched: 1',
      '- Ambiguous: 1',
      '- Degraded (no duplicate suppression): 1',
      '- Match Rate: 33.3%',
      '',
      '### Needs Review (showing first 2 of 2)',
      '- s2 → -: Ambiguous 0.000 (tied)',
      '  candidates: R1, R2',
      '- s3 → -: Unmatched 0.000 (no candidate above threshold) [degraded]',
      '',
      'Stored: 3 results',
      '---',
      'Processing time: 12ms',
    ]);
  });

  it('reports cancellation and storage failure', () => {
    const text = formatBatchReport({
      batchId: 'b2',
      generationId: 1,
      results: [],
      summary: {
        total: 0,
        byStatus: { Matched: 0, MatchedByFallback: 0, Unmatched: 0, Ambiguous: 0 },
        degraded: 0,
        skipped: 4,
      },
      sink: { ok: false, error: 'sink timeout' },
      cancelled: true,
      processingTimeMs: 0,
    });

    const lines = text.split('\n');
    expect(lines[2]).toBe('Cancelled: yes');
    expect(lines).toContain('- Skipped (cancelled): 4');
    expect(lines).toContain('- Match Rate: 0.0%');
    expect(lines).toContain('Storage failed: sink timeout');
  });
});
