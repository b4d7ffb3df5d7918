import { describe, expect, it } from 'vitest';
import {
  DEFAULT_DEDUP_RETENTION_MS,
  formatZodIssues,
  mappingConfigSchema,
  sourceRecordSchema,
} from '../src/validation/index.js';

describe('mappingConfigSchema', () => {
  it('fills every default', () => {
    const config = mappingConfigSchema.parse({});

    expect(config.exactThreshold).toBe(0.98);
    expect(config.fuzzyThreshold).toBe(0.8);
    expect(config.minGap).toBe(0.05);
    expect(config.minScore).toBe(0.5);
    expect(config.candidateLimit).toBe(20);
    expect(config.dedupRetention).toBe(DEFAULT_DEDUP_RETENTION_MS);
    expect(config.concurrencyLimit).toBe(8);
    expect(config.fallbackIdsByCategory).toEqual({});
    expect(config.coordinatorTimeoutMs).toBe(5000);
    expect(config.sinkTimeoutMs).toBe(10_000);
    expect(config.similarity).toBe('jaro');
    expect(config.categoryAttribute).toBe('category');
    expect(config.normalization.keyAttributes).toEqual(['name']);
    expect(config.normalization.foldDiacritics).toBe(true);
    expect(config.normalization.sortTokens).toBe(false);
    expect(config.fields).toBeUndefined();
    expect(config.ruleOrder).toBeUndefined();
  });

  it('parses duration strings for dedupRetention', () => {
    expect(mappingConfigSchema.parse({ dedupRetention: '15m' }).dedupRetention).toBe(900_000);
    expect(mappingConfigSchema.parse({ dedupRetention: 1500 }).dedupRetention).toBe(1500);
  });

  it('rejects an unparseable duration', () => {
    const result = mappingConfigSchema.safeParse({ dedupRetention: 'soon' });
    expect(result.success).toBe(false);
  });

  it('rejects a fuzzy threshold above the exact threshold', () => {
    const result = mappingConfigSchema.safeParse({ exactThreshold: 0.7, fuzzyThreshold: 0.8 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['fuzzyThreshold']);
    }
  });

  it('rejects a minimum score above the fuzzy threshold', () => {
    const result = mappingConfigSchema.safeParse({ minScore: 0.9 });
    expect(result.success).toBe(false);
  });

  it('rejects a rule listed twice', () => {
    const result = mappingConfigSchema.safeParse({
      ruleOrder: ['ExactAcceptRule', 'ExactAcceptRule'],
    });
    expect(result.success).toBe(false);
  });

  it('rejects unknown keys', () => {
    const result = mappingConfigSchema.safeParse({ exactThreshhold: 0.9 });
    expect(result.success).toBe(false);
  });

  it('accepts equal thresholds', () => {
    const config = mappingConfigSchema.parse({
      exactThreshold: 0.9,
      fuzzyThreshold: 0.9,
      minScore: 0.9,
    });
    expect(config.fuzzyThreshold).toBe(0.9);
  });
});

describe('sourceRecordSchema', () => {
  it('accepts scalar and multi-valued attributes', () => {
    const record = sourceRecordSchema.parse({
      sourceId: 'S1',
      attributes: { name: 'Acme', aliases: ['ACME', 'Acme Inc'], size: 3, active: true, note: null },
      category: 'vendor',
    });

    expect(record.attributes.aliases).toEqual(['ACME', 'Acme Inc']);
  });

  it('rejects nested objects', () => {
    const result = sourceRecordSchema.safeParse({
      sourceId: 'S1',
      attributes: { name: { first: 'A' } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects prototype keys', () => {
    const result = sourceRecordSchema.safeParse({
      sourceId: 'S1',
      attributes: { constructor: 'x' },
    });
    expect(result.success).toBe(false);
  });
});

describe('formatZodIssues', () => {
  it('lists each issue with its path', () => {
    const result = mappingConfigSchema.safeParse({ candidateLimit: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues('Invalid mapping config', result.error)).toBe(
        'Invalid mapping config:\n- candidateLimit: Number must be greater than or equal to 1'
      );
    }
  });
});
