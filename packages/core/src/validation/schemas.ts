/**
 * Zod schemas for engine configuration and record inputs
 */

import { z } from 'zod';
import { parseDuration } from '../utils/duration.js';

/** Characters stripped by the normalizer unless configured otherwise */
export const DEFAULT_PUNCTUATION = `.,;:!?'"\`()[]{}<>/\\|-_&*#@+=~^%$`;

export const DEFAULT_DEDUP_RETENTION_MS = 24 * 60 * 60 * 1000;

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

const probability = z.number().min(0).max(1);

/** Named similarity algorithms usable by the matcher */
export const similarityAlgorithmSchema = z.enum([
  'levenshtein',
  'jaro',
  'jaro_winkler',
  'dice_sorensen',
  'jaccard',
  'token_set',
  'soundex',
]);

/** Names of the built-in decision rules */
export const ruleNameSchema = z.enum([
  'ExactAcceptRule',
  'AmbiguityRule',
  'FuzzyAcceptRule',
  'FallbackIdRule',
  'RejectRule',
]);

/** Duration as milliseconds or a string like "24h" */
export const durationSchema = z
  .union([z.number().int().min(0), z.string().min(1)])
  .transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration: ${String(value)} (use milliseconds or e.g. "30s", "15m", "24h")`,
      });
      return z.NEVER;
    }
    return ms;
  });

export const normalizationSchema = z
  .object({
    keyAttributes: z.array(z.string().min(1)).min(1).default(['name']),
    requiredAttributes: z.array(z.string().min(1)).default([]),
    punctuation: z.string().default(DEFAULT_PUNCTUATION),
    foldDiacritics: z.boolean().default(true),
    sortTokens: z.boolean().default(false),
  })
  .strict();

export const fieldScoringSchema = z
  .object({
    attribute: z.string().min(1),
    weight: z.number().positive().max(100).default(1),
    algorithm: similarityAlgorithmSchema.optional(),
  })
  .strict();

export const mappingConfigSchema = z
  .object({
    normalization: normalizationSchema.default({}),
    exactThreshold: probability.default(0.98),
    fuzzyThreshold: probability.default(0.8),
    minGap: probability.default(0.05),
    minScore: probability.default(0.5),
    candidateLimit: z.number().int().min(1).max(1000).default(20),
    dedupRetention: durationSchema.default(DEFAULT_DEDUP_RETENTION_MS),
    concurrencyLimit: z.number().int().min(1).max(1024).default(8),
    fallbackIdsByCategory: z.record(z.string().min(1)).default({}),
    coordinatorTimeoutMs: z.number().int().min(1).max(600_000).default(5000),
    sinkTimeoutMs: z.number().int().min(1).max(600_000).default(10_000),
    similarity: similarityAlgorithmSchema.default('jaro'),
    fields: z.array(fieldScoringSchema).min(1).optional(),
    categoryAttribute: z.string().min(1).default('category'),
    ruleOrder: z.array(ruleNameSchema).min(1).optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.fuzzyThreshold > value.exactThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `fuzzyThreshold (${value.fuzzyThreshold}) must not exceed exactThreshold (${value.exactThreshold})`,
        path: ['fuzzyThreshold'],
      });
    }
    if (value.minScore > value.fuzzyThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `minScore (${value.minScore}) must not exceed fuzzyThreshold (${value.fuzzyThreshold})`,
        path: ['minScore'],
      });
    }
    if (value.ruleOrder && new Set(value.ruleOrder).size !== value.ruleOrder.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'ruleOrder must not list a rule twice',
        path: ['ruleOrder'],
      });
    }
  });

const scalarAttributeSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const attributeValueSchema = z.union([
  scalarAttributeSchema,
  z.array(scalarAttributeSchema),
]);

export const attributesSchema = z
  .record(attributeValueSchema)
  .superRefine((record, ctx) => {
    for (const key of Object.keys(record)) {
      if (FORBIDDEN_RECORD_KEYS.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unsafe attribute name: ${key}`,
        });
      }
    }
  });

export const sourceRecordSchema = z
  .object({
    sourceId: z.string().min(1),
    attributes: attributesSchema,
    category: z.string().min(1).optional(),
  })
  .strict();

export type SimilarityAlgorithmName = z.infer<typeof similarityAlgorithmSchema>;
export type RuleName = z.infer<typeof ruleNameSchema>;
export type NormalizationConfig = z.output<typeof normalizationSchema>;
export type FieldScoringConfig = z.output<typeof fieldScoringSchema>;
export type MappingConfig = z.output<typeof mappingConfigSchema>;
export type MappingConfigInput = z.input<typeof mappingConfigSchema>;
export type SourceRecordInput = z.infer<typeof sourceRecordSchema>;

/**
 * Render zod issues as an indented list
 */
export function formatZodIssues(label: string, err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}
