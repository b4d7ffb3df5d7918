import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage, formatZodIssues, mappingConfigSchema } from '@rdg-mapper/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`, { variable: name });
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(20).optional(),
    baseDelayMs: z.number().int().min(0).max(60_000).optional(),
    maxDelayMs: z.number().int().min(0).max(600_000).optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

const glossaryBase = z.object({
  filePath: z.string().min(1),
  name: z.string().min(1).optional(),
  encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']).optional(),
  idField: z.string().min(1).optional(),
  attributeFields: z.array(z.string().min(1)).min(1).optional(),
  /** Reload cadence; omitted means reload on demand only */
  reloadIntervalMs: z.number().int().min(1000).optional(),
  retry: retrySchema.optional(),
});

const csvGlossary = glossaryBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().optional(),
    headers: z.boolean().optional(),
    quote: z.string().optional(),
    skipEmptyLines: z.boolean().optional(),
  })
  .strict();

const jsonGlossary = glossaryBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().optional(),
  })
  .strict();

const excelGlossary = glossaryBase
  .extend({
    type: z.literal('excel'),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    headers: z.boolean().optional(),
    startRow: z.number().int().min(1).optional(),
    startColumn: z.number().int().min(1).optional(),
  })
  .strict();

export const glossaryEntrySchema = z.discriminatedUnion('type', [csvGlossary, jsonGlossary, excelGlossary]);

export type GlossaryEntryConfig = z.infer<typeof glossaryEntrySchema>;

export const outputSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('jsonl'),
      filePath: z.string().min(1),
    })
    .strict(),
  z
    .object({
      type: z.literal('csv'),
      filePath: z.string().min(1),
      delimiter: z.string().optional(),
      sanitizeFormulas: z.boolean().optional(),
    })
    .strict(),
]);

export type OutputConfig = z.infer<typeof outputSchema>;

export const serverSchema = z
  .object({
    name: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
      })
      .strict()
      .optional(),
    /** Upper bound for one MCP tool call (default: 120000) */
    toolTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
  })
  .strict()
  .optional();

export const dedupSchema = z
  .object({
    maxEntries: z.number().int().min(1).max(10_000_000).optional(),
    breaker: z
      .object({
        enabled: z.boolean().optional(),
        failureThreshold: z.number().int().min(1).max(1000).optional(),
        openMs: z.number().int().min(1).max(3_600_000).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .optional();

export const recordsSchema = z
  .object({
    sourceIdField: z.string().min(1).optional(),
    categoryField: z.string().min(1).optional(),
    attributeFields: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict()
  .optional();

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    server: serverSchema,
    glossary: glossaryEntrySchema,
    mapping: mappingConfigSchema.optional(),
    dedup: dedupSchema,
    records: recordsSchema,
    output: outputSchema.optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadedConfig {
  config: ConfigFile;
  /** Directory relative file paths in the config are resolved against */
  baseDir: string;
}

/**
 * Validate an already parsed config value (after env expansion)
 *
 * @throws ConfigError listing every invalid option
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const expanded = expandEnvVars(raw, options);
  const result = configFileSchema.safeParse(expanded);
  if (!result.success) {
    throw new ConfigError(formatZodIssues('Invalid config file', result.error));
  }
  return result.data;
}

/**
 * Read, expand and validate a JSON config file
 */
export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<LoadedConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(`Config file ${absolutePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return { config: parseConfig(parsed, options), baseDir: dirname(absolutePath) };
}
