/**
 * File result sinks
 * Append mapping results to a JSON-lines or CSV file
 */

import { appendFile, mkdir, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { errorMessage } from '@rdg-mapper/core';
import type { IResultSink, MappingResult, StoreOutcome } from '@rdg-mapper/core';

export interface FileSinkConfig {
  /** Output file; created (with its directory) on first write */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

export interface CsvResultSinkConfig extends FileSinkConfig {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /**
   * Mitigate CSV/Excel formula injection by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export const RESULT_COLUMNS = [
  'sourceId',
  'assignedId',
  'status',
  'confidence',
  'generationId',
  'reason',
  'decisionPath',
  'ambiguousIds',
  'degraded',
] as const;

type ResultRow = Record<(typeof RESULT_COLUMNS)[number], string | number>;

function sanitizeFormulaValue(value: string | number, prefix: string): string | number {
  if (typeof value !== 'string') return value;
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

export function toResultRow(result: MappingResult): ResultRow {
  return {
    sourceId: result.sourceId,
    assignedId: result.assignedId ?? '',
    status: result.status,
    confidence: result.confidence,
    generationId: result.generationId,
    reason: result.reason ?? '',
    decisionPath: result.decisionPath.join('>'),
    ambiguousIds: result.ambiguousIds?.join(' ') ?? '',
    degraded: result.degraded ? 'true' : '',
  };
}

async function isEmptyOrMissing(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).size === 0;
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}

/**
 * Base class: serializes writes and reports failures as a store outcome
 */
abstract class BaseFileResultSink<TConfig extends FileSinkConfig> implements IResultSink {
  readonly config: TConfig;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: TConfig) {
    this.config = config;
  }

  store(results: readonly MappingResult[]): Promise<StoreOutcome> {
    const run = this.tail.then(() => this.storeNow(results));
    this.tail = run;
    return run;
  }

  private async storeNow(results: readonly MappingResult[]): Promise<StoreOutcome> {
    if (results.length === 0) return { ok: true, count: 0 };

    try {
      await mkdir(dirname(this.config.filePath), { recursive: true });
      await appendFile(this.config.filePath, await this.serialize(results), this.config.encoding ?? 'utf-8');
      return { ok: true, count: results.length };
    } catch (error) {
      return { ok: false, error: `Failed to write results to ${this.config.filePath}: ${errorMessage(error)}` };
    }
  }

  protected abstract serialize(results: readonly MappingResult[]): Promise<string>;
}

/**
 * One JSON object per line
 */
export class JsonLinesResultSink extends BaseFileResultSink<FileSinkConfig> {
  protected async serialize(results: readonly MappingResult[]): Promise<string> {
    return results.map((result) => `${JSON.stringify(result)}\n`).join('');
  }
}

/**
 * CSV with a header row written once, when the file is new or empty
 */
export class CsvResultSink extends BaseFileResultSink<CsvResultSinkConfig> {
  protected async serialize(results: readonly MappingResult[]): Promise<string> {
    const sanitize = this.config.sanitizeFormulas !== false;
    const prefix = this.config.formulaEscapePrefix ?? "'";

    const rows = results.map((result) => {
      const row = toResultRow(result);
      if (!sanitize) return row;
      const sanitized = { ...row };
      for (const column of RESULT_COLUMNS) {
        sanitized[column] = sanitizeFormulaValue(row[column], prefix);
      }
      return sanitized;
    });

    return stringify(rows, {
      header: await isEmptyOrMissing(this.config.filePath),
      columns: [...RESULT_COLUMNS],
      delimiter: this.config.delimiter ?? ',',
    });
  }
}

export function createJsonLinesResultSink(config: FileSinkConfig): JsonLinesResultSink {
  return new JsonLinesResultSink(config);
}

export function createCsvResultSink(config: CsvResultSinkConfig): CsvResultSink {
  return new CsvResultSink(config);
}
