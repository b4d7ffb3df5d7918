/**
 * CSV glossary source
 */

import { parse } from 'csv-parse/sync';
import { GlossarySourceError, errorMessage } from '@rdg-mapper/core';
import {
  BaseFileGlossarySource,
  assertSafeColumns,
  readFileContent,
  type FileRow,
  type FileSourceConfig,
} from './base-file-source.js';

export interface CsvParseOptions {
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
}

export interface CsvGlossarySourceConfig extends FileSourceConfig, CsvParseOptions {}

/**
 * Parse CSV content into rows keyed by header (or Column1..N without headers)
 */
export function parseCsvRows(content: string, options: CsvParseOptions = {}): FileRow[] {
  const parsed: unknown = parse(content, {
    columns: false, // Parse rows first so we can safely map headers ourselves
    delimiter: options.delimiter ?? ',',
    quote: options.quote ?? '"',
    skip_empty_lines: options.skipEmptyLines !== false,
    trim: true,
    cast: true, // Auto-convert numbers and booleans
    cast_date: false,
  });

  if (!Array.isArray(parsed)) {
    throw new GlossarySourceError('CSV parser returned no rows');
  }
  const rows: unknown[][] = parsed.filter((row): row is unknown[] => Array.isArray(row));
  if (rows.length === 0) return [];

  const hasHeaders = options.headers !== false;
  const [headerRow = []] = rows;
  const headers = hasHeaders
    ? headerRow.map((h) => String(h ?? ''))
    : Array.from({ length: Math.max(...rows.map((r) => r.length)) }, (_, i) => `Column${i + 1}`);

  assertSafeColumns(headers, 'CSV');

  const dataRows = hasHeaders ? rows.slice(1) : rows;
  return dataRows.map((row) => {
    const record: FileRow = {};
    headers.forEach((header, i) => {
      record[header] = row[i];
    });
    return record;
  });
}

export class CsvGlossarySource extends BaseFileGlossarySource<CsvGlossarySourceConfig> {
  protected async readRows(): Promise<FileRow[]> {
    const content = await readFileContent(this.config.filePath, this.config.encoding);
    try {
      return parseCsvRows(content, this.config);
    } catch (error) {
      if (error instanceof GlossarySourceError) throw error;
      throw new GlossarySourceError(`Invalid CSV in ${this.config.filePath}: ${errorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

/**
 * Factory function to create a CSV glossary source
 */
export function createCsvGlossarySource(config: CsvGlossarySourceConfig): CsvGlossarySource {
  return new CsvGlossarySource(config);
}
