/**
 * Source record files
 *
 * Reads a batch of source records from .csv, .json or .xlsx so a feed
 * exported to a file can be mapped without writing an ingestion step.
 */

import { extname } from 'node:path';
import { ConfigError, InvalidAttributeError, toAttributeValue, toEntityId } from '@rdg-mapper/core';
import type { Attributes, SourceRecord } from '@rdg-mapper/core';
import { readFileContent, type FileRow } from './base-file-source.js';
import { parseCsvRows } from './csv-source.js';
import { readExcelRows } from './excel-source.js';
import { parseJsonRows } from './json-source.js';

export type RecordFileFormat = 'csv' | 'json' | 'xlsx';

export interface ReadRecordFileOptions {
  /** File format (default: from the extension) */
  format?: RecordFileFormat;
  /** Column holding the source id (default: 'sourceId') */
  sourceIdField?: string;
  /** Column copied into `record.category` */
  categoryField?: string;
  /** Columns kept as attributes (default: every column except source id and category) */
  attributeFields?: string[];
  /** JSON: dot path to the records array */
  recordsPath?: string;
  /** CSV: delimiter (default: ',') */
  delimiter?: string;
  /** Excel: sheet name or index */
  sheet?: string | number;
  /** Called for each row without a source id; the row is skipped. Without it such a row fails the read. */
  onInvalidRow?: (error: InvalidAttributeError, row: number) => void;
}

const FORMAT_BY_EXTENSION: Readonly<Record<string, RecordFileFormat>> = {
  '.csv': 'csv',
  '.json': 'json',
  '.xlsx': 'xlsx',
};

export function detectRecordFileFormat(filePath: string): RecordFileFormat {
  const format = FORMAT_BY_EXTENSION[extname(filePath).toLowerCase()];
  if (!format) {
    throw new ConfigError(`Cannot tell the format of ${filePath}; use a .csv, .json or .xlsx file or set the format`, {
      filePath,
    });
  }
  return format;
}

async function readRows(filePath: string, format: RecordFileFormat, options: ReadRecordFileOptions): Promise<FileRow[]> {
  switch (format) {
    case 'csv':
      return parseCsvRows(await readFileContent(filePath), { delimiter: options.delimiter });
    case 'json':
      return parseJsonRows(await readFileContent(filePath), options.recordsPath);
    case 'xlsx':
      return readExcelRows(filePath, { sheet: options.sheet });
  }
}

function toCategory(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Convert one parsed row into a source record
 *
 * @throws InvalidAttributeError when the row has no source id
 */
export function rowToSourceRecord(row: FileRow, index: number, options: ReadRecordFileOptions = {}): SourceRecord {
  const sourceIdField = options.sourceIdField ?? 'sourceId';
  const sourceId = toEntityId(row[sourceIdField]);
  if (sourceId === null) {
    throw new InvalidAttributeError(sourceIdField, `missing in row ${index + 1}`, { row: index + 1 });
  }

  const names =
    options.attributeFields ??
    Object.keys(row).filter((name) => name !== sourceIdField && name !== options.categoryField);

  const attributes: Attributes = {};
  for (const name of names) {
    const value = toAttributeValue(row[name]);
    if (value !== undefined) attributes[name] = value;
  }

  const record: SourceRecord = { sourceId, attributes };
  const category = options.categoryField ? toCategory(row[options.categoryField]) : undefined;
  if (category !== undefined) record.category = category;
  return record;
}

/**
 * Read every record of a .csv, .json or .xlsx file, in file order
 */
export async function readRecordFile(filePath: string, options: ReadRecordFileOptions = {}): Promise<SourceRecord[]> {
  const format = options.format ?? detectRecordFileFormat(filePath);
  const rows = await readRows(filePath, format, options);
  const { onInvalidRow } = options;
  if (!onInvalidRow) {
    return rows.map((row, index) => rowToSourceRecord(row, index, options));
  }

  const records: SourceRecord[] = [];
  rows.forEach((row, index) => {
    try {
      records.push(rowToSourceRecord(row, index, options));
    } catch (err) {
      if (!(err instanceof InvalidAttributeError)) throw err;
      onInvalidRow(err, index + 1);
    }
  });
  return records;
}
