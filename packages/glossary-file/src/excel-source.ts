/**
 * Excel glossary source (.xlsx)
 */

import ExcelJS from 'exceljs';
import { GlossarySourceError } from '@rdg-mapper/core';
import {
  BaseFileGlossarySource,
  assertSafeColumns,
  fileReadError,
  type FileRow,
  type FileSourceConfig,
} from './base-file-source.js';

export interface ExcelReadOptions {
  /** Sheet name or index (default: first sheet) */
  sheet?: string | number;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Starting row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

export interface ExcelGlossarySourceConfig extends FileSourceConfig, ExcelReadOptions {}

function getColumnName(colNumber: number): string {
  let name = '';
  let n = colNumber;

  while (n > 0) {
    const remainder = (n - 1) % 26;
    name = String.fromCharCode(65 + remainder) + name;
    n = Math.floor((n - 1) / 26);
  }

  return name;
}

function getCellValue(cell: ExcelJS.Cell): unknown {
  const value = cell.value;

  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value !== 'object') {
    return value;
  }

  // Formula results
  if ('result' in value) {
    const result = value.result;
    if (result instanceof Date) return result.toISOString();
    return typeof result === 'object' ? null : result;
  }

  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  if ('hyperlink' in value) {
    return value.text;
  }

  // Error cells
  return null;
}

function getSheet(workbook: ExcelJS.Workbook, sheet: string | number | undefined): ExcelJS.Worksheet | undefined {
  if (sheet === undefined) return workbook.worksheets[0];
  return workbook.getWorksheet(sheet);
}

/**
 * Read rows from an .xlsx file
 */
export async function readExcelRows(filePath: string, options: ExcelReadOptions = {}): Promise<FileRow[]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error) {
    throw fileReadError(filePath, error);
  }

  const sheet = getSheet(workbook, options.sheet);
  if (!sheet) {
    throw new GlossarySourceError(`Sheet not found: ${options.sheet ?? 'first sheet'}`, {
      suggestion: 'Check that the sheet name/index is correct.',
      context: { filePath },
    });
  }

  const startRow = options.startRow ?? 1;
  const startColumn = options.startColumn ?? 1;
  const hasHeaders = options.headers !== false;

  const headers: string[] = [];
  if (hasHeaders) {
    sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      if (colNumber >= startColumn) {
        headers[colNumber - startColumn] = String(getCellValue(cell) ?? `Column${colNumber}`);
      }
    });
    assertSafeColumns(headers, 'Excel');
  } else {
    for (let i = 0; i < sheet.columnCount - startColumn + 1; i++) {
      headers[i] = getColumnName(i + startColumn);
    }
  }

  const rows: FileRow[] = [];
  const dataStartRow = hasHeaders ? startRow + 1 : startRow;

  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber < dataStartRow) return;

    const record: FileRow = {};
    let hasData = false;

    row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
      if (colNumber < startColumn) return;

      const header = headers[colNumber - startColumn];
      if (!header) return;

      const value = getCellValue(cell);
      if (value !== null && value !== '') {
        hasData = true;
      }
      record[header] = value;
    });

    if (hasData) {
      rows.push(record);
    }
  });

  return rows;
}

export class ExcelGlossarySource extends BaseFileGlossarySource<ExcelGlossarySourceConfig> {
  protected readRows(): Promise<FileRow[]> {
    return readExcelRows(this.config.filePath, this.config);
  }
}

/**
 * Factory function to create an Excel glossary source
 */
export function createExcelGlossarySource(config: ExcelGlossarySourceConfig): ExcelGlossarySource {
  return new ExcelGlossarySource(config);
}
