/**
 * @rdg-mapper/glossary-file
 *
 * File-backed collaborators for the mapping engine: CSV, Excel and JSON
 * glossary sources, a source record reader and JSON-lines / CSV result sinks
 */

export { BaseFileGlossarySource, readFileContent } from './base-file-source.js';
export type { FileRow, FileSourceConfig } from './base-file-source.js';

export { CsvGlossarySource, createCsvGlossarySource, parseCsvRows } from './csv-source.js';
export type { CsvGlossarySourceConfig, CsvParseOptions } from './csv-source.js';

export { JsonGlossarySource, createJsonGlossarySource, parseJsonRows } from './json-source.js';
export type { JsonGlossarySourceConfig } from './json-source.js';

export { ExcelGlossarySource, createExcelGlossarySource, readExcelRows } from './excel-source.js';
export type { ExcelGlossarySourceConfig, ExcelReadOptions } from './excel-source.js';

export { readRecordFile, rowToSourceRecord, detectRecordFileFormat } from './record-reader.js';
export type { ReadRecordFileOptions, RecordFileFormat } from './record-reader.js';

export {
  JsonLinesResultSink,
  CsvResultSink,
  createJsonLinesResultSink,
  createCsvResultSink,
  toResultRow,
  RESULT_COLUMNS,
} from './result-sinks.js';
export type { FileSinkConfig, CsvResultSinkConfig } from './result-sinks.js';
