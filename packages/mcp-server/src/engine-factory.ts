/**
 * Builds the mapping engine and its file collaborators from a loaded config
 */

import { isAbsolute, resolve } from 'node:path';
import type { IGlossarySource, IResultSink, Logger } from '@rdg-mapper/core';
import {
  createCsvGlossarySource,
  createCsvResultSink,
  createExcelGlossarySource,
  createJsonGlossarySource,
  createJsonLinesResultSink,
} from '@rdg-mapper/glossary-file';
import { MemoryDedupStore, createMappingEngine } from '@rdg-mapper/mapping-core';
import type { MappingEngine } from '@rdg-mapper/mapping-core';
import type { GlossaryEntryConfig, LoadedConfig, OutputConfig } from './config.js';
import type { Metrics } from './metrics.js';

function resolveFrom(baseDir: string, filePath: string): string {
  return isAbsolute(filePath) ? filePath : resolve(baseDir, filePath);
}

export function createGlossarySource(entry: GlossaryEntryConfig, baseDir: string): IGlossarySource {
  const common = {
    filePath: resolveFrom(baseDir, entry.filePath),
    name: entry.name,
    encoding: entry.encoding,
    idField: entry.idField,
    attributeFields: entry.attributeFields,
  };

  switch (entry.type) {
    case 'csv':
      return createCsvGlossarySource({
        ...common,
        delimiter: entry.delimiter,
        headers: entry.headers,
        quote: entry.quote,
        skipEmptyLines: entry.skipEmptyLines,
      });
    case 'json':
      return createJsonGlossarySource({ ...common, recordsPath: entry.recordsPath });
    case 'excel':
      return createExcelGlossarySource({
        ...common,
        sheet: entry.sheet,
        headers: entry.headers,
        startRow: entry.startRow,
        startColumn: entry.startColumn,
      });
  }
}

export function createResultSink(output: OutputConfig, baseDir: string): IResultSink {
  const filePath = resolveFrom(baseDir, output.filePath);
  switch (output.type) {
    case 'jsonl':
      return createJsonLinesResultSink({ filePath });
    case 'csv':
      return createCsvResultSink({
        filePath,
        delimiter: output.delimiter,
        sanitizeFormulas: output.sanitizeFormulas,
      });
  }
}

export interface EngineFactoryOptions {
  logger: Logger;
  metrics?: Metrics;
  /** Replaces `config.output` */
  sink?: IResultSink;
}

/**
 * @throws ConfigError when the mapping section is inconsistent
 */
export function createEngineFromConfig(loaded: LoadedConfig, options: EngineFactoryOptions): MappingEngine {
  const { config, baseDir } = loaded;

  return createMappingEngine({
    source: createGlossarySource(config.glossary, baseDir),
    config: config.mapping,
    sink: options.sink ?? (config.output ? createResultSink(config.output, baseDir) : undefined),
    dedupStore: new MemoryDedupStore({ maxEntries: config.dedup?.maxEntries }),
    dedupBreaker: config.dedup?.breaker,
    reloadRetry: config.glossary.retry,
    listener: options.metrics,
    logger: options.logger,
  });
}
