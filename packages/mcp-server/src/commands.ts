/**
 * CLI commands
 *
 * Usage:
 *   rdg-mapper [serve] --config ./config.json
 *   rdg-mapper map --config ./config.json --input ./records.csv [--output ./results.csv] [--format text|json]
 */

import { extname } from 'node:path';
import { Logger } from '@rdg-mapper/core';
import type { BatchReport, IResultSink } from '@rdg-mapper/core';
import { createCsvResultSink, createJsonLinesResultSink, readRecordFile } from '@rdg-mapper/glossary-file';
import { formatBatchReport } from '@rdg-mapper/mapping-core';
import { loadConfig } from './config.js';
import type { ConfigFile } from './config.js';
import { createEngineFromConfig } from './engine-factory.js';
import { Metrics } from './metrics.js';
import { describeError, runServer } from './server.js';

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Variables for `${VAR}` expansion in the config (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

const processIO: CommandIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const USAGE = [
  'Usage:',
  '  rdg-mapper [serve] --config <config.json>',
  '  rdg-mapper map --config <config.json> --input <records.csv|json|xlsx> [--output <results.csv|jsonl>] [--format text|json]',
].join('\n');

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value && !value.startsWith('--') ? value : undefined;
}

function createLogger(config: ConfigFile, io: CommandIO): Logger {
  return new Logger({
    level: config.server?.logging?.level,
    format: config.server?.logging?.format,
    write: (line) => io.stderr(`${line}\n`),
  });
}

/** Sink for `--output`, chosen by file extension */
export function sinkForPath(filePath: string): IResultSink {
  return extname(filePath).toLowerCase() === '.csv'
    ? createCsvResultSink({ filePath })
    : createJsonLinesResultSink({ filePath });
}

export interface MapCommandOptions {
  configPath: string;
  inputPath: string;
  /** Overrides the config's `output` */
  outputPath?: string;
  format?: 'text' | 'json';
}

/**
 * Load the glossary once, map every record of the input file as one batch
 * and print the report.
 */
export async function runMapCommand(options: MapCommandOptions, io: CommandIO = processIO): Promise<BatchReport> {
  const loaded = await loadConfig(options.configPath, { env: io.env });
  const logger = createLogger(loaded.config, io);

  const engine = createEngineFromConfig(loaded, {
    logger,
    sink: options.outputPath ? sinkForPath(options.outputPath) : undefined,
  });
  await engine.reload();

  const records = await readRecordFile(options.inputPath, {
    ...loaded.config.records,
    onInvalidRow: (error, row) => {
      logger.warn('Skipping input row', { row, error: error.message });
      io.stderr(`Skipped row ${row}: ${error.message}\n`);
    },
  });
  const report = await engine.mapBatch(records);

  io.stdout(options.format === 'json' ? `${JSON.stringify(report, null, 2)}\n` : `${formatBatchReport(report)}\n`);
  return report;
}

/**
 * Load the glossary, then serve MCP tools over stdio until a signal arrives
 */
export async function runServeCommand(configPath: string, io: CommandIO = processIO): Promise<void> {
  const loaded = await loadConfig(configPath, { env: io.env });
  const { config } = loaded;
  const logger = createLogger(config, io);
  const metrics = new Metrics();

  const engine = createEngineFromConfig(loaded, { logger, metrics });
  const status = await engine.reload();
  logger.info('Glossary loaded', { source: status.source, generationId: status.generationId });

  if (config.glossary.reloadIntervalMs !== undefined) {
    engine.reference.startAutoReload(config.glossary.reloadIntervalMs);
  }

  await runServer({
    name: config.server?.name ?? 'rdg-mapper',
    version: config.server?.version ?? '0.1.0',
    engine,
    metrics,
    logger,
    toolTimeoutMs: config.server?.toolTimeoutMs,
  });
}

/**
 * Dispatch a command line; resolves to the process exit code
 */
export async function main(args: readonly string[], io: CommandIO = processIO): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  const [first] = args;
  const command = first !== undefined && !first.startsWith('-') ? first : 'serve';
  const configPath = flagValue(args, '--config');

  if ((command !== 'serve' && command !== 'map') || !configPath) {
    io.stderr(`${USAGE}\n`);
    return 1;
  }

  try {
    if (command === 'serve') {
      await runServeCommand(configPath, io);
      return 0;
    }

    const inputPath = flagValue(args, '--input');
    if (!inputPath) {
      io.stderr(`${USAGE}\n`);
      return 1;
    }
    const format = flagValue(args, '--format');
    if (format !== undefined && format !== 'text' && format !== 'json') {
      io.stderr(`Unknown format: ${format} (use text or json)\n`);
      return 1;
    }

    const report = await runMapCommand(
      { configPath, inputPath, outputPath: flagValue(args, '--output'), format },
      io
    );
    return report.sink && !report.sink.ok ? 1 : 0;
  } catch (err) {
    io.stderr(`${describeError(err)}\n`);
    return 1;
  }
}
