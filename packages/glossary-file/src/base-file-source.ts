/**
 * Base class for file-backed glossary sources
 * Handles reading the file, mapping read errors and turning rows into entries
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { GlossaryEntry, IGlossarySource } from '@rdg-mapper/core';
import { GlossarySourceError, errorMessage, rowToGlossaryEntry } from '@rdg-mapper/core';

/** One parsed row, keyed by column name */
export type FileRow = { [column: string]: unknown };

export interface FileSourceConfig {
  /** Path to the file */
  filePath: string;
  /** Name used in logs (default: file name) */
  name?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /** Column holding the RDG id (default: 'id') */
  idField?: string;
  /** Columns kept as attributes (default: every column except the id) */
  attributeFields?: string[];
}

export const FORBIDDEN_COLUMN_NAMES = new Set(['__proto__', 'prototype', 'constructor']);

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read a whole file, mapping missing or unreadable files to GlossarySourceError
 */
export async function readFileContent(filePath: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
  try {
    return await readFile(filePath, encoding);
  } catch (error) {
    throw fileReadError(filePath, error);
  }
}

export function fileReadError(filePath: string, error: unknown): GlossarySourceError {
  const code = errnoCode(error);
  const cause = error instanceof Error ? error : undefined;

  if (code === 'ENOENT') {
    return new GlossarySourceError(`File not found: ${filePath}`, {
      suggestion: 'Check that the file path is correct and the file exists.',
      cause,
      context: { filePath },
    });
  }

  if (code === 'EACCES') {
    return new GlossarySourceError(`Cannot read file: ${filePath}`, {
      suggestion: 'Check file permissions.',
      cause,
      context: { filePath },
    });
  }

  return new GlossarySourceError(`Failed to read file: ${errorMessage(error)}`, {
    cause,
    context: { filePath },
  });
}

/** Reject column names that would pollute object prototypes */
export function assertSafeColumns(columns: readonly string[], label: string): void {
  for (const column of columns) {
    if (FORBIDDEN_COLUMN_NAMES.has(column)) {
      throw new GlossarySourceError(`Unsafe ${label} column name: ${column}`, {
        suggestion: 'Rename the column to a safe field name and try again.',
      });
    }
  }
}

/**
 * Abstract base class for file glossary sources
 */
export abstract class BaseFileGlossarySource<TConfig extends FileSourceConfig> implements IGlossarySource {
  readonly config: TConfig;
  readonly name: string;

  constructor(config: TConfig) {
    this.config = config;
    this.name = config.name ?? basename(config.filePath);
  }

  /**
   * Read the whole file. Fails instead of returning a partial glossary.
   *
   * @throws GlossarySourceError for unreadable files, malformed content or rows without an id
   */
  async loadGlossary(): Promise<GlossaryEntry[]> {
    const rows = await this.readRows();
    const idField = this.config.idField ?? 'id';

    const entries: GlossaryEntry[] = [];
    rows.forEach((row, index) => {
      const entry = rowToGlossaryEntry(row, idField, this.config.attributeFields);
      if (!entry) {
        throw new GlossarySourceError(`Row ${index + 1} of ${this.config.filePath} has no value in id column '${idField}'`, {
          suggestion: `Give every glossary row an id, or set idField to the column that holds it.`,
          context: { filePath: this.config.filePath, row: index + 1, idField },
        });
      }
      entries.push(entry);
    });

    return entries;
  }

  /**
   * Parse the file into rows (implemented by subclasses)
   */
  protected abstract readRows(): Promise<FileRow[]>;
}
