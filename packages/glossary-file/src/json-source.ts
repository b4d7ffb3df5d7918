/**
 * JSON glossary source
 * Reads an array of objects, at the root or under a dot path
 */

import { GlossarySourceError, errorMessage } from '@rdg-mapper/core';
import {
  BaseFileGlossarySource,
  FORBIDDEN_COLUMN_NAMES,
  readFileContent,
  type FileRow,
  type FileSourceConfig,
} from './base-file-source.js';

export interface JsonGlossarySourceConfig extends FileSourceConfig {
  /** JSON path to the records array (e.g., 'data.items') */
  recordsPath?: string;
}

function parseSafePath(path: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new GlossarySourceError(`Invalid recordsPath: "${path}"`, {
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_COLUMN_NAMES.has(part)) {
      throw new GlossarySourceError(`Unsafe recordsPath segment: "${part}"`, {
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of parseSafePath(path)) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    if (!Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }

  return current;
}

function isRow(value: unknown): value is FileRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON content into rows
 *
 * @param recordsPath - Dot path to the array (default: the root must be an array)
 */
export function parseJsonRows(content: string, recordsPath?: string): FileRow[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new GlossarySourceError(`Invalid JSON: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const records = recordsPath ? getNestedValue(parsed, recordsPath) : parsed;
  if (!Array.isArray(records)) {
    throw new GlossarySourceError(
      recordsPath ? `Path '${recordsPath}' does not contain an array` : 'JSON file does not contain an array at root level',
      {
        suggestion: recordsPath
          ? 'Check that recordsPath points to an array of objects.'
          : 'Either provide a JSON file with an array at root, or specify recordsPath.',
      }
    );
  }

  return records.map((record, index) => {
    if (!isRow(record)) {
      throw new GlossarySourceError(`Element ${index + 1} is not an object`);
    }
    return record;
  });
}

export class JsonGlossarySource extends BaseFileGlossarySource<JsonGlossarySourceConfig> {
  protected async readRows(): Promise<FileRow[]> {
    const content = await readFileContent(this.config.filePath, this.config.encoding);
    return parseJsonRows(content, this.config.recordsPath);
  }
}

/**
 * Factory function to create a JSON glossary source
 */
export function createJsonGlossarySource(config: JsonGlossarySourceConfig): JsonGlossarySource {
  return new JsonGlossarySource(config);
}
