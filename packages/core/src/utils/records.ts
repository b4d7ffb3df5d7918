/**
 * Utility functions for working with records
 */

import { createHash } from 'node:crypto';
import type { Attributes, GlossaryEntry } from '../types/index.js';

/**
 * Extract all unique attribute names from an array of entries, in first-seen order
 */
export function extractAttributeNames(entries: Array<{ attributes: Attributes }>): string[] {
  const fields = new Set<string>();
  for (const entry of entries) {
    for (const key of Object.keys(entry.attributes)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Deterministic JSON serialization with sorted object keys.
 * `undefined` members are dropped the way JSON.stringify drops them.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : stableStringify(item))).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);

  return `{${entries.join(',')}}`;
}

/**
 * SHA-256 hex digest of the stable serialization of a value
 */
export function contentHash(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}

/**
 * Coerce a raw id cell (CSV/Excel values are often numbers) into an entity id.
 * Returns null for missing or blank ids.
 */
export function toEntityId(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return null;
}

/**
 * Create a glossary entry from a flat row
 *
 * @param row - Parsed row (CSV line, JSON object, Excel row)
 * @param idField - Column holding the RDG id
 * @param attributeFields - Columns to keep as attributes (default: every other column)
 */
export function rowToGlossaryEntry(
  row: Record<string, unknown>,
  idField: string,
  attributeFields?: readonly string[]
): GlossaryEntry | null {
  const id = toEntityId(row[idField]);
  if (id === null) return null;

  const attributes: Attributes = {};
  const names = attributeFields ?? Object.keys(row).filter((k) => k !== idField);
  for (const name of names) {
    attributes[name] = toAttributeValue(row[name]);
  }

  return { id, attributes };
}

/**
 * Coerce an arbitrary parsed cell into an attribute value.
 * Dates become ISO strings; other objects are serialized.
 */
export function toAttributeValue(value: unknown): Attributes[string] {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => {
      const coerced = toAttributeValue(item);
      return coerced === undefined ? null : coerced;
    });
  }
  return stableStringify(value);
}
