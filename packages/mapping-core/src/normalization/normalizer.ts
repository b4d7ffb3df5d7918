/**
 * Normalizer
 *
 * Canonicalizes attribute values into the key used for exact lookup and the
 * per-attribute values used for fuzzy scoring. The same instance serves index
 * build and matching, so both sides agree on one canonical form.
 */

import { InvalidAttributeError } from '@rdg-mapper/core';
import type { Attributes, NormalizationConfig, NormalizedFields } from '@rdg-mapper/core';

/** Joins per-attribute values inside a normalized key; always stripped from values */
export const KEY_SEPARATOR = '|';

const COMBINING_MARKS = /\p{M}/gu;
const WHITESPACE = /\s+/g;

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]\[^-]/g, '\\$&');
}

function isScalar(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function isSupportedValue(value: unknown): boolean {
  return isScalar(value) || (Array.isArray(value) && value.every(isScalar));
}

export class Normalizer {
  private readonly config: NormalizationConfig;
  private readonly stripPattern: RegExp;

  constructor(config: NormalizationConfig) {
    this.config = config;
    const chars = new Set([...config.punctuation, KEY_SEPARATOR]);
    this.stripPattern = new RegExp(`[${escapeForCharClass([...chars].join(''))}]`, 'gu');
  }

  get keyAttributes(): readonly string[] {
    return this.config.keyAttributes;
  }

  /**
   * Normalized key of a record or entity.
   *
   * @throws InvalidAttributeError when a required attribute is missing or blank,
   *   or a key attribute has an unsupported shape
   */
  normalize(attributes: Attributes): string {
    this.checkRequired(attributes);

    const parts: string[] = [];
    for (const name of this.config.keyAttributes) {
      const value = this.normalizeAttribute(name, attributes[name]);
      if (value.length > 0) parts.push(value);
    }
    return parts.join(KEY_SEPARATOR);
  }

  /**
   * Canonical value of every attribute that has one, keyed by attribute name.
   * Key attributes come first, in key order. Non-key attributes of an
   * unsupported shape are left out.
   */
  normalizeFields(attributes: Attributes): NormalizedFields {
    const fields: Record<string, string> = {};
    const keyNames = new Set(this.config.keyAttributes);
    const names = new Set([...this.config.keyAttributes, ...Object.keys(attributes)]);
    for (const name of names) {
      const raw = attributes[name];
      if (!keyNames.has(name) && !isSupportedValue(raw)) continue;
      const value = this.normalizeAttribute(name, raw);
      if (value.length > 0) fields[name] = value;
    }
    return fields;
  }

  /** Canonical form of one attribute value; empty string when absent */
  normalizeAttribute(name: string, value: unknown): string {
    if (value === undefined || value === null) return '';

    if (Array.isArray(value)) {
      const items: string[] = [];
      for (const item of value) {
        if (Array.isArray(item)) {
          throw new InvalidAttributeError(name, 'nested arrays are not supported');
        }
        const normalized = this.normalizeScalar(name, item);
        if (normalized.length > 0) items.push(normalized);
      }
      return items.sort().join(' ');
    }

    return this.normalizeScalar(name, value);
  }

  /** Canonical form of a single string */
  normalizeValue(text: string): string {
    let out = text.toLowerCase();
    if (this.config.foldDiacritics) {
      out = out.normalize('NFKD').replace(COMBINING_MARKS, '');
    }
    out = out.replace(this.stripPattern, '').replace(WHITESPACE, ' ').trim();

    if (this.config.sortTokens && out.length > 0) {
      out = out.split(' ').sort().join(' ');
    }
    return out;
  }

  private normalizeScalar(name: string, value: unknown): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return this.normalizeValue(value);
    if (typeof value === 'number' || typeof value === 'boolean') {
      return this.normalizeValue(String(value));
    }
    throw new InvalidAttributeError(name, `unsupported value of type ${typeof value}`);
  }

  private checkRequired(attributes: Attributes): void {
    for (const name of this.config.requiredAttributes) {
      const value = attributes[name];
      if (value === undefined || value === null) {
        throw new InvalidAttributeError(name, 'required attribute is missing');
      }
      if (this.normalizeAttribute(name, value).length === 0) {
        throw new InvalidAttributeError(name, 'required attribute is blank');
      }
    }
  }
}
