import { describe, expect, it } from 'vitest';
import { InvalidAttributeError } from '@rdg-mapper/core';
import { makeNormalizer } from './helpers.js';

describe('Normalizer', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    const normalizer = makeNormalizer();

    expect(normalizer.normalize({ name: 'Acme Corp' })).toBe('acme corp');
    expect(normalizer.normalize({ name: 'ACME CORPORATION' })).toBe('acme corporation');
    expect(normalizer.normalize({ name: 'A.C.M.E., Inc.' })).toBe('acme inc');
    expect(normalizer.normalize({ name: '  Acme \t  Corp  ' })).toBe('acme corp');
  });

  it('folds diacritics unless disabled', () => {
    expect(makeNormalizer().normalize({ name: 'Müller-Lüdenscheidt  GmbH' })).toBe(
      'mullerludenscheidt gmbh'
    );
    expect(makeNormalizer({ foldDiacritics: false }).normalize({ name: 'Café' })).toBe('café');
  });

  it('joins key attributes in order and skips empty ones', () => {
    const normalizer = makeNormalizer({ keyAttributes: ['name', 'city'] });

    expect(normalizer.normalize({ city: 'Berlin', name: 'Acme' })).toBe('acme|berlin');
    expect(normalizer.normalize({ name: 'Acme' })).toBe('acme');
    expect(normalizer.normalize({ name: 'a|b', city: '' })).toBe('ab');
  });

  it('normalizes multi-valued attributes element-wise and sorts them', () => {
    const normalizer = makeNormalizer();
    expect(normalizer.normalize({ name: ['Beta', 'alpha', '', null] })).toBe('alpha beta');
  });

  it('sorts tokens when configured', () => {
    expect(makeNormalizer({ sortTokens: true }).normalize({ name: 'Corp Acme' })).toBe('acme corp');
  });

  it('stringifies numbers and booleans', () => {
    const normalizer = makeNormalizer({ keyAttributes: ['code', 'active'] });
    expect(normalizer.normalize({ code: 42, active: true })).toBe('42|true');
  });

  it('keeps only the configured punctuation', () => {
    const normalizer = makeNormalizer({ punctuation: '.' });
    expect(normalizer.normalize({ name: 'Acme-Corp. Ltd' })).toBe('acme-corp ltd');
  });

  it('is deterministic', () => {
    const normalizer = makeNormalizer();
    const attributes = { name: 'Ärger & Söhne' };
    expect(normalizer.normalize(attributes)).toBe(normalizer.normalize({ ...attributes }));
  });

  it('rejects missing or blank required attributes', () => {
    const normalizer = makeNormalizer({ requiredAttributes: ['name'] });

    expect(() => normalizer.normalize({ city: 'Berlin' })).toThrow(InvalidAttributeError);
    expect(() => normalizer.normalize({ name: ' .. ' })).toThrow(
      "Invalid attribute 'name': required attribute is blank"
    );
  });

  it('rejects unsupported value shapes', () => {
    const normalizer = makeNormalizer();

    expect(() => normalizer.normalize({ name: [['nested']] })).toThrow(InvalidAttributeError);
    expect(() => normalizer.normalizeAttribute('name', { first: 'A' })).toThrow(
      "Invalid attribute 'name': unsupported value of type object"
    );
  });

  it('collects canonical fields and skips unsupported non-key attributes', () => {
    const normalizer = makeNormalizer();

    expect(normalizer.normalizeFields({ name: 'Acme Corp', city: 'Berlin', tags: [['x']], note: '' })).toEqual({
      name: 'acme corp',
      city: 'berlin',
    });
  });
});
