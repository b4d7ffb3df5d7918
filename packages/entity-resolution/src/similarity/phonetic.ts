/**
 * Phonetic matching (American Soundex)
 */

import type { SimilarityResult } from '../types/similarity.js';

const SOUNDEX_CODES: Record<string, string> = {
  B: '1', F: '1', P: '1', V: '1',
  C: '2', G: '2', J: '2', K: '2', Q: '2', S: '2', X: '2', Z: '2',
  D: '3', T: '3',
  L: '4',
  M: '5', N: '5',
  R: '6',
};

/**
 * Four-character Soundex code; "0000" when the input has no letters
 */
export function soundex(text: string): string {
  const normalized = text.toUpperCase().replace(/[^A-Z]/g, '');

  const firstChar = normalized[0];
  if (!firstChar) {
    return '0000';
  }

  let result = firstChar;
  let prevCode = SOUNDEX_CODES[firstChar] ?? '';

  for (let i = 1; i < normalized.length && result.length < 4; i++) {
    const char = normalized[i];
    if (!char) break;
    const code = SOUNDEX_CODES[char];

    if (code && code !== prevCode) {
      result += code;
      prevCode = code;
    } else if (!code && char !== 'H' && char !== 'W') {
      // H and W do not separate equal codes; vowels do
      prevCode = '';
    }
  }

  return result.padEnd(4, '0');
}

/**
 * Compare two strings by their Soundex codes.
 * Identical codes score 1, otherwise the share of equal code positions.
 */
export function soundexSimilarity(a: string, b: string): SimilarityResult {
  const codeA = soundex(a);
  const codeB = soundex(b);

  if (codeA === codeB) {
    return {
      score: codeA === '0000' && a !== b ? 0 : 1,
      algorithm: 'soundex',
      details: `Both encode to: ${codeA}`,
    };
  }

  let matches = 0;
  for (let i = 0; i < 4; i++) {
    if (codeA[i] === codeB[i]) {
      matches++;
    }
  }

  return {
    score: matches / 4,
    algorithm: 'soundex',
    details: `"${a}" → ${codeA}, "${b}" → ${codeB}`,
  };
}
