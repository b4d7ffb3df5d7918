/**
 * Blocking keys (candidate generation).
 *
 * The approximate reference index posts every entity under the character
 * n-grams of its normalized key; lookups score the overlap of n-gram sets.
 */

/**
 * Character n-grams of a key, padded with one space on each side so that
 * word starts and ends contribute their own grams.
 */
export function keyNgrams(key: string, n = 3): Set<string> {
  const grams = new Set<string>();
  if (key.length === 0 || n < 1) return grams;

  const padded = ` ${key} `;
  if (padded.length < n) {
    grams.add(padded);
    return grams;
  }

  for (let i = 0; i <= padded.length - n; i++) {
    grams.add(padded.substring(i, i + n));
  }
  return grams;
}

/** Dice coefficient of two gram sets */
export function gramOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const gram of a) {
    if (b.has(gram)) shared++;
  }
  return (2 * shared) / (a.size + b.size);
}
