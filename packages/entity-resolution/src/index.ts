/**
 * @rdg-mapper/entity-resolution
 *
 * String similarity algorithms and blocking keys used by the matcher
 * and the approximate reference index.
 */

export * from './similarity/index.js';
export * from './blocking/index.js';
export * from './types/index.js';
