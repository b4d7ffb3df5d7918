/**
 * Result output interface
 */

import type { MappingResult, StoreOutcome } from '../types/index.js';

export interface IResultSink {
  /**
   * Persist a batch of results (input order preserved).
   * Reports failure through the outcome; may also reject.
   */
  store(results: readonly MappingResult[]): Promise<StoreOutcome>;
}
