/**
 * Deduplication store used by the assignment coordinator
 */

import type { MappingResult } from '../types/index.js';

export interface IDedupStore {
  /** Previously stored result for the idempotency key, if still retained */
  get(key: string): Promise<MappingResult | undefined>;

  /**
   * Atomic check-and-set.
   * Stores the result unless the key is already present, and returns
   * whichever result is stored for the key afterwards.
   */
  putIfAbsent(key: string, result: MappingResult, ttlMs: number): Promise<MappingResult>;
}
