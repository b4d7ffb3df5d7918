/**
 * Mapping Engine Interface
 */

import type { BatchReport, MappingResult, SourceRecord } from '@rdg-mapper/core';
import type { ReferenceStoreStatus } from '../reference/reference-store.js';

export interface MapBatchOptions {
  /** Stops scheduling further records when aborted */
  signal?: AbortSignal;
  /** Caller-supplied batch id (default: random UUID) */
  batchId?: string;
}

/**
 * Resolves source records against the active reference glossary.
 */
export interface IMappingEngine {
  /**
   * Map one record (a batch of one).
   *
   * @throws GlossaryNotLoadedError when no glossary has been loaded
   */
  mapRecord(record: SourceRecord, options?: MapBatchOptions): Promise<MappingResult>;

  /**
   * Map a finite batch against one pinned snapshot.
   * Never fails because of a single record.
   *
   * @throws GlossaryNotLoadedError when no glossary has been loaded
   */
  mapBatch(records: readonly SourceRecord[], options?: MapBatchOptions): Promise<BatchReport>;

  /** Load the glossary and swap it in; the prior snapshot stays on failure */
  reload(): Promise<ReferenceStoreStatus>;

  status(): ReferenceStoreStatus;
}
