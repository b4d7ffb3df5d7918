import type { BatchReport, MappingEvent, ReloadEvent } from '../types/index.js';

/** Consumer of engine observability events. All hooks are optional. */
export interface MappingEventListener {
  onRecordMapped?(event: MappingEvent): void;
  onBatchCompleted?(report: BatchReport): void;
  onReload?(event: ReloadEvent): void;
}
