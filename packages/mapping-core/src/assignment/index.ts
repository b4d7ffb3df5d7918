export { AssignmentCoordinator, idempotencyKey } from './assignment-coordinator.js';
export type { AssignmentCoordinatorOptions, DecisionSource } from './assignment-coordinator.js';
export { MemoryDedupStore } from './memory-dedup-store.js';
export type { DedupStoreStats, MemoryDedupStoreOptions } from './memory-dedup-store.js';
export {
  toResult,
  unmatchedResult,
  markDegraded,
  downgradeToUnmatched,
  REASON_CANCELLED,
  REASON_COORDINATOR_TIMEOUT,
  REASON_FALLBACK_MISSING,
  REASON_INVALID_INPUT,
  REASON_SINK_TIMEOUT,
} from './results.js';
