/**
 * Interface exports for mapping-core
 */

export type { IMappingEngine, MapBatchOptions } from './mapping-engine.js';
