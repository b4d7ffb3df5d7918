export { MappingEngine } from './mapping-engine.js';
export type { MappingEngineOptions } from './mapping-engine.js';
export { MemoryResultSink } from './memory-result-sink.js';
export { resolveMappingConfig } from './config.js';
