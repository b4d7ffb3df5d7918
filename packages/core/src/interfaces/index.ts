export type { IGlossarySource } from './glossary-source.js';
export type { IResultSink } from './result-sink.js';
export type { IDedupStore } from './dedup-store.js';
export type { MappingEventListener } from './event-listener.js';
