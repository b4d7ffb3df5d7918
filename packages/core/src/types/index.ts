export * from './record.js';
export * from './result.js';
