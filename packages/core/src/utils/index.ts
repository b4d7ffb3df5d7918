export * from './records.js';
export * from './duration.js';
