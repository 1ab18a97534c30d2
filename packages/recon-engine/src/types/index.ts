export * from './records.js';
export * from './results.js';
export * from './rules.js';
