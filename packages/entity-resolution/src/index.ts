/**
 * @commrecon/entity-resolution
 *
 * Similarity measures and blocking keys used to pair records that carry
 * slightly different spellings of the same identifier.
 */

export * from './similarity/index.js';
export * from './blocking/index.js';
export * from './types/index.js';
