export { ReconciliationEngine, buildShards, DEFAULT_MAX_CONCURRENCY } from './reconciliation-engine.js';
export type { ReconciliationEngineOptions } from './reconciliation-engine.js';
