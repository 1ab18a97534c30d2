/**
 * @commrecon/recon-engine
 *
 * Order/commission reconciliation: key normalization, candidate indexing,
 * exact and fuzzy matching, discrepancy classification and KPIs.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Rules
export * from './rules/index.js';

// Normalization
export * from './normalization/index.js';

// Matching
export * from './matching/index.js';

// Classification & aggregation
export * from './classification/index.js';
export * from './aggregation/index.js';

// Concurrency
export { Semaphore } from './concurrency/index.js';

// Reconciliation
import {
  ReconciliationEngine as _ReconciliationEngine,
  type ReconciliationEngineOptions,
} from './reconciliation/index.js';
export {
  ReconciliationEngine,
  buildShards,
  DEFAULT_MAX_CONCURRENCY,
} from './reconciliation/index.js';
export type { ReconciliationEngineOptions } from './reconciliation/index.js';

// Formatters
export * from './formatters/index.js';

// Errors
export { ReconError, ConfigurationError, DataQualityError } from './errors/index.js';
export type {
  ReconErrorCode,
  ReconErrorDetails,
  DataQualityErrorDetails,
} from './errors/index.js';

/**
 * Factory function to create a ReconciliationEngine
 */
export function createReconciliationEngine(
  options?: ReconciliationEngineOptions
): _ReconciliationEngine {
  return new _ReconciliationEngine(options);
}
