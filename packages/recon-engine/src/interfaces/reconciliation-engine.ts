/**
 * Reconciliation Engine Interface
 */

import type { Logger, Record as DataRecord } from '@commrecon/core';
import type { RuleSetInput } from '../rules/index.js';
import type { ReconciliationReport } from '../types/index.js';

export interface ReconciliationFeeds {
  orders: readonly DataRecord[];
  commissions: readonly DataRecord[];
}

export type InvalidRecordPolicy = 'reject' | 'fail';

export interface ReconciliationOptions {
  /** Provider shards matched at once (default: 4) */
  maxConcurrency?: number;
  /**
   * 'reject' (default) moves invalid records to the rejects ledger and goes
   * on; 'fail' throws one DataQualityError listing all of them.
   */
  onInvalidRecord?: InvalidRecordPolicy;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Reconciliation Engine Interface
 *
 * Matches an orders feed against a commission feed and classifies every
 * difference.
 */
export interface IReconciliationEngine {
  /**
   * Reconcile the two feeds under a rule set.
   *
   * Rejects with ConfigurationError before any matching when the rule set is
   * invalid or the data names an unconfigured provider. A rejected or aborted
   * run produces no report.
   */
  reconcile(
    feeds: ReconciliationFeeds,
    ruleSet: RuleSetInput,
    options?: ReconciliationOptions
  ): Promise<ReconciliationReport>;
}
