/**
 * Reconciliation result types
 */

import type { FieldIssue } from '@commrecon/core';

export type MatchKind = 'exact' | 'fuzzy' | 'unmatched_order' | 'unmatched_commission';

/**
 * Per-component fuzzy score. All values are in [0, 1].
 */
export interface ScoreBreakdown {
  codeSimilarity: number;
  amountProximity: number;
  dateProximity: number;
  score: number;
}

export type NearMissReason =
  | 'below_threshold'
  | 'claimed'
  | 'preempted'
  | 'currency_mismatch';

/**
 * Best candidate that was not committed, kept for manual review.
 */
export interface NearMiss {
  lineId: string;
  reason: NearMissReason;
  score: number;
  /** Order holding the line, for claimed/preempted */
  claimedBy?: string;
}

export interface MatchResult {
  readonly id: string;
  readonly providerId: string;
  /** YYYY-MM the result is reported under */
  readonly period: string;
  readonly orderRef: string | null;
  readonly commissionLineRef: string | null;
  readonly matchKind: MatchKind;
  readonly confidence: number;
  readonly expectedAmount: number;
  readonly billedAmount: number;
  /** expected - billed */
  readonly amountDelta: number;
  readonly currency: string;
  /** Exact-bucket siblings passed over by the tie-break */
  readonly rejectedCandidates: readonly string[];
  readonly nearMiss?: NearMiss;
  readonly breakdown?: ScoreBreakdown;
}

export type DiscrepancyCategory =
  | 'missing_commission'
  | 'orphan_commission'
  | 'underbilled'
  | 'overbilled'
  | 'ok';

export const DISCREPANCY_CATEGORIES: readonly DiscrepancyCategory[] = [
  'missing_commission',
  'orphan_commission',
  'underbilled',
  'overbilled',
  'ok',
];

export interface DiscrepancyRecord {
  readonly matchResultRef: string;
  readonly providerId: string;
  readonly period: string;
  readonly category: DiscrepancyCategory;
  /** |amountDelta|, zero for ok */
  readonly magnitude: number;
  readonly expectedAmount: number;
  readonly billedAmount: number;
}

export type CategoryCounts = { [K in DiscrepancyCategory]: number };

export interface ProviderKPI {
  readonly providerId: string;
  readonly period: string;
  readonly counts: CategoryCounts;
  readonly matchResultCount: number;
  readonly totalExpected: number;
  readonly totalBilled: number;
  readonly leakageAmount: number;
}

export interface OverallKPI {
  readonly counts: CategoryCounts;
  readonly matchResultCount: number;
  readonly providerCount: number;
  readonly totalExpected: number;
  readonly totalBilled: number;
  readonly leakageAmount: number;
  /** Matched orders / orders, in [0, 1] */
  readonly matchRate: number;
}

export type FeedName = 'orders' | 'commissions';

/**
 * A record that failed validation or normalization and was left out of the run.
 */
export interface RejectRecord {
  readonly feed: FeedName;
  readonly recordIndex: number;
  readonly recordId: string | null;
  readonly providerId: string | null;
  readonly code: string;
  readonly message: string;
  readonly issues: readonly FieldIssue[];
}

export type WarningCategory = 'ambiguous_match' | 'duplicate_conflict' | 'claim_preempted';

export type WarningCode =
  | 'MULTIPLE_EXACT_CANDIDATES'
  | 'NEAR_THRESHOLD_MATCH'
  | 'CONFLICTING_DUPLICATE'
  | 'CLAIM_PREEMPTED';

export interface ReconWarning {
  readonly category: WarningCategory;
  readonly code: WarningCode;
  readonly message: string;
  readonly providerId: string;
  readonly orderId?: string;
  readonly lineIds: readonly string[];
}

/**
 * Informational: several exact candidates, or a fuzzy match accepted just
 * above the threshold.
 */
export type AmbiguousMatchWarning = ReconWarning & { readonly category: 'ambiguous_match' };

export interface ReconciliationSummary {
  orderCount: number;
  /** Commission lines after de-duplication */
  commissionLineCount: number;
  inputCommissionLineCount: number;
  exactCount: number;
  fuzzyCount: number;
  unmatchedOrderCount: number;
  unmatchedCommissionCount: number;
  rejectCount: number;
  warningCount: number;
  /** Mean confidence over committed matches */
  averageConfidence: number;
}

export interface ReconciliationReport {
  id: string;
  timestamp: Date;
  summary: ReconciliationSummary;
  matchResults: readonly MatchResult[];
  discrepancies: readonly DiscrepancyRecord[];
  kpis: readonly ProviderKPI[];
  overall: OverallKPI;
  rejects: readonly RejectRecord[];
  warnings: readonly ReconWarning[];
  processingTimeMs: number;
}
