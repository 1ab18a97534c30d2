/**
 * Tabular export
 *
 * Flattens a report into row collections with stable snake_case column
 * names, ready for CSV, spreadsheet or JSON writers.
 */

import type { ReconciliationReport } from '../types/index.js';

export type TabularCell = string | number | boolean | null;
export type TabularRow = { [column: string]: TabularCell };

export interface TabularReport {
  match_results: TabularRow[];
  discrepancies: TabularRow[];
  provider_kpis: TabularRow[];
  rejects: TabularRow[];
  warnings: TabularRow[];
}

export type TabularCollection = keyof TabularReport;

export const TABULAR_COLLECTIONS: readonly TabularCollection[] = [
  'match_results',
  'discrepancies',
  'provider_kpis',
  'rejects',
  'warnings',
];

export function toTabular(report: ReconciliationReport): TabularReport {
  return {
    match_results: report.matchResults.map((r) => ({
      match_result_id: r.id,
      provider_id: r.providerId,
      period: r.period,
      order_id: r.orderRef,
      commission_line_id: r.commissionLineRef,
      match_kind: r.matchKind,
      confidence: r.confidence,
      expected_amount: r.expectedAmount,
      billed_amount: r.billedAmount,
      amount_delta: r.amountDelta,
      currency: r.currency,
      rejected_candidates: r.rejectedCandidates.join(';'),
      near_miss_line_id: r.nearMiss?.lineId ?? null,
      near_miss_reason: r.nearMiss?.reason ?? null,
      near_miss_score: r.nearMiss?.score ?? null,
      near_miss_claimed_by: r.nearMiss?.claimedBy ?? null,
    })),
    discrepancies: report.discrepancies.map((d) => ({
      match_result_id: d.matchResultRef,
      provider_id: d.providerId,
      period: d.period,
      category: d.category,
      magnitude: d.magnitude,
      expected_amount: d.expectedAmount,
      billed_amount: d.billedAmount,
    })),
    provider_kpis: report.kpis.map((k) => ({
      provider_id: k.providerId,
      period: k.period,
      match_result_count: k.matchResultCount,
      ok_count: k.counts.ok,
      underbilled_count: k.counts.underbilled,
      overbilled_count: k.counts.overbilled,
      missing_commission_count: k.counts.missing_commission,
      orphan_commission_count: k.counts.orphan_commission,
      total_expected: k.totalExpected,
      total_billed: k.totalBilled,
      leakage_amount: k.leakageAmount,
    })),
    rejects: report.rejects.map((r) => ({
      feed: r.feed,
      record_index: r.recordIndex,
      record_id: r.recordId,
      provider_id: r.providerId,
      code: r.code,
      message: r.message,
      fields: r.issues.map((i) => i.field).join(';'),
    })),
    warnings: report.warnings.map((w) => ({
      category: w.category,
      code: w.code,
      provider_id: w.providerId,
      order_id: w.orderId ?? null,
      line_ids: w.lineIds.join(';'),
      message: w.message,
    })),
  };
}
