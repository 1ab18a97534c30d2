/**
 * Reconciliation Report Formatter
 *
 * Plain-text summary for the terminal.
 */

import { DISCREPANCY_CATEGORIES, type DiscrepancyCategory, type ReconciliationReport } from '../types/index.js';
import { formatMoney, formatPercent, formatTable } from './utils.js';

const CATEGORY_LABELS: { [K in DiscrepancyCategory]: string } = {
  ok: 'Perfect match',
  underbilled: 'Underbilled',
  overbilled: 'Overbilled',
  missing_commission: 'Missing commission',
  orphan_commission: 'Orphan commission',
};

const MAX_LISTED = 10;

/**
 * Format a reconciliation report as plain text
 */
export function formatReconciliationReport(report: ReconciliationReport): string {
  const lines: string[] = [];
  const { summary, overall } = report;

  lines.push(`## Commission Reconciliation`);
  lines.push(`Run: ${report.id}`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push(`### Summary`);
  lines.push(`- Orders: ${summary.orderCount}`);
  lines.push(
    `- Commission lines: ${summary.inputCommissionLineCount} (${summary.commissionLineCount} after de-duplication)`
  );
  lines.push(`- Exact matches: ${summary.exactCount}`);
  lines.push(`- Fuzzy matches: ${summary.fuzzyCount}`);
  lines.push(`- Unmatched orders: ${summary.unmatchedOrderCount}`);
  lines.push(`- Unmatched commission lines: ${summary.unmatchedCommissionCount}`);
  lines.push(`- Average confidence: ${formatPercent(summary.averageConfidence)}`);
  lines.push(`- Match rate: ${formatPercent(overall.matchRate)}`);
  lines.push(`- Rejected records: ${summary.rejectCount}`);
  lines.push(`- Warnings: ${summary.warningCount}`);
  lines.push('');

  // Totals per category
  const totals = new Map<DiscrepancyCategory, { expected: number; billed: number }>();
  for (const record of report.discrepancies) {
    const t = totals.get(record.category) ?? { expected: 0, billed: 0 };
    t.expected += record.expectedAmount;
    t.billed += record.billedAmount;
    totals.set(record.category, t);
  }
  lines.push(`### Discrepancies`);
  lines.push(
    ...formatTable(
      ['Category', 'Records', 'Expected', 'Billed', 'Gap'],
      DISCREPANCY_CATEGORIES.map((category) => {
        const t = totals.get(category) ?? { expected: 0, billed: 0 };
        return [
          CATEGORY_LABELS[category],
          String(overall.counts[category]),
          formatMoney(t.expected),
          formatMoney(t.billed),
          formatMoney(t.expected - t.billed),
        ];
      })
    )
  );
  lines.push(`Leakage: ${formatMoney(overall.leakageAmount)}`);
  lines.push('');

  if (report.kpis.length > 0) {
    lines.push(`### By Provider`);
    lines.push(
      ...formatTable(
        ['Provider', 'Period', 'Results', 'OK', 'Missing', 'Orphan', 'Expected', 'Billed', 'Leakage'],
        report.kpis.map((kpi) => [
          kpi.providerId,
          kpi.period,
          String(kpi.matchResultCount),
          String(kpi.counts.ok),
          String(kpi.counts.missing_commission),
          String(kpi.counts.orphan_commission),
          formatMoney(kpi.totalExpected),
          formatMoney(kpi.totalBilled),
          formatMoney(kpi.leakageAmount),
        ])
      )
    );
    lines.push('');
  }

  const review = report.matchResults.filter((r) => r.nearMiss);
  if (review.length > 0) {
    lines.push(`### Needs Review (${review.length})`);
    for (const result of review.slice(0, MAX_LISTED)) {
      const nearMiss = result.nearMiss;
      if (!nearMiss) continue;
      const by = nearMiss.claimedBy ? `, held by ${nearMiss.claimedBy}` : '';
      lines.push(
        `- ${result.orderRef ?? result.id} ↔ ${nearMiss.lineId}: ${nearMiss.reason} (score ${nearMiss.score}${by})`
      );
    }
    if (review.length > MAX_LISTED) {
      lines.push(`... and ${review.length - MAX_LISTED} more`);
    }
    lines.push('');
  }

  if (report.warnings.length > 0) {
    lines.push(`### Warnings (${report.warnings.length})`);
    for (const warning of report.warnings.slice(0, MAX_LISTED)) {
      lines.push(`- [${warning.code}] ${warning.message}`);
    }
    if (report.warnings.length > MAX_LISTED) {
      lines.push(`... and ${report.warnings.length - MAX_LISTED} more`);
    }
    lines.push('');
  }

  if (report.rejects.length > 0) {
    lines.push(`### Rejected Records (${report.rejects.length})`);
    for (const reject of report.rejects.slice(0, MAX_LISTED)) {
      lines.push(`- ${reject.feed}[${reject.recordIndex}] ${reject.recordId ?? ''}: ${reject.message}`);
    }
    if (report.rejects.length > MAX_LISTED) {
      lines.push(`... and ${report.rejects.length - MAX_LISTED} more`);
    }
    lines.push('');
  }

  lines.push(`---`);
  lines.push(`Processing time: ${report.processingTimeMs}ms`);

  return lines.join('\n');
}
