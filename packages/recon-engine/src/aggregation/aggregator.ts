/**
 * Aggregator
 *
 * Rolls discrepancy records up into per-(provider, period) KPIs and one
 * overall KPI. Output order is deterministic: provider id, then period.
 */

import { roundMoney } from '@commrecon/core';
import { compareIds } from '../matching/index.js';
import type {
  CategoryCounts,
  DiscrepancyRecord,
  OverallKPI,
  ProviderKPI,
} from '../types/index.js';

export interface AggregationResult {
  kpis: ProviderKPI[];
  overall: OverallKPI;
}

interface Accumulator {
  providerId: string;
  period: string;
  counts: CategoryCounts;
  matchResultCount: number;
  totalExpected: number;
  totalBilled: number;
  leakage: number;
}

export function emptyCounts(): CategoryCounts {
  return {
    missing_commission: 0,
    orphan_commission: 0,
    underbilled: 0,
    overbilled: 0,
    ok: 0,
  };
}

/**
 * Signed contribution of one record to leakage: revenue owed but not billed
 * counts up, overbilling counts down, orphans and ok records do not count.
 */
export function leakageContribution(record: DiscrepancyRecord): number {
  switch (record.category) {
    case 'missing_commission':
    case 'underbilled':
      return record.magnitude;
    case 'overbilled':
      return -record.magnitude;
    default:
      return 0;
  }
}

function accumulate(acc: Omit<Accumulator, 'providerId' | 'period'>, record: DiscrepancyRecord): void {
  acc.counts[record.category]++;
  acc.matchResultCount++;
  acc.totalExpected += record.expectedAmount;
  acc.totalBilled += record.billedAmount;
  acc.leakage += leakageContribution(record);
}

export class Aggregator {
  aggregate(records: readonly DiscrepancyRecord[]): AggregationResult {
    const groups = new Map<string, Accumulator>();
    const total: Omit<Accumulator, 'providerId' | 'period'> = {
      counts: emptyCounts(),
      matchResultCount: 0,
      totalExpected: 0,
      totalBilled: 0,
      leakage: 0,
    };
    const providers = new Set<string>();

    for (const record of records) {
      const key = `${record.providerId}\u001F${record.period}`;
      let acc = groups.get(key);
      if (!acc) {
        acc = {
          providerId: record.providerId,
          period: record.period,
          counts: emptyCounts(),
          matchResultCount: 0,
          totalExpected: 0,
          totalBilled: 0,
          leakage: 0,
        };
        groups.set(key, acc);
      }
      accumulate(acc, record);
      accumulate(total, record);
      providers.add(record.providerId);
    }

    const kpis = [...groups.values()]
      .sort((a, b) => compareIds(a.providerId, b.providerId) || compareIds(a.period, b.period))
      .map(
        (acc): ProviderKPI =>
          Object.freeze({
            providerId: acc.providerId,
            period: acc.period,
            counts: Object.freeze({ ...acc.counts }),
            matchResultCount: acc.matchResultCount,
            totalExpected: roundMoney(acc.totalExpected),
            totalBilled: roundMoney(acc.totalBilled),
            leakageAmount: roundMoney(acc.leakage),
          })
      );

    const matchedOrders = total.counts.ok + total.counts.underbilled + total.counts.overbilled;
    const orders = matchedOrders + total.counts.missing_commission;

    const overall: OverallKPI = Object.freeze({
      counts: Object.freeze({ ...total.counts }),
      matchResultCount: total.matchResultCount,
      providerCount: providers.size,
      totalExpected: roundMoney(total.totalExpected),
      totalBilled: roundMoney(total.totalBilled),
      leakageAmount: roundMoney(total.leakage),
      matchRate: orders === 0 ? 0 : Math.round((matchedOrders / orders) * 10_000) / 10_000,
    });

    return { kpis, overall };
  }
}
