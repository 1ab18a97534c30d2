/**
 * Commission de-duplication
 *
 * Lines of one provider sharing a normalized code and statement period are
 * folded into one line when they agree on amount and currency (a provider
 * billing the same booking in several identical rows). Disagreeing
 * duplicates stay separate and are flagged.
 */

import { roundMoney } from '@commrecon/core';
import type { CommissionLine, ReconWarning } from '../types/index.js';

export interface DeduplicationResult {
  lines: CommissionLine[];
  warnings: ReconWarning[];
}

function groupKey(line: CommissionLine): string {
  return [line.providerId, line.confirmationCode, line.statementPeriod].join('\u001F');
}

function isUniform(group: readonly CommissionLine[]): boolean {
  const [first, ...rest] = group;
  if (!first) return true;
  return rest.every(
    (line) => line.currency === first.currency && line.billedAmount === first.billedAmount
  );
}

function mergeGroup(group: readonly CommissionLine[], first: CommissionLine): CommissionLine {
  return Object.freeze({
    ...first,
    billedAmount: roundMoney(group.reduce((sum, line) => sum + line.billedAmount, 0)),
    sourceLineIds: Object.freeze(group.flatMap((line) => line.sourceLineIds)),
  });
}

/**
 * Fold identical duplicate lines; output keeps the order in which groups
 * first appear.
 */
export function deduplicateCommissionLines(lines: readonly CommissionLine[]): DeduplicationResult {
  const groups = new Map<string, CommissionLine[]>();
  for (const line of lines) {
    const key = groupKey(line);
    const group = groups.get(key);
    if (group) {
      group.push(line);
    } else {
      groups.set(key, [line]);
    }
  }

  const out: CommissionLine[] = [];
  const warnings: ReconWarning[] = [];

  for (const group of groups.values()) {
    const [first] = group;
    if (!first) continue;

    if (group.length === 1) {
      out.push(first);
      continue;
    }

    if (isUniform(group)) {
      out.push(mergeGroup(group, first));
      continue;
    }

    out.push(...group);
    const warning: ReconWarning = {
      category: 'duplicate_conflict',
      code: 'CONFLICTING_DUPLICATE',
      message: `Lines ${group.map((l) => l.lineId).join(', ')} share code ${first.confirmationCode} in ${first.statementPeriod} but differ in amount or currency`,
      providerId: first.providerId,
      lineIds: Object.freeze(group.map((l) => l.lineId)),
    };
    warnings.push(Object.freeze(warning));
  }

  return { lines: out, warnings };
}
