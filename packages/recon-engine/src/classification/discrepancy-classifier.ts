/**
 * Discrepancy Classifier
 *
 * MatchResult → DiscrepancyRecord. Pure; the tolerance band comes from the
 * provider's settings.
 */

import { roundMoney } from '@commrecon/core';
import { ConfigurationError } from '../errors/index.js';
import type { ToleranceSettings } from '../rules/index.js';
import type {
  CompiledRuleSet,
  DiscrepancyCategory,
  DiscrepancyRecord,
  MatchResult,
} from '../types/index.js';

/**
 * Largest |expected - billed| still treated as agreement.
 */
export function toleranceLimit(expected: number, tolerance: ToleranceSettings): number {
  return roundMoney(
    Math.max(tolerance.absolute, (tolerance.percentage / 100) * Math.abs(expected))
  );
}

export function isWithinTolerance(
  amountDelta: number,
  expected: number,
  tolerance: ToleranceSettings
): boolean {
  return Math.abs(amountDelta) <= toleranceLimit(expected, tolerance);
}

function categorize(result: MatchResult, tolerance: ToleranceSettings): DiscrepancyCategory {
  switch (result.matchKind) {
    case 'unmatched_order':
      return 'missing_commission';
    case 'unmatched_commission':
      return 'orphan_commission';
    case 'exact':
    case 'fuzzy':
      if (isWithinTolerance(result.amountDelta, result.expectedAmount, tolerance)) {
        return 'ok';
      }
      return result.amountDelta > 0 ? 'underbilled' : 'overbilled';
    default: {
      const exhaustive: never = result.matchKind;
      throw new Error(`Unknown match kind: ${String(exhaustive)}`);
    }
  }
}

export function classifyMatchResult(
  result: MatchResult,
  tolerance: ToleranceSettings
): DiscrepancyRecord {
  const category = categorize(result, tolerance);
  return Object.freeze({
    matchResultRef: result.id,
    providerId: result.providerId,
    period: result.period,
    category,
    magnitude: category === 'ok' ? 0 : roundMoney(Math.abs(result.amountDelta)),
    expectedAmount: result.expectedAmount,
    billedAmount: result.billedAmount,
  });
}

export class DiscrepancyClassifier {
  constructor(private readonly ruleSet: CompiledRuleSet) {}

  classify(result: MatchResult): DiscrepancyRecord {
    return classifyMatchResult(result, this.toleranceFor(result.providerId));
  }

  classifyAll(results: readonly MatchResult[]): DiscrepancyRecord[] {
    return results.map((result) => this.classify(result));
  }

  private toleranceFor(providerId: string): ToleranceSettings {
    const rule = this.ruleSet.providers.get(providerId);
    if (!rule) {
      throw new ConfigurationError({
        code: 'UNKNOWN_PROVIDER',
        message: `No provider rule for "${providerId}"`,
        context: { providers: [providerId] },
      });
    }
    return rule.settings.tolerance;
  }
}
