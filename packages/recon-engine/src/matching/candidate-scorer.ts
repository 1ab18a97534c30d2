/**
 * Candidate Scorer
 *
 * Fuzzy confidence for an (order, commission line) pair.
 */

import { daysOutsidePeriod } from '@commrecon/core';
import { calculateSimilarity } from '@commrecon/entity-resolution/similarity';
import type { MatchingSettings } from '../rules/index.js';
import type { CommissionLine, Order, ScoreBreakdown } from '../types/index.js';

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * 1 for equal amounts, falling linearly with the relative difference.
 */
export function amountProximity(expected: number, billed: number): number {
  const scale = Math.max(Math.abs(expected), Math.abs(billed));
  if (scale === 0) return 1;
  return Math.max(0, 1 - Math.abs(expected - billed) / scale);
}

/**
 * 1 when the booking date falls inside the statement period, 0 once it is
 * `windowDays` or more outside it.
 */
export function dateProximity(bookingDate: Date, period: string, windowDays: number): number {
  const outside = daysOutsidePeriod(bookingDate, period);
  return Math.max(0, 1 - outside / windowDays);
}

export class CandidateScorer {
  /**
   * Weighted mean of code similarity, amount proximity and date proximity,
   * rounded to 4 decimals.
   */
  score(order: Order, line: CommissionLine, settings: MatchingSettings): ScoreBreakdown {
    const codeSimilarity = calculateSimilarity(
      order.confirmationCode,
      line.confirmationCode,
      settings.codeSimilarity
    ).score;
    const amount = amountProximity(order.expectedCommission, line.billedAmount);
    const date = dateProximity(order.bookingDate, line.statementPeriod, settings.dateWindowDays);

    const weights = settings.fuzzyWeights;
    const totalWeight = weights.code + weights.amount + weights.date;
    const score =
      (weights.code * codeSimilarity + weights.amount * amount + weights.date * date) /
      totalWeight;

    return {
      codeSimilarity: round4(codeSimilarity),
      amountProximity: round4(amount),
      dateProximity: round4(date),
      score: round4(score),
    };
  }

  /**
   * A candidate is accepted only when its score is strictly above the threshold.
   */
  meetsThreshold(score: number, threshold: number): boolean {
    return score > threshold;
  }
}
