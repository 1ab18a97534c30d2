/**
 * Matching Engine
 *
 * Pairs the orders of one provider shard with its commission lines:
 * exact code match first, then the best fuzzy candidate above the
 * acceptance threshold, under one-to-one claim discipline.
 */

import { roundMoney, toPeriod } from '@commrecon/core';
import { ConfigurationError } from '../errors/index.js';
import type { MatchingSettings } from '../rules/index.js';
import type {
  AmbiguousMatchWarning,
  CommissionLine,
  CompiledRuleSet,
  MatchResult,
  NearMiss,
  Order,
  ReconWarning,
  ScoreBreakdown,
} from '../types/index.js';
import { CandidateIndex, compareIds } from './candidate-index.js';
import { CandidateScorer } from './candidate-scorer.js';
import { ClaimLedger, type ClaimKind } from './claim-ledger.js';

const EXACT_CONFIDENCE = 1;

/**
 * Orders and commission lines of a single provider.
 */
export interface MatchShard {
  providerId: string;
  orders: readonly Order[];
  lines: readonly CommissionLine[];
}

export interface ShardResult {
  providerId: string;
  /** One per order (feed order), then one per unclaimed line */
  matchResults: MatchResult[];
  warnings: ReconWarning[];
}

type OrderOutcome =
  | {
      kind: ClaimKind;
      line: CommissionLine;
      confidence: number;
      rejectedCandidates: string[];
      breakdown?: ScoreBreakdown;
    }
  | { kind: 'unmatched'; nearMiss?: NearMiss };

interface ScoredCandidate {
  line: CommissionLine;
  breakdown: ScoreBreakdown;
}

/**
 * An order left without an exact match, working down its fuzzy candidates.
 */
interface FuzzyProposer {
  order: Order;
  /** All block candidates, best first */
  candidates: ScoredCandidate[];
  /** Same-currency candidates above the threshold, best first */
  acceptable: ScoredCandidate[];
  next: number;
  exactNearMiss?: NearMiss;
}

interface ShardContext {
  index: CandidateIndex;
  ledger: ClaimLedger;
  settings: MatchingSettings;
  outcomes: Map<string, OrderOutcome>;
  warnings: ReconWarning[];
}

export function orderResultId(orderId: string): string {
  return `order:${orderId}`;
}

export function lineResultId(providerId: string, lineId: string): string {
  return `line:${providerId}:${lineId}`;
}

export class MatchingEngine {
  constructor(
    private readonly ruleSet: CompiledRuleSet,
    private readonly scorer: CandidateScorer = new CandidateScorer()
  ) {}

  /**
   * Match one shard. The index and claim ledger live only for the duration
   * of this call.
   *
   * Exact matches are committed first, in feed order. The remaining orders
   * then propose to their fuzzy candidates best first; a line keeps the
   * proposer it ranks highest and a displaced order moves on to its next
   * candidate. The fuzzy outcome does not depend on the feed order.
   */
  matchShard(shard: MatchShard): ShardResult {
    const ctx: ShardContext = {
      index: new CandidateIndex(shard.lines, this.ruleSet),
      ledger: new ClaimLedger(),
      settings: this.settingsFor(shard.providerId),
      outcomes: new Map(),
      warnings: [],
    };

    const pending: Order[] = [];
    for (const order of shard.orders) {
      const outcome = this.matchExact(order, ctx);
      if (outcome) {
        ctx.outcomes.set(order.orderId, outcome);
      } else {
        pending.push(order);
      }
    }
    this.matchFuzzy(pending, ctx);

    const matchResults: MatchResult[] = [];
    for (const order of shard.orders) {
      const outcome = ctx.outcomes.get(order.orderId) ?? { kind: 'unmatched' };
      matchResults.push(this.toOrderResult(order, outcome));
    }
    for (const line of shard.lines) {
      if (!ctx.ledger.isClaimed(line.lineId)) {
        matchResults.push(this.toCommissionResult(line));
      }
    }

    return { providerId: shard.providerId, matchResults, warnings: ctx.warnings };
  }

  private matchExact(order: Order, ctx: ShardContext): OrderOutcome | undefined {
    const available = ctx.index
      .lookupExact(order.providerId, order.confirmationCode)
      .filter((line) => line.currency === order.currency && !ctx.ledger.isClaimed(line.lineId));
    return available.length > 0 ? this.commitExact(order, available, ctx) : undefined;
  }

  private matchFuzzy(orders: readonly Order[], ctx: ShardContext): void {
    const proposers = new Map<string, FuzzyProposer>();
    for (const order of orders) {
      proposers.set(order.orderId, this.toProposer(order, ctx));
    }

    const queue = [...proposers.values()];
    for (let i = 0; i < queue.length; i++) {
      const proposer = queue[i];
      if (!proposer) continue;
      const { order, acceptable } = proposer;

      while (proposer.next < acceptable.length) {
        const candidate = acceptable[proposer.next++];
        if (!candidate) break;
        const { line, breakdown } = candidate;
        if (!ctx.ledger.canClaim(line.lineId, order.orderId, breakdown.score)) continue;

        const displaced = ctx.ledger.claim(line.lineId, order.orderId, 'fuzzy', breakdown.score);
        const requeued = displaced && proposers.get(displaced.orderId);
        if (requeued) queue.push(requeued);
        break;
      }
    }

    for (const proposer of proposers.values()) {
      ctx.outcomes.set(proposer.order.orderId, this.settleFuzzy(proposer, ctx));
    }
  }

  private toProposer(order: Order, ctx: ShardContext): FuzzyProposer {
    const bucket = ctx.index.lookupExact(order.providerId, order.confirmationCode);
    const exactIds = new Set(bucket.map((line) => line.lineId));
    const candidates = ctx.index
      .lookupFuzzyBlock(order.providerId, order.confirmationCode)
      .filter((line) => !exactIds.has(line.lineId))
      .map((line) => ({ line, breakdown: this.scorer.score(order, line, ctx.settings) }))
      .sort((a, b) => compareCandidates(order, a, b));

    const threshold = ctx.settings.acceptanceThreshold;
    const acceptable: ScoredCandidate[] = [];
    for (const candidate of candidates) {
      if (candidate.line.currency !== order.currency) continue;
      if (!this.scorer.meetsThreshold(candidate.breakdown.score, threshold)) break;
      acceptable.push(candidate);
    }

    const exactNearMiss = this.exactNearMiss(order, bucket, ctx.ledger);
    return { order, candidates, acceptable, next: 0, ...(exactNearMiss ? { exactNearMiss } : {}) };
  }

  /**
   * Read an order's outcome off the settled ledger. Every acceptable
   * candidate ranked above the order's own claim is held by another order.
   */
  private settleFuzzy(proposer: FuzzyProposer, ctx: ShardContext): OrderOutcome {
    const { order, candidates } = proposer;
    const threshold = ctx.settings.acceptanceThreshold;
    let nearMiss = proposer.exactNearMiss;
    let warned = false;

    for (const candidate of candidates) {
      const { line, breakdown } = candidate;
      if (line.currency !== order.currency) {
        nearMiss ??= { lineId: line.lineId, reason: 'currency_mismatch', score: breakdown.score };
        continue;
      }
      if (!this.scorer.meetsThreshold(breakdown.score, threshold)) {
        nearMiss ??= { lineId: line.lineId, reason: 'below_threshold', score: breakdown.score };
        break;
      }

      const holder = ctx.ledger.get(line.lineId);
      if (!holder) continue;
      if (holder.orderId === order.orderId) {
        return this.commitFuzzy(order, candidate, ctx);
      }
      if (holder.kind === 'exact') {
        nearMiss ??= {
          lineId: line.lineId,
          reason: 'claimed',
          score: breakdown.score,
          claimedBy: holder.orderId,
        };
        continue;
      }

      nearMiss ??= {
        lineId: line.lineId,
        reason: 'preempted',
        score: breakdown.score,
        claimedBy: holder.orderId,
      };
      if (!warned) {
        warned = true;
        const warning: ReconWarning = {
          category: 'claim_preempted',
          code: 'CLAIM_PREEMPTED',
          message: `Order ${holder.orderId} (confidence ${holder.confidence}) holds line ${line.lineId} over order ${order.orderId} (confidence ${breakdown.score})`,
          providerId: order.providerId,
          orderId: order.orderId,
          lineIds: [line.lineId],
        };
        ctx.warnings.push(Object.freeze(warning));
      }
    }

    return nearMiss ? { kind: 'unmatched', nearMiss } : { kind: 'unmatched' };
  }

  private commitExact(
    order: Order,
    available: readonly CommissionLine[],
    ctx: ShardContext
  ): OrderOutcome {
    const [chosen, ...rejected] = [...available].sort(
      (a, b) =>
        Math.abs(a.billedAmount - order.expectedCommission) -
          Math.abs(b.billedAmount - order.expectedCommission) || compareIds(a.lineId, b.lineId)
    );
    if (!chosen) {
      return { kind: 'unmatched' };
    }

    ctx.ledger.claim(chosen.lineId, order.orderId, 'exact', EXACT_CONFIDENCE);

    const rejectedCandidates = rejected.map((line) => line.lineId);
    if (rejectedCandidates.length > 0) {
      ctx.warnings.push(
        ambiguousMatch({
          code: 'MULTIPLE_EXACT_CANDIDATES',
          message: `Order ${order.orderId} has ${available.length} exact candidates; chose ${chosen.lineId} (closest amount)`,
          providerId: order.providerId,
          orderId: order.orderId,
          lineIds: [chosen.lineId, ...rejectedCandidates],
        })
      );
    }

    return { kind: 'exact', line: chosen, confidence: EXACT_CONFIDENCE, rejectedCandidates };
  }

  private commitFuzzy(order: Order, candidate: ScoredCandidate, ctx: ShardContext): OrderOutcome {
    const { line, breakdown } = candidate;
    const { acceptanceThreshold, nearThresholdMargin } = ctx.settings;
    if (breakdown.score < acceptanceThreshold + nearThresholdMargin) {
      ctx.warnings.push(
        ambiguousMatch({
          code: 'NEAR_THRESHOLD_MATCH',
          message: `Order ${order.orderId} matched ${line.lineId} with score ${breakdown.score}, within ${nearThresholdMargin} of the threshold ${acceptanceThreshold}`,
          providerId: order.providerId,
          orderId: order.orderId,
          lineIds: [line.lineId],
        })
      );
    }

    return {
      kind: 'fuzzy',
      line,
      confidence: breakdown.score,
      rejectedCandidates: [],
      breakdown,
    };
  }

  /**
   * Why an order with a non-empty exact bucket still found nothing there.
   */
  private exactNearMiss(
    order: Order,
    bucket: readonly CommissionLine[],
    ledger: ClaimLedger
  ): NearMiss | undefined {
    for (const line of bucket) {
      if (line.currency !== order.currency) continue;
      return {
        lineId: line.lineId,
        reason: 'claimed',
        score: EXACT_CONFIDENCE,
        claimedBy: ledger.get(line.lineId)?.orderId,
      };
    }
    const [first] = bucket;
    return first
      ? { lineId: first.lineId, reason: 'currency_mismatch', score: EXACT_CONFIDENCE }
      : undefined;
  }

  private toOrderResult(order: Order, outcome: OrderOutcome): MatchResult {
    if (outcome.kind === 'unmatched') {
      const result: MatchResult = {
        id: orderResultId(order.orderId),
        providerId: order.providerId,
        period: toPeriod(order.bookingDate),
        orderRef: order.orderId,
        commissionLineRef: null,
        matchKind: 'unmatched_order',
        confidence: 0,
        expectedAmount: order.expectedCommission,
        billedAmount: 0,
        amountDelta: order.expectedCommission,
        currency: order.currency,
        rejectedCandidates: [],
        ...(outcome.nearMiss ? { nearMiss: Object.freeze(outcome.nearMiss) } : {}),
      };
      return Object.freeze(result);
    }

    const { line } = outcome;
    const result: MatchResult = {
      id: orderResultId(order.orderId),
      providerId: order.providerId,
      period: line.statementPeriod,
      orderRef: order.orderId,
      commissionLineRef: line.lineId,
      matchKind: outcome.kind,
      confidence: outcome.confidence,
      expectedAmount: order.expectedCommission,
      billedAmount: line.billedAmount,
      amountDelta: roundMoney(order.expectedCommission - line.billedAmount),
      currency: order.currency,
      rejectedCandidates: Object.freeze(outcome.rejectedCandidates),
      ...(outcome.breakdown ? { breakdown: Object.freeze(outcome.breakdown) } : {}),
    };
    return Object.freeze(result);
  }

  private toCommissionResult(line: CommissionLine): MatchResult {
    const result: MatchResult = {
      id: lineResultId(line.providerId, line.lineId),
      providerId: line.providerId,
      period: line.statementPeriod,
      orderRef: null,
      commissionLineRef: line.lineId,
      matchKind: 'unmatched_commission',
      confidence: 0,
      expectedAmount: 0,
      billedAmount: line.billedAmount,
      amountDelta: roundMoney(-line.billedAmount),
      currency: line.currency,
      rejectedCandidates: [],
    };
    return Object.freeze(result);
  }

  private settingsFor(providerId: string): MatchingSettings {
    const rule = this.ruleSet.providers.get(providerId);
    if (!rule) {
      throw new ConfigurationError({
        code: 'UNKNOWN_PROVIDER',
        message: `No provider rule for "${providerId}"`,
        context: { providers: [providerId] },
      });
    }
    return rule.settings;
  }
}

/**
 * Highest score first, then closest amount, then lowest line id.
 */
function compareCandidates(order: Order, a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    b.breakdown.score - a.breakdown.score ||
    Math.abs(a.line.billedAmount - order.expectedCommission) -
      Math.abs(b.line.billedAmount - order.expectedCommission) ||
    compareIds(a.line.lineId, b.line.lineId)
  );
}

function ambiguousMatch(
  details: Omit<AmbiguousMatchWarning, 'category'>
): AmbiguousMatchWarning {
  const warning: AmbiguousMatchWarning = { category: 'ambiguous_match', ...details };
  return Object.freeze(warning);
}
