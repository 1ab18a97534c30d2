/**
 * Reconciliation Engine
 *
 * Orchestrates a run: rule compilation, feed validation, de-duplication,
 * per-provider matching shards, classification and aggregation.
 */

import { randomUUID } from 'crypto';
import { createSilentLogger, type Logger } from '@commrecon/core';
import { Aggregator } from '../aggregation/index.js';
import { DiscrepancyClassifier } from '../classification/index.js';
import { Semaphore } from '../concurrency/index.js';
import { ConfigurationError, DataQualityError, ReconError } from '../errors/index.js';
import type {
  IReconciliationEngine,
  ReconciliationFeeds,
  ReconciliationOptions,
} from '../interfaces/index.js';
import { CandidateScorer, MatchingEngine, compareIds, type MatchShard } from '../matching/index.js';
import {
  deduplicateCommissionLines,
  validateCommissionLines,
  validateOrders,
} from '../normalization/index.js';
import { compileRuleSet, type RuleSetInput } from '../rules/index.js';
import type {
  CommissionLine,
  MatchResult,
  Order,
  ReconciliationReport,
  ReconciliationSummary,
  ReconWarning,
  RejectRecord,
} from '../types/index.js';

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface ReconciliationEngineOptions {
  logger?: Logger;
}

/**
 * Reconciliation Engine Implementation
 */
export class ReconciliationEngine implements IReconciliationEngine {
  private readonly scorer = new CandidateScorer();
  private readonly aggregator = new Aggregator();
  private readonly logger: Logger;

  constructor(options: ReconciliationEngineOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  async reconcile(
    feeds: ReconciliationFeeds,
    ruleSetInput: RuleSetInput,
    options: ReconciliationOptions = {}
  ): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const logger = (options.logger ?? this.logger).child({ runId: randomUUID() });
    const { maxConcurrency = DEFAULT_MAX_CONCURRENCY, onInvalidRecord = 'reject', signal } =
      options;

    this.validateOptions(maxConcurrency, onInvalidRecord);
    throwIfAborted(signal);

    const ruleSet = compileRuleSet(ruleSetInput);

    const orderFeed = validateOrders(feeds.orders, ruleSet);
    const lineFeed = validateCommissionLines(feeds.commissions, ruleSet);

    const unknownProviders = [
      ...new Set([...orderFeed.unknownProviders, ...lineFeed.unknownProviders]),
    ];
    if (unknownProviders.length > 0) {
      throw new ConfigurationError({
        code: 'UNKNOWN_PROVIDER',
        message: `No provider rule for: ${unknownProviders.map((p) => `"${p}"`).join(', ')}`,
        suggestion: 'Add these providers (or aliases for them) to the rule set',
        context: { providers: unknownProviders },
      });
    }

    const rejects: RejectRecord[] = [...orderFeed.rejects, ...lineFeed.rejects];
    if (rejects.length > 0 && onInvalidRecord === 'fail') {
      throw new DataQualityError({
        code: 'INVALID_RECORDS',
        message: `${rejects.length} invalid record(s):\n${rejects
          .map((r) => `- ${r.feed}[${r.recordIndex}]: ${r.message}`)
          .join('\n')}`,
        suggestion: "Fix the records or run with onInvalidRecord: 'reject'",
        issues: rejects.flatMap((r) => r.issues),
        context: { rejects },
      });
    }

    const deduplicated = deduplicateCommissionLines(lineFeed.records);
    const shards = buildShards(orderFeed.records, deduplicated.lines);

    logger.info('Reconciliation started', {
      orders: orderFeed.records.length,
      commissionLines: lineFeed.records.length,
      deduplicatedLines: deduplicated.lines.length,
      rejects: rejects.length,
      shards: shards.length,
    });

    const matcher = new MatchingEngine(ruleSet, this.scorer);
    const semaphore = new Semaphore(maxConcurrency);
    const shardResults = await Promise.all(
      shards.map((shard) =>
        semaphore.run(async () => {
          throwIfAborted(signal);
          const result = matcher.matchShard(shard);
          logger.debug('Shard matched', {
            providerId: shard.providerId,
            orders: shard.orders.length,
            lines: shard.lines.length,
            warnings: result.warnings.length,
          });
          return result;
        })
      )
    );
    throwIfAborted(signal);

    const matchResults = shardResults.flatMap((r) => r.matchResults);
    const warnings: ReconWarning[] = [
      ...deduplicated.warnings,
      ...shardResults.flatMap((r) => r.warnings),
    ];

    const discrepancies = new DiscrepancyClassifier(ruleSet).classifyAll(matchResults);
    const { kpis, overall } = this.aggregator.aggregate(discrepancies);

    const summary = this.summarize(
      orderFeed.records.length,
      lineFeed.records.length,
      deduplicated.lines.length,
      matchResults,
      rejects.length,
      warnings.length
    );

    for (const warning of warnings) {
      logger.warn(warning.message, { code: warning.code, providerId: warning.providerId });
    }
    logger.info('Reconciliation finished', {
      matchResults: matchResults.length,
      leakageAmount: overall.leakageAmount,
      matchRate: overall.matchRate,
    });

    return {
      id: randomUUID(),
      timestamp: new Date(),
      summary,
      matchResults,
      discrepancies,
      kpis,
      overall,
      rejects,
      warnings,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private summarize(
    orderCount: number,
    inputCommissionLineCount: number,
    commissionLineCount: number,
    matchResults: readonly MatchResult[],
    rejectCount: number,
    warningCount: number
  ): ReconciliationSummary {
    const count = (kind: MatchResult['matchKind']) =>
      matchResults.filter((r) => r.matchKind === kind).length;
    const confidences = matchResults
      .filter((r) => r.matchKind === 'exact' || r.matchKind === 'fuzzy')
      .map((r) => r.confidence);
    const averageConfidence =
      confidences.length === 0
        ? 0
        : Math.round((confidences.reduce((a, b) => a + b, 0) / confidences.length) * 10_000) /
          10_000;

    return {
      orderCount,
      commissionLineCount,
      inputCommissionLineCount,
      exactCount: count('exact'),
      fuzzyCount: count('fuzzy'),
      unmatchedOrderCount: count('unmatched_order'),
      unmatchedCommissionCount: count('unmatched_commission'),
      rejectCount,
      warningCount,
      averageConfidence,
    };
  }

  private validateOptions(maxConcurrency: number, onInvalidRecord: string): void {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigurationError({
        code: 'INVALID_OPTIONS',
        message: `maxConcurrency must be a positive integer (got ${maxConcurrency})`,
        suggestion: `Omit it to use the default of ${DEFAULT_MAX_CONCURRENCY}`,
      });
    }
    if (onInvalidRecord !== 'reject' && onInvalidRecord !== 'fail') {
      throw new ConfigurationError({
        code: 'INVALID_OPTIONS',
        message: `onInvalidRecord must be "reject" or "fail" (got "${onInvalidRecord}")`,
      });
    }
  }
}

/**
 * One shard per provider present in either feed, ordered by provider id.
 */
export function buildShards(
  orders: readonly Order[],
  lines: readonly CommissionLine[]
): MatchShard[] {
  const shards = new Map<string, { providerId: string; orders: Order[]; lines: CommissionLine[] }>();
  const shardFor = (providerId: string) => {
    let shard = shards.get(providerId);
    if (!shard) {
      shard = { providerId, orders: [], lines: [] };
      shards.set(providerId, shard);
    }
    return shard;
  };

  for (const order of orders) shardFor(order.providerId).orders.push(order);
  for (const line of lines) shardFor(line.providerId).lines.push(line);

  return [...shards.values()].sort((a, b) => compareIds(a.providerId, b.providerId));
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ReconError({
      code: 'RUN_ABORTED',
      message: 'Reconciliation run was aborted',
      cause: signal.reason instanceof Error ? signal.reason : undefined,
    });
  }
}
