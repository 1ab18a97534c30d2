import { createSilentLogger, type Logger } from '@commrecon/core';
import {
  ReconError,
  createReconciliationEngine,
  formatReconciliationReport,
  type ReconciliationReport,
} from '@commrecon/recon-engine';
import type { ReconConfig } from './config.js';
import { exportReport } from './export.js';
import { loadFeed } from './feeds.js';

export interface RunOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

export interface RunResult {
  report: ReconciliationReport;
  /** Plain-text summary for the terminal */
  summary: string;
  outputFiles: string[];
}

/**
 * Load both feeds, reconcile them and export the report.
 * Nothing is exported when reconciliation fails or the run is aborted.
 */
export async function runReconciliation(
  config: ReconConfig,
  options: RunOptions = {}
): Promise<RunResult> {
  const logger = options.logger ?? createSilentLogger();

  const [orders, commissions] = await Promise.all([
    loadFeed(config.feeds.orders, 'orders'),
    loadFeed(config.feeds.commissions, 'commissions'),
  ]);
  logger.info('Feeds loaded', { orders: orders.length, commissions: commissions.length });

  const engine = createReconciliationEngine({ logger });
  const report = await engine.reconcile({ orders, commissions }, config.rules, {
    maxConcurrency: config.engine.maxConcurrency,
    onInvalidRecord: config.engine.onInvalidRecord,
    signal: options.signal,
  });

  if (options.signal?.aborted) {
    throw new ReconError({
      code: 'RUN_ABORTED',
      message: 'Reconciliation run was aborted before export',
      cause: options.signal.reason instanceof Error ? options.signal.reason : undefined,
    });
  }

  const outputFiles = config.output ? await exportReport(report, config.output) : [];
  if (config.output) {
    logger.info('Report exported', { format: config.output.format, files: outputFiles });
  }

  return { report, summary: formatReconciliationReport(report), outputFiles };
}
