#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   recon --config ./recon.config.json
 */

import { ConnectorError, Logger } from '@commrecon/core';
import { ReconError } from '@commrecon/recon-engine';
import { ConfigError, loadConfig } from './config.js';
import { runReconciliation } from './run.js';

const EXAMPLE_CONFIG = {
  feeds: {
    orders: { type: 'csv', filePath: './orders.csv' },
    commissions: {
      type: 'excel',
      filePath: './statement.xlsx',
      sheet: 'Commissions',
      columns: { billedAmount: 'Commission', lineId: 'Line' },
    },
  },
  rules: './rules.json',
  output: { format: 'xlsx', path: './out/reconciliation.xlsx' },
};

function printUsage(): void {
  console.error('Usage: recon --config <config.json>');
  console.error('');
  console.error('Supported feed types: csv, json, excel');
  console.error('Supported output formats: xlsx, csv, json');
  console.error('');
  console.error('Example config.json:');
  console.error(JSON.stringify(EXAMPLE_CONFIG, null, 2));
}

function describeError(error: unknown): string {
  if (error instanceof ReconError || error instanceof ConnectorError) {
    return error.toActionableMessage();
  }
  if (error instanceof ConfigError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;

  if (!configPath || args.includes('--help')) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const config = await loadConfig(configPath);
    logger = new Logger({ level: config.logging.level, format: config.logging.format });

    const { summary, outputFiles } = await runReconciliation(config, {
      logger,
      signal: controller.signal,
    });

    process.stdout.write(`${summary}\n`);
    for (const file of outputFiles) {
      process.stdout.write(`Wrote ${file}\n`);
    }
  } catch (error) {
    logger.debug('Reconciliation failed', { error });
    console.error(describeError(error));
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
