/**
 * @commrecon/cli
 *
 * Config loading, feed mapping and report export behind the `recon` command
 */

export {
  ConfigError,
  configFileSchema,
  feedSourceSchema,
  outputSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
} from './config.js';
export type {
  ConfigFile,
  EnvExpansionOptions,
  FeedSource,
  OutputConfig,
  ReconConfig,
} from './config.js';

export {
  ORDER_FIELDS,
  COMMISSION_FIELDS,
  FEED_PAGE_SIZE,
  createFeedConnector,
  loadFeed,
  mapColumns,
} from './feeds.js';
export { exportReport, writeThrough } from './export.js';
export { runReconciliation } from './run.js';
export type { RunOptions, RunResult } from './run.js';
