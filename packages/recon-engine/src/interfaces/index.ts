export type {
  IReconciliationEngine,
  ReconciliationFeeds,
  ReconciliationOptions,
  InvalidRecordPolicy,
} from './reconciliation-engine.js';
