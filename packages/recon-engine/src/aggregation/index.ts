export { Aggregator, emptyCounts, leakageContribution } from './aggregator.js';
export type { AggregationResult } from './aggregator.js';
