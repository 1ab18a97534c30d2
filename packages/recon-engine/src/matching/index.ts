export { CandidateIndex, compareIds } from './candidate-index.js';
export { CandidateScorer, amountProximity, dateProximity } from './candidate-scorer.js';
export { ClaimLedger } from './claim-ledger.js';
export type { Claim, ClaimKind } from './claim-ledger.js';
export { MatchingEngine, orderResultId, lineResultId } from './matching-engine.js';
export type { MatchShard, ShardResult } from './matching-engine.js';
