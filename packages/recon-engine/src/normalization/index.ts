export {
  normalizeConfirmationCode,
  normalizeProviderId,
  applyTaxAdjustment,
} from './key-normalizer.js';
export {
  validateOrders,
  validateCommissionLines,
  orderRecordSchema,
  commissionRecordSchema,
} from './feed-validator.js';
export type { FeedValidation } from './feed-validator.js';
export { deduplicateCommissionLines } from './deduplicator.js';
export type { DeduplicationResult } from './deduplicator.js';
