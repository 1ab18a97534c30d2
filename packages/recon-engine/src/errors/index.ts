/**
 * Error exports for the reconciliation engine
 */

export { ReconError, ConfigurationError, DataQualityError } from './recon-error.js';
export type {
  ReconErrorCode,
  ReconErrorDetails,
  DataQualityErrorDetails,
} from './recon-error.js';
