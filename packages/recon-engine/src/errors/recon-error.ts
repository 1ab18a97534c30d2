/**
 * Reconciliation Error Types
 *
 * ConfigurationError aborts a run before any matching starts.
 * DataQualityError is scoped to one record (or, in fail-fast mode, lists
 * every offending record of the run).
 */

import type { FieldIssue } from '@commrecon/core';

export type ReconErrorCode =
  | 'INVALID_RULE_SET'
  | 'MISSING_THRESHOLD'
  | 'UNKNOWN_PROVIDER'
  | 'NON_IDEMPOTENT_RULES'
  | 'INVALID_OPTIONS'
  | 'INVALID_RECORD'
  | 'EMPTY_CONFIRMATION_CODE'
  | 'DUPLICATE_RECORD'
  | 'INVALID_RECORDS'
  | 'RUN_ABORTED';

export interface ReconErrorDetails {
  code: ReconErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconError extends Error {
  readonly code: ReconErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconErrorDetails) {
    super(details.message);
    this.name = 'ReconError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Invalid or incomplete rule set, unknown provider, bad engine options.
 */
export class ConfigurationError extends ReconError {
  constructor(details: ReconErrorDetails) {
    super(details);
    this.name = 'ConfigurationError';
  }
}

export interface DataQualityErrorDetails extends ReconErrorDetails {
  /** Field-level problems found in the record */
  issues?: FieldIssue[];
}

/**
 * Malformed or incomplete input record.
 */
export class DataQualityError extends ReconError {
  readonly issues: FieldIssue[];

  constructor(details: DataQualityErrorDetails) {
    super(details);
    this.name = 'DataQualityError';
    this.issues = details.issues ?? [];
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}
