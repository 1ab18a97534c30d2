/**
 * Feed validation
 *
 * Turns raw feed records into frozen Orders and CommissionLines. Bad records
 * become RejectRecords; provider names nobody configured are collected so
 * the caller can fail the whole run with one error listing all of them.
 */

import { z } from 'zod';
import {
  amountSchema,
  currencySchema,
  dateSchema,
  periodSchema,
  requiredTextSchema,
  type FieldIssue,
  type Record as DataRecord,
} from '@commrecon/core';
import { DataQualityError } from '../errors/index.js';
import { lookupProvider } from '../rules/index.js';
import type {
  CommissionLine,
  CompiledRuleSet,
  FeedName,
  Order,
  RejectRecord,
} from '../types/index.js';
import { TAX_TREATMENTS } from '../types/index.js';
import { applyTaxAdjustment, normalizeConfirmationCode } from './key-normalizer.js';

const taxTreatmentSchema = z.preprocess(
  (value) => {
    if (value === null || value === undefined) return undefined;
    if (typeof value !== 'string') return value;
    const trimmed = value.trim().toLowerCase();
    return trimmed === '' ? undefined : trimmed;
  },
  z
    .enum(['gross', 'net', 'exempt'], {
      errorMap: () => ({ message: `must be one of ${TAX_TREATMENTS.join(', ')}` }),
    })
    .default('net')
);

export const orderRecordSchema = z.object({
  orderId: requiredTextSchema,
  confirmationCode: requiredTextSchema,
  providerId: requiredTextSchema,
  expectedCommission: amountSchema,
  currency: currencySchema,
  bookingDate: dateSchema,
  taxTreatment: taxTreatmentSchema,
});

export const commissionRecordSchema = z.object({
  lineId: requiredTextSchema,
  confirmationCode: requiredTextSchema,
  providerId: requiredTextSchema,
  billedAmount: amountSchema,
  currency: currencySchema,
  statementPeriod: periodSchema,
});

export interface FeedValidation<T> {
  records: T[];
  rejects: RejectRecord[];
  /** Raw provider names with no matching rule, in first-seen order */
  unknownProviders: string[];
}

function toFieldIssues(error: z.ZodError, record: DataRecord): FieldIssue[] {
  return error.issues.map((issue) => {
    const field = issue.path.length ? issue.path.join('.') : '(record)';
    const key = issue.path[0];
    return {
      field,
      message: issue.message,
      value: typeof key === 'string' ? record[key] : undefined,
    };
  });
}

function textOrNull(value: unknown): string | null {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function rejectFromError(
  feed: FeedName,
  recordIndex: number,
  recordId: string | null,
  providerId: string | null,
  error: DataQualityError
): RejectRecord {
  return Object.freeze({
    feed,
    recordIndex,
    recordId,
    providerId,
    code: error.code,
    message: error.message,
    issues: error.issues,
  });
}

function invalidRecord(
  feed: FeedName,
  recordIndex: number,
  record: DataRecord,
  idField: string,
  error: z.ZodError
): RejectRecord {
  const issues = toFieldIssues(error, record);
  return Object.freeze({
    feed,
    recordIndex,
    recordId: textOrNull(record[idField]),
    providerId: textOrNull(record.providerId),
    code: 'INVALID_RECORD',
    message: `Invalid ${feed === 'orders' ? 'order' : 'commission line'} at index ${recordIndex}: ${issues
      .map((i) => `${i.field} ${i.message}`)
      .join('; ')}`,
    issues,
  });
}

function normalizeCode(
  rawCode: string,
  providerId: string,
  ruleSet: CompiledRuleSet
): string | DataQualityError {
  try {
    return normalizeConfirmationCode(rawCode, providerId, ruleSet);
  } catch (error) {
    if (error instanceof DataQualityError) return error;
    throw error;
  }
}

/**
 * Validate and normalize the orders feed.
 *
 * @throws ConfigurationError when code patterns never settle
 */
export function validateOrders(
  records: readonly DataRecord[],
  ruleSet: CompiledRuleSet
): FeedValidation<Order> {
  const orders: Order[] = [];
  const rejects: RejectRecord[] = [];
  const unknownProviders = new Set<string>();
  const seenIds = new Set<string>();

  records.forEach((record, recordIndex) => {
    const parsed = orderRecordSchema.safeParse(record);
    if (!parsed.success) {
      rejects.push(invalidRecord('orders', recordIndex, record, 'orderId', parsed.error));
      return;
    }

    const data = parsed.data;
    const providerId = lookupProvider(ruleSet, data.providerId);
    if (providerId === undefined) {
      unknownProviders.add(data.providerId);
      return;
    }

    if (seenIds.has(data.orderId)) {
      rejects.push(
        rejectFromError(
          'orders',
          recordIndex,
          data.orderId,
          providerId,
          new DataQualityError({
            code: 'DUPLICATE_RECORD',
            message: `Duplicate orderId "${data.orderId}"`,
            issues: [{ field: 'orderId', message: 'must be unique', value: data.orderId }],
          })
        )
      );
      return;
    }

    const code = normalizeCode(data.confirmationCode, providerId, ruleSet);
    if (code instanceof DataQualityError) {
      rejects.push(rejectFromError('orders', recordIndex, data.orderId, providerId, code));
      return;
    }

    seenIds.add(data.orderId);
    orders.push(
      Object.freeze({
        orderId: data.orderId,
        providerId,
        rawConfirmationCode: data.confirmationCode,
        confirmationCode: code,
        expectedCommission: applyTaxAdjustment(
          data.expectedCommission,
          data.taxTreatment,
          providerId,
          ruleSet
        ),
        reportedCommission: data.expectedCommission,
        currency: data.currency,
        bookingDate: data.bookingDate,
        taxTreatment: data.taxTreatment,
        recordIndex,
      })
    );
  });

  return { records: orders, rejects, unknownProviders: [...unknownProviders] };
}

/**
 * Validate and normalize the commission feed.
 *
 * @throws ConfigurationError when code patterns never settle
 */
export function validateCommissionLines(
  records: readonly DataRecord[],
  ruleSet: CompiledRuleSet
): FeedValidation<CommissionLine> {
  const lines: CommissionLine[] = [];
  const rejects: RejectRecord[] = [];
  const unknownProviders = new Set<string>();
  const seenIds = new Set<string>();

  records.forEach((record, recordIndex) => {
    const parsed = commissionRecordSchema.safeParse(record);
    if (!parsed.success) {
      rejects.push(invalidRecord('commissions', recordIndex, record, 'lineId', parsed.error));
      return;
    }

    const data = parsed.data;
    const providerId = lookupProvider(ruleSet, data.providerId);
    if (providerId === undefined) {
      unknownProviders.add(data.providerId);
      return;
    }

    const idKey = `${providerId}\u001F${data.lineId}`;
    if (seenIds.has(idKey)) {
      rejects.push(
        rejectFromError(
          'commissions',
          recordIndex,
          data.lineId,
          providerId,
          new DataQualityError({
            code: 'DUPLICATE_RECORD',
            message: `Duplicate lineId "${data.lineId}" for provider "${providerId}"`,
            issues: [{ field: 'lineId', message: 'must be unique per provider', value: data.lineId }],
          })
        )
      );
      return;
    }

    const code = normalizeCode(data.confirmationCode, providerId, ruleSet);
    if (code instanceof DataQualityError) {
      rejects.push(rejectFromError('commissions', recordIndex, data.lineId, providerId, code));
      return;
    }

    seenIds.add(idKey);
    lines.push(
      Object.freeze({
        lineId: data.lineId,
        providerId,
        rawConfirmationCode: data.confirmationCode,
        confirmationCode: code,
        billedAmount: data.billedAmount,
        currency: data.currency,
        statementPeriod: data.statementPeriod,
        sourceLineIds: Object.freeze([data.lineId]),
        recordIndex,
      })
    );
  });

  return { records: lines, rejects, unknownProviders: [...unknownProviders] };
}
