import type { Record as DataRecord } from '@commrecon/core';
import { DEFAULT_MATCHING_SETTINGS, type RuleSetInput } from '../src/rules/index.js';

export function testRules(providers?: RuleSetInput['providers']): RuleSetInput {
  return {
    defaults: { ...DEFAULT_MATCHING_SETTINGS, tolerance: { absolute: 0, percentage: 5 } },
    providers: providers ?? [
      { providerId: 'ACME', aliases: ['Acme Travel'] },
      { providerId: 'GLOBEX' },
    ],
  };
}

export function order(
  orderId: string,
  confirmationCode: string,
  expectedCommission: unknown,
  bookingDate: unknown = '2024-03-10',
  extra: DataRecord = {}
): DataRecord {
  return {
    orderId,
    confirmationCode,
    providerId: 'ACME',
    expectedCommission,
    currency: 'USD',
    bookingDate,
    ...extra,
  };
}

export function line(
  lineId: string,
  confirmationCode: string,
  billedAmount: unknown,
  statementPeriod = '2024-03',
  extra: DataRecord = {}
): DataRecord {
  return {
    lineId,
    confirmationCode,
    providerId: 'ACME',
    billedAmount,
    currency: 'USD',
    statementPeriod,
    ...extra,
  };
}
