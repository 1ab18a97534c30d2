/**
 * Zod field schemas for loosely typed feed cells.
 *
 * Each schema accepts the shapes spreadsheets and CSV exports produce and
 * outputs a single canonical type.
 */

import { z } from 'zod';
import { parseAmount } from '../utils/amounts.js';
import { parseDateValue, parsePeriod } from '../utils/dates.js';

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/** Non-empty text; numbers are accepted and stringified (codes are often numeric cells) */
export const requiredTextSchema = z.preprocess(
  (value) => (typeof value === 'number' && Number.isFinite(value) ? String(value) : value),
  z
    .string({ required_error: 'is required', invalid_type_error: 'must be text' })
    .trim()
    .min(1, 'must not be empty')
);

/** Monetary amount as a finite number */
export const amountSchema = z.unknown().transform((value, ctx) => {
  if (isBlank(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
    return z.NEVER;
  }
  const amount = parseAmount(value);
  if (amount === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `is not a valid amount: ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return amount;
});

/** Calendar date */
export const dateSchema = z.unknown().transform((value, ctx) => {
  if (isBlank(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
    return z.NEVER;
  }
  const date = parseDateValue(value);
  if (!date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `is not a valid date: ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return date;
});

/** Statement period as YYYY-MM */
export const periodSchema = z.unknown().transform((value, ctx) => {
  if (isBlank(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
    return z.NEVER;
  }
  const period = parsePeriod(value);
  if (!period) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `is not a valid period (expected YYYY-MM): ${JSON.stringify(value)}`,
    });
    return z.NEVER;
  }
  return period;
});

/** ISO 4217-style currency code, upper-cased */
export const currencySchema = requiredTextSchema.pipe(
  z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{3}$/, 'must be a 3-letter currency code'))
);
