import { describe, expect, it } from 'vitest';
import {
  parseAmount,
  roundMoney,
  parseDateValue,
  parsePeriod,
  daysOutsidePeriod,
  periodBounds,
  getField,
} from '../src/index.js';

describe('parseAmount', () => {
  it('reads plain numbers and numeric text', () => {
    expect(parseAmount(12.5)).toBe(12.5);
    expect(parseAmount(' 100 ')).toBe(100);
    expect(parseAmount('-3.25')).toBe(-3.25);
  });

  it('strips currency symbols and thousands separators', () => {
    expect(parseAmount('$1,234.50')).toBe(1234.5);
    expect(parseAmount('1 000')).toBe(1000);
  });

  it('treats accounting parentheses as negative', () => {
    expect(parseAmount('(12.00)')).toBe(-12);
    expect(parseAmount('($1,000)')).toBe(-1000);
  });

  it('returns null for empty or malformed cells', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('n/a')).toBeNull();
    expect(parseAmount('12.3.4')).toBeNull();
    expect(parseAmount(Number.NaN)).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount({ value: 1 })).toBeNull();
  });
});

describe('roundMoney', () => {
  it('rounds to cents symmetrically', () => {
    expect(roundMoney(1.005)).toBe(1.01);
    expect(roundMoney(-1.005)).toBe(-1.01);
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
  });
});

describe('parseDateValue', () => {
  it('reads ISO dates as UTC midnight', () => {
    expect(parseDateValue('2024-03-15')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('reads spreadsheet serial numbers', () => {
    expect(parseDateValue(45366)?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
    expect(parseDateValue('45366')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('reads other date text as that calendar day in UTC', () => {
    expect(parseDateValue('01/01/2024')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(parseDateValue('March 15, 2024')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
    expect(parsePeriod('01/01/2024')).toBe('2024-01');
  });

  it('keeps the instant of zoned ISO timestamps', () => {
    expect(parseDateValue('2024-03-31T23:30:00-02:00')?.toISOString()).toBe(
      '2024-04-01T01:30:00.000Z'
    );
    expect(parseDateValue('2024-03-15T10:00:00Z')?.toISOString()).toBe('2024-03-15T10:00:00.000Z');
  });

  it('returns null for unreadable values', () => {
    expect(parseDateValue('')).toBeNull();
    expect(parseDateValue('not a date')).toBeNull();
    expect(parseDateValue(new Date('invalid'))).toBeNull();
  });
});

describe('parsePeriod', () => {
  it('accepts YYYY-MM and full dates', () => {
    expect(parsePeriod('2024-03')).toBe('2024-03');
    expect(parsePeriod('2024-03-31')).toBe('2024-03');
    expect(parsePeriod(new Date(Date.UTC(2024, 0, 10)))).toBe('2024-01');
  });

  it('rejects invalid months', () => {
    expect(parsePeriod('2024-13')).toBeNull();
  });
});

describe('period arithmetic', () => {
  it('computes period bounds', () => {
    const { start, end } = periodBounds('2024-02');
    expect(start.toISOString()).toBe('2024-02-01T00:00:00.000Z');
    expect(end.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('measures days outside a period', () => {
    expect(daysOutsidePeriod(new Date(Date.UTC(2024, 2, 15)), '2024-03')).toBe(0);
    expect(daysOutsidePeriod(new Date(Date.UTC(2024, 2, 31, 18)), '2024-03')).toBe(0);
    expect(daysOutsidePeriod(new Date(Date.UTC(2024, 1, 25)), '2024-03')).toBe(5);
    expect(daysOutsidePeriod(new Date(Date.UTC(2024, 3, 10)), '2024-03')).toBe(10);
  });
});

describe('getField', () => {
  it('matches headers ignoring case and whitespace', () => {
    const record = { ' Booking Locator ': 'ABC', amount: 1 };
    expect(getField(record, 'booking locator')).toBe('ABC');
    expect(getField(record, 'amount')).toBe(1);
    expect(getField(record, 'missing')).toBeUndefined();
  });
});
