import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, loadFeed, mapColumns } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('mapColumns', () => {
  it('matches headers trimmed and case-insensitively', () => {
    const rows = [{ ' Order ID ': 'O1', CURRENCY: 'usd', Notes: 'ignored' }];

    expect(mapColumns(rows, 'orders', { orderId: 'order id' })).toEqual([
      { orderId: 'O1', currency: 'usd' },
    ]);
  });

  it('prefers an exact header over a case-insensitive one', () => {
    const rows = [{ lineId: 'L-1', LINEID: 'other' }];

    expect(mapColumns(rows, 'commissions')).toEqual([{ lineId: 'L-1' }]);
  });

  it('rejects mappings for fields the feed does not have', () => {
    expect(() => mapColumns([], 'orders', { billedAmount: 'Amount' })).toThrow(ConfigError);
    expect(() => mapColumns([], 'orders', { billedAmount: 'Amount' })).toThrow(
      /^Unknown orders field\(s\) in column mapping: billedAmount /
    );
  });
});

describe('loadFeed', () => {
  it('reads a CSV feed through the column mapping', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-feeds-'));
    const filePath = join(tmpDir, 'statement.csv');
    writeFileSync(
      filePath,
      'Line;Booking Ref;Partner;Commission;Currency;Period\nL-1;00AB12;ACME;(12.50);EUR;2024-03\n',
      'utf-8'
    );

    const records = await loadFeed(
      {
        type: 'csv',
        filePath,
        delimiter: ';',
        columns: {
          lineId: 'Line',
          confirmationCode: 'Booking Ref',
          providerId: 'Partner',
          billedAmount: 'Commission',
          statementPeriod: 'Period',
        },
      },
      'commissions'
    );

    expect(records).toEqual([
      {
        lineId: 'L-1',
        confirmationCode: '00AB12',
        providerId: 'ACME',
        billedAmount: '(12.50)',
        currency: 'EUR',
        statementPeriod: '2024-03',
      },
    ]);
  });

  it('reads a JSON feed under a records path', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-feeds-'));
    const filePath = join(tmpDir, 'orders.json');
    writeFileSync(
      filePath,
      JSON.stringify({ export: { orders: [{ orderId: 'O1', expectedCommission: 10 }] } }),
      'utf-8'
    );

    const records = await loadFeed(
      { type: 'json', filePath, recordsPath: 'export.orders' },
      'orders'
    );

    expect(records).toEqual([{ orderId: 'O1', expectedCommission: 10 }]);
  });

  it('reads a feed across several pages', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'recon-feeds-'));
    const filePath = join(tmpDir, 'lines.json');
    const lines = ['L1', 'L2', 'L3', 'L4', 'L5'].map((lineId) => ({ lineId, billedAmount: 1 }));
    writeFileSync(filePath, JSON.stringify(lines), 'utf-8');

    const records = await loadFeed({ type: 'json', filePath }, 'commissions', 2);

    expect(records.map((r) => r.lineId)).toEqual(['L1', 'L2', 'L3', 'L4', 'L5']);
  });
});
