import { describe, expect, it, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import ExcelJS from 'exceljs';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
  getColumnName,
  sanitizeFormulaValue,
  toCellValue,
  toSheetName,
} from '../src/index.js';

let tmpDir = '';

function tempFile(name: string): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
  return join(tmpDir, name);
}

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

describe('CsvConnector', () => {
  it('handles empty CSV files', async () => {
    const filePath = tempFile('empty.csv');
    writeFileSync(filePath, '');

    const connector = createCsvConnector({ id: 'csv-empty', name: 'empty', filePath });
    await connector.connect();
    const result = await connector.readRecords();

    expect(result.records).toHaveLength(0);
    expect(result.totalCount).toBe(0);
    expect(result.hasMore).toBe(false);
  });

  it('strips a byte order mark and keeps values as text', async () => {
    const filePath = tempFile('orders.csv');
    writeFileSync(
      filePath,
      '\uFEFForderId,confirmationCode,expectedCommission\n001,00AB12,"1,250.00"\n',
      'utf-8'
    );

    const connector = createCsvConnector({ id: 'csv-bom', name: 'orders', filePath });
    await connector.connect();
    const { records } = await connector.readRecords();

    expect(records).toHaveLength(1);
    expect(Object.keys(records[0] ?? {})).toEqual([
      'orderId',
      'confirmationCode',
      'expectedCommission',
    ]);
    expect(records[0]?.orderId).toBe('001');
    expect(records[0]?.confirmationCode).toBe('00AB12');
    expect(records[0]?.expectedCommission).toBe('1,250.00');
  });

  it('pages with offset and limit', async () => {
    const filePath = tempFile('lines.csv');
    writeFileSync(filePath, 'lineId\nL1\nL2\nL3\nL4\nL5\n', 'utf-8');

    const connector = createCsvConnector({ id: 'csv-page', name: 'lines', filePath });
    await connector.connect();

    const page = await connector.readRecords({ offset: 1, limit: 2 });
    expect(page.records.map((r) => r.lineId)).toEqual(['L2', 'L3']);
    expect(page.totalCount).toBe(5);
    expect(page.hasMore).toBe(true);

    const last = await connector.readRecords({ offset: 4, limit: 2 });
    expect(last.records.map((r) => r.lineId)).toEqual(['L5']);
    expect(last.hasMore).toBe(false);
  });

  it('generates column names when the file has no header row', async () => {
    const filePath = tempFile('plain.csv');
    writeFileSync(filePath, 'a;1\nb;2\n', 'utf-8');

    const connector = createCsvConnector({
      id: 'csv-plain',
      name: 'plain',
      filePath,
      headers: false,
      delimiter: ';',
    });
    await connector.connect();
    const { records } = await connector.readRecords();

    expect(records).toHaveLength(2);
    expect(records[1]?.Column1).toBe('b');
    expect(records[1]?.Column2).toBe('2');
  });

  it('rejects unsafe header names', async () => {
    const filePath = tempFile('unsafe.csv');
    writeFileSync(filePath, '__proto__,b\n1,2\n', 'utf-8');

    const connector = createCsvConnector({ id: 'csv-unsafe', name: 'unsafe', filePath });

    await expect(connector.connect()).rejects.toMatchObject({ code: 'SCHEMA_MISMATCH' });
    expect(connector.state).toBe('error');
  });

  it('sanitizes formulas and replaces the file on write', async () => {
    const filePath = tempFile('export.csv');

    const connector = createCsvConnector({
      id: 'csv-export',
      name: 'export',
      filePath,
      createIfMissing: true,
    });
    await connector.connect();
    const result = await connector.writeRecords([{ name: '=2+2', code: 'AB1' }]);

    expect(result).toEqual({ success: 1, failed: 0 });
    expect(readFileSync(filePath, 'utf-8')).toBe("name,code\n'=2+2,AB1\n");
  });

  it('fails with NOT_FOUND for a missing file', async () => {
    const filePath = tempFile('missing.csv');
    const connector = createCsvConnector({ id: 'csv-missing', name: 'missing', filePath });

    await expect(connector.connect()).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('requires a connection before reading', async () => {
    const filePath = tempFile('unused.csv');
    const connector = createCsvConnector({ id: 'csv-idle', name: 'idle', filePath });

    await expect(connector.readRecords()).rejects.toMatchObject({ code: 'NOT_CONNECTED' });
  });

  it('refuses writes when read-only', async () => {
    const filePath = tempFile('readonly.csv');
    writeFileSync(filePath, 'a\n1\n', 'utf-8');

    const connector = createCsvConnector({
      id: 'csv-readonly',
      name: 'readonly',
      filePath,
      readonly: true,
    });
    await connector.connect();

    await expect(connector.writeRecords([{ a: '2' }])).rejects.toMatchObject({
      code: 'UNSUPPORTED_OPERATION',
    });
    expect(readFileSync(filePath, 'utf-8')).toBe('a\n1\n');
  });
});

describe('ExcelConnector', () => {
  it('reads Excel files with merged cells without throwing', async () => {
    const filePath = tempFile('merged.xlsx');

    const wb = new ExcelJS.Workbook();
    const sheet = wb.addWorksheet('Sheet1');
    sheet.mergeCells('B1:C1');
    sheet.getCell('A1').value = 'name';
    sheet.getCell('B1').value = 'amount';
    sheet.getCell('A2').value = 'Alice';
    sheet.getCell('B2').value = 10;
    await wb.xlsx.writeFile(filePath);

    const connector = createExcelConnector({ id: 'excel-merged', name: 'merged', filePath });
    await connector.connect();
    const result = await connector.readRecords();

    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.name).toBe('Alice');
    expect(result.records[0]?.amount).toBe(10);
  });

  it('unwraps formula results, rich text and hyperlinks', async () => {
    const filePath = tempFile('cells.xlsx');

    const wb = new ExcelJS.Workbook();
    const sheet = wb.addWorksheet('Statement');
    sheet.getCell('A1').value = 'total';
    sheet.getCell('B1').value = 'provider';
    sheet.getCell('C1').value = 'link';
    sheet.getCell('A2').value = { formula: 'SUM(1,2)', result: 3 };
    sheet.getCell('B2').value = { richText: [{ text: 'Acme ' }, { text: 'Travel' }] };
    sheet.getCell('C2').value = { text: 'portal', hyperlink: 'https://example.com' };
    await wb.xlsx.writeFile(filePath);

    const connector = createExcelConnector({
      id: 'excel-cells',
      name: 'cells',
      filePath,
      sheet: 'Statement',
    });
    await connector.connect();
    const [record] = (await connector.readRecords()).records;

    expect(record?.total).toBe(3);
    expect(record?.provider).toBe('Acme Travel');
    expect(record?.link).toBe('portal');
  });

  it('fails with NOT_FOUND for an unknown sheet', async () => {
    const filePath = tempFile('sheets.xlsx');
    const writer = createExcelConnector({
      id: 'excel-orders',
      name: 'orders',
      filePath,
      sheet: 'orders',
      createIfMissing: true,
    });
    await writer.connect();
    await writer.writeRecords([{ a: 1 }]);

    const connector = createExcelConnector({
      id: 'excel-sheet',
      name: 'sheet',
      filePath,
      sheet: 'commissions',
    });

    await expect(connector.connect()).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('writes records and reads them back', async () => {
    const filePath = tempFile('lines.xlsx');
    const bookedOn = new Date(Date.UTC(2024, 2, 15));

    const writer = createExcelConnector({
      id: 'excel-write',
      name: 'write',
      filePath,
      sheet: 'lines',
      createIfMissing: true,
    });
    await writer.connect();
    await writer.writeRecords([
      { lineId: 'L-1', code: '007', amount: 12.5, bookedOn },
      { lineId: 'L-2', code: 'AB9', amount: 4 },
    ]);

    const reader = createExcelConnector({ id: 'excel-read', name: 'read', filePath, sheet: 'lines' });
    await reader.connect();
    const { records } = await reader.readRecords();

    expect(records).toHaveLength(2);
    expect(records[0]?.code).toBe('007');
    expect(records[0]?.amount).toBe(12.5);
    const readDate = records[0]?.bookedOn;
    expect(readDate).toBeInstanceOf(Date);
    expect(readDate instanceof Date ? readDate.toISOString() : null).toBe(
      '2024-03-15T00:00:00.000Z'
    );
    expect(records[1]?.bookedOn ?? null).toBeNull();
  });
});

describe('workbook output', () => {
  it('replaces one sheet and keeps the others', async () => {
    const filePath = tempFile('report.xlsx');
    const writeSheet = async (sheet: string, records: { [key: string]: unknown }[]) => {
      const connector = createExcelConnector({
        id: `excel-${sheet}`,
        name: sheet,
        filePath,
        sheet,
        createIfMissing: true,
      });
      await connector.connect();
      expect(connector.state).toBe('connected');
      await connector.writeRecords(records);
      await connector.disconnect();
    };

    await writeSheet('match_results', [{ id: 'order:O-1', confidence: 1 }]);
    await writeSheet('rejects', [{ feed: 'orders', record_index: 3 }]);
    await writeSheet('match_results', [{ id: 'order:O-2', confidence: 0.9 }]);

    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(filePath);

    expect(wb.worksheets.map((ws) => ws.name)).toEqual(['rejects', 'match_results']);
    expect(wb.getWorksheet('match_results')?.getCell('A2').value).toBe('order:O-2');
    expect(wb.getWorksheet('match_results')?.getCell('A3').value).toBeNull();
    expect(wb.getWorksheet('rejects')?.getCell('B1').value).toBe('record_index');
  });

  it('cleans sheet names and cell values', () => {
    expect(toSheetName('a/b:c')).toBe('a_b_c');
    expect(toSheetName('x'.repeat(40))).toBe('x'.repeat(31));
    expect(toCellValue(undefined)).toBeNull();
    expect(toCellValue(['L1', 'L2'])).toBe('["L1","L2"]');
    expect(getColumnName(28)).toBe('AB');
    expect(sanitizeFormulaValue('@SUM(A1)', "'")).toBe("'@SUM(A1)");
    expect(sanitizeFormulaValue('-12.50', "'")).toBe("'-12.50");
    expect(sanitizeFormulaValue(-12.5, "'")).toBe(-12.5);
  });
});

describe('JsonConnector', () => {
  it('reads records under recordsPath and preserves the document on write', async () => {
    const filePath = tempFile('nested.json');
    writeFileSync(
      filePath,
      JSON.stringify({
        meta: { source: 'export' },
        data: { items: [{ id: 1, nested: { a: 1, b: 'x' } }] },
      }),
      'utf-8'
    );

    const connector = createJsonConnector({
      id: 'json-nested',
      name: 'nested',
      filePath,
      recordsPath: 'data.items',
    });
    await connector.connect();

    const result = await connector.readRecords();
    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.nested).toEqual({ a: 1, b: 'x' });

    await connector.writeRecords([{ id: 2 }]);
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual({
      meta: { source: 'export' },
      data: { items: [{ id: 2 }] },
    });
  });

  it('adds a missing records path to an existing document', async () => {
    const filePath = tempFile('report.json');
    writeFileSync(filePath, JSON.stringify({ report_id: 'r-1' }), 'utf-8');

    const connector = createJsonConnector({
      id: 'json-append',
      name: 'warnings',
      filePath,
      recordsPath: 'warnings',
      createIfMissing: true,
    });
    await connector.connect();
    expect((await connector.readRecords()).totalCount).toBe(0);

    await connector.writeRecords([{ code: 'CLAIM_PREEMPTED' }]);
    expect(readFileSync(filePath, 'utf-8')).toBe(
      '{\n  "report_id": "r-1",\n  "warnings": [\n    {\n      "code": "CLAIM_PREEMPTED"\n    }\n  ]\n}'
    );
  });

  it('fails on a missing records path unless asked to create it', async () => {
    const filePath = tempFile('no-path.json');
    writeFileSync(filePath, JSON.stringify({ report_id: 'r-1' }), 'utf-8');

    const connector = createJsonConnector({
      id: 'json-no-path',
      name: 'warnings',
      filePath,
      recordsPath: 'warnings',
    });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: "Path 'warnings' does not contain an array",
    });
  });

  it('replaces the contents on write', async () => {
    const filePath = tempFile('replace.json');
    writeFileSync(filePath, JSON.stringify([{ id: 1 }, { id: 2 }]), 'utf-8');

    const connector = createJsonConnector({ id: 'json-replace', name: 'replace', filePath });
    await connector.connect();
    await connector.writeRecords([{ id: 3 }]);

    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual([{ id: 3 }]);
    const result = await connector.readRecords();
    expect(result.totalCount).toBe(1);
  });

  it('rejects unsafe recordsPath segments', async () => {
    const filePath = tempFile('unsafe-path.json');
    writeFileSync(filePath, JSON.stringify({ data: { items: [] } }), 'utf-8');

    const connector = createJsonConnector({
      id: 'json-unsafe-path',
      name: 'unsafe-path',
      filePath,
      recordsPath: '__proto__.polluted',
    });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'CONFIGURATION_ERROR',
    });
  });

  it('rejects arrays holding non-objects', async () => {
    const filePath = tempFile('scalars.json');
    writeFileSync(filePath, '[{"id":1}, 2]', 'utf-8');

    const connector = createJsonConnector({ id: 'json-scalars', name: 'scalars', filePath });

    await expect(connector.connect()).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'Element 1 is not an object',
    });
  });

  it('reports malformed JSON', async () => {
    const filePath = tempFile('broken.json');
    writeFileSync(filePath, '{"data": [', 'utf-8');

    const connector = createJsonConnector({ id: 'json-broken', name: 'broken', filePath });

    await expect(connector.connect()).rejects.toMatchObject({ code: 'SCHEMA_MISMATCH' });
  });
});
