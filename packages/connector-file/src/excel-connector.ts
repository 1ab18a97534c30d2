/**
 * Excel Connector
 * Reads and writes Excel files (.xlsx). Date cells come back as Date objects.
 */

import ExcelJS from 'exceljs';
import type { Record } from '@commrecon/core';
import { ConnectorError } from '@commrecon/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';
import { addRecordsSheet } from './workbook-writer.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based id (default: first sheet) */
  sheet?: string | number;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Starting row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

/**
 * Plain value of a cell: formula results, rich text and hyperlinks are unwrapped
 */
export function getCellValue(cell: ExcelJS.Cell): unknown {
  const value = cell.value;

  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date || typeof value !== 'object') {
    return value;
  }

  if ('result' in value) {
    return value.result ?? null;
  }

  if ('richText' in value) {
    return value.richText.map((rt) => rt.text).join('');
  }

  if ('hyperlink' in value) {
    return value.text;
  }

  // Error values
  return null;
}

export function getColumnName(colNumber: number): string {
  let name = '';
  let n = colNumber;

  while (n > 0) {
    const remainder = (n - 1) % 26;
    name = String.fromCharCode(65 + remainder) + name;
    n = Math.floor((n - 1) / 26);
  }

  return name;
}

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async loadRecords(): Promise<Record[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet = this.getSheet(workbook);
    if (!sheet && this.config.createIfMissing) {
      return [];
    }
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const startRow = this.config.startRow ?? 1;
    const startColumn = this.config.startColumn ?? 1;
    const hasHeaders = this.config.headers !== false;

    // Get headers from first row or generate column names
    const headers: string[] = [];
    if (hasHeaders) {
      const headerRow = sheet.getRow(startRow);
      headerRow.eachCell({ includeEmpty: false }, (cell, colNumber) => {
        if (colNumber >= startColumn) {
          const header = getCellValue(cell);
          headers[colNumber - startColumn] =
            header === null ? `Column${colNumber}` : String(header).trim();
        }
      });

      this.rejectUnsafeHeaders(headers, 'Excel');
    } else {
      const colCount = sheet.columnCount;
      for (let i = 0; i < colCount - startColumn + 1; i++) {
        headers[i] = getColumnName(i + startColumn);
      }
    }

    const records: Record[] = [];
    const dataStartRow = hasHeaders ? startRow + 1 : startRow;

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber < dataStartRow) return;

      const record: Record = Object.create(null);
      let hasData = false;

      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        if (colNumber < startColumn) return;

        const header = headers[colNumber - startColumn];
        if (!header) return;

        const value = getCellValue(cell);
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      });

      if (hasData) {
        records.push(record);
      }
    });

    return records;
  }

  /**
   * Replace the configured sheet. Other sheets of an existing workbook are kept;
   * the rewritten sheet moves to the end.
   */
  protected async persistRecords(records: Record[]): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    if (await this.fileExists()) {
      await workbook.xlsx.readFile(this.config.filePath);
    }

    const existing = this.getSheet(workbook);
    const name =
      existing?.name ?? (typeof this.config.sheet === 'string' ? this.config.sheet : 'Sheet1');
    if (existing) {
      workbook.removeWorksheet(existing.id);
    }

    addRecordsSheet(
      workbook,
      { name, records },
      {
        headers: this.config.headers,
        startRow: this.config.startRow,
        startColumn: this.config.startColumn,
      }
    );

    await workbook.xlsx.writeFile(this.config.filePath);
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    if (this.config.sheet !== undefined) {
      return workbook.getWorksheet(this.config.sheet);
    }
    return workbook.worksheets[0];
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
