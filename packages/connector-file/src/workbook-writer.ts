/**
 * Worksheet helpers for the Excel connector
 */

import ExcelJS from 'exceljs';
import type { Record } from '@commrecon/core';
import { extractFieldNames } from '@commrecon/core';

export interface WorkbookSheet {
  /** Worksheet name (Excel limits names to 31 characters) */
  name: string;
  records: Record[];
  /** Column order; defaults to the union of record keys in first-seen order */
  columns?: string[];
}

export interface SheetLayout {
  /** Whether to write a bold header row (default: true) */
  headers?: boolean;
  /** Starting row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

const MAX_SHEET_NAME_LENGTH = 31;
const INVALID_SHEET_NAME_CHARS = /[\\/?*[\]:]/g;

/**
 * Convert a record value into something a cell can hold.
 * Objects and arrays are stored as JSON text.
 */
export function toCellValue(value: unknown): ExcelJS.CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  return JSON.stringify(value);
}

export function toSheetName(name: string): string {
  const cleaned = name.replace(INVALID_SHEET_NAME_CHARS, '_').slice(0, MAX_SHEET_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : 'Sheet1';
}

/**
 * Add a worksheet holding the records as a table
 */
export function addRecordsSheet(
  workbook: ExcelJS.Workbook,
  sheet: WorkbookSheet,
  layout: SheetLayout = {}
): ExcelJS.Worksheet {
  const worksheet = workbook.addWorksheet(toSheetName(sheet.name));
  const columns = sheet.columns ?? extractFieldNames(sheet.records);

  const startRow = layout.startRow ?? 1;
  const startColumn = layout.startColumn ?? 1;
  const hasHeaders = layout.headers !== false;

  if (hasHeaders) {
    const headerRow = worksheet.getRow(startRow);
    columns.forEach((header, index) => {
      headerRow.getCell(startColumn + index).value = header;
    });
    headerRow.font = { bold: true };
  }

  const dataStartRow = hasHeaders ? startRow + 1 : startRow;
  sheet.records.forEach((record, rowIndex) => {
    const row = worksheet.getRow(dataStartRow + rowIndex);
    columns.forEach((header, colIndex) => {
      row.getCell(startColumn + colIndex).value = toCellValue(record[header]);
    });
  });

  // Auto-fit columns (approximate)
  columns.forEach((_, index) => {
    worksheet.getColumn(startColumn + index).width = 15;
  });

  return worksheet;
}
