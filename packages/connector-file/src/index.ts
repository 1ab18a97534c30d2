/**
 * @commrecon/connector-file
 *
 * File-based connectors for CSV, Excel, and JSON files
 */

export {
  BaseFileConnector,
  TextFileConnector,
  FORBIDDEN_RECORD_KEYS,
} from './base-file-connector.js';
export type { FileConnectorConfig } from './base-file-connector.js';

export { CsvConnector, createCsvConnector, sanitizeFormulaValue } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { JsonConnector, createJsonConnector } from './json-connector.js';
export type { JsonConnectorConfig } from './json-connector.js';

export {
  ExcelConnector,
  createExcelConnector,
  getCellValue,
  getColumnName,
} from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export { addRecordsSheet, toCellValue, toSheetName } from './workbook-writer.js';
export type { WorkbookSheet, SheetLayout } from './workbook-writer.js';

// Re-export core types for convenience
export type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  ReadOptions,
  ReadResult,
  WriteResult,
  Record,
} from '@commrecon/core';
