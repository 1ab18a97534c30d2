/**
 * CSV Connector
 * Reads and writes CSV files. Values stay strings so confirmation codes keep leading zeros.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { Record } from '@commrecon/core';
import { ConnectorError, extractFieldNames } from '@commrecon/core';
import {
  TextFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /**
   * Mitigate CSV/Excel formula injection on write by prefixing strings that start
   * with =, +, -, or @ (after optional whitespace). Default: true.
   */
  sanitizeFormulas?: boolean;
  /** Prefix used when sanitizeFormulas is enabled (default: "'"). */
  formulaEscapePrefix?: string;
}

export function sanitizeFormulaValue(value: unknown, prefix: string): unknown {
  if (typeof value !== 'string') return value;
  if (value.startsWith(prefix)) return value;
  return /^[\t\r\n ]*[=+\-@]/.test(value) ? `${prefix}${value}` : value;
}

function toRows(parsed: unknown): unknown[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((row): row is unknown[] => Array.isArray(row));
}

export class CsvConnector extends TextFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: string): Promise<Record[]> {
    let parsed: unknown;
    try {
      parsed = parse(content, {
        columns: false, // Parse rows first so we can safely map headers ourselves
        bom: true,
        delimiter: this.config.delimiter ?? ',',
        quote: this.config.quote ?? '"',
        skip_empty_lines: this.config.skipEmptyLines !== false,
        relax_column_count: true,
        trim: true,
      });
    } catch (error) {
      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Invalid CSV: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        suggestion: 'Check quoting and the delimiter setting.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const rows = toRows(parsed);
    const [firstRow] = rows;
    if (!firstRow) return [];

    const hasHeaders = this.config.headers !== false;
    const headers = hasHeaders
      ? firstRow.map((h) => String(h ?? ''))
      : Array.from(
          { length: Math.max(...rows.map((r) => r.length)) },
          (_, i) => `Column${i + 1}`
        );

    this.rejectUnsafeHeaders(headers, 'CSV');

    const dataRows = hasHeaders ? rows.slice(1) : rows;
    return dataRows.map((row) => {
      const record: Record = Object.create(null);
      headers.forEach((key, i) => {
        record[key] = row[i];
      });
      return record;
    });
  }

  protected async serializeContent(records: Record[]): Promise<string> {
    if (records.length === 0) {
      return '';
    }

    const sanitize = this.config.sanitizeFormulas !== false;
    const prefix = this.config.formulaEscapePrefix ?? "'";

    const outputRecords = sanitize
      ? records.map((record) => {
          const sanitized: Record = Object.create(null);
          for (const key of Object.keys(record)) {
            sanitized[key] = sanitizeFormulaValue(record[key], prefix);
          }
          return sanitized;
        })
      : records;

    return stringify(outputRecords, {
      header: this.config.headers !== false,
      columns: extractFieldNames(records),
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      cast: {
        date: (value) => value.toISOString(),
        boolean: (value) => (value ? 'true' : 'false'),
      },
    });
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
