/**
 * Report export: one sheet, CSV file or JSON property per tabular collection
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { IConnector, Record as DataRecord } from '@commrecon/core';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
} from '@commrecon/connector-file';
import {
  TABULAR_COLLECTIONS,
  toTabular,
  type ReconciliationReport,
} from '@commrecon/recon-engine';
import type { OutputConfig } from './config.js';

/**
 * Replace a connector's records, disconnecting whether or not the write succeeds
 */
export async function writeThrough(connector: IConnector, records: DataRecord[]): Promise<void> {
  await connector.connect();
  try {
    await connector.writeRecords(records);
  } finally {
    await connector.disconnect();
  }
}

/**
 * Write the report and return the files written
 */
export async function exportReport(
  report: ReconciliationReport,
  output: OutputConfig
): Promise<string[]> {
  const tabular = toTabular(report);

  switch (output.format) {
    case 'xlsx': {
      await mkdir(dirname(output.path), { recursive: true });
      // Each collection replaces its own sheet, so start from an empty workbook
      await rm(output.path, { force: true });
      for (const name of TABULAR_COLLECTIONS) {
        const connector = createExcelConnector({
          id: `export-${name}`,
          name,
          filePath: output.path,
          sheet: name,
          createIfMissing: true,
        });
        await writeThrough(connector, tabular[name]);
      }
      return [output.path];
    }

    case 'csv': {
      await mkdir(output.path, { recursive: true });
      const files: string[] = [];
      for (const name of TABULAR_COLLECTIONS) {
        const filePath = join(output.path, `${name}.csv`);
        const connector = createCsvConnector({
          id: `export-${name}`,
          name,
          filePath,
          createIfMissing: true,
        });
        await writeThrough(connector, tabular[name]);
        files.push(filePath);
      }
      return files;
    }

    case 'json': {
      await mkdir(dirname(output.path), { recursive: true });
      const header = {
        report_id: report.id,
        generated_at: report.timestamp.toISOString(),
      };
      await writeFile(output.path, JSON.stringify(header), 'utf-8');
      for (const name of TABULAR_COLLECTIONS) {
        const connector = createJsonConnector({
          id: `export-${name}`,
          name,
          filePath: output.path,
          recordsPath: name,
          createIfMissing: true,
        });
        await writeThrough(connector, tabular[name]);
      }
      return [output.path];
    }

    default: {
      const exhaustive: never = output.format;
      throw new Error(`Unsupported output format: ${String(exhaustive)}`);
    }
  }
}
