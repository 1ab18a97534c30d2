/**
 * Feed loading: file connector per source, then column mapping onto the
 * field names the engine validates.
 */

import { resolve } from 'node:path';
import type { IConnector, Record as DataRecord } from '@commrecon/core';
import { getField } from '@commrecon/core';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
} from '@commrecon/connector-file';
import type { FeedName } from '@commrecon/recon-engine';
import { ConfigError, type FeedSource } from './config.js';

export const ORDER_FIELDS = [
  'orderId',
  'confirmationCode',
  'providerId',
  'expectedCommission',
  'currency',
  'bookingDate',
  'taxTreatment',
] as const;

export const COMMISSION_FIELDS = [
  'lineId',
  'confirmationCode',
  'providerId',
  'billedAmount',
  'currency',
  'statementPeriod',
] as const;

export const FEED_PAGE_SIZE = 5_000;

const FEED_FIELDS: { [K in FeedName]: readonly string[] } = {
  orders: ORDER_FIELDS,
  commissions: COMMISSION_FIELDS,
};

export function createFeedConnector(feed: FeedSource, name: FeedName): IConnector {
  const common = {
    id: `feed-${name}`,
    name,
    readonly: true,
    filePath: resolve(process.cwd(), feed.filePath),
    encoding: feed.encoding,
  };

  switch (feed.type) {
    case 'csv':
      return createCsvConnector({
        ...common,
        delimiter: feed.delimiter,
        headers: feed.headers,
        quote: feed.quote,
        skipEmptyLines: feed.skipEmptyLines,
      });

    case 'json':
      return createJsonConnector({ ...common, recordsPath: feed.recordsPath });

    case 'excel':
      return createExcelConnector({
        ...common,
        sheet: feed.sheet,
        headers: feed.headers,
        startRow: feed.startRow,
        startColumn: feed.startColumn,
      });

    default: {
      const exhaustive: never = feed;
      throw new ConfigError(`Unknown feed type: ${JSON.stringify(exhaustive)}`);
    }
  }
}

/**
 * Pick the engine's fields out of raw rows. Headers match trimmed and
 * case-insensitively; `columns` renames a field to the source header.
 */
export function mapColumns(
  records: readonly DataRecord[],
  name: FeedName,
  columns: { [field: string]: string } = {}
): DataRecord[] {
  const fields = FEED_FIELDS[name];

  const unknown = Object.keys(columns).filter((field) => !fields.includes(field));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown ${name} field(s) in column mapping: ${unknown.join(', ')} (expected one of ${fields.join(', ')})`
    );
  }

  return records.map((record) => {
    const mapped: DataRecord = {};
    for (const field of fields) {
      const value = getField(record, columns[field] ?? field);
      if (value !== undefined) {
        mapped[field] = value;
      }
    }
    return mapped;
  });
}

/**
 * Read a whole feed page by page and map it onto the engine's field names
 */
export async function loadFeed(
  feed: FeedSource,
  name: FeedName,
  pageSize = FEED_PAGE_SIZE
): Promise<DataRecord[]> {
  const connector = createFeedConnector(feed, name);
  await connector.connect();
  try {
    const records: DataRecord[] = [];
    let hasMore = true;
    while (hasMore) {
      const page = await connector.readRecords({ offset: records.length, limit: pageSize });
      records.push(...mapColumns(page.records, name, feed.columns));
      hasMore = page.hasMore && page.records.length > 0;
    }
    return records;
  } finally {
    await connector.disconnect();
  }
}
