/**
 * Utility functions for working with records
 */

import type { Record } from '../types/index.js';

/**
 * Extract all unique field names from an array of records
 */
export function extractFieldNames(records: Record[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}

/**
 * Canonical form of a column header: trimmed and lower-cased.
 */
export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Look up a field by header name, ignoring case and surrounding whitespace.
 */
export function getField(record: Record, header: string): unknown {
  if (Object.prototype.hasOwnProperty.call(record, header)) {
    return record[header];
  }

  const wanted = normalizeHeader(header);
  for (const key of Object.keys(record)) {
    if (normalizeHeader(key) === wanted) {
      return record[key];
    }
  }
  return undefined;
}
