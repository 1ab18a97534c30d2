/**
 * Record types for data exchange between connectors and the engine
 */

/** Generic record type - a row of data */
export type Record = {
  [key: string]: unknown;
};

/** Pagination options for reading records */
export interface ReadOptions {
  /** Number of records to skip */
  offset?: number;
  /** Max records to return */
  limit?: number;
}

/** Result of a read operation */
export interface ReadResult {
  /** The retrieved records */
  records: Record[];
  /** Total count of records in the source */
  totalCount: number;
  /** Whether more records exist beyond the current page */
  hasMore: boolean;
}

/** Result of a write operation */
export interface WriteResult {
  /** Number of records successfully written */
  success: number;
  /** Number of records that failed */
  failed: number;
}

/** A problem found with one field of a record */
export interface FieldIssue {
  field: string;
  message: string;
  value?: unknown;
}
