/**
 * Core Connector Interface
 *
 * File connectors implement this interface to hand raw rows to the
 * ingestion step and to receive exported rows.
 */

import type {
  ReadOptions,
  ReadResult,
  WriteResult,
  Record,
} from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, excel, json) */
  type: string;
  /** Whether this connector rejects write operations */
  readonly?: boolean;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all connectors must implement
 */
export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Load the data source
   * @throws ConnectorError if the source cannot be read
   */
  connect(): Promise<void>;

  /**
   * Release loaded data
   */
  disconnect(): Promise<void>;

  /**
   * Read records from the data source
   */
  readRecords(options?: ReadOptions): Promise<ReadResult>;

  /**
   * Replace the contents of the data source with the given records
   * @throws ConnectorError if connector is readonly
   */
  writeRecords(records: Record[]): Promise<WriteResult>;
}
