/**
 * Base class for file-based connectors
 * Handles common functionality: connection state, caching, paging, replace-on-write
 */

import { access, readFile, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  ReadOptions,
  ReadResult,
  WriteResult,
  Record,
} from '@commrecon/core';
import { ConnectorError } from '@commrecon/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /**
   * Start empty instead of failing when the file, or the sheet or records path
   * inside it, does not exist (for export targets)
   */
  createIfMissing?: boolean;
}

export const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _records: Record[] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      if (this.config.createIfMissing && !(await this.fileExists())) {
        this._records = [];
      } else {
        this._records = await this.loadRecords();
      }
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (isErrnoException(error) && error.code === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${errorMessage(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._records = [];
    this._state = 'disconnected';
  }

  async readRecords(options?: ReadOptions): Promise<ReadResult> {
    this.ensureConnected();

    const totalCount = this._records.length;
    const offset = Math.max(0, options?.offset ?? 0);
    const limit = options?.limit ?? totalCount;
    const records = this._records.slice(offset, offset + limit);

    return {
      records,
      totalCount,
      hasMore: offset + records.length < totalCount,
    };
  }

  async writeRecords(records: Record[]): Promise<WriteResult> {
    this.ensureConnected();

    if (this.config.readonly) {
      throw new ConnectorError({
        code: 'UNSUPPORTED_OPERATION',
        message: 'This connector is configured as read-only',
        connectorId: this.config.id,
        suggestion: 'Create a new connector with readonly: false to enable writes.',
      });
    }

    try {
      await this.persistRecords(records);
      this._records = [...records];

      return {
        success: records.length,
        failed: 0,
      };
    } catch (error) {
      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write records: ${errorMessage(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'NOT_CONNECTED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  protected rejectUnsafeHeaders(headers: readonly string[], kind: string): void {
    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe ${kind} header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }
  }

  protected async fileExists(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.F_OK);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return false;
      throw error;
    }
  }

  /**
   * Load every record from the file
   */
  protected abstract loadRecords(): Promise<Record[]>;

  /**
   * Replace the file with the given records
   */
  protected abstract persistRecords(records: Record[]): Promise<void>;
}

/**
 * Base class for text formats: the subclass only converts between content and records
 */
export abstract class TextFileConnector<
  TConfig extends FileConnectorConfig,
> extends BaseFileConnector<TConfig> {
  protected async loadRecords(): Promise<Record[]> {
    const content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');
    return this.parseContent(content);
  }

  protected async persistRecords(records: Record[]): Promise<void> {
    const content = await this.serializeContent(records);
    await writeFile(this.config.filePath, content, this.config.encoding ?? 'utf-8');
  }

  /**
   * Parse file content into records (implemented by subclasses)
   */
  protected abstract parseContent(content: string): Promise<Record[]>;

  /**
   * Serialize records back to file content (implemented by subclasses)
   */
  protected abstract serializeContent(records: Record[]): Promise<string>;
}
