/**
 * JSON Connector
 * Reads and writes JSON files (arrays of objects)
 */

import type { Record } from '@commrecon/core';
import { ConnectorError } from '@commrecon/core';
import {
  TextFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface JsonConnectorConfig extends FileConnectorConfig {
  type: 'json';
  /** Dot path to the records array (e.g., 'data.items') */
  recordsPath?: string;
}

const INDENT = 2;

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function isRecord(value: unknown): value is Record {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSafePath(path: string, connectorId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath.',
      });
    }
  }

  return parts;
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, parts: string[]): unknown {
  let current = obj;

  for (const part of parts) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set nested value in object using dot notation path
 */
function setNestedValue(obj: Record, parts: string[], value: unknown): void {
  const last = parts[parts.length - 1];
  if (last === undefined) return;

  let current = obj;
  for (const part of parts.slice(0, -1)) {
    const next = Object.prototype.hasOwnProperty.call(current, part)
      ? current[part]
      : undefined;

    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record = Object.create(null);
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

export class JsonConnector extends TextFileConnector<JsonConnectorConfig> {
  private _originalStructure: unknown = null;

  constructor(config: Omit<JsonConnectorConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  protected async parseContent(content: string): Promise<Record[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
    this._originalStructure = parsed;

    const records = this.config.recordsPath
      ? getNestedValue(parsed, parseSafePath(this.config.recordsPath, this.config.id))
      : parsed;

    if (records === undefined && this.config.recordsPath && this.config.createIfMissing) {
      return [];
    }

    if (!Array.isArray(records)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: this.config.recordsPath
          ? `Path '${this.config.recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        connectorId: this.config.id,
        suggestion: this.config.recordsPath
          ? 'Check that recordsPath points to an array of objects.'
          : 'Either provide a JSON file with an array at root, or specify recordsPath.',
      });
    }

    const invalidIndex = records.findIndex((record) => !isRecord(record));
    if (invalidIndex !== -1) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Element ${invalidIndex} is not an object`,
        connectorId: this.config.id,
        suggestion: 'Every element of the records array must be a JSON object.',
      });
    }

    return records.filter(isRecord);
  }

  protected async serializeContent(records: Record[]): Promise<string> {
    // Write back into the original document when records live under a path
    if (this.config.recordsPath) {
      const output: Record = Object.create(null);
      if (isRecord(this._originalStructure)) {
        Object.assign(output, this._originalStructure);
      }

      setNestedValue(output, parseSafePath(this.config.recordsPath, this.config.id), records);
      return JSON.stringify(output, null, INDENT);
    }

    return JSON.stringify(records, null, INDENT);
  }
}

/**
 * Factory function to create a JSON connector
 */
export function createJsonConnector(
  config: Omit<JsonConnectorConfig, 'type'>
): JsonConnector {
  return new JsonConnector(config);
}
