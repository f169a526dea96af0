/**
 * Flat-file key/value store
 *
 * One JSON document per namespace. Every operation reads, modifies and
 * rewrites the document synchronously (write to a temp file, then rename),
 * so conditional writes are atomic for all callers within one process.
 * Not meant to be shared between processes; use SqliteStore for that.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { KeyValueStore, ScanFilter, StoreEntry, StoredValue, UpdatePlan } from './KeyValueStore.js';
import { matchesPrefix } from './KeyValueStore.js';
import { BackingStoreError } from '../../lib/errors/AttendanceErrors.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';

type Document = Record<string, StoredValue>;

export class JsonFileStore implements KeyValueStore {
  readonly namespace: string;
  private readonly filePath: string;
  private logger: Logger;

  constructor(directory: string, namespace: string, logger: Logger = defaultLogger) {
    if (!/^[A-Za-z0-9_-]+$/.test(namespace)) {
      throw new Error(`Invalid namespace for file store: ${namespace}`);
    }

    this.namespace = namespace;
    this.filePath = join(directory, `${namespace}.json`);
    this.logger = logger;

    if (!existsSync(directory)) {
      mkdirSync(directory, { recursive: true });
    }
  }

  async get(key: string): Promise<StoredValue | undefined> {
    const doc = this.read();
    return Object.prototype.hasOwnProperty.call(doc, key) ? doc[key] : undefined;
  }

  async put(key: string, value: StoredValue): Promise<void> {
    const doc = this.read();
    doc[key] = value;
    this.write(doc);
  }

  async putIfAbsent(key: string, value: StoredValue): Promise<boolean> {
    const doc = this.read();
    if (Object.prototype.hasOwnProperty.call(doc, key)) {
      return false;
    }
    doc[key] = value;
    this.write(doc);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    const doc = this.read();
    if (!Object.prototype.hasOwnProperty.call(doc, key)) {
      return false;
    }
    delete doc[key];
    this.write(doc);
    return true;
  }

  async *scan(filter?: ScanFilter): AsyncIterable<StoreEntry> {
    const doc = this.read();
    const keys = Object.keys(doc).filter((key) => matchesPrefix(key, filter)).sort();

    for (const key of keys) {
      const value = doc[key];
      if (value !== undefined) {
        yield { key, value };
      }
    }
  }

  async update<T>(plan: UpdatePlan<T>): Promise<T> {
    const doc = this.read();
    const { operations, result } = plan({
      get: (key) => (Object.prototype.hasOwnProperty.call(doc, key) ? doc[key] : undefined),
    });

    if (operations.length === 0) {
      return result;
    }

    for (const operation of operations) {
      switch (operation.type) {
        case 'put':
          doc[operation.key] = operation.value;
          break;
        case 'delete':
          delete doc[operation.key];
          break;
        case 'deletePrefix':
          for (const key of Object.keys(doc)) {
            if (key.startsWith(operation.prefix)) {
              delete doc[key];
            }
          }
          break;
      }
    }
    this.write(doc);

    return result;
  }

  close(): void {
    // Nothing is held open between operations
  }

  private read(): Document {
    if (!existsSync(this.filePath)) {
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      if (!isDocument(parsed)) {
        throw new Error(`${this.filePath} does not contain a JSON object`);
      }
      return parsed;
    } catch (error) {
      this.logger.logStorageError('read', error, { namespace: this.namespace });
      throw new BackingStoreError('read', error);
    }
  }

  private write(doc: Document): void {
    const tmpPath = `${this.filePath}.tmp`;

    try {
      writeFileSync(tmpPath, JSON.stringify(doc), 'utf-8');
      renameSync(tmpPath, this.filePath);
    } catch (error) {
      this.logger.logStorageError('write', error, { namespace: this.namespace });
      throw new BackingStoreError('write', error);
    }
  }
}

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
