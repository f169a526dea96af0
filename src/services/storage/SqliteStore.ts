/**
 * SQLite key/value store
 *
 * One namespace of the shared kv_entries table. putIfAbsent maps to
 * INSERT ... ON CONFLICT DO NOTHING, which is atomic across connections
 * and processes. update() runs its read and its writes in one
 * BEGIN IMMEDIATE transaction.
 */

import type Database from 'better-sqlite3';
import type {
  KeyValueStore,
  ScanFilter,
  StoreEntry,
  StoreOperation,
  StoredValue,
  UpdatePlan,
} from './KeyValueStore.js';
import { prefixUpperBound } from './KeyValueStore.js';
import { WriteLock } from '../write-lock.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';
import { BackingStoreError, FaceAttendanceError } from '../../lib/errors/AttendanceErrors.js';

interface EntryRow {
  key: string;
  value: string;
}

/** Rows fetched per scan page */
const SCAN_PAGE_SIZE = 256;

export class SqliteStore implements KeyValueStore {
  readonly namespace: string;
  private writeLock: WriteLock;
  private logger: Logger;

  private getStmt: Database.Statement<[string, string], EntryRow>;
  private putStmt: Database.Statement<[string, string, string, number]>;
  private insertIfAbsentStmt: Database.Statement<[string, string, string, number]>;
  private deleteStmt: Database.Statement<[string, string]>;
  private deleteRangeStmt: Database.Statement<[string, string, string]>;
  private firstPageStmt: Database.Statement<[string, string, string, number], EntryRow>;
  private nextPageStmt: Database.Statement<[string, string, string, number], EntryRow>;

  constructor(db: Database.Database, namespace: string, logger: Logger = defaultLogger) {
    this.namespace = namespace;
    this.logger = logger;
    this.writeLock = new WriteLock(db, {}, logger);

    // Prepare all statements once
    this.getStmt = db.prepare<[string, string], EntryRow>(`
      SELECT key, value FROM kv_entries
      WHERE namespace = ? AND key = ?
    `);

    this.putStmt = db.prepare<[string, string, string, number]>(`
      INSERT INTO kv_entries (namespace, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(namespace, key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `);

    this.insertIfAbsentStmt = db.prepare<[string, string, string, number]>(`
      INSERT INTO kv_entries (namespace, key, value, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(namespace, key) DO NOTHING
    `);

    this.deleteStmt = db.prepare<[string, string]>(`
      DELETE FROM kv_entries
      WHERE namespace = ? AND key = ?
    `);

    this.deleteRangeStmt = db.prepare<[string, string, string]>(`
      DELETE FROM kv_entries
      WHERE namespace = ? AND key >= ? AND key < ?
    `);

    // Keyset pagination: first page from the prefix, then after the last key seen
    this.firstPageStmt = db.prepare<[string, string, string, number], EntryRow>(`
      SELECT key, value FROM kv_entries
      WHERE namespace = ? AND key >= ? AND key < ?
      ORDER BY key
      LIMIT ?
    `);

    this.nextPageStmt = db.prepare<[string, string, string, number], EntryRow>(`
      SELECT key, value FROM kv_entries
      WHERE namespace = ? AND key > ? AND key < ?
      ORDER BY key
      LIMIT ?
    `);
  }

  async get(key: string): Promise<StoredValue | undefined> {
    const row = this.run('get', () => this.getStmt.get(this.namespace, key));
    return row === undefined ? undefined : parseValue(row.value);
  }

  async put(key: string, value: StoredValue): Promise<void> {
    this.run('put', () => this.putStmt.run(this.namespace, key, JSON.stringify(value), Date.now()));
  }

  async putIfAbsent(key: string, value: StoredValue): Promise<boolean> {
    const info = this.run('putIfAbsent', () =>
      this.insertIfAbsentStmt.run(this.namespace, key, JSON.stringify(value), Date.now())
    );
    return info.changes === 1;
  }

  async delete(key: string): Promise<boolean> {
    const info = this.run('delete', () => this.deleteStmt.run(this.namespace, key));
    return info.changes > 0;
  }

  async *scan(filter?: ScanFilter): AsyncIterable<StoreEntry> {
    const prefix = filter?.prefix ?? '';
    const upper = prefixUpperBound(prefix);
    let after: string | undefined;

    // Pages are read one at a time, so writes between pages are allowed
    while (true) {
      const cursor = after;
      const rows = this.run('scan', () =>
        cursor === undefined
          ? this.firstPageStmt.all(this.namespace, prefix, upper, SCAN_PAGE_SIZE)
          : this.nextPageStmt.all(this.namespace, cursor, upper, SCAN_PAGE_SIZE)
      );

      for (const row of rows) {
        if (row.key.startsWith(prefix)) {
          yield { key: row.key, value: parseValue(row.value) };
        }
      }

      const last = rows[rows.length - 1];
      if (rows.length < SCAN_PAGE_SIZE || last === undefined) {
        return;
      }
      after = last.key;
    }
  }

  async update<T>(plan: UpdatePlan<T>): Promise<T> {
    try {
      return await this.writeLock.withWriteLock(() => {
        const { operations, result } = plan({
          get: (key) => {
            const row = this.getStmt.get(this.namespace, key);
            return row === undefined ? undefined : parseValue(row.value);
          },
        });
        this.apply(operations);
        return result;
      });
    } catch (error) {
      // Rejections raised by the plan itself are not storage failures
      if (error instanceof FaceAttendanceError) {
        throw error;
      }
      this.logger.logStorageError('update', error, { namespace: this.namespace });
      throw new BackingStoreError('update', error);
    }
  }

  close(): void {
    // The connection belongs to the DatabaseService that created it
  }

  private apply(operations: ReadonlyArray<StoreOperation>): void {
    const now = Date.now();

    for (const operation of operations) {
      switch (operation.type) {
        case 'put':
          this.putStmt.run(this.namespace, operation.key, JSON.stringify(operation.value), now);
          break;
        case 'delete':
          this.deleteStmt.run(this.namespace, operation.key);
          break;
        case 'deletePrefix':
          this.deleteRangeStmt.run(this.namespace, operation.prefix, prefixUpperBound(operation.prefix));
          break;
      }
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      this.logger.logStorageError(operation, error, { namespace: this.namespace });
      throw new BackingStoreError(operation, error);
    }
  }
}

function parseValue(raw: string): StoredValue {
  const value: StoredValue = JSON.parse(raw);
  return value;
}
