/**
 * Database Service
 *
 * Opens the SQLite database that backs the registry and the ledger and
 * applies the schema.
 */

import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const SCHEMA_PATH = path.join(__dirname, '../../sql/schema.sql');

export class DatabaseService {
  private db: Database.Database;

  /**
   * @param dbPath - File path, or ':memory:' for a private in-memory database
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeSchema();
  }

  private initializeSchema(): void {
    const sql = readFileSync(SCHEMA_PATH, 'utf-8');
    this.db.exec(sql);
  }

  /**
   * Get current schema version
   */
  getSchemaVersion(): string {
    const result = this.db
      .prepare<[], { value: string }>(`SELECT value FROM meta WHERE key = 'schema_version'`)
      .get();
    return result?.value ?? '0';
  }

  /**
   * Get database statistics
   */
  getStats(): { entryCount: number; schemaVersion: string } {
    const result = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM kv_entries`)
      .get();

    return {
      entryCount: result?.count ?? 0,
      schemaVersion: this.getSchemaVersion(),
    };
  }

  /**
   * Underlying connection, shared by the stores of one process
   */
  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
