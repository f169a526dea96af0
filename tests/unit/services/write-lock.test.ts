import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { join } from 'path';
import { WriteLock, isBusyError } from '../../../src/services/write-lock.js';
import { DatabaseService } from '../../../src/services/database.js';
import { createTempDir, quietLogger, type TempDir } from '../../helpers/attendance-test-helper.js';

describe('WriteLock', () => {
  let dir: TempDir;
  let database: DatabaseService;
  let db: Database.Database;

  beforeEach(() => {
    dir = createTempDir();
    database = new DatabaseService(join(dir.path, 'attendance.db'));
    db = database.getDatabase();
  });

  afterEach(() => {
    database.close();
    dir.cleanup();
  });

  function count(): number {
    const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM kv_entries').get();
    return row?.n ?? 0;
  }

  const insert = (key: string) =>
    db.prepare(`INSERT INTO kv_entries (namespace, key, value, updated_at) VALUES ('t', ?, '1', 0)`).run(key);

  it('should commit the callback and return its value', async () => {
    const lock = new WriteLock(db, {}, quietLogger());

    const result = await lock.withWriteLock(() => {
      insert('a');
      return 'done';
    });

    expect(result).toBe('done');
    expect(count()).toBe(1);
    expect(db.inTransaction).toBe(false);
  });

  it('should roll back when the callback throws', async () => {
    const lock = new WriteLock(db, {}, quietLogger());

    await expect(
      lock.withWriteLock(() => {
        insert('a');
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(count()).toBe(0);
    expect(db.inTransaction).toBe(false);
  });

  it('should give up after the timeout while another connection holds the lock', async () => {
    const other = new Database(join(dir.path, 'attendance.db'), { timeout: 0 });
    other.prepare('BEGIN IMMEDIATE').run();

    try {
      db.pragma('busy_timeout = 0');
      const lock = new WriteLock(db, { timeoutMs: 50, initialBackoffMs: 5, maxBackoffMs: 10 }, quietLogger());

      await expect(lock.withWriteLock(() => insert('a'))).rejects.toThrow('Failed to acquire write lock within 50ms');
    } finally {
      other.prepare('ROLLBACK').run();
      other.close();
    }
  });

  it('should recognize busy errors by code', () => {
    const busy = Object.assign(new Error('database is locked'), { code: 'SQLITE_BUSY' });

    expect(isBusyError(busy)).toBe(true);
    expect(isBusyError(new Error('other'))).toBe(false);
  });
});
