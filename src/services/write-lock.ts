/**
 * Single-Writer Enforcement Pattern
 *
 * SQLite supports multiple concurrent readers but only one writer at a time.
 * Bulk writes (registry rebuilds) take the write lock upfront with
 * BEGIN IMMEDIATE and retry with exponential backoff while another
 * connection holds it.
 *
 * ## Usage Example
 *
 * ```typescript
 * const writeLock = new WriteLock(db);
 *
 * await writeLock.withWriteLock(() => {
 *   db.prepare('DELETE FROM kv_entries WHERE namespace = ?').run('embeddings');
 *   db.prepare('INSERT INTO kv_entries ...').run();
 * });
 * ```
 *
 * The callback is synchronous: BEGIN, the callback and COMMIT run without
 * yielding, so no other statement on the same connection can slip into
 * the transaction.
 *
 * ## Retry Strategy
 *
 * When the lock cannot be acquired (SQLITE_BUSY):
 * 1. Wait with exponential backoff: 10ms, 20ms, 40ms, 80ms, ...
 * 2. Maximum backoff: 500ms per attempt
 * 3. Total timeout: configurable (default 5000ms)
 * 4. After timeout: throw
 */

import type Database from 'better-sqlite3';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

/**
 * Write lock configuration
 */
export interface WriteLockConfig {
	/** Total timeout in milliseconds (default: 5000ms) */
	timeoutMs: number;
	/** Initial backoff delay in milliseconds (default: 10ms) */
	initialBackoffMs: number;
	/** Maximum backoff delay in milliseconds (default: 500ms) */
	maxBackoffMs: number;
	/** Backoff multiplier (default: 2 for exponential) */
	backoffMultiplier: number;
}

export const DEFAULT_WRITE_LOCK_CONFIG: WriteLockConfig = {
	timeoutMs: 5000,
	initialBackoffMs: 10,
	maxBackoffMs: 500,
	backoffMultiplier: 2,
};

export function isBusyError(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		(error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED')
	);
}

/**
 * Write Lock Manager
 */
export class WriteLock {
	private db: Database.Database;
	private config: WriteLockConfig;
	private logger: Logger;

	constructor(
		db: Database.Database,
		config: Partial<WriteLockConfig> = {},
		logger: Logger = defaultLogger
	) {
		this.db = db;
		this.config = { ...DEFAULT_WRITE_LOCK_CONFIG, ...config };
		this.logger = logger;
	}

	/**
	 * Run `fn` inside a BEGIN IMMEDIATE transaction
	 *
	 * Commits on success, rolls back when `fn` throws.
	 *
	 * @throws Error if the lock cannot be acquired within the timeout,
	 * or whatever `fn` throws
	 */
	async withWriteLock<T>(fn: () => T): Promise<T> {
		const startTime = Date.now();
		let backoffMs = this.config.initialBackoffMs;
		let attempt = 0;

		while (Date.now() - startTime < this.config.timeoutMs) {
			attempt++;

			try {
				this.db.prepare('BEGIN IMMEDIATE').run();
			} catch (error) {
				if (!isBusyError(error)) {
					throw error;
				}

				this.logger.debug('Database busy, retrying', {
					attempt,
					backoffMs,
					elapsedMs: Date.now() - startTime,
				});

				await this.sleep(backoffMs);
				backoffMs = Math.min(
					backoffMs * this.config.backoffMultiplier,
					this.config.maxBackoffMs
				);
				continue;
			}

			this.logger.debug('Write lock acquired', {
				attempt,
				elapsedMs: Date.now() - startTime,
			});

			try {
				const result = fn();
				this.db.prepare('COMMIT').run();
				return result;
			} catch (error) {
				if (this.db.inTransaction) {
					this.db.prepare('ROLLBACK').run();
				}
				this.logger.debug('Write lock function failed, rolled back', {
					error: error instanceof Error ? error.message : String(error),
				});
				throw error;
			}
		}

		this.logger.warn('Write lock acquisition timeout', {
			attempts: attempt,
			timeoutMs: this.config.timeoutMs,
		});

		throw new Error(
			`Failed to acquire write lock within ${this.config.timeoutMs}ms timeout`
		);
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}
