/**
 * Structured Logging Module
 *
 * Structured logging for registry, ledger and storage operations in
 * JSON Lines (.jsonl) format.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Storage error log entry
 */
export interface StorageErrorLog extends BaseLogEntry {
	type: 'storage_error';
	level: 'error' | 'fatal';
	operation: string;
	namespace?: string;
	error_code: string;
	error_message: string;
	stack_trace?: string;
	context?: Record<string, unknown>;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

export type LogEntry = StorageErrorLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; no file output when omitted */
	logDir?: string;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

/**
 * Structured logger
 */
export class Logger {
	private logDir: string | undefined;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Reconfigure in place, so instances handed out earlier pick up the change
	 */
	configure(config: LoggerConfig): void {
		if (config.logDir !== undefined) {
			this.logDir = config.logDir;
			if (!fs.existsSync(this.logDir)) {
				fs.mkdirSync(this.logDir, { recursive: true });
			}
		}
		if (config.console !== undefined) {
			this.consoleEnabled = config.console;
		}
		if (config.consoleLevel !== undefined) {
			this.consoleLevel = config.consoleLevel;
		}
	}

	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = `[${entry.level.toUpperCase()}] ${entry.timestamp}`;
		const body = entry.type === 'general' ? entry.message : `${entry.operation}: ${entry.error_message}`;
		const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(prefix, body + context);
				break;
			case 'warn':
				console.warn(prefix, body + context);
				break;
			default:
				console.log(prefix, body + context);
		}
	}

	/**
	 * Log a failed backing store call
	 */
	logStorageError(
		operation: string,
		error: unknown,
		context?: {
			namespace?: string;
			additionalContext?: Record<string, unknown>;
		}
	): void {
		const cause = error instanceof Error ? error : undefined;
		const code = cause && 'code' in cause && typeof cause.code === 'string' ? cause.code : 'UNKNOWN';

		const entry: StorageErrorLog = {
			timestamp: new Date().toISOString(),
			level: 'error',
			type: 'storage_error',
			operation,
			namespace: context?.namespace,
			error_code: code,
			error_message: cause ? cause.message : String(error),
			stack_trace: cause?.stack,
			context: context?.additionalContext,
		};

		this.writeLogEntry('storage-errors', entry);
		this.outputToConsole(entry);
	}

	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

/**
 * Default logger instance
 */
export const logger = new Logger();
