/**
 * Configuration Management
 *
 * Application configuration from environment variables, optionally loaded
 * from a .env file. Every variable is prefixed FACE_ATTENDANCE_.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err } from './result-types.js';
import { ConfigError } from './errors/AttendanceErrors.js';
import type { LogLevel } from './logger.js';
import type { SessionPolicyKind } from '../services/attendance/session-policy.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

export type StorageBackend = 'sqlite' | 'file' | 'memory';

export interface AppConfig {
	/** Data directory: database, flat files, samples and logs */
	home: string;

	/** Backend of the registry and the ledger */
	storage: StorageBackend;

	/** Maximum Euclidean distance accepted as a match */
	threshold: number;

	/** How repeated attendance attempts are deduplicated */
	dedupPolicy: SessionPolicyKind;

	/** Window of the cooldown policy */
	cooldownSeconds: number;

	/** Offset of the local calendar day from UTC */
	utcOffsetMinutes: number;

	/** Minimum level printed to the console */
	logLevel: LogLevel;
}

const ENV_PREFIX = 'FACE_ATTENDANCE_';

const EnvSchema = z.object({
	FACE_ATTENDANCE_HOME: z.string().min(1).default('.face-attendance'),
	FACE_ATTENDANCE_STORAGE: z.enum(['sqlite', 'file', 'memory']).default('sqlite'),
	FACE_ATTENDANCE_THRESHOLD: z.coerce.number().finite().nonnegative().default(0.5),
	FACE_ATTENDANCE_DEDUP_POLICY: z.enum(['calendar', 'cooldown']).default('calendar'),
	FACE_ATTENDANCE_COOLDOWN_SECONDS: z.coerce.number().finite().positive().default(300),
	FACE_ATTENDANCE_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-840).max(840).default(0),
	FACE_ATTENDANCE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
});

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Loads the .env file and validates the environment into an AppConfig.
 */
export class ConfigurationManager {
	constructor(private envPath?: string) {}

	/**
	 * Load environment variables from .env file
	 *
	 * A missing .env file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Validate the FACE_ATTENDANCE_* variables of `env`
	 *
	 * Empty variables count as unset.
	 */
	getAppConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, ConfigError> {
		const relevant: Record<string, string> = {};
		for (const [key, value] of Object.entries(env)) {
			if (key.startsWith(ENV_PREFIX) && value !== undefined && value.trim() !== '') {
				relevant[key] = value.trim();
			}
		}

		const parsed = EnvSchema.safeParse(relevant);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const field = issue ? String(issue.path[0]) : undefined;
			return err(
				new ConfigError(
					field ? `Invalid ${field}: ${issue?.message}` : 'Invalid configuration',
					field
				)
			);
		}

		const vars = parsed.data;
		return ok({
			home: vars.FACE_ATTENDANCE_HOME,
			storage: vars.FACE_ATTENDANCE_STORAGE,
			threshold: vars.FACE_ATTENDANCE_THRESHOLD,
			dedupPolicy: vars.FACE_ATTENDANCE_DEDUP_POLICY,
			cooldownSeconds: vars.FACE_ATTENDANCE_COOLDOWN_SECONDS,
			utcOffsetMinutes: vars.FACE_ATTENDANCE_UTC_OFFSET_MINUTES,
			logLevel: vars.FACE_ATTENDANCE_LOG_LEVEL,
		});
	}
}

/**
 * Load the .env file into process.env, then read the configuration
 *
 * @param envPath - Optional path to .env file
 */
export function loadConfig(envPath?: string): Result<AppConfig, ConfigError> {
	const manager = new ConfigurationManager(envPath);
	return manager.loadEnv().andThen(() => manager.getAppConfig());
}
