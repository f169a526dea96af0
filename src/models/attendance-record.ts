/**
 * Attendance Record Model
 */

import { z } from 'zod';
import type { Identity } from './face.js';

/**
 * Where an attendance attempt came from (e.g. 'camera', 'cli', 'manual')
 */
export type AttendanceSource = string;

export const DEFAULT_ATTENDANCE_SOURCE: AttendanceSource = 'manual';

/**
 * One persisted attendance event
 */
export interface AttendanceRecord {
  identity: Identity;
  /** ISO 8601 UTC timestamp */
  timestamp: string;
  source: AttendanceSource;
  /** Dedup bucket the record occupies */
  sessionKey: string;
}

export const AttendanceRecordSchema = z.object({
  identity: z.string().min(1),
  timestamp: z.string().datetime(),
  source: z.string(),
  sessionKey: z.string().min(1),
});

/**
 * Result of a single logAttempt call
 */
export type LogOutcome =
  | { logged: true; record: AttendanceRecord }
  | { logged: false; identity: Identity; sessionKey: string; attemptedAt: string };

/**
 * Filters for attendance queries; both bounds are inclusive
 */
export interface AttendanceQuery {
  identity?: Identity;
  from?: Date;
  to?: Date;
}
