/**
 * Session Factory
 *
 * Builds an AttendanceSession over the storage backend named by the
 * configuration, with `*.faces.json` documents as the image type.
 */

import { join } from 'path';
import { DatabaseService } from './database.js';
import type { KeyValueStore } from './storage/KeyValueStore.js';
import { MemoryStore } from './storage/MemoryStore.js';
import { JsonFileStore } from './storage/JsonFileStore.js';
import { SqliteStore } from './storage/SqliteStore.js';
import { EmbeddingRegistry } from './embedding-registry.js';
import { AttendanceLedger } from './attendance/attendance-ledger.js';
import { CalendarBucketPolicy, CooldownPolicy, type SessionPolicy } from './attendance/session-policy.js';
import { PrecomputedFaceEncoder } from './face-encoder.js';
import { FileSampleStore } from './sample-store.js';
import { AttendanceSession } from './attendance-session.js';
import type { AppConfig } from '../lib/env-config.js';
import type { FaceDetections } from '../models/face.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';

export const REGISTRY_NAMESPACE = 'registry';
export const ATTENDANCE_NAMESPACE = 'attendance';

export interface OpenedSession {
  session: AttendanceSession<FaceDetections>;
  /** Entry count and schema version, for SQLite storage only */
  storageStats(): { entryCount: number; schemaVersion: string } | null;
  /** Release the stores and the database connection */
  close(): void;
}

export function createSessionPolicy(config: Pick<AppConfig, 'dedupPolicy' | 'cooldownSeconds' | 'utcOffsetMinutes'>): SessionPolicy {
  switch (config.dedupPolicy) {
    case 'calendar':
      return new CalendarBucketPolicy(config.utcOffsetMinutes);
    case 'cooldown':
      return new CooldownPolicy(config.cooldownSeconds * 1000);
  }
}

export function openAttendanceSession(
  config: AppConfig,
  options: { logger?: Logger; clock?: () => Date } = {}
): OpenedSession {
  const logger = options.logger ?? defaultLogger;
  let database: DatabaseService | undefined;
  let registryStore: KeyValueStore;
  let attendanceStore: KeyValueStore;

  switch (config.storage) {
    case 'sqlite': {
      database = new DatabaseService(join(config.home, 'attendance.db'));
      registryStore = new SqliteStore(database.getDatabase(), REGISTRY_NAMESPACE, logger);
      attendanceStore = new SqliteStore(database.getDatabase(), ATTENDANCE_NAMESPACE, logger);
      break;
    }
    case 'file':
      registryStore = new JsonFileStore(join(config.home, 'store'), REGISTRY_NAMESPACE, logger);
      attendanceStore = new JsonFileStore(join(config.home, 'store'), ATTENDANCE_NAMESPACE, logger);
      break;
    case 'memory':
      registryStore = new MemoryStore(REGISTRY_NAMESPACE);
      attendanceStore = new MemoryStore(ATTENDANCE_NAMESPACE);
      break;
  }

  const encoder = new PrecomputedFaceEncoder();
  const registry = new EmbeddingRegistry(registryStore, encoder, { logger, clock: options.clock });
  const ledger = new AttendanceLedger(attendanceStore, createSessionPolicy(config), { logger, clock: options.clock });
  const samples = new FileSampleStore(join(config.home, 'samples'), { logger, clock: options.clock });

  const session = new AttendanceSession({
    registry,
    ledger,
    encoder,
    samples,
    matchPolicy: { metric: 'euclidean', threshold: config.threshold },
    logger,
  });

  let closed = false;

  return {
    session,
    storageStats: () => (database && !closed ? database.getStats() : null),
    close: () => {
      if (closed) {
        return;
      }
      closed = true;
      registryStore.close();
      attendanceStore.close();
      database?.close();
    },
  };
}
