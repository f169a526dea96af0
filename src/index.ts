/**
 * Library entry point
 */

export * from './models/face.js';
export * from './models/match-result.js';
export * from './models/attendance-record.js';
export * from './lib/errors/AttendanceErrors.js';
export { Logger, logger, type LogLevel, type LoggerConfig } from './lib/logger.js';
export { loadConfig, ConfigurationManager, type AppConfig, type StorageBackend } from './lib/env-config.js';

export type {
  KeyValueStore,
  StoreEntry,
  StoredValue,
  ScanFilter,
  StoreOperation,
  StoreReader,
  PlannedUpdate,
  UpdatePlan,
} from './services/storage/KeyValueStore.js';
export { MemoryStore } from './services/storage/MemoryStore.js';
export { JsonFileStore } from './services/storage/JsonFileStore.js';
export { SqliteStore } from './services/storage/SqliteStore.js';
export { DatabaseService } from './services/database.js';

export type { FaceEncoder } from './services/face-encoder.js';
export { PrecomputedFaceEncoder } from './services/face-encoder.js';
export { EmbeddingRegistry } from './services/embedding-registry.js';
export { FaceMatcher } from './services/face-matcher.js';
export {
  CalendarBucketPolicy,
  CooldownPolicy,
  type SessionPolicy,
  type SessionPolicyKind,
  type SessionResolution,
} from './services/attendance/session-policy.js';
export { AttendanceLedger } from './services/attendance/attendance-ledger.js';
export { FileSampleStore, type SampleStore } from './services/sample-store.js';
export {
  AttendanceSession,
  type AttendanceSessionOptions,
  type CheckInResult,
  type EnrollResult,
  type IdentitySummary,
  type SessionStatus,
} from './services/attendance-session.js';
export { openAttendanceSession, createSessionPolicy, type OpenedSession } from './services/session-factory.js';
