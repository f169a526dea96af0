/**
 * AttendanceLedger Service
 *
 * Records at most one attendance event per (identity, session key). Records
 * are stored under `slot/<identity>/<sessionKey>` and written with
 * putIfAbsent: the store decides who wins a slot, never a prior read.
 */

import type { KeyValueStore, StoredValue } from '../storage/KeyValueStore.js';
import type { SessionPolicy } from './session-policy.js';
import type { Identity } from '../../models/face.js';
import { checkIdentity } from '../../models/face.js';
import {
  AttendanceRecordSchema,
  DEFAULT_ATTENDANCE_SOURCE,
  type AttendanceQuery,
  type AttendanceRecord,
  type AttendanceSource,
  type LogOutcome,
} from '../../models/attendance-record.js';
import { InputError, InvalidIdentityError } from '../../lib/errors/AttendanceErrors.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger.js';

const SLOT_PREFIX = 'slot/';

function identityPrefix(identity: Identity): string {
  return `${SLOT_PREFIX}${encodeURIComponent(identity)}/`;
}

export function slotKey(identity: Identity, sessionKey: string): string {
  return identityPrefix(identity) + encodeURIComponent(sessionKey);
}

interface ResolvedQuery {
  identity?: Identity;
  fromMs?: number;
  toMs?: number;
}

export class AttendanceLedger {
  private store: KeyValueStore;
  private policy: SessionPolicy;
  private logger: Logger;
  private clock: () => Date;

  constructor(
    store: KeyValueStore,
    policy: SessionPolicy,
    options: { logger?: Logger; clock?: () => Date } = {}
  ) {
    this.store = store;
    this.policy = policy;
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  get sessionPolicy(): SessionPolicy {
    return this.policy;
  }

  /**
   * Record an attendance event unless the identity already holds the
   * current session slot
   *
   * @throws InvalidIdentityError for an empty or reserved identity
   */
  async logAttempt(rawIdentity: string, source: AttendanceSource = DEFAULT_ATTENDANCE_SOURCE): Promise<LogOutcome> {
    const checked = checkIdentity(rawIdentity);
    if ('reason' in checked) {
      throw new InvalidIdentityError(rawIdentity, checked.reason);
    }
    const { identity } = checked;

    const tag = source.trim();
    if (tag.length === 0) {
      throw new InputError('Attendance source must not be empty');
    }

    const at = this.clock();
    const attemptedAt = at.toISOString();
    const previous = this.policy.needsPreviousEvent ? await this.lastEvent(identity) : undefined;
    const resolution = this.policy.resolve(at, previous);

    if (resolution.kind === 'suppressed') {
      this.logger.debug('Attendance suppressed by session policy', {
        identity,
        sessionKey: resolution.sessionKey,
        previous: resolution.previous.timestamp,
      });
      return { logged: false, identity, sessionKey: resolution.sessionKey, attemptedAt };
    }

    const record: AttendanceRecord = {
      identity,
      timestamp: attemptedAt,
      source: tag,
      sessionKey: resolution.sessionKey,
    };

    const written = await this.store.putIfAbsent(slotKey(identity, record.sessionKey), recordValue(record));
    if (!written) {
      this.logger.debug('Attendance slot already taken', { identity, sessionKey: record.sessionKey });
      return { logged: false, identity, sessionKey: record.sessionKey, attemptedAt };
    }

    this.logger.info('Attendance logged', { identity, source: tag, sessionKey: record.sessionKey });
    return { logged: true, record };
  }

  /**
   * Records matching `filters`, ascending by timestamp
   *
   * Nothing is read until iteration starts; every iteration reads the
   * store again, so the same result object can be iterated repeatedly.
   *
   * @throws InputError for an invalid date bound
   */
  query(filters: AttendanceQuery = {}): AsyncIterable<AttendanceRecord> {
    const resolved = resolveQuery(filters);
    return {
      [Symbol.asyncIterator]: () => this.iterate(resolved),
    };
  }

  /**
   * Most recent record of an identity
   */
  async lastEvent(identity: Identity): Promise<AttendanceRecord | undefined> {
    let last: AttendanceRecord | undefined;

    for await (const record of this.iterate({ identity })) {
      last = record;
    }

    return last;
  }

  private async *iterate(filters: ResolvedQuery): AsyncGenerator<AttendanceRecord> {
    const prefix = filters.identity === undefined ? SLOT_PREFIX : identityPrefix(filters.identity);
    const matched: Array<{ record: AttendanceRecord; timeMs: number }> = [];

    for await (const entry of this.store.scan({ prefix })) {
      const parsed = AttendanceRecordSchema.safeParse(entry.value);
      if (!parsed.success) {
        this.logger.warn('Skipping malformed attendance record', { key: entry.key });
        continue;
      }

      const record = parsed.data;
      const timeMs = Date.parse(record.timestamp);
      if (filters.fromMs !== undefined && timeMs < filters.fromMs) {
        continue;
      }
      if (filters.toMs !== undefined && timeMs > filters.toMs) {
        continue;
      }
      matched.push({ record, timeMs });
    }

    // Slot keys are not time-ordered, so order after filtering
    matched.sort((a, b) => a.timeMs - b.timeMs || compareStrings(a.record.identity, b.record.identity));

    for (const { record } of matched) {
      yield record;
    }
  }
}

function resolveQuery(filters: AttendanceQuery): ResolvedQuery {
  const resolved: ResolvedQuery = {};

  if (filters.identity !== undefined) {
    const checked = checkIdentity(filters.identity);
    if ('reason' in checked) {
      throw new InvalidIdentityError(filters.identity, checked.reason);
    }
    resolved.identity = checked.identity;
  }

  if (filters.from !== undefined) {
    resolved.fromMs = validTime(filters.from, 'from');
  }
  if (filters.to !== undefined) {
    resolved.toMs = validTime(filters.to, 'to');
  }

  return resolved;
}

function validTime(value: Date, bound: string): number {
  const ms = value.getTime();
  if (Number.isNaN(ms)) {
    throw new InputError(`Invalid "${bound}" date`);
  }
  return ms;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function recordValue(record: AttendanceRecord): StoredValue {
  return {
    identity: record.identity,
    timestamp: record.timestamp,
    source: record.source,
    sessionKey: record.sessionKey,
  };
}
