/**
 * Session-key policies
 *
 * A policy maps an attendance attempt onto the dedup slot it competes for.
 * The ledger then claims `(identity, sessionKey)` with one conditional write.
 *
 * The two policies are not equivalent: an identity seen at 23:59 and again
 * at 00:01 lands in two calendar buckets (two records), while a 5-minute
 * cooldown suppresses the second attempt.
 */

import type { AttendanceRecord } from '../../models/attendance-record.js';

export type SessionPolicyKind = 'calendar' | 'cooldown';

export type SessionResolution =
  | { kind: 'claim'; sessionKey: string }
  | { kind: 'suppressed'; sessionKey: string; previous: AttendanceRecord };

export interface SessionPolicy {
  readonly kind: SessionPolicyKind;

  /**
   * Whether resolve() needs the identity's latest record
   */
  readonly needsPreviousEvent: boolean;

  /**
   * @param at - Time of the attempt
   * @param previous - Latest record of the identity (only when needsPreviousEvent)
   */
  resolve(at: Date, previous: AttendanceRecord | undefined): SessionResolution;

  /** Human-readable summary for status output */
  describe(): string;
}

const MINUTE_MS = 60_000;

/**
 * One record per identity per calendar day
 */
export class CalendarBucketPolicy implements SessionPolicy {
  readonly kind = 'calendar';
  readonly needsPreviousEvent = false;
  private readonly utcOffsetMinutes: number;

  /**
   * @param utcOffsetMinutes - Offset of the local day from UTC (e.g. 120 for UTC+2)
   */
  constructor(utcOffsetMinutes: number = 0) {
    if (!Number.isInteger(utcOffsetMinutes) || Math.abs(utcOffsetMinutes) > 14 * 60) {
      throw new RangeError(`UTC offset must be a whole number of minutes within ±840 (got ${utcOffsetMinutes})`);
    }
    this.utcOffsetMinutes = utcOffsetMinutes;
  }

  resolve(at: Date): SessionResolution {
    return { kind: 'claim', sessionKey: this.bucketOf(at) };
  }

  /**
   * Day bucket as YYYYMMDD
   */
  bucketOf(at: Date): string {
    const local = new Date(at.getTime() + this.utcOffsetMinutes * MINUTE_MS);
    const year = local.getUTCFullYear().toString().padStart(4, '0');
    const month = (local.getUTCMonth() + 1).toString().padStart(2, '0');
    const day = local.getUTCDate().toString().padStart(2, '0');
    return `${year}${month}${day}`;
  }

  describe(): string {
    if (this.utcOffsetMinutes === 0) {
      return 'calendar day (UTC)';
    }
    const sign = this.utcOffsetMinutes > 0 ? '+' : '-';
    return `calendar day (UTC${sign}${Math.abs(this.utcOffsetMinutes)}m)`;
  }
}

/**
 * Rolling window: no second record within `cooldownMs` of the previous one
 *
 * The slot claimed is derived from the previous record, so two attempts that
 * saw the same previous record compete for the same slot, and an attempt
 * that saw a stale previous record finds its slot already taken.
 */
export class CooldownPolicy implements SessionPolicy {
  readonly kind = 'cooldown';
  readonly needsPreviousEvent = true;
  readonly cooldownMs: number;

  constructor(cooldownMs: number) {
    if (!Number.isFinite(cooldownMs) || cooldownMs <= 0) {
      throw new RangeError(`Cooldown must be a positive duration (got ${cooldownMs}ms)`);
    }
    this.cooldownMs = cooldownMs;
  }

  resolve(at: Date, previous: AttendanceRecord | undefined): SessionResolution {
    if (!previous) {
      return { kind: 'claim', sessionKey: 'first' };
    }

    const elapsed = at.getTime() - Date.parse(previous.timestamp);
    if (elapsed < this.cooldownMs) {
      return { kind: 'suppressed', sessionKey: previous.sessionKey, previous };
    }

    return { kind: 'claim', sessionKey: `after-${previous.timestamp}` };
  }

  describe(): string {
    return `cooldown ${Math.round(this.cooldownMs / 1000)}s`;
  }
}
