import { describe, it, expect } from 'vitest';
import { CalendarBucketPolicy, CooldownPolicy } from '../../../../src/services/attendance/session-policy.js';
import type { AttendanceRecord } from '../../../../src/models/attendance-record.js';

function recordAt(timestamp: string, sessionKey: string = 'first'): AttendanceRecord {
  return { identity: 'alice', timestamp, source: 'camera', sessionKey };
}

describe('CalendarBucketPolicy', () => {
  it('should bucket by UTC day by default', () => {
    const policy = new CalendarBucketPolicy();

    expect(policy.resolve(new Date('2026-03-02T23:59:00.000Z'))).toEqual({ kind: 'claim', sessionKey: '20260302' });
    expect(policy.resolve(new Date('2026-03-03T00:01:00.000Z'))).toEqual({ kind: 'claim', sessionKey: '20260303' });
  });

  it('should shift the day boundary by the UTC offset', () => {
    const policy = new CalendarBucketPolicy(120);

    expect(policy.bucketOf(new Date('2026-03-02T22:30:00.000Z'))).toBe('20260303');
    expect(policy.bucketOf(new Date('2026-03-02T21:30:00.000Z'))).toBe('20260302');
  });

  it('should reject offsets outside ±14h', () => {
    expect(() => new CalendarBucketPolicy(900)).toThrow(RangeError);
  });

  it('should describe itself', () => {
    expect(new CalendarBucketPolicy().describe()).toBe('calendar day (UTC)');
    expect(new CalendarBucketPolicy(-300).describe()).toBe('calendar day (UTC-300m)');
  });
});

describe('CooldownPolicy', () => {
  const fiveMinutes = new CooldownPolicy(300_000);

  it('should claim the first slot without a previous record', () => {
    expect(fiveMinutes.resolve(new Date('2026-03-02T09:00:00.000Z'), undefined)).toEqual({
      kind: 'claim',
      sessionKey: 'first',
    });
  });

  it('should suppress attempts inside the window', () => {
    const previous = recordAt('2026-03-02T09:00:00.000Z');

    expect(fiveMinutes.resolve(new Date('2026-03-02T09:03:20.000Z'), previous)).toEqual({
      kind: 'suppressed',
      sessionKey: 'first',
      previous,
    });
  });

  it('should claim a slot derived from the previous record once the window has passed', () => {
    const previous = recordAt('2026-03-02T09:00:00.000Z');

    expect(fiveMinutes.resolve(new Date('2026-03-02T09:05:00.000Z'), previous)).toEqual({
      kind: 'claim',
      sessionKey: 'after-2026-03-02T09:00:00.000Z',
    });
  });

  it('should reject a non-positive window', () => {
    expect(() => new CooldownPolicy(0)).toThrow(RangeError);
  });

  it('should describe itself', () => {
    expect(fiveMinutes.describe()).toBe('cooldown 300s');
  });
});
