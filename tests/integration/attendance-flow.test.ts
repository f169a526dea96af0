/**
 * End-to-end flow over the persistent backends, reopening the data
 * directory between steps the way separate CLI invocations do
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { AppConfig } from '../../src/lib/env-config.js';
import { openAttendanceSession, type OpenedSession } from '../../src/services/session-factory.js';
import type { AttendanceRecord } from '../../src/models/attendance-record.js';
import { EmbeddingsUnavailableError } from '../../src/lib/errors/AttendanceErrors.js';
import {
  createTempDir,
  createTestClock,
  facesDoc,
  quietLogger,
  type TempDir,
  type TestClock,
} from '../helpers/attendance-test-helper.js';

async function collect(iterable: AsyncIterable<AttendanceRecord>): Promise<AttendanceRecord[]> {
  const records: AttendanceRecord[] = [];
  for await (const record of iterable) {
    records.push(record);
  }
  return records;
}

describe.each(['sqlite', 'file'] as const)('attendance flow on %s storage', (storage) => {
  let dir: TempDir;
  let clock: TestClock;
  let config: AppConfig;
  const opened: OpenedSession[] = [];

  function open(overrides: Partial<AppConfig> = {}): OpenedSession {
    const session = openAttendanceSession({ ...config, ...overrides }, { logger: quietLogger(), clock: clock.now });
    opened.push(session);
    return session;
  }

  beforeEach(() => {
    dir = createTempDir();
    clock = createTestClock('2026-03-02T08:55:00.000Z');
    config = {
      home: dir.path,
      storage,
      threshold: 0.5,
      dedupPolicy: 'calendar',
      cooldownSeconds: 300,
      utcOffsetMinutes: 0,
      logLevel: 'warn',
    };
  });

  afterEach(() => {
    for (const session of opened.splice(0)) {
      session.close();
    }
    dir.cleanup();
  });

  it('should enroll, recognize and record attendance across reopenings', async () => {
    const first = open();
    await expect(first.session.recognize({ vector: [0, 0] })).rejects.toThrow(EmbeddingsUnavailableError);
    await first.session.enroll('alice', { image: facesDoc([0.1, 0.2, 0]) });
    await first.session.enroll('bob', { image: facesDoc([0.9, 0.8, 0.7]) });
    first.close();

    const second = open();
    const results = await second.session.checkIn({ image: facesDoc([0.1, 0.2, 0.3], [0.5, 0.5, 0.5]) });
    expect(results.map((r) => [r.identity, r.logged])).toEqual([
      ['alice', true],
      ['Unknown', false],
    ]);
    second.close();

    clock.advance(3_600_000);
    const third = open();
    expect((await third.session.logAttendance('alice', 'manual')).logged).toBe(false);
    expect((await third.session.logAttendance('bob', 'manual')).logged).toBe(true);

    expect(await collect(third.session.queryAttendance())).toEqual([
      { identity: 'alice', timestamp: '2026-03-02T08:55:00.000Z', source: 'camera', sessionKey: '20260302' },
      { identity: 'bob', timestamp: '2026-03-02T09:55:00.000Z', source: 'manual', sessionKey: '20260302' },
    ]);
    expect(await third.session.listIdentities()).toEqual([
      { identity: 'alice', sampleCount: 1 },
      { identity: 'bob', sampleCount: 1 },
    ]);
  });

  it('should rebuild the registry from the samples kept on disk', async () => {
    const first = open();
    await first.session.enroll('alice', { image: facesDoc([0, 0]) });
    await first.session.enroll('bob', { image: facesDoc([1, 1]) });
    first.close();

    const second = open();
    expect(await second.session.rebuild()).toBe(2);
    expect((await second.session.status()).snapshotVersion).toBe(3);
    expect(await second.session.recognize({ vector: [1, 1] })).toEqual([{ identity: 'bob', distance: 0 }]);
  });

  it('should apply the cooldown policy when configured', async () => {
    const session = open({ dedupPolicy: 'cooldown', cooldownSeconds: 300 }).session;

    clock.set('2026-03-02T23:59:00.000Z');
    const lateEvening = await session.logAttendance('alice');
    clock.set('2026-03-03T00:01:00.000Z');
    const afterMidnight = await session.logAttendance('alice');
    clock.set('2026-03-03T00:04:00.000Z');
    const afterWindow = await session.logAttendance('alice');

    expect([lateEvening.logged, afterMidnight.logged, afterWindow.logged]).toEqual([true, false, true]);
  });
});

describe('storage statistics', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function configFor(storage: AppConfig['storage']): AppConfig {
    return {
      home: dir.path,
      storage,
      threshold: 0.5,
      dedupPolicy: 'calendar',
      cooldownSeconds: 300,
      utcOffsetMinutes: 0,
      logLevel: 'warn',
    };
  }

  it('should count registry and ledger rows in the SQLite database', async () => {
    const opened = openAttendanceSession(configFor('sqlite'), { logger: quietLogger() });
    await opened.session.enroll('alice', { vector: [0.1, 0.2] });
    await opened.session.logAttendance('alice');

    expect(opened.storageStats()).toEqual({ entryCount: 3, schemaVersion: '1' });
    opened.close();
    expect(opened.storageStats()).toBeNull();
  });

  it('should report no statistics for file storage', () => {
    const opened = openAttendanceSession(configFor('file'), { logger: quietLogger() });
    expect(opened.storageStats()).toBeNull();
    opened.close();
  });
});
