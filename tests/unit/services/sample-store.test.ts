import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { FileSampleStore } from '../../../src/services/sample-store.js';
import type { FaceDetections, FaceSample } from '../../../src/models/face.js';
import { BackingStoreError, InputError } from '../../../src/lib/errors/AttendanceErrors.js';
import {
  createTempDir,
  createTestClock,
  facesDoc,
  quietLogger,
  type TempDir,
  type TestClock,
} from '../../helpers/attendance-test-helper.js';

async function collect(iterable: AsyncIterable<FaceSample<FaceDetections>>): Promise<Array<FaceSample<FaceDetections>>> {
  const samples: Array<FaceSample<FaceDetections>> = [];
  for await (const sample of iterable) {
    samples.push(sample);
  }
  return samples;
}

describe('FileSampleStore', () => {
  let dir: TempDir;
  let clock: TestClock;
  let store: FileSampleStore;

  beforeEach(() => {
    dir = createTempDir();
    clock = createTestClock('2026-03-02T09:00:00.000Z');
    store = new FileSampleStore(join(dir.path, 'samples'), { logger: quietLogger(), clock: clock.now });
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('should save samples under the identity directory', async () => {
    const ref = await store.save('alice', facesDoc([0.1, 0.2]));

    expect(existsSync(ref)).toBe(true);
    expect(basename(dirname(ref))).toBe('alice');
    expect(basename(ref)).toMatch(/^20260302T090000000Z-[0-9a-f]{8}\.faces\.json$/);
  });

  it('should encode identities that are not valid directory names', async () => {
    const ref = await store.save('ng/josé', facesDoc([1]));

    expect(basename(dirname(ref))).toBe('ng%2Fjos%C3%A9');
    expect(await store.countByIdentity()).toEqual(new Map([['ng/josé', 1]]));
  });

  it('should yield samples grouped by identity, oldest first', async () => {
    await store.save('bob', facesDoc([2]));
    await store.save('alice', facesDoc([1, 0]));
    clock.advance(1000);
    await store.save('alice', facesDoc([1, 1]));

    const samples = await collect(store.samples());

    expect(samples).toEqual([
      { identity: 'alice', image: facesDoc([1, 0]) },
      { identity: 'alice', image: facesDoc([1, 1]) },
      { identity: 'bob', image: facesDoc([2]) },
    ]);
  });

  it('should count samples per identity', async () => {
    await store.save('alice', facesDoc([1]));
    await store.save('alice', facesDoc([2]));
    await store.save('bob', facesDoc([3]));

    expect(await store.countByIdentity()).toEqual(
      new Map([
        ['alice', 2],
        ['bob', 1],
      ])
    );
  });

  it('should be empty before the first save', async () => {
    expect(await collect(store.samples())).toEqual([]);
    expect(await store.countByIdentity()).toEqual(new Map());
  });

  it('should remove a saved sample', async () => {
    const ref = await store.save('alice', facesDoc([1]));

    await store.remove(ref);

    expect(existsSync(ref)).toBe(false);
    expect(await store.countByIdentity()).toEqual(new Map([['alice', 0]]));
  });

  it('should reject documents that do not match the face format', () => {
    const broken = { faces: [{ box: { top: -1, right: 1, bottom: 1, left: 0 }, vector: [1] }] };

    expect(() => store.validate(broken)).toThrow(InputError);
  });

  it('should skip unreadable files when listing samples', async () => {
    const ref = await store.save('alice', facesDoc([1]));
    writeFileSync(join(dirname(ref), 'zz-broken.faces.json'), '{ not json', 'utf-8');

    const samples = await collect(store.samples());

    expect(samples).toHaveLength(1);
    expect(readdirSync(dirname(ref))).toHaveLength(2);
  });

  it('should report a sample that cannot be read as a storage failure', async () => {
    const ref = await store.save('alice', facesDoc([1]));
    mkdirSync(join(dirname(ref), 'zz-folder.faces.json'));

    await expect(collect(store.samples())).rejects.toThrow(BackingStoreError);
  });

  it('should remove every sample of one identity', async () => {
    await store.save('alice', facesDoc([1]));
    await store.save('alice', facesDoc([2]));
    await store.save('bob', facesDoc([3]));

    expect(await store.removeIdentity('alice')).toBe(2);
    expect(await store.removeIdentity('carol')).toBe(0);

    expect(await store.countByIdentity()).toEqual(new Map([['bob', 1]]));
  });
});
