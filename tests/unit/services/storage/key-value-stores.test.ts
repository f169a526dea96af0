/**
 * Shared behaviour of the three KeyValueStore backends
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { KeyValueStore, StoreEntry } from '../../../../src/services/storage/KeyValueStore.js';
import { MemoryStore } from '../../../../src/services/storage/MemoryStore.js';
import { JsonFileStore } from '../../../../src/services/storage/JsonFileStore.js';
import { SqliteStore } from '../../../../src/services/storage/SqliteStore.js';
import { DatabaseService } from '../../../../src/services/database.js';
import { InputError } from '../../../../src/lib/errors/AttendanceErrors.js';
import { createTempDir, quietLogger } from '../../../helpers/attendance-test-helper.js';

interface Backend {
  store: KeyValueStore;
  dispose(): void;
}

const backends: Array<{ name: string; open: () => Backend }> = [
  {
    name: 'memory',
    open: () => {
      const store = new MemoryStore('test');
      return { store, dispose: () => store.close() };
    },
  },
  {
    name: 'json-file',
    open: () => {
      const dir = createTempDir();
      return { store: new JsonFileStore(dir.path, 'test', quietLogger()), dispose: () => dir.cleanup() };
    },
  },
  {
    name: 'sqlite',
    open: () => {
      const database = new DatabaseService(':memory:');
      return {
        store: new SqliteStore(database.getDatabase(), 'test', quietLogger()),
        dispose: () => database.close(),
      };
    },
  },
];

async function collect(iterable: AsyncIterable<StoreEntry>): Promise<StoreEntry[]> {
  const entries: StoreEntry[] = [];
  for await (const entry of iterable) {
    entries.push(entry);
  }
  return entries;
}

describe.each(backends)('$name store', ({ open }) => {
  let backend: Backend;
  let store: KeyValueStore;

  beforeEach(() => {
    backend = open();
    store = backend.store;
  });

  afterEach(() => {
    backend.dispose();
  });

  it('should return undefined for a missing key', async () => {
    expect(await store.get('missing')).toBeUndefined();
  });

  it('should round-trip JSON values exactly', async () => {
    const value = { vector: [0.1, 0.2, 1e-7, -3.14159], note: 'x', flag: true, none: null };

    await store.put('a', value);

    expect(await store.get('a')).toEqual(value);
  });

  it('should replace on put', async () => {
    await store.put('a', 1);
    await store.put('a', 2);

    expect(await store.get('a')).toBe(2);
  });

  it('should only write the first putIfAbsent', async () => {
    expect(await store.putIfAbsent('slot', 'first')).toBe(true);
    expect(await store.putIfAbsent('slot', 'second')).toBe(false);
    expect(await store.get('slot')).toBe('first');
  });

  it('should let exactly one of many concurrent putIfAbsent calls win', async () => {
    const outcomes = await Promise.all(
      Array.from({ length: 10 }, (_, i) => store.putIfAbsent('slot', i))
    );

    expect(outcomes.filter(Boolean)).toHaveLength(1);
  });

  it('should report whether delete removed something', async () => {
    await store.put('a', 1);

    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect(await store.get('a')).toBeUndefined();
  });

  it('should scan by prefix in ascending key order', async () => {
    await store.put('b/2', 2);
    await store.put('a/1', 1);
    await store.put('b/1', 1);
    await store.put('bb', 0);

    const entries = await collect(store.scan({ prefix: 'b/' }));

    expect(entries).toEqual([
      { key: 'b/1', value: 1 },
      { key: 'b/2', value: 2 },
    ]);
  });

  it('should scan everything without a filter', async () => {
    await store.put('z', 1);
    await store.put('a', 2);

    const keys = (await collect(store.scan())).map((entry) => entry.key);

    expect(keys).toEqual(['a', 'z']);
  });

  it('should not read before iteration starts', async () => {
    const scan = store.scan({ prefix: 'k/' });
    await store.put('k/1', 1);

    expect(await collect(scan)).toEqual([{ key: 'k/1', value: 1 }]);
  });

  it('should scan more entries than one page', async () => {
    for (let i = 0; i < 300; i++) {
      await store.put(`p/${String(i).padStart(3, '0')}`, i);
    }

    const entries = await collect(store.scan({ prefix: 'p/' }));

    expect(entries).toHaveLength(300);
    expect(entries[0]).toEqual({ key: 'p/000', value: 0 });
    expect(entries[299]).toEqual({ key: 'p/299', value: 299 });
  });

  it('should apply planned operations together and return the plan result', async () => {
    await store.put('v/old', 1);
    await store.put('v/kept-name', 2);
    await store.put('manifest', 3);

    const result = await store.update((current) => {
      const manifest = current.get('manifest');
      return {
        operations: [
          { type: 'deletePrefix', prefix: 'v/' },
          { type: 'put', key: 'v/kept-name', value: 20 },
          { type: 'put', key: 'v/new', value: 30 },
          { type: 'put', key: 'manifest', value: typeof manifest === 'number' ? manifest + 1 : 0 },
        ],
        result: 'applied',
      };
    });

    expect(result).toBe('applied');
    expect(await collect(store.scan())).toEqual([
      { key: 'manifest', value: 4 },
      { key: 'v/kept-name', value: 20 },
      { key: 'v/new', value: 30 },
    ]);
  });

  it('should delete single keys in an update', async () => {
    await store.put('a', 1);
    await store.put('b', 2);

    await store.update(() => ({ operations: [{ type: 'delete', key: 'a' }], result: undefined }));

    expect(await collect(store.scan())).toEqual([{ key: 'b', value: 2 }]);
  });

  it('should write nothing and pass the error on when the plan throws', async () => {
    await store.put('a', 1);

    await expect(
      store.update(() => {
        throw new InputError('rejected by plan');
      })
    ).rejects.toThrow(InputError);

    expect(await store.get('a')).toBe(1);
    await store.put('b', 2);
    expect(await store.get('b')).toBe(2);
  });

  it('should not interleave concurrent updates', async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, () =>
        store.update((current) => {
          const counter = current.get('counter');
          const next = (typeof counter === 'number' ? counter : 0) + 1;
          return { operations: [{ type: 'put', key: 'counter', value: next }], result: next };
        })
      )
    );

    expect([...results].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(await store.get('counter')).toBe(10);
  });
});
