/**
 * In-process key/value store
 *
 * Every operation runs synchronously before its promise settles, so
 * putIfAbsent and update are atomic with respect to other callers in the
 * process.
 */

import type { KeyValueStore, ScanFilter, StoreEntry, StoredValue, UpdatePlan } from './KeyValueStore.js';
import { matchesPrefix } from './KeyValueStore.js';

export class MemoryStore implements KeyValueStore {
  readonly namespace: string;
  private entries: Map<string, string>;

  constructor(namespace: string) {
    this.namespace = namespace;
    this.entries = new Map();
  }

  async get(key: string): Promise<StoredValue | undefined> {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : parseValue(raw);
  }

  async put(key: string, value: StoredValue): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async putIfAbsent(key: string, value: StoredValue): Promise<boolean> {
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, JSON.stringify(value));
    return true;
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async *scan(filter?: ScanFilter): AsyncIterable<StoreEntry> {
    // Copy keys so concurrent writes do not disturb an ongoing scan
    const keys = [...this.entries.keys()].filter((key) => matchesPrefix(key, filter)).sort();

    for (const key of keys) {
      const raw = this.entries.get(key);
      if (raw !== undefined) {
        yield { key, value: parseValue(raw) };
      }
    }
  }

  async update<T>(plan: UpdatePlan<T>): Promise<T> {
    const { operations, result } = plan({
      get: (key) => {
        const raw = this.entries.get(key);
        return raw === undefined ? undefined : parseValue(raw);
      },
    });

    // Applied to a copy and swapped in whole
    const next = new Map(this.entries);
    for (const operation of operations) {
      switch (operation.type) {
        case 'put':
          next.set(operation.key, JSON.stringify(operation.value));
          break;
        case 'delete':
          next.delete(operation.key);
          break;
        case 'deletePrefix':
          for (const key of [...next.keys()]) {
            if (key.startsWith(operation.prefix)) {
              next.delete(key);
            }
          }
          break;
      }
    }
    this.entries = next;

    return result;
  }

  /**
   * Number of stored entries
   */
  size(): number {
    return this.entries.size;
  }

  close(): void {
    this.entries.clear();
  }
}

function parseValue(raw: string): StoredValue {
  // Values are stored serialized so callers never share mutable state
  const value: StoredValue = JSON.parse(raw);
  return value;
}
