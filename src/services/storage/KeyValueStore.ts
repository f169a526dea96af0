/**
 * Key/value storage capability
 *
 * The single storage seam of the registry and the ledger. Each store
 * instance is one namespace ("table"); values are JSON-serializable.
 */

/**
 * JSON-serializable value
 */
export type StoredValue =
  | string
  | number
  | boolean
  | null
  | StoredValue[]
  | { [key: string]: StoredValue };

export interface StoreEntry<V = StoredValue> {
  key: string;
  value: V;
}

export type StoreOperation =
  | { type: 'put'; key: string; value: StoredValue }
  | { type: 'delete'; key: string }
  /** Remove every key starting with `prefix` */
  | { type: 'deletePrefix'; prefix: string };

/**
 * Synchronous view of the store inside update()
 */
export interface StoreReader {
  get(key: string): StoredValue | undefined;
}

export interface PlannedUpdate<T> {
  operations: ReadonlyArray<StoreOperation>;
  result: T;
}

export type UpdatePlan<T> = (current: StoreReader) => PlannedUpdate<T>;

export interface ScanFilter {
  /** Only keys starting with this prefix */
  prefix?: string;
}

export interface KeyValueStore {
  /** Namespace the store operates on */
  readonly namespace: string;

  /**
   * @returns The stored value, or undefined when the key does not exist
   */
  get(key: string): Promise<StoredValue | undefined>;

  /** Insert or replace */
  put(key: string, value: StoredValue): Promise<void>;

  /**
   * Atomic conditional insert
   *
   * @returns true if the value was written, false if the key already existed
   */
  putIfAbsent(key: string, value: StoredValue): Promise<boolean>;

  /**
   * @returns true if a value was removed
   */
  delete(key: string): Promise<boolean>;

  /**
   * Entries in ascending key order. Iteration reads the store; nothing is
   * read before the first `next()`.
   */
  scan(filter?: ScanFilter): AsyncIterable<StoreEntry>;

  /**
   * Atomic read-modify-write
   *
   * `plan` runs synchronously against the current content while no other
   * writer can interleave, and the operations it returns are applied in
   * order as one unit. If `plan` throws, nothing is written and its error
   * propagates unchanged.
   */
  update<T>(plan: UpdatePlan<T>): Promise<T>;

  close(): void;
}

/**
 * Exclusive upper bound for keys starting with `prefix`, valid for
 * keys made of BMP characters (callers encode identities)
 */
export function prefixUpperBound(prefix: string): string {
  return prefix + '\uffff';
}

export function matchesPrefix(key: string, filter?: ScanFilter): boolean {
  return filter?.prefix === undefined || key.startsWith(filter.prefix);
}
